/**
 * 数据库迁移脚本
 * 运行: npm run db:migrate
 */

import dotenv from 'dotenv';
import { getDatabase, closeDatabase } from './Database.js';
import { logger } from '../utils/logger.js';

dotenv.config();

const SCHEMA_VERSION = '1.0.0';

async function migrate(): Promise<void> {
  logger.info('Starting database migration...');

  try {
    const db = getDatabase();

    // Schema 已在构造函数中初始化
    db.setSystemState('schema_version', SCHEMA_VERSION);
    db.setSystemState('last_migration', new Date().toISOString());

    logger.info('Database migration completed successfully');
    logger.info(`Database path: ${db.getDbPath()}`);
    logger.info('Archive statistics', {
      rounds: db.countRounds(),
      ...db.loadCounters(),
    });
  } catch (error) {
    logger.error('Migration failed', { error: error instanceof Error ? error.message : String(error) });
    throw error;
  } finally {
    closeDatabase();
  }
}

migrate().catch((error: unknown) => {
  logger.error('Migration error', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
