/**
 * 引擎装配
 * 按配置组装 RoundManager 及其外部协作者 (权限、付款、归档)
 */

import { RoundManager } from './core/RoundManager.js';
import { SingleAuthority } from './core/authority.js';
import { LedgerPaymentGateway } from './payments/LedgerPaymentGateway.js';
import { RoundArchiveDatabase } from './db/Database.js';
import { getConfig } from './utils/config.js';
import { logger } from './utils/logger.js';
import type { TypedEventBus } from './utils/EventBus.js';
import type { DiceOracle, EngineConfig, PaymentGateway } from './types/index.js';

export interface CreateEngineOptions {
  config?: EngineConfig;
  payments?: PaymentGateway;
  diceOracle?: DiceOracle;
  /** 未指定时按 config.persistRounds 决定是否打开 SQLite 归档 */
  archive?: RoundArchiveDatabase | null;
  bus?: TypedEventBus;
  clock?: () => number;
}

export interface DicePoolEngine {
  manager: RoundManager;
  config: EngineConfig;
  payments: PaymentGateway;
  archive: RoundArchiveDatabase | null;
  close(): void;
}

export function createEngine(options: CreateEngineOptions = {}): DicePoolEngine {
  const config = options.config ?? getConfig();
  const payments = options.payments ?? new LedgerPaymentGateway();

  const ownsArchive = options.archive === undefined && config.persistRounds;
  const archive =
    options.archive !== undefined
      ? options.archive
      : config.persistRounds
        ? new RoundArchiveDatabase(config.dbPath)
        : null;

  let manager: RoundManager;
  try {
    // 有归档时会恢复上次的活跃轮次与引擎状态
    manager = new RoundManager({
      options: {
        minStake: config.minStake,
        feePercent: config.feePercent,
        refundShortfallPolicy: config.refundShortfallPolicy,
        historyCacheSize: config.historyCacheSize,
      },
      authority: new SingleAuthority(config.authority),
      payments,
      diceOracle: options.diceOracle,
      archive,
      bus: options.bus,
      clock: options.clock,
    });
  } catch (error) {
    if (ownsArchive && archive) {
      archive.close();
    }
    throw error;
  }

  logger.info('Dice pool engine ready', {
    archive: archive ? archive.getDbPath() : null,
    lastRoundId: manager.getRoundCount(),
  });

  return {
    manager,
    config,
    payments,
    archive,
    close(): void {
      if (ownsArchive && archive) {
        archive.close();
      }
    },
  };
}

export default createEngine;
