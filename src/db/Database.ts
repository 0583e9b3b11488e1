/**
 * 数据库管理模块
 * 使用 better-sqlite3 持久化轮次、引擎状态与事件日志
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { logger } from '../utils/logger.js';
import type {
  ArchiveCounters,
  ArchivedEvent,
  Bid,
  DeferredRefund,
  DiceRoll,
  EventRecord,
  PersistedEngineState,
  RoundArchive,
  RoundResult,
  RoundSnapshot,
  RoundState,
  Side,
  StateTransition,
} from '../types/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const ROUND_STATES: readonly RoundState[] = [
  'WAITING_FOR_BIDS',
  'EQUALIZING',
  'EQUALIZED',
  'PROCESSING',
  'PAYING_WINNERS',
  'FINISHED',
];

const SIDES: readonly Side[] = ['BIG', 'SMALL'];

const ENGINE_STATE_KEY = 'engine_state';

// ===== 行解析 =====

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function corrupt(field: string, value: unknown): Error {
  return new Error(`Corrupt archive value for ${field}: ${String(value)}`);
}

function readRow(value: unknown, table: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw corrupt(table, value);
  }
  return value;
}

function readNumber(row: Record<string, unknown>, key: string): number {
  const value = row[key];
  if (typeof value !== 'number') {
    throw corrupt(key, value);
  }
  return value;
}

function readString(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  if (typeof value !== 'string') {
    throw corrupt(key, value);
  }
  return value;
}

function parseState(value: unknown): RoundState {
  const state = ROUND_STATES.find((candidate) => candidate === value);
  if (!state) {
    throw corrupt('state', value);
  }
  return state;
}

function parseSide(value: unknown): Side {
  const side = SIDES.find((candidate) => candidate === value);
  if (!side) {
    throw corrupt('side', value);
  }
  return side;
}

function parseResult(value: unknown): RoundResult {
  return value === 'UNDETERMINED' ? 'UNDETERMINED' : parseSide(value);
}

function parseHistory(text: string): StateTransition[] {
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) {
    throw corrupt('history', text);
  }

  return parsed.map((entry: unknown) => {
    const item = readRow(entry, 'history');
    const transition: StateTransition = {
      from: parseState(item.from),
      to: parseState(item.to),
      event: readString(item, 'event'),
      timestamp: readNumber(item, 'timestamp'),
    };
    if (isRecord(item.data)) {
      transition.data = item.data;
    }
    return transition;
  });
}

function parseBid(value: unknown): Bid {
  const row = readRow(value, 'bids');
  return {
    id: readNumber(row, 'bid_id'),
    roundId: readNumber(row, 'round_id'),
    bettor: readString(row, 'bettor'),
    side: parseSide(row.side),
    stake: readNumber(row, 'stake'),
    originalStake: readNumber(row, 'original_stake'),
    fee: readNumber(row, 'fee'),
    won: readNumber(row, 'won') === 1,
    placedAt: readNumber(row, 'placed_at'),
  };
}

function parseDeferredRefund(value: unknown): DeferredRefund {
  const item = readRow(value, 'deferredRefunds');
  return {
    roundId: readNumber(item, 'roundId'),
    bidId: readNumber(item, 'bidId'),
    bettor: readString(item, 'bettor'),
    amount: readNumber(item, 'amount'),
    remainingStake: readNumber(item, 'remainingStake'),
    deferredAt: readNumber(item, 'deferredAt'),
  };
}

function parseEngineState(text: string): PersistedEngineState {
  const row = readRow(JSON.parse(text), ENGINE_STATE_KEY);
  const deferred = row.deferredRefunds;
  if (!Array.isArray(deferred)) {
    throw corrupt('deferredRefunds', deferred);
  }

  return {
    activeRoundId: row.activeRoundId === null ? null : readNumber(row, 'activeRoundId'),
    balance: readNumber(row, 'balance'),
    feesCollected: readNumber(row, 'feesCollected'),
    feePercent: readNumber(row, 'feePercent'),
    authority: readString(row, 'authority'),
    deferredRefunds: deferred.map((entry: unknown) => parseDeferredRefund(entry)),
  };
}

function eventRoundId(record: EventRecord): number | null {
  return 'roundId' in record.payload ? record.payload.roundId : null;
}

export class RoundArchiveDatabase implements RoundArchive {
  private db: Database.Database;
  private readonly dbPath: string;

  constructor(dbPath?: string) {
    this.dbPath = dbPath || process.env.DB_PATH || './data/rounds.db';

    // 确保数据目录存在
    if (this.dbPath !== ':memory:') {
      const dataDir = path.dirname(this.dbPath);
      if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
      }
    }

    logger.info(`Opening database at ${this.dbPath}`);
    this.db = new Database(this.dbPath);

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');

    this.initSchema();
  }

  /**
   * 初始化数据库 schema
   */
  private initSchema(): void {
    const schemaPath = path.join(__dirname, 'schema.sql');
    const schema = fs.readFileSync(schemaPath, 'utf-8');
    this.db.exec(schema);
    logger.info('Database schema initialized');
  }

  close(): void {
    this.db.close();
    logger.info('Database connection closed');
  }

  /**
   * 在一个事务内执行写入，任何异常都会回滚整批
   */
  atomically(work: () => void): void {
    this.db.transaction(work)();
  }

  // ===== 轮次 =====

  /**
   * 保存轮次及其下注 (覆盖同 id 的旧记录)
   */
  saveRound(round: RoundSnapshot): void {
    const roundStmt = this.db.prepare(`
      INSERT OR REPLACE INTO rounds (
        id, state, result, dice1, dice2, dice3, total_pips,
        big_pool_total, small_pool_total, next_bid_id, history,
        created_at, updated_at, finished_at
      ) VALUES (
        @id, @state, @result, @dice1, @dice2, @dice3, @totalPips,
        @bigPoolTotal, @smallPoolTotal, @nextBidId, @history,
        @createdAt, @updatedAt, @finishedAt
      )
    `);
    const clearBids = this.db.prepare('DELETE FROM bids WHERE round_id = ?');
    const bidStmt = this.db.prepare(`
      INSERT INTO bids (
        round_id, bid_id, bettor, side, stake, original_stake, fee, won, placed_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const transaction = this.db.transaction((snapshot: RoundSnapshot) => {
      roundStmt.run({
        id: snapshot.id,
        state: snapshot.state,
        result: snapshot.result,
        dice1: snapshot.dice[0],
        dice2: snapshot.dice[1],
        dice3: snapshot.dice[2],
        totalPips: snapshot.totalPips,
        bigPoolTotal: snapshot.bigPoolTotal,
        smallPoolTotal: snapshot.smallPoolTotal,
        nextBidId: snapshot.nextBidId,
        history: JSON.stringify(snapshot.history),
        createdAt: snapshot.createdAt,
        updatedAt: snapshot.updatedAt,
        finishedAt: snapshot.finishedAt ?? null,
      });

      clearBids.run(snapshot.id);
      for (const bid of snapshot.bids) {
        bidStmt.run(
          snapshot.id,
          bid.id,
          bid.bettor,
          bid.side,
          bid.stake,
          bid.originalStake,
          bid.fee,
          bid.won ? 1 : 0,
          bid.placedAt
        );
      }
    });

    transaction(round);
    logger.debug(`Archived round ${round.id} with ${round.bids.length} bids`);
  }

  loadRound(id: number): RoundSnapshot | null {
    const found: unknown = this.db.prepare('SELECT * FROM rounds WHERE id = ?').get(id);
    if (found === undefined) {
      return null;
    }

    const row = readRow(found, 'rounds');
    const bids = this.db
      .prepare('SELECT * FROM bids WHERE round_id = ? ORDER BY bid_id')
      .all(id)
      .map((bidRow: unknown) => parseBid(bidRow));

    const dice: DiceRoll = [readNumber(row, 'dice1'), readNumber(row, 'dice2'), readNumber(row, 'dice3')];

    const snapshot: RoundSnapshot = {
      id: readNumber(row, 'id'),
      state: parseState(row.state),
      result: parseResult(row.result),
      dice,
      totalPips: readNumber(row, 'total_pips'),
      bigPoolTotal: readNumber(row, 'big_pool_total'),
      smallPoolTotal: readNumber(row, 'small_pool_total'),
      bidIds: bids.map((bid) => bid.id),
      bids,
      nextBidId: readNumber(row, 'next_bid_id'),
      history: parseHistory(readString(row, 'history')),
      createdAt: readNumber(row, 'created_at'),
      updatedAt: readNumber(row, 'updated_at'),
    };
    if (row.finished_at !== null) {
      snapshot.finishedAt = readNumber(row, 'finished_at');
    }
    return snapshot;
  }

  countRounds(): number {
    const row = readRow(this.db.prepare('SELECT COUNT(*) AS count FROM rounds').get(), 'rounds');
    return readNumber(row, 'count');
  }

  // ===== 事件日志 =====

  appendEvents(records: readonly EventRecord[]): void {
    const stmt = this.db.prepare(`
      INSERT INTO events (sequence, name, round_id, payload, recorded_at)
      VALUES (?, ?, ?, ?, ?)
    `);

    const transaction = this.db.transaction((items: readonly EventRecord[]) => {
      for (const record of items) {
        stmt.run(
          record.sequence,
          record.name,
          eventRoundId(record),
          JSON.stringify(record.payload),
          record.recordedAt
        );
      }
    });

    transaction(records);
    logger.debug(`Archived ${records.length} events`);
  }

  /**
   * 按序号读取事件，可按轮次过滤
   */
  getEvents(roundId?: number): ArchivedEvent[] {
    const rows =
      roundId === undefined
        ? this.db.prepare('SELECT * FROM events ORDER BY sequence').all()
        : this.db.prepare('SELECT * FROM events WHERE round_id = ? ORDER BY sequence').all(roundId);

    return rows.map((value: unknown) => {
      const row = readRow(value, 'events');
      const payload: unknown = JSON.parse(readString(row, 'payload'));
      return {
        sequence: readNumber(row, 'sequence'),
        name: readString(row, 'name'),
        roundId: row.round_id === null ? null : readNumber(row, 'round_id'),
        payload,
        recordedAt: readNumber(row, 'recorded_at'),
      };
    });
  }

  /**
   * 读取已归档的最大轮次 id 与事件序号
   */
  loadCounters(): ArchiveCounters {
    const row = readRow(
      this.db
        .prepare(
          `SELECT
            MAX(
              (SELECT COALESCE(MAX(id), 0) FROM rounds),
              (SELECT COALESCE(MAX(round_id), 0) FROM events)
            ) AS lastRoundId,
            (SELECT COALESCE(MAX(sequence), 0) FROM events) AS lastEventSequence`
        )
        .get(),
      'counters'
    );

    return {
      lastRoundId: readNumber(row, 'lastRoundId'),
      lastEventSequence: readNumber(row, 'lastEventSequence'),
    };
  }

  // ===== 引擎状态 =====

  saveEngineState(state: PersistedEngineState): void {
    this.setSystemState(ENGINE_STATE_KEY, JSON.stringify(state));
  }

  loadEngineState(): PersistedEngineState | null {
    const text = this.getSystemState(ENGINE_STATE_KEY);
    return text === null ? null : parseEngineState(text);
  }

  // ===== 系统状态 =====

  getSystemState(key: string): string | null {
    const found: unknown = this.db.prepare('SELECT value FROM system_state WHERE key = ?').get(key);
    if (found === undefined) {
      return null;
    }
    return readString(readRow(found, 'system_state'), 'value');
  }

  setSystemState(key: string, value: string): void {
    this.db
      .prepare(
        `
      INSERT OR REPLACE INTO system_state (key, value, updated_at)
      VALUES (?, ?, datetime('now'))
    `
      )
      .run(key, value);
  }

  getDbPath(): string {
    return this.dbPath;
  }
}

// 单例实例
let dbInstance: RoundArchiveDatabase | null = null;

export function getDatabase(dbPath?: string): RoundArchiveDatabase {
  if (!dbInstance) {
    dbInstance = new RoundArchiveDatabase(dbPath);
  }
  return dbInstance;
}

export function closeDatabase(): void {
  if (dbInstance) {
    dbInstance.close();
    dbInstance = null;
  }
}

export default RoundArchiveDatabase;
