/**
 * RoundArchiveDatabase 单元测试
 *
 * 使用内存 SQLite (:memory:)
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

// Mock logger
vi.mock('../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
  logSettlement: vi.fn(),
}));

import { RoundArchiveDatabase } from '../src/db/Database.js';
import { RoundManager } from '../src/core/RoundManager.js';
import { SingleAuthority } from '../src/core/authority.js';
import { LedgerPaymentGateway } from '../src/payments/LedgerPaymentGateway.js';
import { TypedEventBus } from '../src/utils/EventBus.js';
import type { EventRecord, RoundSnapshot } from '../src/types/index.js';

const createSnapshot = (overrides: Partial<RoundSnapshot> = {}): RoundSnapshot => ({
  id: 3,
  state: 'FINISHED',
  result: 'BIG',
  dice: [6, 5, 4],
  totalPips: 15,
  bigPoolTotal: 100,
  smallPoolTotal: 100,
  bidIds: [1, 2],
  bids: [
    {
      id: 1,
      roundId: 3,
      bettor: 'alice',
      side: 'BIG',
      stake: 100,
      originalStake: 300,
      fee: 6,
      won: true,
      placedAt: 1100,
    },
    {
      id: 2,
      roundId: 3,
      bettor: 'bob',
      side: 'SMALL',
      stake: 100,
      originalStake: 100,
      fee: 2,
      won: false,
      placedAt: 1200,
    },
  ],
  nextBidId: 3,
  history: [
    {
      from: 'WAITING_FOR_BIDS',
      to: 'EQUALIZING',
      event: 'equalize_started',
      timestamp: 1300,
    },
    {
      from: 'EQUALIZING',
      to: 'EQUALIZED',
      event: 'pools_equalized',
      timestamp: 1300,
      data: { heavySide: 'BIG', deficit: 200, refunds: 1 },
    },
  ],
  createdAt: 1000,
  updatedAt: 1500,
  finishedAt: 1500,
  ...overrides,
});

const createEvents = (): EventRecord[] => [
  {
    sequence: 1,
    name: 'round:created',
    payload: { roundId: 4, state: 'WAITING_FOR_BIDS', createdAt: 2000 },
    recordedAt: 2000,
  },
  {
    sequence: 2,
    name: 'config:fee_updated',
    payload: { previous: 2, next: 3 },
    recordedAt: 2100,
  },
  {
    sequence: 3,
    name: 'bid:placed',
    payload: { bidId: 1, roundId: 4, bettor: 'carol', netStake: 97, fee: 3, side: 'SMALL' },
    recordedAt: 2200,
  },
];

describe('RoundArchiveDatabase', () => {
  let db: RoundArchiveDatabase;

  beforeEach(() => {
    db = new RoundArchiveDatabase(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  describe('轮次', () => {
    it('应该完整保存并读取轮次', () => {
      const snapshot = createSnapshot();

      db.saveRound(snapshot);

      expect(db.loadRound(3)).toEqual(snapshot);
      expect(db.countRounds()).toBe(1);
    });

    it('未结束的轮次没有 finishedAt', () => {
      db.saveRound(createSnapshot({ state: 'WAITING_FOR_BIDS', finishedAt: undefined }));

      const loaded = db.loadRound(3);
      expect(loaded?.state).toBe('WAITING_FOR_BIDS');
      expect(loaded && 'finishedAt' in loaded).toBe(false);
    });

    it('重复保存应该覆盖下注', () => {
      db.saveRound(createSnapshot());
      const [first] = createSnapshot().bids;
      db.saveRound(createSnapshot({ bidIds: [1], bids: [first], smallPoolTotal: 0 }));

      const loaded = db.loadRound(3);
      expect(loaded?.bidIds).toEqual([1]);
      expect(loaded?.smallPoolTotal).toBe(0);
      expect(db.countRounds()).toBe(1);
    });

    it('未知轮次返回 null', () => {
      expect(db.loadRound(99)).toBeNull();
    });
  });

  describe('事件日志', () => {
    it('应该按序号读取事件并可按轮次过滤', () => {
      db.appendEvents(createEvents());

      const all = db.getEvents();
      expect(all.map((event) => event.sequence)).toEqual([1, 2, 3]);
      expect(all[1]).toEqual({
        sequence: 2,
        name: 'config:fee_updated',
        roundId: null,
        payload: { previous: 2, next: 3 },
        recordedAt: 2100,
      });

      expect(db.getEvents(4).map((event) => event.name)).toEqual(['round:created', 'bid:placed']);
    });

    it('loadCounters 应该返回最大轮次 id 与事件序号', () => {
      expect(db.loadCounters()).toEqual({ lastRoundId: 0, lastEventSequence: 0 });

      db.saveRound(createSnapshot());
      db.appendEvents(createEvents());

      expect(db.loadCounters()).toEqual({ lastRoundId: 4, lastEventSequence: 3 });
    });
  });

  describe('引擎状态', () => {
    it('未保存时返回 null', () => {
      expect(db.loadEngineState()).toBeNull();
    });

    it('应该保存并读取引擎状态', () => {
      const state = {
        activeRoundId: 4,
        balance: 1100,
        feesCollected: 30,
        feePercent: 3,
        authority: 'next-authority',
        deferredRefunds: [
          { roundId: 3, bidId: 1, bettor: 'alice', amount: 100, remainingStake: 0, deferredAt: 1000 },
        ],
      };

      db.saveEngineState(state);
      db.saveEngineState({ ...state, activeRoundId: null });

      expect(db.loadEngineState()).toEqual({ ...state, activeRoundId: null });
    });

    it('损坏的引擎状态应该报错', () => {
      db.setSystemState('engine_state', JSON.stringify({ activeRoundId: 1, balance: 'lots', deferredRefunds: [] }));

      expect(() => db.loadEngineState()).toThrow('Corrupt archive value for balance: lots');
    });
  });

  describe('atomically', () => {
    it('异常时应该回滚整批写入', () => {
      expect(() =>
        db.atomically(() => {
          db.saveRound(createSnapshot());
          db.appendEvents(createEvents());
          throw new Error('disk full');
        })
      ).toThrow('disk full');

      expect(db.countRounds()).toBe(0);
      expect(db.getEvents()).toEqual([]);
    });

    it('成功时应该提交全部写入', () => {
      db.atomically(() => {
        db.saveRound(createSnapshot());
        db.appendEvents(createEvents());
      });

      expect(db.countRounds()).toBe(1);
      expect(db.getEvents()).toHaveLength(3);
    });
  });

  describe('系统状态', () => {
    it('应该读写系统状态', () => {
      expect(db.getSystemState('schema_version')).toBeNull();

      db.setSystemState('schema_version', '1.0.0');
      db.setSystemState('schema_version', '1.1.0');

      expect(db.getSystemState('schema_version')).toBe('1.1.0');
    });
  });

  describe('与 RoundManager 集成', () => {
    it('被移出缓存的轮次应该从数据库读取', () => {
      const manager = new RoundManager({
        options: { minStake: 0, feePercent: 0, refundShortfallPolicy: 'defer', historyCacheSize: 1 },
        authority: new SingleAuthority('test-authority'),
        payments: new LedgerPaymentGateway(),
        archive: db,
        bus: new TypedEventBus(),
      });

      manager.createRound('test-authority');
      manager.placeBid('alice', 1, 'BIG', 100);
      manager.placeBid('bob', 1, 'SMALL', 100);
      manager.equalizeBids('test-authority', 1);
      const first = manager.processRound('test-authority', 1, 2, 3);
      manager.equalizeBids('test-authority', 2);
      manager.processRound('test-authority', 1, 2, 3);

      expect(manager.getRound(1)).toEqual(first.round);
      expect(manager.getBid(1, 2)).toMatchObject({ bettor: 'bob', won: true, finished: true });
      // 两个已结束轮次加上活跃的第 3 轮
      expect(db.countRounds()).toBe(3);
      expect(db.loadRound(3)?.state).toBe('WAITING_FOR_BIDS');
      expect(db.loadEngineState()).toMatchObject({ activeRoundId: 3, balance: 0 });

      // 第 1 轮已移出缓存，内存日志从第 2 轮创建开始，完整日志在数据库中
      expect(db.getEvents().map((event) => event.sequence)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
      expect(manager.getEventLog().map((record) => record.sequence)).toEqual([7, 8, 9]);
      expect(manager.getEventLog()[0]).toMatchObject({ name: 'round:created', payload: { roundId: 2 } });
    });
  });
});
