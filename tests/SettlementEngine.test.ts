/**
 * SettlementEngine 单元测试
 *
 * 资金池平衡、派彩计算、点数判定与骰子校验
 */

import { describe, it, expect } from 'vitest';
import {
  assertValidDice,
  classifyRoll,
  computePayouts,
  equalize,
} from '../src/core/SettlementEngine.js';
import { InvalidDiceValueError, PoolImbalanceError } from '../src/core/errors.js';
import type { Bid, Side } from '../src/types/index.js';

const makeBid = (id: number, side: Side, stake: number): Bid => ({
  id,
  roundId: 1,
  bettor: `bettor-${id}`,
  side,
  stake,
  originalStake: stake,
  fee: 0,
  won: false,
  placedAt: 0,
});

describe('SettlementEngine', () => {
  describe('equalize', () => {
    it('BIG 300 对 SMALL 100 时应该从最近的下注开始退款', () => {
      const bids = [
        makeBid(1, 'BIG', 100),
        makeBid(2, 'BIG', 100),
        makeBid(3, 'BIG', 100),
        makeBid(4, 'SMALL', 100),
      ];

      const outcome = equalize(300, 100, bids);

      expect(outcome.heavySide).toBe('BIG');
      expect(outcome.deficit).toBe(200);
      expect(outcome.bigPoolTotal).toBe(100);
      expect(outcome.smallPoolTotal).toBe(100);
      expect(outcome.refunds).toEqual([
        { bidId: 3, bettor: 'bettor-3', side: 'BIG', amount: 100, remainingStake: 0 },
        { bidId: 2, bettor: 'bettor-2', side: 'BIG', amount: 100, remainingStake: 0 },
      ]);
    });

    it('差额不足一整笔下注时应该部分退款', () => {
      const bids = [makeBid(1, 'BIG', 100), makeBid(2, 'BIG', 150), makeBid(3, 'SMALL', 200)];

      const outcome = equalize(250, 200, bids);

      expect(outcome.refunds).toEqual([
        { bidId: 2, bettor: 'bettor-2', side: 'BIG', amount: 50, remainingStake: 100 },
      ]);
      expect(outcome.bigPoolTotal).toBe(200);
      expect(outcome.smallPoolTotal).toBe(200);
    });

    it('应该跳过较小一方的下注', () => {
      const bids = [makeBid(1, 'BIG', 100), makeBid(2, 'SMALL', 50), makeBid(3, 'BIG', 30)];

      const outcome = equalize(130, 50, bids);

      expect(outcome.refunds.map((refund) => [refund.bidId, refund.amount, refund.remainingStake])).toEqual([
        [3, 30, 0],
        [1, 50, 50],
      ]);
    });

    it('SMALL 较大时应该退还 SMALL 一方', () => {
      const bids = [makeBid(1, 'SMALL', 400), makeBid(2, 'BIG', 100)];

      const outcome = equalize(100, 400, bids);

      expect(outcome.heavySide).toBe('SMALL');
      expect(outcome.smallPoolTotal).toBe(100);
      expect(outcome.refunds).toEqual([
        { bidId: 1, bettor: 'bettor-1', side: 'SMALL', amount: 300, remainingStake: 100 },
      ]);
    });

    it('资金池相等时不应该退款', () => {
      const bids = [makeBid(1, 'BIG', 100), makeBid(2, 'SMALL', 100)];

      expect(equalize(100, 100, bids)).toEqual({
        bigPoolTotal: 100,
        smallPoolTotal: 100,
        heavySide: null,
        deficit: 0,
        refunds: [],
      });
    });

    it('应该跳过 stake 为 0 的下注', () => {
      const bids = [makeBid(1, 'BIG', 100), makeBid(2, 'BIG', 0), makeBid(3, 'SMALL', 60)];

      const outcome = equalize(100, 60, bids);

      expect(outcome.refunds).toEqual([
        { bidId: 1, bettor: 'bettor-1', side: 'BIG', amount: 40, remainingStake: 60 },
      ]);
    });

    it('不应该修改输入的下注', () => {
      const bids = [makeBid(1, 'BIG', 300), makeBid(2, 'SMALL', 100)];

      equalize(300, 100, bids);

      expect(bids[0].stake).toBe(300);
      expect(bids[1].stake).toBe(100);
    });

    it('下注无法覆盖差额时应该抛出 PoolImbalanceError', () => {
      const bids = [makeBid(1, 'BIG', 100), makeBid(2, 'SMALL', 50)];

      expect(() => equalize(300, 50, bids)).toThrow(PoolImbalanceError);
    });
  });

  describe('computePayouts', () => {
    it('押中一方应该获得两倍 stake', () => {
      const bids = [makeBid(1, 'BIG', 50), makeBid(2, 'SMALL', 50)];

      expect(computePayouts('BIG', bids)).toEqual([
        { bidId: 1, bettor: 'bettor-1', side: 'BIG', stake: 50, amount: 100, won: true },
        { bidId: 2, bettor: 'bettor-2', side: 'SMALL', stake: 50, amount: 0, won: false },
      ]);
    });

    it('stake 已全部退还的赢家应该标记为 won 但金额为 0', () => {
      const bids = [makeBid(1, 'SMALL', 0), makeBid(2, 'SMALL', 80), makeBid(3, 'BIG', 80)];

      const payouts = computePayouts('SMALL', bids);

      expect(payouts[0]).toMatchObject({ bidId: 1, won: true, amount: 0 });
      expect(payouts[1]).toMatchObject({ bidId: 2, won: true, amount: 160 });
      expect(payouts[2]).toMatchObject({ bidId: 3, won: false, amount: 0 });
    });

    it('结果未定时没有赢家', () => {
      const payouts = computePayouts('UNDETERMINED', [makeBid(1, 'BIG', 10)]);
      expect(payouts[0].won).toBe(false);
      expect(payouts[0].amount).toBe(0);
    });
  });

  describe('classifyRoll', () => {
    it('3 - 10 点判定为 SMALL', () => {
      expect(classifyRoll(3)).toBe('SMALL');
      expect(classifyRoll(10)).toBe('SMALL');
    });

    it('11 - 18 点判定为 BIG', () => {
      expect(classifyRoll(11)).toBe('BIG');
      expect(classifyRoll(18)).toBe('BIG');
    });
  });

  describe('assertValidDice', () => {
    it('应该接受 1 - 6 的整数', () => {
      expect(() => assertValidDice([1, 6, 3])).not.toThrow();
    });

    it.each([
      [[0, 1, 1]],
      [[1, 7, 1]],
      [[1, 2, 2.5]],
      [[1, 2]],
      [[1, 2, 3, 4]],
    ])('应该拒绝 %j', (dice) => {
      expect(() => assertValidDice(dice)).toThrow(InvalidDiceValueError);
    });
  });
});
