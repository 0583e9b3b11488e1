/**
 * 结算引擎
 * 纯计算: 资金池平衡 (部分退款) 与派彩分配，不修改输入、不触发状态转换
 */

import { InvalidDiceValueError, PoolImbalanceError } from './errors.js';
import type {
  Bid,
  DiceRoll,
  EqualizationOutcome,
  Payout,
  RoundResult,
  Side,
  StakeRefund,
} from '../types/index.js';

// 小: 3 - 10 点，大: 11 - 18 点
const SMALL_MAX_PIPS = 10;

/**
 * 校验三颗骰子，每颗须为 1 - 6 的整数
 */
export function assertValidDice(dice: readonly number[]): asserts dice is DiceRoll {
  const valid =
    dice.length === 3 &&
    dice.every((value) => Number.isInteger(value) && value >= 1 && value <= 6);
  if (!valid) {
    throw new InvalidDiceValueError(dice);
  }
}

/**
 * 根据总点数判定结果
 */
export function classifyRoll(totalPips: number): Side {
  return totalPips >= 3 && totalPips <= SMALL_MAX_PIPS ? 'SMALL' : 'BIG';
}

/**
 * 平衡双方资金池
 *
 * 较大的一方 (heavy side) 的资金池减少 |big - small|，差额按下注的逆序
 * 从最近的下注开始退还，直到差额耗尽；较小一方的下注不受影响。
 *
 * 例如: BIG = 300 (#1:100, #2:100, #3:100), SMALL = 100
 *       差额 200 → #3 退 100, #2 退 100, #1 不变 → 100 / 100
 */
export function equalize(
  bigPoolTotal: number,
  smallPoolTotal: number,
  orderedBids: readonly Bid[]
): EqualizationOutcome {
  if (bigPoolTotal === smallPoolTotal) {
    return { bigPoolTotal, smallPoolTotal, heavySide: null, deficit: 0, refunds: [] };
  }

  const heavySide: Side = bigPoolTotal > smallPoolTotal ? 'BIG' : 'SMALL';
  const deficit = Math.abs(bigPoolTotal - smallPoolTotal);
  const refunds: StakeRefund[] = [];
  let remainingDeficit = deficit;

  // 逆序遍历: 后下注者先承担退款
  for (let i = orderedBids.length - 1; i >= 0 && remainingDeficit > 0; i--) {
    const bid = orderedBids[i];
    if (bid.side !== heavySide) {
      continue;
    }

    const refund = Math.min(remainingDeficit, bid.stake);
    remainingDeficit -= refund;

    if (refund > 0) {
      refunds.push({
        bidId: bid.id,
        bettor: bid.bettor,
        side: bid.side,
        amount: refund,
        remainingStake: bid.stake - refund,
      });
    }
  }

  if (remainingDeficit > 0) {
    throw new PoolImbalanceError(
      `${heavySide} pool stakes cannot absorb deficit ${deficit} (${remainingDeficit} left)`
    );
  }

  return {
    bigPoolTotal: heavySide === 'BIG' ? bigPoolTotal - deficit : bigPoolTotal,
    smallPoolTotal: heavySide === 'SMALL' ? smallPoolTotal - deficit : smallPoolTotal,
    heavySide,
    deficit,
    refunds,
  };
}

/**
 * 计算派彩
 *
 * 押中一方的下注获得 2 × stake (本金 + 等额来自输方资金池)，其余为 0。
 * 按 bid id 顺序返回每一笔下注。
 */
export function computePayouts(result: RoundResult, orderedBids: readonly Bid[]): Payout[] {
  return orderedBids.map((bid) => {
    const won = result !== 'UNDETERMINED' && bid.side === result;
    return {
      bidId: bid.id,
      bettor: bid.bettor,
      side: bid.side,
      stake: bid.stake,
      amount: won ? bid.stake * 2 : 0,
      won,
    };
  });
}
