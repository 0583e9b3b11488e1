/**
 * 轮次管理器
 * 管理唯一活跃轮次的生命周期: 创建、下注、平衡、开奖派彩，结束后自动开启下一轮
 *
 * 每个修改状态的操作都是原子的: 操作开始前对活跃轮次和引擎状态做快照，
 * 事件与转账先暂存，操作末尾整批交给付款网关；任何异常 (包括付款失败)
 * 都会恢复快照并丢弃暂存内容。
 *
 * 配置归档时，每次提交都在同一事务中写入活跃轮次、引擎状态和新事件，
 * 重启后从归档恢复活跃轮次、余额与待付退款。
 */

import { v4 as uuidv4 } from 'uuid';
import { logger, logSettlement } from '../utils/logger.js';
import { eventBus as defaultEventBus, type TypedEventBus } from '../utils/EventBus.js';
import { RoundStateMachine } from './RoundStateMachine.js';
import { assertValidDice, classifyRoll, computePayouts, equalize } from './SettlementEngine.js';
import {
  BelowMinimumStakeError,
  BidNotFoundError,
  DiceOracleUnavailableError,
  InsufficientBalanceError,
  InvalidParameterError,
  InvalidRoundStateError,
  PaymentFailedError,
  PoolImbalanceError,
  RoundAlreadyActiveError,
  RoundNotFoundError,
  UnauthorizedError,
} from './errors.js';
import type {
  AuthorityPolicy,
  BalanceSummary,
  Bid,
  BidDetail,
  BidReceipt,
  DeferredRefund,
  DiceOracle,
  DiceRoll,
  EngineEventName,
  EngineEventPayload,
  EngineEvents,
  EventRecord,
  PaymentGateway,
  Payout,
  PersistedEngineState,
  ProcessOutcome,
  Round,
  RoundArchive,
  RoundManagerOptions,
  RoundSnapshot,
  RoundState,
  Side,
  StakeRefund,
  Transfer,
} from '../types/index.js';

// amount × feePercent 须保持在安全整数范围内
export const MAX_STAKE = Math.floor(Number.MAX_SAFE_INTEGER / 100);

export interface RoundManagerDeps {
  options: RoundManagerOptions;
  authority: AuthorityPolicy;
  payments: PaymentGateway;
  diceOracle?: DiceOracle;
  archive?: RoundArchive | null;
  bus?: TypedEventBus;
  clock?: () => number;
}

interface EngineState {
  activeRoundId: number | null;
  lastRoundId: number;
  balance: number;
  feesCollected: number;
  feePercent: number;
  deferredRefunds: DeferredRefund[];
}

interface StateSnapshot {
  state: EngineState;
  activeRound: Round | null;
}

interface PendingEvent {
  name: EngineEventName;
  payload: EngineEventPayload;
  dispatch: () => void;
}

/**
 * 单个操作内暂存的事件、转账和已结束轮次
 */
class OperationContext {
  readonly events: PendingEvent[] = [];
  readonly transfers: Transfer[] = [];
  readonly finishedRounds: Round[] = [];

  constructor(
    readonly name: string,
    private readonly bus: TypedEventBus
  ) {}

  emit<K extends keyof EngineEvents>(event: K, payload: EngineEvents[K]): void {
    this.events.push({
      name: event,
      payload,
      dispatch: () => this.bus.emitEvent(event, payload),
    });
  }
}

function copyDice(dice: DiceRoll): DiceRoll {
  return [dice[0], dice[1], dice[2]];
}

function createEmptyRound(id: number, now: number): Round {
  return {
    id,
    state: 'WAITING_FOR_BIDS',
    result: 'UNDETERMINED',
    dice: [0, 0, 0],
    totalPips: 0,
    bigPoolTotal: 0,
    smallPoolTotal: 0,
    bids: new Map(),
    nextBidId: 1,
    history: [],
    createdAt: now,
    updatedAt: now,
  };
}

/**
 * 生成轮次快照 (深拷贝)
 */
export function toSnapshot(round: Round): RoundSnapshot {
  const { bids, ...rest } = structuredClone(round);
  const bidList = [...bids.values()];
  return {
    ...rest,
    bidIds: bidList.map((bid) => bid.id),
    bids: bidList,
  };
}

function fromSnapshot(snapshot: RoundSnapshot): Round {
  const copy = structuredClone(snapshot);
  return {
    id: copy.id,
    state: copy.state,
    result: copy.result,
    dice: copy.dice,
    totalPips: copy.totalPips,
    bigPoolTotal: copy.bigPoolTotal,
    smallPoolTotal: copy.smallPoolTotal,
    bids: new Map(copy.bids.map((bid): [number, Bid] => [bid.id, bid])),
    nextBidId: copy.nextBidId,
    history: copy.history,
    createdAt: copy.createdAt,
    updatedAt: copy.updatedAt,
  };
}

function eventRoundId(record: EventRecord): number | null {
  return 'roundId' in record.payload ? record.payload.roundId : null;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RoundManager {
  private readonly options: RoundManagerOptions;
  private readonly authority: AuthorityPolicy;
  private readonly payments: PaymentGateway;
  private readonly diceOracle: DiceOracle | null;
  private readonly archive: RoundArchive | null;
  private readonly bus: TypedEventBus;
  private readonly clock: () => number;
  private readonly stateMachine: RoundStateMachine;

  private rounds: Map<number, Round> = new Map();
  private journal: EventRecord[] = [];
  private unarchived: Set<number> = new Set();
  private unarchivedEvents: EventRecord[] = [];
  private eventSequence: number = 0;
  private state: EngineState;

  constructor(deps: RoundManagerDeps) {
    const { minStake, feePercent, historyCacheSize } = deps.options;
    if (!Number.isSafeInteger(minStake) || minStake < 0) {
      throw new InvalidParameterError('minStake', minStake);
    }
    if (!Number.isInteger(feePercent) || feePercent < 0 || feePercent > 100) {
      throw new InvalidParameterError('feePercent', feePercent);
    }
    if (!Number.isInteger(historyCacheSize) || historyCacheSize < 1) {
      throw new InvalidParameterError('historyCacheSize', historyCacheSize);
    }

    this.options = { ...deps.options };
    this.authority = deps.authority;
    this.payments = deps.payments;
    this.diceOracle = deps.diceOracle ?? null;
    this.archive = deps.archive ?? null;
    this.bus = deps.bus ?? defaultEventBus;
    this.clock = deps.clock ?? Date.now;
    this.stateMachine = new RoundStateMachine(this.clock);

    // 从归档恢复计数器，保证轮次 id 与事件序号在重启后不重复
    const counters = this.archive?.loadCounters() ?? { lastRoundId: 0, lastEventSequence: 0 };
    const saved = this.archive?.loadEngineState() ?? null;
    this.eventSequence = counters.lastEventSequence;
    this.state = {
      activeRoundId: null,
      lastRoundId: counters.lastRoundId,
      balance: saved?.balance ?? 0,
      feesCollected: saved?.feesCollected ?? 0,
      feePercent: saved?.feePercent ?? feePercent,
      deferredRefunds: saved?.deferredRefunds ?? [],
    };
    if (saved) {
      this.resume(saved);
    }

    logger.info('RoundManager initialized', {
      minStake,
      feePercent: `${feePercent}%`,
      refundShortfallPolicy: this.options.refundShortfallPolicy,
      archive: this.archive !== null,
      lastRoundId: counters.lastRoundId,
    });
  }

  // ===== 生命周期操作 =====

  /**
   * 创建新轮次 (仅管理者)
   */
  createRound(caller: string): RoundSnapshot {
    this.requireAuthority(caller, 'createRound');

    return this.run('createRound', (op) => {
      if (this.state.activeRoundId !== null) {
        throw new RoundAlreadyActiveError(this.state.activeRoundId);
      }
      return toSnapshot(this.openNextRound(op));
    });
  }

  /**
   * 下注: 扣除手续费后计入对应资金池
   */
  placeBid(caller: string, roundId: number, side: Side, amount: number): BidReceipt {
    return this.run('placeBid', (op) => {
      const round = this.requireMutableRound(roundId, 'WAITING_FOR_BIDS', 'placeBid');

      if (caller.length === 0) {
        throw new InvalidParameterError('bettor', caller);
      }
      if (side !== 'BIG' && side !== 'SMALL') {
        throw new InvalidParameterError('side', side);
      }
      if (!Number.isSafeInteger(amount) || amount < 0 || amount > MAX_STAKE) {
        throw new InvalidParameterError('amount', amount);
      }
      if (amount <= this.options.minStake) {
        throw new BelowMinimumStakeError(amount, this.options.minStake);
      }
      // 余额包含全部资金池，余额安全则池总额与派彩 (2 × stake) 均安全
      if (!Number.isSafeInteger(this.state.balance + amount)) {
        throw new InvalidParameterError('amount', amount);
      }

      const fee = Math.floor((amount * this.state.feePercent) / 100);
      const netStake = amount - fee;
      const now = this.clock();

      const bid: Bid = {
        id: round.nextBidId,
        roundId: round.id,
        bettor: caller,
        side,
        stake: netStake,
        originalStake: netStake,
        fee,
        won: false,
        placedAt: now,
      };

      round.bids.set(bid.id, bid);
      round.nextBidId += 1;
      if (side === 'BIG') {
        round.bigPoolTotal += netStake;
      } else {
        round.smallPoolTotal += netStake;
      }
      round.updatedAt = now;

      // 全额进入系统余额，手续费留存
      this.state.balance += amount;
      this.state.feesCollected += fee;

      logger.info('Bid placed', {
        roundId: round.id,
        bidId: bid.id,
        bettor: caller,
        side,
        netStake,
        fee,
      });

      op.emit('bid:placed', {
        bidId: bid.id,
        roundId: round.id,
        bettor: caller,
        netStake,
        fee,
        side,
      });

      return { success: true, roundId: round.id, bidId: bid.id, bettor: caller, netStake, fee };
    });
  }

  /**
   * 平衡资金池 (仅管理者)
   */
  equalizeBids(caller: string, roundId: number): RoundSnapshot {
    this.requireAuthority(caller, 'equalizeBids');

    return this.run('equalizeBids', (op) => {
      const round = this.requireMutableRound(roundId, 'WAITING_FOR_BIDS', 'equalizeBids');
      this.stateMachine.transition(round, 'EQUALIZING', 'equalize_started');

      if (round.bigPoolTotal === 0 && round.smallPoolTotal === 0) {
        this.stateMachine.transition(round, 'EQUALIZED', 'empty_round');
        logger.info('Round has no stakes, nothing to equalize', { roundId: round.id });
        return toSnapshot(round);
      }

      const outcome = equalize(round.bigPoolTotal, round.smallPoolTotal, [...round.bids.values()]);

      for (const refund of outcome.refunds) {
        const bid = round.bids.get(refund.bidId);
        if (!bid) {
          throw new BidNotFoundError(round.id, refund.bidId);
        }
        bid.stake = refund.remainingStake;
        this.payRefund(op, round.id, refund);
      }

      round.bigPoolTotal = outcome.bigPoolTotal;
      round.smallPoolTotal = outcome.smallPoolTotal;

      this.stateMachine.transition(round, 'EQUALIZED', 'pools_equalized', {
        heavySide: outcome.heavySide,
        deficit: outcome.deficit,
        refunds: outcome.refunds.length,
      });

      logger.info('Round equalized', {
        roundId: round.id,
        heavySide: outcome.heavySide,
        deficit: outcome.deficit,
        bigPoolTotal: round.bigPoolTotal,
        smallPoolTotal: round.smallPoolTotal,
      });

      op.emit('round:equalized', {
        roundId: round.id,
        state: round.state,
        bigPoolTotal: round.bigPoolTotal,
        smallPoolTotal: round.smallPoolTotal,
      });

      return toSnapshot(round);
    });
  }

  /**
   * 开奖并派彩 (仅管理者)，作用于当前活跃轮次
   */
  processRound(caller: string, dice1: number, dice2: number, dice3: number): ProcessOutcome {
    this.requireAuthority(caller, 'processRound');

    return this.run('processRound', (op) => {
      const dice = [dice1, dice2, dice3];
      assertValidDice(dice);

      const round = this.getActiveRound();
      if (!round) {
        throw new RoundNotFoundError(null);
      }
      this.stateMachine.assertState(round, 'EQUALIZED', 'processRound');

      this.stateMachine.transition(round, 'PROCESSING', 'dice_received', { dice: [...dice] });
      round.dice = copyDice(dice);
      round.totalPips = dice1 + dice2 + dice3;
      round.result = classifyRoll(round.totalPips);

      let payouts: Payout[] = [];

      if (round.bigPoolTotal === 0 || round.smallPoolTotal === 0) {
        logger.info('No opposing stakes, finishing round without payouts', {
          roundId: round.id,
          bigPoolTotal: round.bigPoolTotal,
          smallPoolTotal: round.smallPoolTotal,
        });
      } else {
        this.stateMachine.transition(round, 'PAYING_WINNERS', 'paying_winners', {
          result: round.result,
        });
        payouts = computePayouts(round.result, [...round.bids.values()]);

        for (const payout of payouts) {
          const bid = round.bids.get(payout.bidId);
          if (!bid) {
            throw new BidNotFoundError(round.id, payout.bidId);
          }
          bid.won = payout.won;

          if (payout.amount > 0) {
            this.stageTransfer(op, {
              kind: 'payout',
              recipient: payout.bettor,
              amount: payout.amount,
              roundId: round.id,
              bidId: payout.bidId,
            });
            logSettlement('winner_paid', {
              roundId: round.id,
              bidId: payout.bidId,
              bettor: payout.bettor,
              amount: payout.amount,
            });
            op.emit('winner:paid', {
              roundId: round.id,
              bidId: payout.bidId,
              bettor: payout.bettor,
              amount: payout.amount,
            });
          }
        }
      }

      this.finishRound(op, round);
      const next = this.openNextRound(op);

      return { round: toSnapshot(round), payouts, nextRoundId: next.id };
    });
  }

  /**
   * 从骰子预言机取值后开奖 (仅管理者)
   */
  processRoundWithOracle(caller: string): ProcessOutcome {
    this.requireAuthority(caller, 'processRound');

    if (!this.diceOracle) {
      throw new DiceOracleUnavailableError();
    }
    const round = this.getActiveRound();
    if (!round) {
      throw new RoundNotFoundError(null);
    }
    this.stateMachine.assertState(round, 'EQUALIZED', 'processRound');

    const [dice1, dice2, dice3] = this.diceOracle.roll(round.id);
    return this.processRound(caller, dice1, dice2, dice3);
  }

  // ===== 管理操作 =====

  /**
   * 更新手续费百分比，只影响之后的下注
   */
  setFeePercent(caller: string, percent: number): void {
    this.requireAuthority(caller, 'setFeePercent');

    this.run('setFeePercent', (op) => {
      if (!Number.isInteger(percent) || percent < 0 || percent > 100) {
        throw new InvalidParameterError('feePercent', percent);
      }
      const previous = this.state.feePercent;
      this.state.feePercent = percent;

      logger.info('Fee percent updated', { previous, next: percent });
      op.emit('config:fee_updated', { previous, next: percent });
    });
  }

  transferAuthority(caller: string, newAuthority: string): void {
    this.requireAuthority(caller, 'transferAuthority');

    this.run('transferAuthority', (op) => {
      const previous = this.authority.currentAuthority();
      this.authority.transferTo(newAuthority);
      op.emit('authority:transferred', { previous, next: this.authority.currentAuthority() });
    });
  }

  /**
   * 提取留存资金，金额须严格小于可用余额
   */
  withdraw(caller: string, receiver: string, amount: number): BalanceSummary {
    this.requireAuthority(caller, 'withdraw');

    return this.run('withdraw', (op) => {
      if (!Number.isSafeInteger(amount) || amount <= 0) {
        throw new InvalidParameterError('amount', amount);
      }
      if (receiver.length === 0) {
        throw new InvalidParameterError('receiver', receiver);
      }

      const { available } = this.computeBalance();
      if (amount >= available) {
        throw new InsufficientBalanceError(amount, available);
      }

      this.stageTransfer(op, { kind: 'withdrawal', recipient: receiver, amount });

      logger.info('Retained balance withdrawn', { receiver, amount, balance: this.state.balance });
      op.emit('treasury:withdrawn', { receiver, amount, balance: this.state.balance });

      return this.computeBalance();
    });
  }

  /**
   * 支付之前因余额不足而延后的退款，返回本次支付的笔数
   */
  settleDeferredRefunds(caller: string): number {
    this.requireAuthority(caller, 'settleDeferredRefunds');

    return this.run('settleDeferredRefunds', (op) => {
      const outstanding: DeferredRefund[] = [];
      let settled = 0;

      for (const refund of this.state.deferredRefunds) {
        if (this.state.balance <= refund.amount) {
          outstanding.push(refund);
          continue;
        }

        this.stageTransfer(op, {
          kind: 'refund',
          recipient: refund.bettor,
          amount: refund.amount,
          roundId: refund.roundId,
          bidId: refund.bidId,
        });
        op.emit('refund:paid', {
          roundId: refund.roundId,
          bidId: refund.bidId,
          bettor: refund.bettor,
          amount: refund.amount,
          remainingStake: refund.remainingStake,
          deferred: true,
        });
        settled += 1;
      }

      this.state.deferredRefunds = outstanding;

      if (settled > 0) {
        logger.info('Deferred refunds settled', { settled, outstanding: outstanding.length });
      }
      return settled;
    });
  }

  // ===== 查询 (不修改状态) =====

  getCurrentRound(): RoundSnapshot | null {
    const round = this.getActiveRound();
    return round ? toSnapshot(round) : null;
  }

  getRound(roundId: number): RoundSnapshot {
    const round = this.rounds.get(roundId);
    if (round) {
      return toSnapshot(round);
    }

    // 超出内存缓存的轮次从归档读取
    if (this.archive && Number.isInteger(roundId) && roundId >= 1 && roundId <= this.state.lastRoundId) {
      const archived = this.archive.loadRound(roundId);
      if (archived) {
        return archived;
      }
    }

    throw new RoundNotFoundError(roundId);
  }

  getBid(roundId: number, bidId: number): BidDetail {
    const round = this.getRound(roundId);
    const bid = round.bids.find((candidate) => candidate.id === bidId);
    if (!bid) {
      throw new BidNotFoundError(roundId, bidId);
    }
    return { ...bid, finished: round.state === 'FINISHED' };
  }

  getRoundCount(): number {
    return this.state.lastRoundId;
  }

  getBalance(): BalanceSummary {
    return this.computeBalance();
  }

  getFeePercent(): number {
    return this.state.feePercent;
  }

  getMinStake(): number {
    return this.options.minStake;
  }

  getAuthority(): string {
    return this.authority.currentAuthority();
  }

  /**
   * 内存中的事件日志；有归档时只保留最早缓存轮次以来的记录，更早的从归档读取
   */
  getEventLog(): EventRecord[] {
    return structuredClone(this.journal);
  }

  getDeferredRefunds(): DeferredRefund[] {
    return this.state.deferredRefunds.map((refund) => ({ ...refund }));
  }

  // ===== 内部实现 =====

  /**
   * 用归档中的引擎状态恢复管理者与活跃轮次
   */
  private resume(saved: PersistedEngineState): void {
    if (saved.authority !== this.authority.currentAuthority()) {
      logger.warn('Configured authority differs from persisted authority, keeping persisted', {
        configured: this.authority.currentAuthority(),
        persisted: saved.authority,
      });
      this.authority.transferTo(saved.authority);
    }

    if (saved.activeRoundId !== null) {
      const snapshot = this.archive?.loadRound(saved.activeRoundId) ?? null;
      if (!snapshot || snapshot.state === 'FINISHED') {
        logger.error('Persisted active round missing from archive', { roundId: saved.activeRoundId });
        throw new RoundNotFoundError(saved.activeRoundId);
      }
      const round = fromSnapshot(snapshot);
      this.assertPoolInvariant(round);
      this.rounds.set(round.id, round);
      this.state.activeRoundId = round.id;
    }

    logger.info('Engine state restored from archive', {
      activeRoundId: this.state.activeRoundId,
      balance: this.state.balance,
      deferredRefunds: this.state.deferredRefunds.length,
    });
  }

  private toPersistedState(): PersistedEngineState {
    return {
      activeRoundId: this.state.activeRoundId,
      balance: this.state.balance,
      feesCollected: this.state.feesCollected,
      feePercent: this.state.feePercent,
      authority: this.authority.currentAuthority(),
      deferredRefunds: this.state.deferredRefunds.map((refund) => ({ ...refund })),
    };
  }

  private requireAuthority(caller: string, action: string): void {
    if (!this.authority.isAuthority(caller)) {
      logger.warn('Unauthorized call rejected', { caller, action });
      throw new UnauthorizedError(caller, action);
    }
  }

  private getActiveRound(): Round | null {
    if (this.state.activeRoundId === null) {
      return null;
    }
    return this.rounds.get(this.state.activeRoundId) ?? null;
  }

  /**
   * 获取可修改的轮次: 只有活跃轮次可以修改，其余已结束
   */
  private requireMutableRound(roundId: number, expected: RoundState, action: string): Round {
    const active = this.getActiveRound();
    if (active && active.id === roundId) {
      this.stateMachine.assertState(active, expected, action);
      return active;
    }

    if (Number.isInteger(roundId) && roundId >= 1 && roundId <= this.state.lastRoundId) {
      logger.warn(`Rejected ${action}: round already finished`, { roundId, expected });
      throw new InvalidRoundStateError(roundId, 'FINISHED', expected);
    }

    throw new RoundNotFoundError(roundId);
  }

  private openNextRound(op: OperationContext): Round {
    const now = this.clock();
    const round = createEmptyRound(this.state.lastRoundId + 1, now);

    this.rounds.set(round.id, round);
    this.state.lastRoundId = round.id;
    this.state.activeRoundId = round.id;

    logger.info('Round created', { roundId: round.id });
    logSettlement('round_created', { roundId: round.id });

    op.emit('round:created', { roundId: round.id, state: round.state, createdAt: now });
    return round;
  }

  private finishRound(op: OperationContext, round: Round): void {
    this.stateMachine.transition(round, 'FINISHED', 'round_finished', {
      result: round.result,
      totalPips: round.totalPips,
    });
    round.finishedAt = round.updatedAt;
    this.state.activeRoundId = null;
    op.finishedRounds.push(round);

    logger.info('Round processed', {
      roundId: round.id,
      result: round.result,
      dice: [...round.dice],
      totalPips: round.totalPips,
    });

    op.emit('round:processed', {
      roundId: round.id,
      state: round.state,
      result: round.result,
      dice: copyDice(round.dice),
      totalPips: round.totalPips,
    });
  }

  /**
   * 支付平衡退款: 余额须严格大于退款额，否则按 refundShortfallPolicy 处理
   */
  private payRefund(op: OperationContext, roundId: number, refund: StakeRefund): void {
    if (refund.amount <= 0) {
      return;
    }

    if (this.state.balance > refund.amount) {
      this.stageTransfer(op, {
        kind: 'refund',
        recipient: refund.bettor,
        amount: refund.amount,
        roundId,
        bidId: refund.bidId,
      });
      logSettlement('refund_paid', {
        roundId,
        bidId: refund.bidId,
        bettor: refund.bettor,
        amount: refund.amount,
      });
      op.emit('refund:paid', {
        roundId,
        bidId: refund.bidId,
        bettor: refund.bettor,
        amount: refund.amount,
        remainingStake: refund.remainingStake,
        deferred: false,
      });
      return;
    }

    if (this.options.refundShortfallPolicy === 'abort') {
      throw new InsufficientBalanceError(refund.amount, this.state.balance);
    }

    this.state.deferredRefunds.push({
      roundId,
      bidId: refund.bidId,
      bettor: refund.bettor,
      amount: refund.amount,
      remainingStake: refund.remainingStake,
      deferredAt: this.clock(),
    });

    logger.warn('Refund deferred: balance does not exceed refund amount', {
      roundId,
      bidId: refund.bidId,
      bettor: refund.bettor,
      amount: refund.amount,
      balance: this.state.balance,
    });
    logSettlement('refund_deferred', { roundId, bidId: refund.bidId, amount: refund.amount });

    op.emit('refund:deferred', {
      roundId,
      bidId: refund.bidId,
      bettor: refund.bettor,
      amount: refund.amount,
    });
  }

  /**
   * 暂存一笔转账并扣减余额，操作提交时统一执行
   */
  private stageTransfer(op: OperationContext, transfer: Omit<Transfer, 'reference'>): Transfer {
    if (transfer.amount > this.state.balance) {
      throw new PaymentFailedError(
        `Cannot fund ${transfer.kind} of ${transfer.amount}: balance is ${this.state.balance}`
      );
    }

    const staged: Transfer = { reference: uuidv4(), ...transfer };
    this.state.balance -= transfer.amount;
    op.transfers.push(staged);
    return staged;
  }

  private computeBalance(): BalanceSummary {
    const active = this.getActiveRound();
    const pools = active ? active.bigPoolTotal + active.smallPoolTotal : 0;
    const owed = this.state.deferredRefunds.reduce((sum, refund) => sum + refund.amount, 0);
    const committed = pools + owed;

    return {
      balance: this.state.balance,
      committed,
      available: Math.max(0, this.state.balance - committed),
      feesCollected: this.state.feesCollected,
      deferredRefunds: owed,
    };
  }

  private assertPoolInvariant(round: Round): void {
    let big = 0;
    let small = 0;
    for (const bid of round.bids.values()) {
      if (bid.stake < 0) {
        throw new PoolImbalanceError(`Bid ${bid.id} in round ${round.id} has negative stake`);
      }
      if (bid.side === 'BIG') {
        big += bid.stake;
      } else {
        small += bid.stake;
      }
    }
    if (big !== round.bigPoolTotal || small !== round.smallPoolTotal) {
      throw new PoolImbalanceError(
        `Round ${round.id} pools ${round.bigPoolTotal}/${round.smallPoolTotal} ` +
          `do not match bid stakes ${big}/${small}`
      );
    }
  }

  private capture(): StateSnapshot {
    const active = this.getActiveRound();
    return {
      state: structuredClone(this.state),
      activeRound: active ? structuredClone(active) : null,
    };
  }

  private restore(snapshot: StateSnapshot): void {
    // 删除本次操作中新建的轮次
    for (let id = snapshot.state.lastRoundId + 1; id <= this.state.lastRoundId; id++) {
      this.rounds.delete(id);
    }
    if (snapshot.activeRound) {
      this.rounds.set(snapshot.activeRound.id, snapshot.activeRound);
    }
    this.state = snapshot.state;
  }

  /**
   * 以原子方式执行一个操作
   */
  private run<T>(name: string, body: (op: OperationContext) => T): T {
    const snapshot = this.capture();
    const op = new OperationContext(name, this.bus);
    let result: T;

    try {
      result = body(op);

      const active = this.getActiveRound();
      if (active) {
        this.assertPoolInvariant(active);
      }
      for (const round of op.finishedRounds) {
        this.assertPoolInvariant(round);
      }

      this.executeTransfers(op);
    } catch (error) {
      this.restore(snapshot);
      logger.warn(`Operation ${name} aborted, state restored`, { error: describeError(error) });
      throw error;
    }

    this.commit(op);
    return result;
  }

  private executeTransfers(op: OperationContext): void {
    if (op.transfers.length === 0) {
      return;
    }

    try {
      this.payments.execute(op.transfers);
    } catch (error) {
      logger.error('Payment batch failed', {
        operation: op.name,
        transfers: op.transfers.length,
        error: describeError(error),
      });
      throw new PaymentFailedError(`Payment failed during ${op.name}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  private commit(op: OperationContext): void {
    const now = this.clock();
    const records: EventRecord[] = op.events.map((event) => ({
      sequence: ++this.eventSequence,
      name: event.name,
      payload: event.payload,
      recordedAt: now,
    }));
    this.journal.push(...records);

    this.persist(op, records);

    for (const event of op.events) {
      try {
        event.dispatch();
      } catch (error) {
        logger.error('Event listener failed', { event: event.name, error: describeError(error) });
      }
    }
  }

  /**
   * 写入归档；付款已执行，失败时仅记录并发出 archive:error，内存状态保持为准，
   * 未写入的轮次与事件不会被移出内存，下次提交时重试
   */
  private persist(op: OperationContext, records: EventRecord[]): void {
    const archive = this.archive;
    if (!archive) {
      return;
    }

    for (const round of op.finishedRounds) {
      this.unarchived.add(round.id);
    }
    const pendingEvents = [...this.unarchivedEvents, ...records];

    try {
      archive.atomically(() => {
        // 先补写之前归档失败的轮次
        for (const id of this.unarchived) {
          const round = this.rounds.get(id);
          if (round) {
            archive.saveRound(toSnapshot(round));
          }
        }
        const active = this.getActiveRound();
        if (active) {
          archive.saveRound(toSnapshot(active));
        }
        if (pendingEvents.length > 0) {
          archive.appendEvents(pendingEvents);
        }
        archive.saveEngineState(this.toPersistedState());
      });
      this.unarchived.clear();
      this.unarchivedEvents = [];
    } catch (error) {
      this.unarchivedEvents = pendingEvents;
      logger.error('Failed to archive operation', { operation: op.name, error: describeError(error) });
      this.bus.emitEvent('archive:error', { operation: op.name, message: describeError(error) });
      return;
    }

    this.evictHistory();
    this.trimJournal();
  }

  /**
   * 有归档时，内存中只保留最近 historyCacheSize 个已结束轮次
   */
  private evictHistory(): void {
    for (const id of this.rounds.keys()) {
      const finishedInMemory = this.rounds.size - (this.state.activeRoundId === null ? 0 : 1);
      if (finishedInMemory <= this.options.historyCacheSize) {
        break;
      }
      if (id !== this.state.activeRoundId) {
        this.rounds.delete(id);
      }
    }
  }

  /**
   * 丢弃最早缓存轮次之前的事件 (均已归档)
   */
  private trimJournal(): void {
    const keepFrom = this.journal.findIndex((record) => {
      const roundId = eventRoundId(record);
      return roundId !== null && this.rounds.has(roundId);
    });
    if (keepFrom > 0) {
      this.journal.splice(0, keepFrom);
    }
  }
}

export default RoundManager;
