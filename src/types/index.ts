/**
 * Dice Pool Engine - 类型定义
 */

// ===== 配置类型 =====

export type RefundShortfallPolicy = 'defer' | 'abort';

export interface EngineConfig {
  // 下注参数
  minStake: number;            // 最低下注额 (严格大于)
  feePercent: number;          // 平台手续费百分比 (0 - 100)

  // 权限
  authority: string;           // 初始管理者身份

  // 结算策略
  refundShortfallPolicy: RefundShortfallPolicy;  // 退款余额不足时的处理方式

  // 存储配置
  historyCacheSize: number;    // 内存中保留的已结束轮次数量 (有归档时生效)
  dbPath: string;              // SQLite 文件路径
  persistRounds: boolean;      // 是否启用 SQLite 归档
}

export type RoundManagerOptions = Pick<
  EngineConfig,
  'minStake' | 'feePercent' | 'refundShortfallPolicy' | 'historyCacheSize'
>;

// ===== 轮次类型 =====

export type Side = 'BIG' | 'SMALL';

export type RoundResult = 'UNDETERMINED' | Side;

export type RoundState =
  | 'WAITING_FOR_BIDS'   // 接受下注
  | 'EQUALIZING'         // 平衡双方资金池
  | 'EQUALIZED'          // 资金池已平衡，等待开奖
  | 'PROCESSING'         // 已收到骰子，正在判定结果
  | 'PAYING_WINNERS'     // 派彩中
  | 'FINISHED';          // 终止状态

export type DiceRoll = readonly [number, number, number];

export interface StateTransition {
  from: RoundState;
  to: RoundState;
  event: string;
  timestamp: number;
  data?: Record<string, unknown>;
}

export interface Bid {
  id: number;
  roundId: number;
  bettor: string;
  side: Side;
  stake: number;               // 扣除手续费后的净下注额，只会因平衡退款而减少
  originalStake: number;       // 下注时的净额
  fee: number;
  won: boolean;
  placedAt: number;
}

export interface Round {
  id: number;
  state: RoundState;
  result: RoundResult;
  dice: DiceRoll;
  totalPips: number;
  bigPoolTotal: number;
  smallPoolTotal: number;
  bids: Map<number, Bid>;      // 按插入顺序 (bid id 递增)
  nextBidId: number;
  history: StateTransition[];
  createdAt: number;
  updatedAt: number;
  finishedAt?: number;
}

/**
 * 对外返回的轮次快照 (深拷贝，不与内部状态共享引用)
 */
export interface RoundSnapshot {
  id: number;
  state: RoundState;
  result: RoundResult;
  dice: DiceRoll;
  totalPips: number;
  bigPoolTotal: number;
  smallPoolTotal: number;
  bidIds: number[];
  bids: Bid[];
  nextBidId: number;
  history: StateTransition[];
  createdAt: number;
  updatedAt: number;
  finishedAt?: number;
}

export interface BidDetail extends Bid {
  finished: boolean;           // 所属轮次是否已结束
}

export interface BidReceipt {
  success: true;
  roundId: number;
  bidId: number;
  bettor: string;
  netStake: number;
  fee: number;
}

// ===== 结算类型 =====

export interface StakeRefund {
  bidId: number;
  bettor: string;
  side: Side;
  amount: number;
  remainingStake: number;
}

export interface EqualizationOutcome {
  bigPoolTotal: number;
  smallPoolTotal: number;
  heavySide: Side | null;
  deficit: number;
  refunds: StakeRefund[];
}

export interface Payout {
  bidId: number;
  bettor: string;
  side: Side;
  stake: number;
  amount: number;
  won: boolean;
}

export interface ProcessOutcome {
  round: RoundSnapshot;
  payouts: Payout[];
  nextRoundId: number;
}

export interface DeferredRefund {
  roundId: number;
  bidId: number;
  bettor: string;
  amount: number;
  remainingStake: number;      // 退款时该注的剩余净额
  deferredAt: number;
}

export interface BalanceSummary {
  balance: number;             // 系统持有的全部资金
  committed: number;           // 活跃轮次资金池 + 待付退款
  available: number;           // 可提取余额
  feesCollected: number;
  deferredRefunds: number;     // 待付退款总额
}

// ===== 外部协作者 (端口) =====

export type TransferKind = 'refund' | 'payout' | 'withdrawal';

export interface Transfer {
  reference: string;           // 幂等引用
  kind: TransferKind;
  recipient: string;
  amount: number;
  roundId?: number;
  bidId?: number;
}

/**
 * 付款执行: 整批成功或抛出异常 (全部不生效)
 */
export interface PaymentGateway {
  execute(transfers: readonly Transfer[]): void;
}

/**
 * 权限能力: 判断调用者是否为管理者
 */
export interface AuthorityPolicy {
  isAuthority(caller: string): boolean;
  currentAuthority(): string;
  transferTo(newAuthority: string): void;
}

/**
 * 骰子来源 (外部预言机)
 */
export interface DiceOracle {
  roll(roundId: number): DiceRoll;
}

/**
 * 轮次 (含活跃轮次)、引擎状态与事件日志的持久化
 */
export interface RoundArchive {
  saveRound(round: RoundSnapshot): void;
  loadRound(id: number): RoundSnapshot | null;
  appendEvents(records: readonly EventRecord[]): void;
  saveEngineState(state: PersistedEngineState): void;
  loadEngineState(): PersistedEngineState | null;
  loadCounters(): ArchiveCounters;
  // 在同一事务中执行一次提交的全部写入
  atomically(work: () => void): void;
}

/**
 * 每次提交后写入归档的引擎状态，重启时据此恢复
 */
export interface PersistedEngineState {
  activeRoundId: number | null;
  balance: number;
  feesCollected: number;
  feePercent: number;
  authority: string;
  deferredRefunds: DeferredRefund[];
}

export interface ArchiveCounters {
  lastRoundId: number;
  lastEventSequence: number;
}

// ===== 事件类型 =====

export interface EngineEvents {
  // 轮次事件
  'round:created': { roundId: number; state: RoundState; createdAt: number };
  'round:equalized': {
    roundId: number;
    state: RoundState;
    bigPoolTotal: number;
    smallPoolTotal: number;
  };
  'round:processed': {
    roundId: number;
    state: RoundState;
    result: RoundResult;
    dice: DiceRoll;
    totalPips: number;
  };

  // 下注与结算事件
  'bid:placed': {
    bidId: number;
    roundId: number;
    bettor: string;
    netStake: number;
    fee: number;
    side: Side;
  };
  'refund:paid': {
    roundId: number;
    bidId: number;
    bettor: string;
    amount: number;
    remainingStake: number;
    deferred: boolean;
  };
  'refund:deferred': { roundId: number; bidId: number; bettor: string; amount: number };
  'winner:paid': { roundId: number; bidId: number; bettor: string; amount: number };

  // 管理事件
  'config:fee_updated': { previous: number; next: number };
  'authority:transferred': { previous: string; next: string };
  'treasury:withdrawn': { receiver: string; amount: number; balance: number };

  // 系统事件
  'archive:error': { operation: string; message: string };
}

export type EngineEventName = keyof EngineEvents;

export type EngineEventPayload = EngineEvents[EngineEventName];

export interface EventRecord {
  sequence: number;
  name: EngineEventName;
  payload: EngineEventPayload;
  recordedAt: number;
}

export interface ArchivedEvent {
  sequence: number;
  name: string;
  roundId: number | null;
  payload: unknown;
  recordedAt: number;
}
