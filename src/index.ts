/**
 * Dice Pool Engine 入口
 * Big/Small 三骰同注分彩结算引擎
 */

export { createEngine, type CreateEngineOptions, type DicePoolEngine } from './engine.js';
export * from './core/index.js';
export { LedgerPaymentGateway } from './payments/LedgerPaymentGateway.js';
export { RoundArchiveDatabase, getDatabase, closeDatabase } from './db/index.js';
export * from './utils/index.js';
export type * from './types/index.js';
