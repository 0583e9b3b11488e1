/**
 * 核心模块导出
 */

export { RoundManager, MAX_STAKE, toSnapshot, type RoundManagerDeps } from './RoundManager.js';
export { RoundStateMachine } from './RoundStateMachine.js';
export { assertValidDice, classifyRoll, computePayouts, equalize } from './SettlementEngine.js';
export { SingleAuthority } from './authority.js';
export * from './errors.js';
