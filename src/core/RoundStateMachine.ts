/**
 * 轮次状态机
 * 管理单个轮次从接受下注到派彩结束的状态流转
 */

import { logger, logSettlement } from '../utils/logger.js';
import { InvalidRoundStateError } from './errors.js';
import type { Round, RoundState, StateTransition } from '../types/index.js';

// 有效的状态转换映射
const VALID_TRANSITIONS: Record<RoundState, RoundState[]> = {
  'WAITING_FOR_BIDS': ['EQUALIZING'],
  'EQUALIZING': ['EQUALIZED'],
  'EQUALIZED': ['PROCESSING'],
  'PROCESSING': ['PAYING_WINNERS', 'FINISHED'], // 任一资金池为 0 时直接结束
  'PAYING_WINNERS': ['FINISHED'],
  'FINISHED': [],
};

export class RoundStateMachine {
  constructor(private readonly clock: () => number = Date.now) {}

  /**
   * 检查转换是否有效
   */
  canTransition(from: RoundState, to: RoundState): boolean {
    return VALID_TRANSITIONS[from].includes(to);
  }

  /**
   * 断言轮次处于某个状态，否则抛出 InvalidRoundStateError
   */
  assertState(round: Round, expected: RoundState, action: string): void {
    if (round.state !== expected) {
      logger.warn(`Rejected ${action}: round in wrong state`, {
        roundId: round.id,
        state: round.state,
        expected,
      });
      throw new InvalidRoundStateError(round.id, round.state, expected);
    }
  }

  /**
   * 执行状态转换
   */
  transition(
    round: Round,
    newState: RoundState,
    event: string,
    data?: Record<string, unknown>
  ): StateTransition {
    const currentState = round.state;

    if (!this.canTransition(currentState, newState)) {
      logger.error('Invalid state transition', {
        roundId: round.id,
        from: currentState,
        to: newState,
        event,
      });
      throw new InvalidRoundStateError(round.id, currentState, newState);
    }

    const transition: StateTransition = {
      from: currentState,
      to: newState,
      event,
      timestamp: this.clock(),
      data,
    };
    round.history.push(transition);

    round.state = newState;
    round.updatedAt = transition.timestamp;

    logger.debug(`State transition: ${currentState} -> ${newState}`, {
      roundId: round.id,
      event,
    });

    logSettlement('state_transition', {
      roundId: round.id,
      from: currentState,
      to: newState,
      event,
      data,
    });

    return transition;
  }
}

export default RoundStateMachine;
