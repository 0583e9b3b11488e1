/**
 * 领域错误
 * 均为前置条件违反，同步抛给调用方，内部不重试
 */

import type { RoundState } from '../types/index.js';

export class DomainError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class UnauthorizedError extends DomainError {
  constructor(
    readonly caller: string,
    readonly action: string
  ) {
    super(`Caller ${caller} is not allowed to ${action}`);
  }
}

export class RoundNotFoundError extends DomainError {
  constructor(readonly roundId: number | null) {
    super(roundId === null ? 'No active round' : `Round ${roundId} not found`);
  }
}

export class RoundAlreadyActiveError extends DomainError {
  constructor(readonly activeRoundId: number) {
    super(`Round ${activeRoundId} is still active`);
  }
}

export class InvalidRoundStateError extends DomainError {
  constructor(
    readonly roundId: number,
    readonly actual: RoundState,
    readonly expected: RoundState
  ) {
    super(`Round ${roundId} is ${actual}, expected ${expected}`);
  }
}

export class BelowMinimumStakeError extends DomainError {
  constructor(
    readonly amount: number,
    readonly minStake: number
  ) {
    super(`Stake ${amount} must exceed minimum ${minStake}`);
  }
}

export class InvalidDiceValueError extends DomainError {
  constructor(readonly dice: readonly number[]) {
    super(`Dice values must be integers between 1 and 6, got [${dice.join(', ')}]`);
  }
}

export class InsufficientBalanceError extends DomainError {
  constructor(
    readonly requested: number,
    readonly available: number
  ) {
    super(`Requested ${requested} but only ${available} is available`);
  }
}

export class PaymentFailedError extends DomainError {}

export class InvalidParameterError extends DomainError {
  constructor(
    readonly field: string,
    readonly value: unknown
  ) {
    super(`Invalid ${field}: ${String(value)}`);
  }
}

export class BidNotFoundError extends DomainError {
  constructor(
    readonly roundId: number,
    readonly bidId: number
  ) {
    super(`Bid ${bidId} not found in round ${roundId}`);
  }
}

export class DiceOracleUnavailableError extends DomainError {
  constructor() {
    super('No dice oracle configured');
  }
}

export class PoolImbalanceError extends DomainError {}
