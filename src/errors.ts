import { IndexName, OptionType } from './types';

export class TrackerError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(message: string, code: string, statusCode = 500) {
    super(message);
    this.code = code;
    this.statusCode = statusCode;
    this.name = 'TrackerError';
  }
}

// No valid expiry / instrument set for an index; strategy is never created.
export class ResolutionError extends TrackerError {
  constructor(message: string, public readonly index: IndexName) {
    super(message, 'RESOLUTION_ERROR', 422);
    this.name = 'ResolutionError';
  }
}

export class NotFoundError extends TrackerError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

export class InstrumentNotFoundError extends NotFoundError {
  constructor(
    public readonly index: IndexName,
    public readonly expiry: string,
    public readonly strike: number,
    public readonly optionType: OptionType,
  ) {
    super(`No contract ${index} ${expiry} ${strike}${optionType}`);
    this.name = 'InstrumentNotFoundError';
  }
}

export class ClockSkewError extends TrackerError {
  constructor(
    public readonly token: number,
    public readonly exchangeTs: number,
    public readonly nowTs: number,
  ) {
    super(
      `Tick for ${token} is ${Math.abs(nowTs - exchangeTs)}ms away from clock`,
      'CLOCK_SKEW',
      400,
    );
    this.name = 'ClockSkewError';
  }
}

export class StrategyStateError extends TrackerError {
  constructor(message: string) {
    super(message, 'STRATEGY_STATE', 409);
    this.name = 'StrategyStateError';
  }
}

// Strategy parameters that cannot be scheduled (e.g. entry at or after close).
export class InvalidStrategyError extends TrackerError {
  constructor(message: string) {
    super(message, 'INVALID_STRATEGY', 400);
    this.name = 'InvalidStrategyError';
  }
}
