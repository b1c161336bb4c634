import { RunStatus } from '../types/qualification.types';

/**
 * Raised when a raw input cannot be read as a standing row at all.
 */
export class MalformedStandingError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'MalformedStandingError';
  }
}

/**
 * Raised when a standing row parses but holds values the blender refuses
 * (unknown status, negative counters, rank below 1).
 */
export class StandingValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'StandingValidationError';
  }
}

/**
 * Wraps any failure of the store while a batch is being materialized.
 * The batch has been rolled back when this is thrown.
 */
export class StoreUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StoreUnavailableError';
  }
}

export class RunStateError extends Error {
  constructor(
    public readonly runId: string,
    public readonly currentStatus: RunStatus,
    attempted: string,
  ) {
    super(`Run ${runId} is ${currentStatus}; cannot ${attempted}`);
    this.name = 'RunStateError';
  }
}

export class LookupTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LookupTableError';
  }
}
