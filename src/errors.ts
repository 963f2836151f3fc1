/**
 * Error types for attack-correlator.
 *
 * Every error raised by the library extends CorrelatorError and carries a
 * stable `code` so the CLI (and callers) can branch without string matching.
 */

export type CorrelatorErrorCode =
  | 'EMPTY_INPUT'
  | 'ENCODING_FAILED'
  | 'FETCH_FAILED'
  | 'TASK_CANCELLED'
  | 'QUEUE_FULL'
  | 'DIMENSION_MISMATCH'
  | 'INVALID_CONFIG';

export class CorrelatorError extends Error {
  constructor(
    message: string,
    public readonly code: CorrelatorErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'CorrelatorError';
  }
}

/** Blank or whitespace-only query text. */
export class EmptyInputError extends CorrelatorError {
  constructor() {
    super('Please enter a sentence.', 'EMPTY_INPUT');
    this.name = 'EmptyInputError';
  }
}

/** The embedding provider failed on the query or the technique descriptions. */
export class EncodingError extends CorrelatorError {
  constructor(message: string, cause?: unknown) {
    super(`${message}: ${describeCause(cause)}`, 'ENCODING_FAILED', { cause });
    this.name = 'EncodingError';
  }
}

/** The technique corpus could not be fetched or parsed. */
export class FetchError extends CorrelatorError {
  constructor(
    message: string,
    cause?: unknown,
    public readonly statusCode?: number,
  ) {
    super(
      cause === undefined ? message : `${message}: ${describeCause(cause)}`,
      'FETCH_FAILED',
      { cause },
    );
    this.name = 'FetchError';
  }
}

export type CancelReason = 'superseded' | 'cancelled';

export class TaskCancelledError extends CorrelatorError {
  constructor(public readonly reason: CancelReason = 'cancelled') {
    super(`Task ${reason}`, 'TASK_CANCELLED');
    this.name = 'TaskCancelledError';
  }
}

export class QueueFullError extends CorrelatorError {
  constructor(public readonly capacity: number) {
    super(`Request queue is full (${capacity} pending)`, 'QUEUE_FULL');
    this.name = 'QueueFullError';
  }
}

export class DimensionMismatchError extends CorrelatorError {
  constructor(expected: number, actual: number) {
    super(
      `Embedding dimension mismatch: expected ${expected}, got ${actual}`,
      'DIMENSION_MISMATCH',
    );
    this.name = 'DimensionMismatchError';
  }
}

export class ConfigError extends CorrelatorError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
