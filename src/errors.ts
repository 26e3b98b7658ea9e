/**
 * Failure taxonomy for the execution cycle.
 *
 * Venue failures carry a kind that decides whether a call may be retried.
 * Aggregation and decision-payload problems are data-integrity failures and
 * abort the cycle. Risk violations are not errors at all; they are verdicts.
 */

export type VenueFailureKind = 'transient' | 'rejected' | 'auth' | 'unknown';

export class VenueError extends Error {
  readonly kind: VenueFailureKind;
  readonly code: number | null;

  constructor(message: string, kind: VenueFailureKind, options: { code?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'VenueError';
    this.kind = kind;
    this.code = options.code ?? null;
  }
}

export class TimeoutError extends Error {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

export class AbortedError extends Error {
  constructor(operation: string) {
    super(`${operation} aborted`);
    this.name = 'AbortedError';
  }
}

export class DataIntegrityError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'DataIntegrityError';
  }
}

export class DecisionUnavailableError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'DecisionUnavailableError';
  }
}

export function isTransient(err: unknown): boolean {
  if (err instanceof TimeoutError) return true;
  return err instanceof VenueError && err.kind === 'transient';
}

/** Transient and unknown venue failures; auth and rejections never succeed on resubmission. */
export function isRetryableSubmission(err: unknown): boolean {
  if (isTransient(err)) return true;
  return err instanceof VenueError && err.kind === 'unknown';
}

export function describeError(err: unknown): string {
  if (err instanceof VenueError) return `${err.kind}: ${err.message}`;
  if (err instanceof TimeoutError) return `timeout: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
