import { AbortedError, TimeoutError } from '../errors';
import type { Logger } from '../logger';

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` with its own AbortSignal, rejecting with TimeoutError after `timeoutMs`.
 * When `parent` aborts first the call rejects with AbortedError. Callers that mutate
 * venue state simply ignore the signal so the request itself is never torn down.
 */
export function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) return Promise.reject(new AbortedError(operation));
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const onParentAbort = () => {
      controller.abort();
      cleanup();
      reject(new AbortedError(operation));
    };
    const timer = setTimeout(() => {
      controller.abort();
      cleanup();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
    const cleanup = () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    };
    parent?.addEventListener('abort', onParentAbort, { once: true });
    fn(controller.signal).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });
}

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  isRetryable: (err: unknown) => boolean;
  label: string;
  logger?: Logger;
  signal?: AbortSignal;
}

export async function withRetries<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const attempts = Math.max(1, opts.attempts);
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      const retryable = opts.isRetryable(err);
      opts.logger?.warn({ err, attempt, attempts, label: opts.label, retryable }, 'attempt failed');
      if (!retryable || attempt === attempts || opts.signal?.aborted) break;
      await sleep(opts.delayMs * 2 ** (attempt - 1));
    }
  }
  throw lastError;
}

/** Serializes tasks that share a key; tasks under different keys run concurrently. */
export class KeyedSerialQueue {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const next = prev.then(task);
    const tail = next.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    return next;
  }

  get size(): number {
    return this.tails.size;
  }
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
