import { RetryExhaustedError } from '../error/retryExhaustedError.js';
import { RetrySuppressedError } from '../error/retrySuppressedError.js';
import { sleep } from './sleep.js';
import type { SafeWrapAsync } from './wrap.js';

/** Exponential backoff shape shared by {@link retry} and {@link backoffDelay}. */
export interface BackoffOptions {
  /** Milliseconds to wait before the first retry. */
  timeout?: number;
  /** Multiplier applied to the delay after every failed attempt. */
  factor?: number;
  /** Upper bound for a single delay. */
  maxTimeout?: number;
}

/** Options for retry-function */
export interface RetryOptions<R> extends BackoffOptions {
  /** Function to execute; must return a tuple-style result. */
  fn: () => SafeWrapAsync<Error, R>;
  /**
   * Maximum number of retries after the initial attempt (total tries = attempts + 1).
   * Passing 0 means "try once, then stop."
   */
  attempts?: number;
  /**
   * Predicate that decides whether to stop retrying.
   * Return true to stop retrying and surface the error, false to continue.
   */
  errFn?: (e: Error) => boolean;
  /** Called before waiting out the delay of each retry. */
  onRetry?: (e: Error, attempt: number, delay: number) => void;
  /** Cuts a pending backoff delay short; the next attempt is expected to observe the abort. */
  signal?: AbortSignal | null;
}

/**
 * Delay before the retry following `attempt` (1-based):
 * `timeout * factor^(attempt - 1)`, capped at `maxTimeout`.
 */
export function backoffDelay(attempt: number, { timeout = 250, factor = 2, maxTimeout = 30_000 }: BackoffOptions = {}) {
  return Math.min(timeout * factor ** Math.max(attempt - 1, 0), maxTimeout);
}

/**
 * Retry-function to keep retrying a function that can error for X-number
 * attempts with exponentially growing wait-times between each attempt.
 *
 * `This is for functions that catch their own errors and return them in a tuple structure like [Error, Response]`
 *
 * Errors are wrapped in {@link RetrySuppressedError} when `errFn` stops the loop, and in
 * {@link RetryExhaustedError} once every attempt has failed.
 */
export async function retry<R = unknown>({
  fn,
  attempts = 3,
  timeout,
  factor,
  maxTimeout,
  errFn,
  onRetry,
  signal,
}: RetryOptions<R>): SafeWrapAsync<Error, R> {
  for (let attempt = 1; ; attempt += 1) {
    const [err, data] = await fn();
    if (!err) {
      return [null, data];
    }

    if (typeof errFn === 'function' && errFn(err)) {
      return [new RetrySuppressedError('error further retries suppressed', attempt, { cause: err }), null];
    }

    if (attempt > attempts) {
      return [new RetryExhaustedError(`error retries exhausted after ${attempt} attempts`, attempt, { cause: err }), null];
    }

    const delay = backoffDelay(attempt, { timeout, factor, maxTimeout });
    onRetry?.(err, attempt, delay);
    await sleep(delay, signal);
  }
}
