import { isErrorType } from './isErrorType.js';
import { unwrapErrorNamed } from './unwrapErrorType.js';

/**
 * Error raised when a request exceeds the configured timeout threshold.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  name = 'TimeoutError';
  /** Timeout that was exceeded, in milliseconds */
  readonly timeout: number;

  constructor(message: string, timeout: number, opts?: ErrorOptions) {
    super(message, opts);
    this.timeout = timeout;
  }
}

/**
 * Type guard for {@link TimeoutError}, also matching the `DOMException` raised by `AbortSignal.timeout()`.
 */
export function isTimeoutError(error: unknown): boolean {
  return isErrorType(TimeoutError, error) || unwrapErrorNamed('TimeoutError', error) !== null;
}
