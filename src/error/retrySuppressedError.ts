import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a retry attempt suppressed and exited from retrying further,
 * e.g. on a 404 or a body that failed to decode.
 */
export class RetrySuppressedError extends Error {
  /** RetrySuppressedError error-name */
  name = 'RetrySuppressedError';
  /** Internal attempts tried before retry was suppressed */
  #attempts: number;

  /** Creates a new instance of a RetrySuppressedError with accompanying retries attempted */
  constructor(message: string, attempts: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#attempts = attempts;
  }

  /** Attempts tried before retry was suppressed */
  get attempts(): number {
    return this.#attempts;
  }
}

export function isRetrySuppressedError(error: unknown): error is RetrySuppressedError {
  return isErrorType(RetrySuppressedError, error);
}

export function getRetrySuppressedError(error: unknown): RetrySuppressedError | null {
  return unwrapErrorType(RetrySuppressedError, error);
}
