import { isErrorType } from './isErrorType.js';
import { unwrapErrorNamed } from './unwrapErrorType.js';

/**
 * Error raised when a request is intentionally aborted (e.g., via AbortController or `dispose`).
 */
export class AbortError extends Error {
  /** AbortError error-name */
  name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}, also matching the `DOMException` a bare `controller.abort()` produces.
 */
export function isAbortError(error: unknown): boolean {
  return isErrorType(AbortError, error) || unwrapErrorNamed('AbortError', error) !== null;
}
