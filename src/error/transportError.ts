import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a request that could not be built, sent or completed:
 * connection failures once retries ran out, timeouts, cancellation, unreadable bodies.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  name = 'TransportError';
  /** Failure kind, shared with {@link HTTPError} and {@link DecodeError} for narrowing */
  readonly kind = 'transport';
}

/**
 * Type guard for {@link TransportError} (and {@link ConstructURLError}, which extends it).
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): TransportError | null {
  return unwrapErrorType(TransportError, error);
}
