import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a 200 response whose body is not JSON, or is JSON of the wrong shape.
 */
export class DecodeError extends Error {
  /** DecodeError error-name */
  name = 'DecodeError';
  /** Failure kind, shared with {@link TransportError} and {@link HTTPError} for narrowing */
  readonly kind = 'decode';
  /** Raw response body that failed to decode */
  readonly body: string;
  /** Schema issues; empty when the body was not JSON at all */
  readonly issues: ReadonlyArray<StandardSchemaV1.Issue>;

  constructor(message: string, body: string, issues: ReadonlyArray<StandardSchemaV1.Issue> = [], opts?: ErrorOptions) {
    super(message, opts);
    this.body = body;
    this.issues = issues;
  }
}

/**
 * Type guard for {@link DecodeError}.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return isErrorType(DecodeError, error);
}

/**
 * Extract a {@link DecodeError} from an unknown error value, following nested causes.
 */
export function getDecodeError(error: unknown): DecodeError | null {
  return unwrapErrorType(DecodeError, error);
}
