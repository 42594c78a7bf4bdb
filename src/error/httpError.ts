import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Longest slice of the response body repeated in the error message. */
const MESSAGE_BODY_LIMIT = 200;

/**
 * Error representing a final HTTP response with a status other than 200.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  name = 'HTTPError';
  /** Failure kind, shared with {@link TransportError} and {@link DecodeError} for narrowing */
  readonly kind = 'status';
  /** Status code of the response */
  #status: number;
  /** Response body, read as text */
  #body: string;
  /** URL the response came from */
  #url: string;

  /** Creates a new instance of a HTTPError from the status and body of the response */
  constructor(status: number, body: string, url: string, opts?: ErrorOptions) {
    const excerpt = body.length > MESSAGE_BODY_LIMIT ? `${body.slice(0, MESSAGE_BODY_LIMIT)}…` : body;
    super(`error API returned non-success status ${status} for ${url}${excerpt ? `: ${excerpt}` : ''}`, opts);
    this.#status = status;
    this.#body = body;
    this.#url = url;
  }

  /** Status code of the response */
  get status(): number {
    return this.#status;
  }

  /** Full response body text */
  get body(): string {
    return this.#body;
  }

  /** URL the response came from */
  get url(): string {
    return this.#url;
  }
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): HTTPError | null {
  return unwrapErrorType(HTTPError, error);
}
