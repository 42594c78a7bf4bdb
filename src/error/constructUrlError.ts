import { isErrorType } from './isErrorType.js';
import { TransportError } from './transportError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a request URL that could not be built, either from an invalid
 * base URL or from path parameters that did not fit the endpoint template.
 */
export class ConstructURLError extends TransportError {
  /** ConstructURLError error-name */
  name = 'ConstructURLError';
  /** Internal URL for what it looked like */
  #url: string;

  /** Creates a new instance of a ConstructURLError with accompanying URL input */
  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url;
  }

  /** URL (or template) as it looked when construction failed */
  get url(): string {
    return this.#url;
  }
}

/**
 * Extract an {@link ConstructURLError} from an unknown error value, following nested causes.
 */
export function getConstructURLError(error: unknown): null | ConstructURLError {
  return unwrapErrorType(ConstructURLError, error);
}

/**
 * Type guard for {@link ConstructURLError}.
 */
export function isConstructURLError(error: unknown): error is ConstructURLError {
  return isErrorType(ConstructURLError, error);
}
