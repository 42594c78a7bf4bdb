/**
 * Error entrypoint: the failure kinds the client returns, and helpers for identifying
 * and unwrapping them.
 * @module
 */

export { AbortError, isAbortError } from './abortError.js';
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
export { DecodeError, getDecodeError, isDecodeError } from './decodeError.js';
export { describeError } from './describeError.js';
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
export { isErrorType } from './isErrorType.js';
export { getRetryExhaustedError, isRetryExhaustedError, RetryExhaustedError } from './retryExhaustedError.js';
export { getRetrySuppressedError, isRetrySuppressedError, RetrySuppressedError } from './retrySuppressedError.js';
export { isTimeoutError, TimeoutError } from './timeoutError.js';
export { getTransportError, isTransportError, TransportError } from './transportError.js';
export { type ErrorClass, unwrapErrorNamed, unwrapErrorType } from './unwrapErrorType.js';
export { isValidationError, ValidationError } from './validationError.js';
