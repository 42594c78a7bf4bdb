import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * Header options accepted by the fetch wrapper.
 * A `null` or `undefined` value in the record form removes a header set at a lower level.
 */
export type HeaderOptions = Headers | Array<[string, string]> | Record<string, string | null | undefined>;

/** Subset of HTTP status codes used for retry logic. */
export type StatusCode =
  | 100
  | 101
  | 102
  | 103
  | 200
  | 201
  | 202
  | 203
  | 204
  | 205
  | 206
  | 207
  | 208
  | 214
  | 226
  | 300
  | 301
  | 302
  | 303
  | 304
  | 305
  | 307
  | 308
  | 400
  | 401
  | 402
  | 403
  | 404
  | 405
  | 406
  | 407
  | 408
  | 409
  | 410
  | 411
  | 412
  | 413
  | 414
  | 415
  | 416
  | 417
  | 418
  | 421
  | 422
  | 423
  | 424
  | 425
  | 426
  | 428
  | 429
  | 431
  | 451
  | 500
  | 501
  | 502
  | 503
  | 504
  | 505
  | 506
  | 507
  | 508
  | 510
  | 511;

/** Options to pass in for each fetch request */
export interface FetchOptions {
  /** Headers merged with provider defaults. */
  headers?: HeaderOptions;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Fetch options for requests that may carry a JSON body. */
export interface FetchBodyOptions extends FetchOptions {
  /**
   * Value serialized as the JSON request body.
   * Ignored for GET and DELETE, which never carry a body.
   */
  data?: unknown;
}

/** Options for retry logic, delays grow exponentially between attempts */
export type RetryOptions = {
  /**
   * The number of times to retry failed requests, after the first attempt.
   * Fractions are truncated, negatives count as 0, and non-finite values are ignored.
   * @default 3
   */
  limit?: number;
  /**
   * Time to wait before the first retry, in milliseconds.
   * @default 250
   */
  timeout?: number;
  /**
   * Multiplier applied to the wait after every retry.
   * @default 2
   */
  factor?: number;
  /**
   * Longest single wait, in milliseconds.
   * @default 5000
   */
  maxTimeout?: number;
} & (
  | {
      /**
       * The HTTP status codes allowed to retry, replacing the default.
       * @default every 5xx status
       */
      statusCodes?: StatusCode[];
      ignoreStatusCodes?: never;
    }
  | {
      /**
       * The HTTP status codes skipping retries, removed from the codes retried otherwise.
       */
      ignoreStatusCodes?: StatusCode[];
      statusCodes?: never;
    }
);

/** Request-level options that sit above the raw fetch options. */
export interface RequestOptions extends FetchOptions {
  /**
   * Request timeout in milliseconds, applied to every attempt.
   * @default 60000
   */
  timeout?: number | false;
  /** Retry behavior (object for fine-grained control or number for retry count). */
  retry?: RetryOptions | number;
}

/** Contract for HTTP client implementations used by RequestClient. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request against an endpoint relative to the base URL. */
  get: (endpoint: string, options: FetchOptions) => SafeWrapAsync<Error, Response>;
  /** Optional lifecycle hook to dispose resources (e.g., keep-alive agents). */
  dispose?: () => void;
}

/** Default options handed to a provider at construction. */
export interface FetchClientOptions {
  /** Headers sent with every request. */
  headers?: HeaderOptions;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the fetch-client, with a base-url + options */
  new (baseUrl: string, opts: FetchClientOptions): FetchClientProviderDefinition;
}
