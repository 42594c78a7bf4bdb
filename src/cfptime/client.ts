import { RequestClient } from '../core/client.js';
import { getConstructURLError } from '../error/constructUrlError.js';
import { type DecodeError, getDecodeError } from '../error/decodeError.js';
import { describeError } from '../error/describeError.js';
import { getHttpError, type HTTPError } from '../error/httpError.js';
import { TransportError } from '../error/transportError.js';
import type { FetchClientProvider, HeaderOptions, RequestOptions, RetryOptions } from '../types/request.js';
import type { Logger } from '../utils/logger.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { DEFAULT_BASE_URL, endpoints } from './endpoints.js';
import type { Conference } from './schemas.js';

/**
 * Every failure a {@link CFPTime} call can return. Narrow on `kind`:
 * - `'transport'`: the request could not be built, sent or completed ({@link ConstructURLError} included),
 * - `'status'`: the API answered with a status other than 200,
 * - `'decode'`: a 200 whose body is not the expected JSON.
 */
export type CFPTimeError = TransportError | HTTPError | DecodeError;

/** Constructor options of {@link CFPTime}. */
export interface CFPTimeOptions {
  /**
   * Root every endpoint is resolved against.
   * @default 'https://api.cfptime.org/api/'
   */
  baseUrl?: string;
  /**
   * Per-attempt request timeout in milliseconds, `false` to disable.
   * @default 60000
   */
  timeout?: number | false;
  /**
   * Retry policy for transient failures; a number sets the retry count only.
   * @default { limit: 3, timeout: 250, factor: 2, maxTimeout: 5000 }
   */
  retry?: RetryOptions | number;
  /** Extra headers sent with every request. */
  headers?: HeaderOptions;
  /** Transport implementation, {@link FetchClient} unless replaced (e.g. in tests). */
  fetchProvider?: FetchClientProvider;
  /** Receives debug lines about attempts, retries and failures. */
  logger?: Logger;
  /** Log to `console` when no `logger` is given. */
  debug?: boolean;
}

/** Per-call options of every {@link CFPTime} operation. */
export type CallOptions = Pick<RequestOptions, 'signal' | 'timeout' | 'retry' | 'headers'>;

/**
 * Maps the cause chain of a failed request onto the closed {@link CFPTimeError} set.
 * Status and decode failures are returned as found; anything else is reported as
 * a transport failure that keeps the whole chain as `cause`.
 */
export function toCFPTimeError(err: Error): CFPTimeError {
  const urlError = getConstructURLError(err);
  if (urlError) {
    return urlError;
  }

  const httpError = getHttpError(err);
  if (httpError) {
    return httpError;
  }

  const decodeError = getDecodeError(err);
  if (decodeError) {
    return decodeError;
  }

  return new TransportError(describeError(err), { cause: err });
}

/** Settles a request, narrowing its failure to a {@link CFPTimeError}. */
async function settle<T>(pending: SafeWrapAsync<Error, T>): SafeWrapAsync<CFPTimeError, T> {
  const [err, data] = await pending;
  if (err) {
    return [toCFPTimeError(err), null];
  }

  return [null, data];
}

/**
 * Client for the CFPTime conference and call-for-papers directory.
 *
 * Every operation is a read-only GET that resolves to `[error, data]`, never rejects,
 * and can run concurrently with any other on the same instance.
 *
 * @example
 * const cfptime = new CFPTime();
 * const [err, cfps] = await cfptime.getCfps();
 * if (err) {
 *   console.error(err.kind, err.message);
 * } else {
 *   for (const cfp of cfps) console.log(cfp.name, cfp.cfp_deadline);
 * }
 */
export class CFPTime {
  #client: RequestClient;

  /**
   * @throws {ConstructURLError} when `baseUrl` is not an absolute http(s) URL.
   */
  constructor({ baseUrl = DEFAULT_BASE_URL, timeout, retry, headers, fetchProvider, logger, debug }: CFPTimeOptions = {}) {
    this.#client = new RequestClient({
      baseUrl,
      fetchProvider,
      fetchOpts: { headers, timeout, retry },
      logger,
      debug,
    });
  }

  /** Root every endpoint is resolved against, always ending in `/`. */
  get baseUrl(): string {
    return this.#client.baseUrl;
  }

  /** All calls for papers, in the order the API lists them. */
  getCfps(opts?: CallOptions): SafeWrapAsync<CFPTimeError, Conference[]> {
    return settle(this.#client.get('cfps', null, endpoints.cfps.get, opts));
  }

  /** A single call for papers by its id. */
  getCfp(id: number, opts?: CallOptions): SafeWrapAsync<CFPTimeError, Conference> {
    return settle(this.#client.get('cfps/{id}/', { id }, endpoints['cfps/{id}/'].get, opts));
  }

  /** All conferences, in the order the API lists them. */
  getConferences(opts?: CallOptions): SafeWrapAsync<CFPTimeError, Conference[]> {
    return settle(this.#client.get('conferences', null, endpoints.conferences.get, opts));
  }

  /** A single conference by its id. */
  getConference(id: number, opts?: CallOptions): SafeWrapAsync<CFPTimeError, Conference> {
    return settle(this.#client.get('conferences/{id}/', { id }, endpoints['conferences/{id}/'].get, opts));
  }

  /** Conferences that have not started yet; the filtering happens server-side. */
  getUpcoming(opts?: CallOptions): SafeWrapAsync<CFPTimeError, Conference[]> {
    return settle(this.#client.get('upcoming', null, endpoints.upcoming.get, opts));
  }

  /**
   * Aborts every in-flight call. Calls made afterwards fail with a {@link TransportError}.
   */
  dispose() {
    this.#client.dispose();
  }
}
