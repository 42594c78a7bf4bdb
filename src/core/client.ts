import { AbortError } from '../error/abortError.js';
import { describeError } from '../error/describeError.js';
import { isDecodeError } from '../error/decodeError.js';
import { getHttpError, HTTPError } from '../error/httpError.js';
import { isTimeoutError } from '../error/timeoutError.js';
import { TransportError } from '../error/transportError.js';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaderOptions, parseBaseUrl } from '../fetch/utils.js';
import type {
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  RequestOptions,
  RetryOptions,
} from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { decodeResponse, getResponseText } from '../utils/getResponseData.js';
import { type Logger, resolveLogger } from '../utils/logger.js';
import { retry } from '../utils/retry.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import type { EndpointDefinition, PathParams } from './types.js';

/** Configuration for constructing a {@link RequestClient}. */
export interface RequestClientProps {
  /** HTTP client implementation used for requests. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** Base URL every endpoint is resolved against (e.g. `https://api.example.com/api/`). */
  baseUrl: string;
  /** Default headers plus the timeout and retry policy applied to every request. */
  fetchOpts?: FetchClientOptions & Pick<RequestOptions, 'timeout' | 'retry'>;
  /** Receives a debug line per attempt, retry and failure. */
  logger?: Logger;
  /** Log to `console` when no `logger` is given. */
  debug?: boolean;
}

/** Statuses retried when no `statusCodes` are configured. */
function isServerError(status: number): boolean {
  return status >= 500 && status <= 599;
}

/** Retry count as a non-negative integer; anything not finite keeps `fallback`. */
function toRetryLimit(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }

  return Math.max(0, Math.trunc(value));
}

/** Retry policy with every default filled in. */
interface ResolvedRetry {
  limit: number;
  timeout: number;
  factor: number;
  maxTimeout: number;
  retryable: (status: number) => boolean;
}

/**
 * Typed HTTP client that:
 * - fills `{param}` path templates, validating params via an optional `$path` schema,
 * - performs GET requests via a pluggable provider, with a per-attempt timeout,
 * - retries transient failures with exponential backoff,
 * - decodes 200 responses as JSON and validates them against the endpoint `response` schema.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}; nothing throws once
 * the client is constructed. The client holds no per-request state, so one instance
 * can serve any number of concurrent calls.
 */
export class RequestClient {
  /** Underlying fetch-capable HTTP provider instance. */
  #fetchClient: FetchClientProviderDefinition;
  /** Default request-level options (timeout, retry). */
  #requestOpts: Pick<RequestOptions, 'timeout' | 'retry'>;
  /** Default request timeout in milliseconds. */
  #defaultTimeout = 60_000;
  /** Base URL prefix applied to all endpoints, ending in `/`. */
  #baseUrl: string;
  /** Global abort-controller for disposing */
  #abortController: AbortController;
  #logger: Logger;

  /**
   * Creates a RequestClient and the provider it sends requests through.
   *
   * @throws {ConstructURLError} when `baseUrl` is not an absolute http(s) URL; a client
   * without a usable base URL cannot do anything, so this is not deferred to the first call.
   */
  constructor({ fetchProvider = FetchClient, baseUrl, fetchOpts, logger, debug }: RequestClientProps) {
    const [errUrl, url] = parseBaseUrl(baseUrl);
    if (errUrl) {
      throw errUrl;
    }

    const { timeout, retry, ...fetchClientOpts } = { ...fetchOpts };

    this.#requestOpts = { timeout, retry };
    this.#baseUrl = url;
    this.#abortController = new AbortController();
    this.#logger = resolveLogger(logger, debug);
    this.#fetchClient = new fetchProvider(url, {
      ...fetchClientOpts,
      headers: mergeHeaderOptions(
        {
          Accept: 'application/json',
          'Content-Type': 'application/json; charset=utf-8',
        },
        fetchClientOpts.headers,
      ),
    });
  }

  /** Base URL every endpoint is resolved against. */
  get baseUrl(): string {
    return this.#baseUrl;
  }

  /**
   * Aborts every in-flight request of this client and releases the provider.
   * Requests issued afterwards fail immediately with a {@link TransportError}.
   */
  dispose() {
    this.#abortController.abort(new AbortError('error client was disposed'));
    this.#fetchClient.dispose?.();
  }

  /**
   * Performs a GET request against an endpoint template and decodes the response.
   *
   * @param path - Endpoint template relative to the base URL, e.g. `cfps/{id}/`.
   * @param params - Values for the `{param}` segments, `null` when there are none.
   * @param definition - `$path` and `response` schemas of the endpoint.
   * @param opts - Per-call headers, signal, timeout and retry overrides.
   * @returns A promise resolving to `[error, data]` where `data` is the decoded response.
   */
  async get<Path extends string, Output>(
    path: Path,
    params: PathParams<Path>,
    definition: EndpointDefinition<Output>,
    opts: RequestOptions = {},
  ): SafeWrapAsync<Error, Output> {
    const [errUrl, url] = await constructUrl(path, params, definition.$path);
    if (errUrl) {
      return [new Error('error constructing URL in get', { cause: errUrl }), null];
    }

    const [errReq, result] = await this.#request(url, opts, (text) => decodeResponse(text, definition.response));
    if (errReq) {
      this.#logger.debug('request failed', { method: 'GET', url, error: describeError(errReq) });
      return [new Error('error doing request in get', { cause: errReq }), null];
    }

    return [null, result];
  }

  /**
   * Resolves the retry policy for a call: client defaults, then client options, then per-call options.
   * A bare number only overrides `limit`. Any 5xx is retried unless a layer says otherwise;
   * `statusCodes` replaces the retried set, `ignoreStatusCodes` removes codes from the set resolved so far.
   */
  #retryPolicy(override?: RetryOptions | number): ResolvedRetry {
    let limit = 3;
    let timeout = 250;
    let factor = 2;
    let maxTimeout = 5_000;
    let retryable = isServerError;

    for (const layer of [this.#requestOpts.retry, override]) {
      if (layer === undefined) {
        continue;
      }

      if (typeof layer === 'number') {
        limit = toRetryLimit(layer, limit);
        continue;
      }

      limit = toRetryLimit(layer.limit, limit);
      timeout = layer.timeout ?? timeout;
      factor = layer.factor ?? factor;
      maxTimeout = layer.maxTimeout ?? maxTimeout;

      if (layer.statusCodes) {
        const retryCodes = new Set<number>(layer.statusCodes);
        retryable = (status) => retryCodes.has(status);
      }

      if (layer.ignoreStatusCodes) {
        const ignoreCodes = new Set<number>(layer.ignoreStatusCodes);
        const previous = retryable;
        retryable = (status) => !ignoreCodes.has(status) && previous(status);
      }
    }

    return { limit, timeout, factor, maxTimeout, retryable };
  }

  /**
   * Internal request executor that applies retry/timeout handling and response decoding.
   *
   * Each attempt:
   * - merges the caller signal, the client dispose signal and a fresh timeout signal,
   * - sends the request through the provider,
   * - turns any status but 200 into an {@link HTTPError} carrying the body text,
   * - hands the body of a 200 to `decode`.
   *
   * Retried: transport failures, timeouts, and statuses in the retry policy.
   * Not retried: caller cancellation, dispose, decode failures, other statuses.
   */
  #request<ResponseType>(
    url: string,
    opts: RequestOptions,
    decode: (text: string) => SafeWrapAsync<Error, ResponseType>,
  ): SafeWrapAsync<Error, ResponseType> {
    const { retry: retryOpt, timeout: timeoutOpt, signal, headers } = opts;
    const policy = this.#retryPolicy(retryOpt);
    const timeout = timeoutOpt ?? this.#requestOpts.timeout ?? this.#defaultTimeout;
    const cancel = mergeSignals([signal, this.#abortController.signal]);
    const isCancelled = () => cancel.signal?.aborted === true;

    const attempt = async (): SafeWrapAsync<Error, ResponseType> => {
      const timeoutSignal = createTimeoutSignal(timeout);
      const merged = mergeSignals([cancel.signal, timeoutSignal.signal]);

      this.#logger.debug('dispatching request', { method: 'GET', url });
      const [err, response] = await this.#fetchClient.get(url, {
        headers,
        ...(merged.signal && { signal: merged.signal }),
      });

      let outcome: SafeWrap<Error, ResponseType>;
      if (err) {
        outcome = [new Error('error request GET in request', { cause: err }), null];
      } else {
        outcome = await this.#readResponse(response, url, decode);
      }

      merged.release();
      timeoutSignal.release();

      return outcome;
    };

    const pending = retry<ResponseType>({
      attempts: policy.limit,
      timeout: policy.timeout,
      factor: policy.factor,
      maxTimeout: policy.maxTimeout,
      signal: cancel.signal,
      errFn: (err) => {
        if (isCancelled()) {
          return true;
        }

        if (isTimeoutError(err)) {
          return false;
        }

        if (isDecodeError(err)) {
          return true;
        }

        const httpError = getHttpError(err);
        if (httpError) {
          return !policy.retryable(httpError.status);
        }

        return false;
      },
      onRetry: (err, attemptNo, delay) => {
        this.#logger.debug('retrying request', { method: 'GET', url, attempt: attemptNo, delay, error: describeError(err) });
      },
      fn: attempt,
    });

    return pending.finally(cancel.release);
  }

  /**
   * Settles one response: a 200 is decoded, anything else becomes an {@link HTTPError}.
   * Body read failures are a {@link TransportError} (and retried like one).
   */
  async #readResponse<ResponseType>(
    response: Response,
    url: string,
    decode: (text: string) => SafeWrapAsync<Error, ResponseType>,
  ): SafeWrapAsync<Error, ResponseType> {
    const [errText, text] = await getResponseText(response);
    if (errText) {
      return [new TransportError(`error reading ${response.status} response body of GET ${url}`, { cause: errText }), null];
    }

    if (response.status !== 200) {
      return [new HTTPError(response.status, text, response.url || `${this.#baseUrl}${url}`), null];
    }

    return decode(text);
  }
}
