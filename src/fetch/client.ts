import type { HttpMethod } from '../core/types.js';
import { TransportError } from '../error/transportError.js';
import type {
  FetchBodyOptions,
  FetchClientOptions,
  FetchClientProviderDefinition,
  FetchOptions,
} from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { buildRequest, mergeHeaderOptions, parseBaseUrl } from './utils.js';

/**
 * Thin wrapper around the global `fetch` API that:
 * - resolves every request against a configured base URL,
 * - merges default and per-request headers,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * It never looks at the status code: any response that arrives is returned as-is.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Base URL all request paths resolve against, always ending in `/`. */
  #baseUrl: string;
  /** Default fetch options (headers). */
  #opts: FetchClientOptions;

  /**
   * Creates a new instance of the fetch-client, with a base-url + options.
   *
   * @throws {ConstructURLError} when `baseUrl` is not an absolute http(s) URL.
   * @throws {TransportError} when the runtime has no `fetch`.
   */
  constructor(baseUrl: string, opts?: FetchClientOptions) {
    const [errUrl, url] = parseBaseUrl(baseUrl);
    if (errUrl) {
      throw errUrl;
    }

    if (typeof globalThis.fetch !== 'function') {
      throw new TransportError('error no fetch implementation available in this runtime');
    }

    this.#baseUrl = url;
    this.#opts = opts ?? {};
  }

  /** Base URL requests resolve against. */
  get baseUrl(): string {
    return this.#baseUrl;
  }

  /**
   * Executes a GET request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path (e.g. `cfps/1729/`).
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public get(endpoint: string, opts: FetchOptions = {}): SafeWrapAsync<Error, Response> {
    return this.request('get', endpoint, opts);
  }

  /**
   * Executes a request of any method against the given endpoint.
   *
   * `opts.data` is sent as a JSON body, except for GET and DELETE, where it is dropped.
   *
   * Errors:
   * - URL or body construction failures are returned as-is.
   * - Network / fetch errors are wrapped in {@link TransportError}.
   */
  public async request(
    method: HttpMethod,
    endpoint: string,
    opts: FetchBodyOptions = {},
  ): SafeWrapAsync<Error, Response> {
    const [errBuild, built] = buildRequest(method, this.#baseUrl, endpoint, opts.data);
    if (errBuild) {
      return [errBuild, null];
    }

    const headers = mergeHeaderOptions(this.#opts.headers, opts.headers);
    const [err, res] = await safeWrapAsync(() =>
      fetch(built.url, {
        method: built.method,
        body: built.body,
        headers,
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new TransportError(`error sending ${built.method} request to ${built.url}`, { cause: err }), null];
    }

    return [null, res];
  }
}
