import { ConstructURLError } from '../error/constructUrlError.js';
import type { HttpMethod } from '../core/types.js';
import type { HeaderOptions } from '../types/request.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, string | null | undefined]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

/**
 * Merge global and local headers into a single `Headers` instance, normalizing keys.
 * Later sources win; a nullish value removes the header.
 */
export function mergeHeaderOptions(...sources: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const source of sources) {
    for (const [key, value] of toEntries(source)) {
      if (value == null) {
        merged.delete(key);
        continue;
      }

      merged.set(key, value);
    }
  }

  return merged;
}

/**
 * Validates a base URL and normalizes it to end with a single `/`, so relative
 * endpoints resolve beneath it instead of replacing its last segment.
 */
export function parseBaseUrl(baseUrl: string): SafeWrap<ConstructURLError, string> {
  const [errUrl, url] = safeWrap(() => new URL(baseUrl));
  if (errUrl) {
    return [new ConstructURLError(`error invalid base URL ${baseUrl}`, baseUrl, { cause: errUrl }), null];
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return [new ConstructURLError(`error base URL must be http(s), got ${url.protocol}`, baseUrl), null];
  }

  if (url.search || url.hash) {
    return [new ConstructURLError('error base URL cannot carry a query or fragment', baseUrl), null];
  }

  return [null, url.href.endsWith('/') ? url.href : `${url.href}/`];
}

/**
 * Joins a relative endpoint onto a base URL with URL semantics, tolerating a missing
 * trailing slash on the base and a leading slash on the endpoint.
 *
 * @example
 * joinUrl('https://api.cfptime.org/api', '/cfps/1729/'); // https://api.cfptime.org/api/cfps/1729/
 */
export function joinUrl(baseUrl: string, endpoint: string): SafeWrap<ConstructURLError, string> {
  const [errBase, base] = parseBaseUrl(baseUrl);
  if (errBase) {
    return [errBase, null];
  }

  const relative = endpoint.replace(/^\/+/, '');
  const [errUrl, url] = safeWrap(() => new URL(relative, base));
  if (errUrl) {
    return [new ConstructURLError(`error joining ${endpoint} onto ${base}`, `${base}${relative}`, { cause: errUrl }), null];
  }

  return [null, url.href];
}

/** URL and serialized body of a request ready to dispatch. */
export interface BuiltRequest {
  method: Uppercase<HttpMethod>;
  url: string;
  body: string | undefined;
}

/**
 * Produces the URL and body for a request.
 *
 * - The endpoint is joined onto `baseUrl` via {@link joinUrl}.
 * - GET and DELETE never carry a body, whatever `data` holds.
 * - Any other method gets `data` serialized as JSON, when defined.
 */
export function buildRequest(
  method: HttpMethod,
  baseUrl: string,
  endpoint: string,
  data?: unknown,
): SafeWrap<Error, BuiltRequest> {
  const upper = toUpperMethod(method);
  const [errUrl, url] = joinUrl(baseUrl, endpoint);
  if (errUrl) {
    return [errUrl, null];
  }

  if (method === 'get' || method === 'delete' || data === undefined) {
    return [null, { method: upper, url, body: undefined }];
  }

  const [errBody, body] = safeWrap(() => JSON.stringify(data));
  if (errBody) {
    return [new Error(`error serializing ${upper} request body`, { cause: errBody }), null];
  }

  return [null, { method: upper, url, body }];
}

const UPPER_METHODS = {
  get: 'GET',
  post: 'POST',
  put: 'PUT',
  patch: 'PATCH',
  delete: 'DELETE',
} as const satisfies Record<HttpMethod, Uppercase<HttpMethod>>;

/** `get` -> `GET`, typed. */
export function toUpperMethod(method: HttpMethod): Uppercase<HttpMethod> {
  return UPPER_METHODS[method];
}
