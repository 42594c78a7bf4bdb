/**
 * Fetch entrypoint: exports the fetch client and its request-building helpers.
 * @module
 */
export { FetchClient } from './client.js';
export { type BuiltRequest, buildRequest, joinUrl, mergeHeaderOptions, parseBaseUrl } from './utils.js';
