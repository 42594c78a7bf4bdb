/**
 * Root entrypoint: re-exports the CFPTime client, the generic request client, and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export {
  type CallOptions,
  CFPTime,
  type CFPTimeEndpoints,
  type CFPTimeError,
  type CFPTimeOptions,
  type Conference,
  conferenceListSchema,
  conferenceSchema,
  DEFAULT_BASE_URL,
  endpoints,
  idParamsSchema,
  toCFPTimeError,
} from './cfptime/index.js';
export {
  type EndpointDefinition,
  type HttpMethod,
  type PathParams,
  RequestClient,
  type RequestClientProps,
  type RequestDefinitions,
  type ResponseType,
} from './core/index.js';
export * from './error/index.js';
export { FetchClient } from './fetch/index.js';
export type {
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
  RequestOptions,
  RetryOptions,
  StatusCode,
} from './types/request.js';
export type { Logger } from './utils/logger.js';
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
