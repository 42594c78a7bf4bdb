/**
 * Core entrypoint: exports the generic request client and endpoint definition types.
 * Import from here to talk to an API other than CFPTime with the same pipeline.
 * @module
 */

export { RequestClient, type RequestClientProps } from './client.js';
export type {
  EndpointDefinition,
  HttpMethod,
  ParsePathParams,
  PathParams,
  RequestDefinitions,
  ResponseType,
} from './types.js';
