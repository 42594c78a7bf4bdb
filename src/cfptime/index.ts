/**
 * CFPTime entrypoint: the API client, its record type and error union.
 * @module
 */

export { type CallOptions, CFPTime, type CFPTimeError, type CFPTimeOptions, toCFPTimeError } from './client.js';
export { type CFPTimeEndpoints, DEFAULT_BASE_URL, endpoints } from './endpoints.js';
export { type Conference, conferenceListSchema, conferenceSchema, idParamsSchema } from './schemas.js';
