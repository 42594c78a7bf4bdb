import type { RequestDefinitions } from '../core/types.js';
import { conferenceListSchema, conferenceSchema, idParamsSchema } from './schemas.js';

/** Production root of the CFPTime API. */
export const DEFAULT_BASE_URL = 'https://api.cfptime.org/api/';

/**
 * Endpoints of the CFPTime API, relative to {@link DEFAULT_BASE_URL}.
 * The by-id endpoints end in a slash, the list endpoints do not.
 */
export const endpoints = {
  cfps: {
    get: { response: conferenceListSchema },
  },
  'cfps/{id}/': {
    get: { $path: idParamsSchema, response: conferenceSchema },
  },
  conferences: {
    get: { response: conferenceListSchema },
  },
  'conferences/{id}/': {
    get: { $path: idParamsSchema, response: conferenceSchema },
  },
  upcoming: {
    get: { response: conferenceListSchema },
  },
} satisfies RequestDefinitions;

/** Endpoint map type of the CFPTime API. */
export type CFPTimeEndpoints = typeof endpoints;
