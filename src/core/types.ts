import type { StandardSchemaV1 } from '@standard-schema/spec';

/** Empty object definition */
export type EmptyObject = Record<never, never>;

/**
 * EmptyishObject turns an object type without keys into `null`
 */
export type EmptyishObject<T> = [keyof T] extends [never] ? null : T;

/**
 * HTTPMethods that exists
 */
export type HttpMethod = 'get' | 'post' | 'put' | 'patch' | 'delete';

/**
 * Schemas for one endpoint:
 * - `$path` validates the `{param}` values before they are put into the URL,
 * - `response` decodes the JSON body of a 200 response.
 */
export interface EndpointDefinition<Output = unknown> {
  $path?: StandardSchemaV1;
  response: StandardSchemaV1<unknown, Output>;
}

/**
 * RequestDefinitions types up the endpoints an API exposes,
 * keyed by their path template relative to the base URL
 */
export type RequestDefinitions = {
  [path: string]: {
    get: EndpointDefinition;
  };
};

/** Parse `{param}` segments from a path template into a typed object. */
export type ParsePathParams<Path extends string> = Path extends `${string}{${infer Param}}${infer Rest}`
  ? { [K in Param]: string | number | boolean } & ParsePathParams<Rest>
  : EmptyObject;

/** Params expected for a path template, `null` when it has none. */
export type PathParams<Path extends string> = EmptyishObject<ParsePathParams<Path>>;

/** Decoded response type of an endpoint in a {@link RequestDefinitions} map. */
export type ResponseType<Schema extends RequestDefinitions, Endpoint extends keyof Schema> = StandardSchemaV1.InferOutput<
  Schema[Endpoint]['get']['response']
>;
