import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ConstructURLError } from '../error/constructUrlError.js';
import { validator } from './validator.js';
import type { SafeWrapAsync } from './wrap.js';

/** Matches any `{param}` left in a template. */
const PLACEHOLDER = /\{[^}]*\}/;

/**
 * Constructs a relative URL by replacing `{param}` segments of a path template.
 *
 * - When `schema` is given, `params` are validated (and possibly transformed) by it first.
 * - Values are URI-encoded; only strings, numbers and booleans are substituted.
 * - Any placeholder left over, or a param value of another type, fails construction.
 * - A leading slash is stripped for clean joining onto the base URL.
 */
export async function constructUrl(
  path: string,
  params: unknown,
  schema?: StandardSchemaV1,
): SafeWrapAsync<ConstructURLError, string> {
  let data = params;
  if (schema && params !== null && params !== undefined) {
    const [errParse, parsed] = await validator(params, schema);
    if (errParse) {
      return [new ConstructURLError(`error validating path params for ${path}`, path, { cause: errParse }), null];
    }

    data = parsed;
  }

  let result = path;
  if (typeof data === 'object' && data !== null) {
    for (const [key, value] of Object.entries(data)) {
      if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
        return [new ConstructURLError(`error path param ${key} must be a string, number or boolean`, path), null];
      }

      result = result.replaceAll(`{${key}}`, encodeURIComponent(String(value)));
    }
  }

  if (PLACEHOLDER.test(result)) {
    return [new ConstructURLError(`error constructing URL, unreplaced params left in ${result}`, result), null];
  }

  return [null, result.replace(/^\/+/, '')];
}
