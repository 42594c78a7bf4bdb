import type { StandardSchemaV1 } from '@standard-schema/spec';
import { DecodeError } from '../error/decodeError.js';
import { validator } from './validator.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads the whole response body as text.
 *
 * The body is read once; read failures (aborts, dropped connections) come back as the error.
 */
export async function getResponseText(response: Response): SafeWrapAsync<Error, string> {
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseText', { cause: errText }), null];
  }

  return [null, text];
}

/**
 * Decodes a response body: parses it as JSON whatever the `Content-Type` claims, then
 * validates it against `schema`. Both failures are a {@link DecodeError} carrying the raw body.
 */
export async function decodeResponse<Output>(
  text: string,
  schema: StandardSchemaV1<unknown, Output>,
): SafeWrapAsync<DecodeError, Output> {
  const [errJson, json] = safeWrap((): unknown => JSON.parse(text));
  if (errJson) {
    return [new DecodeError('error parsing json response body', text, [], { cause: errJson }), null];
  }

  const [errValidate, value] = await validator(json, schema);
  if (errValidate) {
    return [
      new DecodeError('error response body does not match the expected shape', text, errValidate.issues, {
        cause: errValidate,
      }),
      null,
    ];
  }

  return [null, value];
}
