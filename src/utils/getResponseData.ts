import type { JsonCodec } from '../codec/json.js';
import { EmptyResponseError } from '../error/emptyResponseError.js';
import { TransportError } from '../error/transportError.js';
import type { FetchResponse } from '../types/request.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads a successful response to completion and decodes it with the given codec.
 *
 * - A failure while reading the body is a {@link TransportError}.
 * - An empty or whitespace-only body (204 included) is an {@link EmptyResponseError}.
 * - A body the codec cannot decode is returned as a plain `Error` with the codec error as `cause`.
 */
export async function getResponseData(response: FetchResponse, codec: JsonCodec): SafeWrapAsync<Error, unknown> {
  // Always read as text, so the body is drained exactly once whatever the outcome
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new TransportError('error reading response body in getResponseData', { cause: errText }), null];
  }

  if (!text.trim()) {
    return [new EmptyResponseError(`error empty response body with status ${response.status}`), null];
  }

  const [errDecode, decoded] = safeWrap(() => codec.decode(text));
  if (errDecode) {
    return [new Error('error decoding response body in getResponseData', { cause: errDecode }), null];
  }

  return [null, decoded];
}

/**
 * Reads the body of a rejected response so it can be logged, releasing the connection.
 * Resolves to `null` when the response has no body.
 */
export async function getErrorBody(response: FetchResponse): SafeWrapAsync<Error, string | null> {
  if (response.body === null) {
    return [null, null];
  }

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new TransportError('error reading error response body in getErrorBody', { cause: errText }), null];
  }

  return [null, text];
}
