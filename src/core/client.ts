import type { StandardSchemaV1 } from '@standard-schema/spec';
import { type JsonCodec, jsonCodec } from '../codec/json.js';
import { getHttpError, type HTTPError } from '../error/httpError.js';
import { EncodingError, isNotSerializableError } from '../error/serializationError.js';
import { toUpdateError } from '../error/updateError.js';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import { createLogger, type LogMeta, type Logger } from '../logger/logger.js';
import type { FetchClientProviderDefinition } from '../types/request.js';
import { checkEndpointTemplate, formatEndpoint } from '../utils/formatEndpoint.js';
import { getErrorBody, getResponseData } from '../utils/getResponseData.js';
import { validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import type { UpdateClientProps, UpdateRequest, UpdateResponse, UpdateResultAsync } from './types.js';

/** Media type of every request body. */
export const JSON_MEDIA_TYPE = 'application/json; charset=utf-8';

/**
 * Client that submits updates to a Jira Cloud REST endpoint.
 *
 * Each call is one stateless POST: the payload is encoded, sent with a bearer token to the
 * endpoint resolved for the destination, and the response body decoded against a caller-supplied
 * schema. Nothing is thrown to the caller; every failure comes back as an `UpdateError` in the
 * error slot of the result.
 *
 * @example
 * const client = new UpdateClient({ endpoint: BUILDS_API_URL });
 * const [err, data] = await client.postUpdate(cloudId, token, siteUrl, builds, buildsResponseSchema);
 * if (err) {
 *   console.warn(err.message);
 * }
 */
export class UpdateClient {
  /** Endpoint template, fixed at construction. */
  #endpoint: string;
  /** Underlying transport. */
  #fetchClient: FetchClientProviderDefinition;
  /** Request/response body codec. */
  #codec: JsonCodec;
  /** Receives the bodies of rejected responses. */
  #logger: Logger;

  /**
   * Wires together the transport, codec and logger.
   *
   * @throws {ConstructURLError} when `endpoint` does not contain exactly one `%s`.
   */
  constructor({
    endpoint,
    fetchProvider = FetchClient,
    fetchOpts,
    codec = jsonCodec,
    logger = createLogger(),
  }: UpdateClientProps) {
    const [errTemplate] = checkEndpointTemplate(endpoint);
    if (errTemplate) {
      throw errTemplate;
    }

    this.#endpoint = endpoint;
    this.#codec = codec;
    this.#logger = logger;
    this.#fetchClient = new fetchProvider({
      ...fetchOpts,
      headers: mergeHeaderOptions({ Accept: 'application/json' }, fetchOpts?.headers),
    });
  }

  /** Endpoint template this client posts to. */
  get endpoint(): string {
    return this.#endpoint;
  }

  /**
   * Submits an update and decodes the response.
   *
   * @param destinationId - Identifier substituted into the endpoint template (the Jira cloud id).
   * @param accessToken - Sent as `Authorization: Bearer <token>`.
   * @param siteUrl - Jira site the update belongs to; only used as log context.
   * @param request - Payload to encode as the request body.
   * @param responseSchema - Standard Schema the success body is validated against.
   * @returns `[null, data]` on success, `[UpdateError, null]` otherwise. Never rejects.
   */
  async postUpdate<Schema extends StandardSchemaV1>(
    destinationId: string,
    accessToken: string,
    siteUrl: string,
    request: UpdateRequest,
    responseSchema: Schema,
  ): UpdateResultAsync<UpdateResponse<Schema>> {
    const [errUnexpected, result] = await safeWrapAsync(() =>
      this.#submit(destinationId, accessToken, siteUrl, request, responseSchema),
    );
    if (errUnexpected) {
      return [toUpdateError(errUnexpected), null];
    }

    const [err, data] = result;
    if (err) {
      return [toUpdateError(err), null];
    }

    return [null, data];
  }

  /**
   * One request/response cycle. Errors come back typed so {@link toUpdateError} can classify them.
   */
  async #submit<Schema extends StandardSchemaV1>(
    destinationId: string,
    accessToken: string,
    siteUrl: string,
    request: UpdateRequest,
    responseSchema: Schema,
  ): SafeWrapAsync<Error, UpdateResponse<Schema>> {
    const [errEncode, body] = safeWrap(() => this.#codec.encode(request));
    if (errEncode) {
      if (isNotSerializableError(errEncode)) {
        return [errEncode, null];
      }

      return [new EncodingError('error encoding request payload in postUpdate', { cause: errEncode }), null];
    }

    const [errUrl, url] = formatEndpoint(this.#endpoint, destinationId);
    if (errUrl) {
      return [new Error('error constructing URL in postUpdate', { cause: errUrl }), null];
    }

    const [errReq, response] = await this.#fetchClient.post(url, {
      body,
      headers: {
        'Content-Type': JSON_MEDIA_TYPE,
        Authorization: `Bearer ${accessToken}`,
      },
    });
    if (errReq) {
      const httpError = getHttpError(errReq);
      if (httpError) {
        return this.#rejected(httpError, { destinationId, siteUrl });
      }

      return [new Error('error doing request in postUpdate', { cause: errReq }), null];
    }

    const [errData, data] = await getResponseData(response, this.#codec);
    if (errData) {
      return [new Error('error getting response in postUpdate', { cause: errData }), null];
    }

    const [errParse, parsed] = await validator(data, responseSchema);
    if (errParse) {
      return [new Error('error parsing response in postUpdate', { cause: errParse }), null];
    }

    return [null, parsed];
  }

  /**
   * Drains and logs the body of a non-2xx response. The body stays out of the returned error.
   */
  async #rejected(httpError: HTTPError, context: LogMeta): SafeWrapAsync<Error, never> {
    const [errBody, body] = await getErrorBody(httpError.response);
    if (errBody) {
      return [errBody, null];
    }

    if (body !== null) {
      this.#logger.error(`Error response body when submitting update to Jira: ${body}`, {
        ...context,
        status: httpError.status,
      });
    }

    return [httpError, null];
  }
}
