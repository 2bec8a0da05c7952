import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { JsonCodec } from '../codec/json.js';
import type { UpdateError } from '../error/updateError.js';
import type { FetchClientOptions } from '../fetch/client.js';
import type { Logger } from '../logger/logger.js';
import type { FetchClientProvider } from '../types/request.js';
import type { SafeWrap } from '../utils/wrap.js';

/**
 * Payload submitted as the request body. The client never looks inside it; it only has
 * to be something the configured codec can encode.
 */
export type UpdateRequest = unknown;

/**
 * Outcome of a submitted update: `[error, null]` on failure, `[null, data]` on success.
 */
export type UpdateResult<T> = SafeWrap<UpdateError, T>;

/** Async variant of {@link UpdateResult}. */
export type UpdateResultAsync<T> = Promise<UpdateResult<T>>;

/** Success value produced by a response schema. */
export type UpdateResponse<Schema extends StandardSchemaV1> = StandardSchemaV1.InferOutput<Schema>;

/** Configuration for constructing an `UpdateClient`. */
export interface UpdateClientProps {
  /**
   * Endpoint template with exactly one `%s` placeholder for the destination identifier,
   * e.g. `https://api.example.com/sites/%s/update`.
   */
  endpoint: string;
  /** HTTP transport implementation. Defaults to `FetchClient`. */
  fetchProvider?: FetchClientProvider;
  /** Default transport options (headers, timeout). */
  fetchOpts?: FetchClientOptions;
  /** Codec used for request and response bodies. Defaults to `jsonCodec`. */
  codec?: JsonCodec;
  /** Logger for rejected responses. Defaults to `createLogger()`. */
  logger?: Logger;
}
