/**
 * Root entrypoint: re-exports the update client, its types, the default transport, codec, logger
 * and error utilities.
 * @module
 */

/**
 * Client submitting build and deployment updates to Jira Cloud.
 */
export {
  BUILDS_API_URL,
  DEPLOYMENTS_API_URL,
  JSON_MEDIA_TYPE,
  UpdateClient,
  type UpdateClientProps,
  type UpdateRequest,
  type UpdateResponse,
  type UpdateResult,
  type UpdateResultAsync,
} from './core/index.js';

/**
 * JSON codec contract and its default implementation.
 */
export { type JsonCodec, jsonCodec } from './codec/json.js';

/**
 * Default HTTP transport over the global `fetch`, and the header merging it applies.
 */
export { FetchClient, type FetchClientOptions, mergeHeaderOptions } from './fetch/index.js';

/**
 * Transport contract for plugging in another HTTP client.
 */
export type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  FetchResponse,
  HeaderOptions,
} from './types/request.js';

/**
 * Logging contract and the winston-backed default.
 */
export { createLogger, type LogMeta, type Logger, type LoggerOptions } from './logger/logger.js';

/**
 * Failure taxonomy returned in the error slot of every result.
 */
export * from './error/index.js';

/** Error-first tuple types used throughout. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
