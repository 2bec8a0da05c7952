/**
 * Core entrypoint: exports the update client, its result types and well-known endpoints.
 * @module
 */
export { JSON_MEDIA_TYPE, UpdateClient } from './client.js';
export { BUILDS_API_URL, DEPLOYMENTS_API_URL } from './endpoints.js';
export type {
  UpdateClientProps,
  UpdateRequest,
  UpdateResponse,
  UpdateResult,
  UpdateResultAsync,
} from './types.js';
