import type { FetchClientOptions } from '../fetch/client.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/**
 * Header options accepted by the transport. A `null` or `undefined` value removes the header
 * when merging.
 */
export type HeaderOptions = Headers | Record<string, string | null | undefined>;

/** Options passed with each transport request. */
export interface FetchOptions {
  /** Serialized request body. */
  body?: string;
  /** Headers merged over the provider defaults. */
  headers?: HeaderOptions;
}

/** Response handed back by the transport. */
export type FetchResponse = Response;

/**
 * Contract for HTTP transports used by `UpdateClient`.
 *
 * `post` resolves to `[error, response]`: network failures as `TransportError`,
 * non-2xx responses as `HTTPError` carrying the unread response.
 */
export interface FetchClientProviderDefinition {
  /** Executes a POST request against an absolute URL. */
  post: (url: string, options: FetchOptions) => SafeWrapAsync<Error, FetchResponse>;
}

/** Factory signature for constructing transports. */
export interface FetchClientProvider {
  /** Creates a new transport with default options */
  new (opts: FetchClientOptions): FetchClientProviderDefinition;
}
