import { HTTPError } from '../error/httpError.js';
import { TransportError } from '../error/transportError.js';
import type {
  FetchClientProviderDefinition,
  FetchOptions,
  FetchResponse,
  HeaderOptions,
} from '../types/request.js';
import { createTimeoutSignal } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/** Options to configure the {@link FetchClient} transport. */
export interface FetchClientOptions {
  /** Headers sent with every request. */
  headers?: HeaderOptions;
  /**
   * Request timeout in milliseconds, covering the round-trip and reading the body.
   * `false` disables it.
   * @default 60000
   */
  timeout?: number | false;
}

/**
 * Thin transport over the global `fetch` API that:
 * - merges default and per-request headers,
 * - applies a timeout,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Default request timeout in milliseconds. */
  #defaultTimeout = 60_000;
  /** Default options (headers, timeout). */
  #opts: FetchClientOptions;

  /** Creates a new transport with default options */
  constructor(opts?: FetchClientOptions) {
    this.#opts = opts ?? {};
  }

  /**
   * Executes a POST request.
   *
   * @param url - Absolute request URL.
   * @param opts - Body and headers merged over the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public post(url: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    return this.#request('POST', url, opts);
  }

  /**
   * Core request implementation.
   *
   * Errors:
   * - Network / fetch errors, timeouts included, are wrapped in `TransportError`.
   * - Non-2xx responses are wrapped in `HTTPError`, body unread.
   */
  async #request(method: string, url: string, opts: FetchOptions): SafeWrapAsync<Error, FetchResponse> {
    const headers = mergeHeaderOptions(this.#opts.headers, opts.headers);
    const signal = createTimeoutSignal(this.#opts.timeout ?? this.#defaultTimeout);

    const [err, res] = await safeWrapAsync(() =>
      fetch(url, {
        body: opts.body,
        method,
        headers,
        ...(signal && { signal }),
      }),
    );

    if (err) {
      return [new TransportError(`error in ${method} request in fetchClient`, { cause: err }), null];
    }

    if (!res.ok) {
      return [new HTTPError(res, `error in ${method} request in fetchClient, status ${res.status}`), null];
    }

    return [null, res];
  }
}
