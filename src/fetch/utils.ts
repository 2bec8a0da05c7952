import type { HeaderOptions } from '../types/request.js';

/**
 * Filters out unsupported values and turns remaining into strings.
 */
function sanitize(value: unknown): string | null {
  const type = typeof value;
  return type === 'object' || type === 'function' || type === 'symbol' ? null : String(value);
}

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, unknown]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  return Object.entries(headers);
}

/**
 * Merge default and per-request headers into a single `Headers` instance. Later values win;
 * `null`/`undefined` removes a header set earlier.
 */
export function mergeHeaderOptions(...headerOptions: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const [key, value] of headerOptions.flatMap((headers) => [...toEntries(headers)])) {
    if (value == null) {
      merged.delete(key);
      continue;
    }

    const clean = sanitize(value);
    if (clean !== null) {
      merged.set(key, clean);
    }
  }

  return merged;
}
