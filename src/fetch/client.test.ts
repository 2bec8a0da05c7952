import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { HTTPError } from '../error/httpError.js';
import { getTimeoutError } from '../error/timeoutError.js';
import { TransportError } from '../error/transportError.js';
import { FetchClient } from './client.js';

describe('FetchClient', () => {
  let mockedFetch: Mock<typeof fetch>;

  beforeEach(() => {
    mockedFetch = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', mockedFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  describe('POST', () => {
    it('should make a post request with merged headers', async () => {
      const successResponse = new Response('{"id":1}', { status: 201 });
      mockedFetch.mockResolvedValueOnce(successResponse);

      const client = new FetchClient({ headers: { Accept: 'application/json', 'X-Base': '1' } });
      const [err, response] = await client.post('https://api.example.com/sites/abc/update', {
        body: '{"builds":[]}',
        headers: { 'X-Base': null, Authorization: 'Bearer test-token' },
      });

      expect(err).toBeNull();
      expect(response).toBe(successResponse);
      expect(mockedFetch).toHaveBeenCalledTimes(1);
      expect(mockedFetch).toHaveBeenCalledWith('https://api.example.com/sites/abc/update', {
        body: '{"builds":[]}',
        method: 'POST',
        headers: expect.any(Headers),
        signal: expect.any(AbortSignal),
      });

      const headers = new Headers(mockedFetch.mock.calls[0][1]?.headers);
      expect(headers.get('accept')).toBe('application/json');
      expect(headers.get('authorization')).toBe('Bearer test-token');
      expect(headers.get('x-base')).toBeNull();
    });

    it('should not attach a signal when the timeout is disabled', async () => {
      mockedFetch.mockResolvedValueOnce(new Response('{}', { status: 200 }));

      const client = new FetchClient({ timeout: false });
      const [err] = await client.post('https://api.example.com/update', { body: '{}' });

      expect(err).toBeNull();
      expect(mockedFetch.mock.calls[0][1]?.signal).toBeUndefined();
    });

    it('should return HTTPError with the unread response for non-2xx', async () => {
      const errorResponse = new Response('{"err":"boom"}', { status: 500 });
      mockedFetch.mockResolvedValueOnce(errorResponse);

      const client = new FetchClient();
      const [err, response] = await client.post('https://api.example.com/update', { body: '{}' });

      expect(response).toBeNull();
      expect(err).toBeInstanceOf(HTTPError);
      expect(err?.message).toBe('error in POST request in fetchClient, status 500');
      expect(err instanceof HTTPError && err.response).toBe(errorResponse);
      expect(errorResponse.bodyUsed).toBe(false);
    });

    it('should wrap network errors in TransportError', async () => {
      const networkError = new TypeError('fetch failed');
      mockedFetch.mockRejectedValueOnce(networkError);

      const client = new FetchClient();
      const [err, response] = await client.post('https://api.example.com/update', { body: '{}' });

      expect(response).toBeNull();
      expect(err).toBeInstanceOf(TransportError);
      expect(err?.message).toBe('error in POST request in fetchClient');
      expect(err?.cause).toBe(networkError);
    });

    it('should abort with a TimeoutError once the timeout elapses', async () => {
      vi.useFakeTimers();
      mockedFetch.mockImplementationOnce(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason), { once: true });
          }),
      );

      const client = new FetchClient({ timeout: 50 });
      const pending = client.post('https://api.example.com/update', { body: '{}' });

      await vi.advanceTimersByTimeAsync(50);
      const [err, response] = await pending;

      expect(response).toBeNull();
      expect(err).toBeInstanceOf(TransportError);
      expect(getTimeoutError(err)?.message).toBe('error request timed out after 50ms');
    });
  });
});
