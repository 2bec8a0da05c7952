import { describe, expect, it } from 'vitest';
import { getHttpError, HTTPError, isHttpError } from './httpError.js';

describe('HTTPError', () => {
  it('defaults the message to the status', () => {
    const err = new HTTPError(new Response(null, { status: 400 }));

    expect(err.message).toBe('HTTP Error: 400');
    expect(err.status).toBe(400);
  });

  it('keeps the response unread', async () => {
    const response = new Response('{"err":"boom"}', { status: 500 });
    const err = new HTTPError(response, 'error in POST request');

    expect(err.response).toBe(response);
    expect(err.response.bodyUsed).toBe(false);
    expect(await err.response.text()).toBe('{"err":"boom"}');
  });

  it('expect shallow to correctly return true', () => {
    expect(isHttpError(new HTTPError(new Response(null, { status: 400 })))).toEqual(true);
  });

  it('extracts the error from a wrapped cause', () => {
    const err = new HTTPError(new Response(null, { status: 401 }));
    const wrapped = new Error('error doing request', { cause: err });

    expect(getHttpError(wrapped)?.status).toBe(401);
    expect(getHttpError(new Error('plain'))).toBeNull();
  });
});
