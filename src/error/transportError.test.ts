import { describe, expect, it } from 'vitest';
import { TimeoutError } from './timeoutError.js';
import { getTransportError, isTransportError, TransportError } from './transportError.js';

describe('isTransportError', () => {
  it('returns true for instances of TransportError', () => {
    expect(isTransportError(new TransportError('error in POST request in fetchClient'))).toBe(true);
  });

  it('returns true when a TransportError is a nested cause', () => {
    const err = new TransportError('error in POST request in fetchClient');

    expect(isTransportError(new Error('error doing request in postUpdate', { cause: err }))).toBe(true);
  });

  it('returns false for non TransportError errors', () => {
    expect(isTransportError(new TimeoutError('error request timed out after 50ms'))).toBe(false);
    expect(isTransportError('fetch failed')).toBe(false);
  });
});

describe('getTransportError', () => {
  it('unwraps the transport error and keeps its cause', () => {
    const timeout = new TimeoutError('error request timed out after 50ms');
    const err = new TransportError('error in POST request in fetchClient', { cause: timeout });
    const wrapped = new Error('error doing request in postUpdate', { cause: err });

    expect(getTransportError(wrapped)).toBe(err);
    expect(getTransportError(wrapped)?.cause).toBe(timeout);
  });

  it('returns null when there is no TransportError in the chain', () => {
    expect(getTransportError(new Error('boom'))).toBeNull();
  });
});
