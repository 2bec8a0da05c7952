import { describe, expect, it } from 'vitest';
import { unwrapErrorType } from './unwrapErrorType.js';

class CustomError extends Error {}

class DifferentError extends Error {}

describe('unwrapErrorType', () => {
  it('returns null for non-error values', () => {
    expect(unwrapErrorType(CustomError, { message: 'not an error' })).toBeNull();
    expect(unwrapErrorType(CustomError, 'boom')).toBeNull();
    expect(unwrapErrorType(CustomError, null)).toBeNull();
  });

  it('returns the error itself when it matches', () => {
    const err = new CustomError('test');

    expect(unwrapErrorType(CustomError, err)).toBe(err);
  });

  it('unwraps 4 layers of causes', () => {
    const err = new CustomError('test', { cause: new Error('first') });
    const wrapped1 = new Error('err1', { cause: err });
    const wrapped2 = new DifferentError('err2', { cause: wrapped1 });
    const wrapped3 = new Error('err3', { cause: wrapped2 });
    const wrapped4 = new Error('err4', { cause: wrapped3 });

    expect(unwrapErrorType(CustomError, wrapped4)).toBe(err);
  });

  it('returns the outermost match', () => {
    const inner = new CustomError('inner');
    const outer = new CustomError('outer', { cause: new Error('middle', { cause: inner }) });

    expect(unwrapErrorType(CustomError, outer)).toBe(outer);
  });

  it('returns null when nothing in the chain matches', () => {
    const err = new DifferentError('err2', { cause: new Error('err1', { cause: new DifferentError('err') }) });

    expect(unwrapErrorType(CustomError, err)).toBeNull();
  });

  it('stops at a non-error cause', () => {
    const err = new Error('outer', { cause: { reason: 'not an error' } });

    expect(unwrapErrorType(CustomError, err)).toBeNull();
  });

  it('terminates on cyclic causes', () => {
    const first = new Error('first');
    const second = new Error('second', { cause: first });
    first.cause = second;

    expect(unwrapErrorType(CustomError, second)).toBeNull();
  });
});
