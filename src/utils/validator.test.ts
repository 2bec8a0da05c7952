import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../error/validationError.js';
import { validator } from './validator.js';

type Validate = StandardSchemaV1<unknown, string>['~standard']['validate'];

function createSchema(validate: Validate): StandardSchemaV1<unknown, string> {
  return {
    '~standard': { version: 1, vendor: 'test', validate },
  };
}

describe('validator', () => {
  it('returns the schema output for a matching value', async () => {
    const schema = z.object({ id: z.number().int() });
    const [err, parsed] = await validator({ id: 42 }, schema);

    expect(err).toBeNull();
    expect(parsed).toEqual({ id: 42 });
  });

  it('returns the transformed output', async () => {
    const schema = z
      .object({ acceptedBuilds: z.array(z.string()) })
      .transform(({ acceptedBuilds }) => acceptedBuilds.length);
    const [err, parsed] = await validator({ acceptedBuilds: ['build-1', 'build-2'] }, schema);

    expect(err).toBeNull();
    expect(parsed).toBe(2);
  });

  it('returns the issues for a mismatching value', async () => {
    const schema = z.object({ id: z.number().int() });
    const [err, parsed] = await validator({ id: '42' }, schema);

    expect(parsed).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.message.startsWith('error validating response; issues: ')).toBe(true);
    expect(err?.issues).toHaveLength(1);
    expect(err?.issues[0]?.path).toEqual(['id']);
  });

  it('returns error when sync validation throws', async () => {
    const schema = createSchema(() => {
      throw new Error('oops');
    });

    const [err, value] = await validator({}, schema);

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating response on validation start; issues: []');
    expect(err?.cause).toEqual(new Error('oops'));
  });

  it('returns error when async validation rejects', async () => {
    const schema = createSchema(() => Promise.reject(new Error('oops')));

    const [err, value] = await validator({}, schema);

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating response asynchronously; issues: []');
  });

  it('returns error when validation returns no result', async () => {
    const schema = createSchema(() => JSON.parse('null'));

    const [err, value] = await validator('test', schema);

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating response, schema returned no result; issues: []');
  });

  it('returns the value when async validation resolves', async () => {
    const schema = createSchema(async (input) => ({ value: String(input) }));

    const [err, value] = await validator('test', schema);

    expect(err).toBeNull();
    expect(value).toBe('test');
  });
});
