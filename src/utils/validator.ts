import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

type ValidationResult<T extends StandardSchemaV1> = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

/**
 * Checks a decoded value against a Standard Schema (zod, valibot, arktype, ...) and
 * returns the schema's output.
 *
 * Schemas may validate synchronously or return a promise; both are awaited. A schema that
 * throws, or that breaks the Standard Schema result contract, is reported as a
 * {@link ValidationError} with no issues and the thrown error as `cause`.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  const [errStart, pending] = safeWrap<Error, ValidationResult<T> | Promise<ValidationResult<T>>>(() =>
    schema['~standard'].validate(input),
  );
  if (errStart) {
    return [new ValidationError('error validating response on validation start', [], { cause: errStart }), null];
  }

  const [errAsync, result] = await safeWrapAsync<Error, ValidationResult<T>>(() => Promise.resolve(pending));
  if (errAsync) {
    return [new ValidationError('error validating response asynchronously', [], { cause: errAsync }), null];
  }

  if (!result || typeof result !== 'object') {
    return [new ValidationError('error validating response, schema returned no result', []), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating response', result.issues), null];
  }

  return [null, result.value];
}
