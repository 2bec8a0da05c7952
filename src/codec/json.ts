import { NotSerializableError } from '../error/serializationError.js';
import { safeWrap } from '../utils/wrap.js';

/**
 * Converts payloads to JSON text and response bodies back to values.
 * Implementations throw on failure; the client turns throws into results.
 */
export interface JsonCodec {
  /** Renders a value as JSON text. Throws {@link NotSerializableError} when the value has no JSON form. */
  encode(value: unknown): string;
  /** Parses JSON text. */
  decode(text: string): unknown;
}

/**
 * Replacer that flags the two values `JSON.stringify` refuses (BigInt and circular references)
 * right before it throws on them. Ancestors are tracked the same way `JSON.stringify` does.
 */
function createUnserializableTracker() {
  const ancestors: object[] = [];
  let found = false;

  function replacer(this: unknown, _key: string, value: unknown): unknown {
    if (typeof value === 'bigint') {
      found = true;
      return value;
    }

    if (typeof value !== 'object' || value === null) {
      return value;
    }

    while (ancestors.length > 0 && ancestors[ancestors.length - 1] !== this) {
      ancestors.pop();
    }

    if (ancestors.includes(value)) {
      found = true;
      return value;
    }

    ancestors.push(value);
    return value;
  }

  return { replacer, found: () => found };
}

/**
 * Default codec over `JSON.stringify` / `JSON.parse`.
 *
 * Circular structures, BigInt values and values with no JSON text (`undefined`, functions,
 * symbols) become a {@link NotSerializableError}. Anything else thrown while encoding, such as
 * an error from a `toJSON` method or a getter, is rethrown untouched.
 */
export const jsonCodec: JsonCodec = {
  encode(value) {
    const tracker = createUnserializableTracker();
    const [err, text] = safeWrap<Error, string | undefined>(() => JSON.stringify(value, tracker.replacer));
    if (err) {
      if (tracker.found()) {
        throw new NotSerializableError('error value is not serializable to JSON', { cause: err });
      }

      throw err;
    }

    if (text === undefined) {
      throw new NotSerializableError(`error ${typeof value} has no JSON representation`);
    }

    return text;
  },
  decode(text) {
    return JSON.parse(text);
  },
};
