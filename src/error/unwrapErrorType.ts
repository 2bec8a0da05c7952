/**
 * Walks an error and its nested `cause` chain, returning the first link that is an instance of `errorClass`.
 */
export function unwrapErrorType<T extends Error>(errorClass: new (...args: never[]) => T, err: unknown): T | null {
  const seen = new Set<unknown>();
  let current = err;
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}
