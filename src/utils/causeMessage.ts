/**
 * Flattens an error and its nested `cause` chain into a single message,
 * e.g. `fetch failed: connect ECONNREFUSED 127.0.0.1:443`.
 * Non-error values are stringified; empty messages are skipped.
 */
export function causeMessage(error: unknown): string {
  const messages: string[] = [];
  const seen = new Set<unknown>();
  let current = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (!(current instanceof Error)) {
      messages.push(String(current));
      break;
    }

    if (current.message) {
      messages.push(current.message);
    }
    current = current.cause;
  }

  return messages.join(': ');
}
