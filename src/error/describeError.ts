/**
 * Flattens an error and its `cause` chain into one line, e.g.
 * `error doing request in get: error retries exhausted after 4 attempts: fetch failed`.
 */
export function describeError(err: unknown): string {
  const parts: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = err;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (!(current instanceof Error)) {
      parts.push(String(current));
      break;
    }

    if (current.message && parts[parts.length - 1] !== current.message) {
      parts.push(current.message);
    }

    current = current.cause;
  }

  return parts.join(': ');
}
