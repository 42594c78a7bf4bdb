/** Constructor of an error class, as accepted by the error helpers. */
export type ErrorClass<T extends Error> = abstract new (...args: never[]) => T;

/**
 * Walks an error and its nested `cause` chain, returning the first link `match` accepts.
 */
function walkCauses<T>(err: unknown, match: (link: Error) => T | null): T | null {
  const seen = new Set<unknown>();
  let current: unknown = err;

  while (current instanceof Error && !seen.has(current)) {
    const found = match(current);
    if (found) {
      return found;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  return walkCauses(err, (link) => (link instanceof errorClass ? link : null));
}

/**
 * Extract the first error in the `cause` chain with the given `name`.
 * Needed for errors we do not construct ourselves, like the `DOMException`
 * named `AbortError` that a bare `controller.abort()` rejects with.
 */
export function unwrapErrorNamed(name: string, err: unknown): Error | null {
  return walkCauses(err, (link) => (link.name === name ? link : null));
}
