/**
 * Waits for the given number of milliseconds.
 *
 * Resolves early (never rejects) once `signal` aborts, so a cancelled retry loop
 * does not sit out its backoff delay.
 *
 * @example
 * await sleep(250);
 */
export function sleep(ms: number, signal?: AbortSignal | null): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };

    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}
