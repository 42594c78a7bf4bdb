import { AbortError } from '../error/abortError.js';
import { TimeoutError } from '../error/timeoutError.js';

/**
 * A signal together with the function that detaches its timers and listeners.
 * `release` must be called once the guarded work settles, aborted or not.
 */
export interface ScopedSignal {
  signal: AbortSignal | null;
  release: () => void;
}

const noop = () => {};

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after
 * the specified timeout.
 *
 * When `timeoutMs` is `false` or `0`, no timeout signal is created.
 */
export function createTimeoutSignal(timeoutMs?: number | false): ScopedSignal {
  if (!timeoutMs) {
    return { signal: null, release: noop };
  }

  const controller = new AbortController();
  const timer = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`, timeoutMs)),
    timeoutMs,
  );

  return { signal: controller.signal, release: () => clearTimeout(timer) };
}

/**
 * Merges multiple {@link AbortSignal} instances into a single signal.
 *
 * - No signals gives `null`, a single signal is passed through as-is.
 * - Otherwise a new controller aborts as soon as any source aborts, keeping the source `reason`
 *   when there is one and falling back to an {@link AbortError}.
 * - `release` removes the listeners put on the sources; long-lived sources (such as a client-wide
 *   dispose signal) would otherwise collect one listener per request.
 */
export function mergeSignals(signals: Array<AbortSignal | null | undefined>): ScopedSignal {
  const active = signals.filter((s): s is AbortSignal => s !== null && s !== undefined);

  if (active.length === 0) {
    return { signal: null, release: noop };
  }

  if (active.length === 1) {
    return { signal: active[0], release: noop };
  }

  const controller = new AbortController();
  const listeners: Array<() => void> = [];
  const release = () => {
    for (const remove of listeners.splice(0)) {
      remove();
    }
  };

  const abortFrom = (source: AbortSignal) => {
    release();
    controller.abort(source.reason ?? new AbortError('error signal triggered with unknown reason'));
  };

  for (const signal of active) {
    if (signal.aborted) {
      abortFrom(signal);
      break;
    }

    const abort = () => abortFrom(signal);
    signal.addEventListener('abort', abort, { once: true });
    listeners.push(() => signal.removeEventListener('abort', abort));
  }

  return { signal: controller.signal, release };
}
