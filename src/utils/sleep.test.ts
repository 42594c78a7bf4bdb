import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { sleep } from './sleep.js';

describe('sleep', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves after the given delay', async () => {
    const done = vi.fn();
    const pending = sleep(100).then(done);

    await vi.advanceTimersByTimeAsync(99);
    expect(done).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it('resolves early once the signal aborts', async () => {
    const controller = new AbortController();
    const done = vi.fn();
    const pending = sleep(10_000, controller.signal).then(done);

    controller.abort();
    await pending;

    expect(done).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('resolves immediately with an aborted signal', async () => {
    await sleep(10_000, AbortSignal.abort());

    expect(vi.getTimerCount()).toBe(0);
  });
});
