import { describe, expect, it } from 'vitest';
import { safeWrap, safeWrapAsync, toError } from './wrap.js';

describe('safeWrapAsync', () => {
  it('returns data on resolve', async () => {
    const [err, data] = await safeWrapAsync(async () => 42);

    expect(err).toBeNull();
    expect(data).toBe(42);
  });

  it('returns the error on reject', async () => {
    const boom = new Error('boom');
    const [err, data] = await safeWrapAsync(() => Promise.reject(boom));

    expect(err).toBe(boom);
    expect(data).toBeNull();
  });

  it('catches synchronous throws inside the factory', async () => {
    const [err] = await safeWrapAsync(() => {
      throw new TypeError('sync');
    });

    expect(err).toBeInstanceOf(TypeError);
  });
});

describe('safeWrap', () => {
  it('returns data when fn succeeds', () => {
    expect(safeWrap(() => JSON.parse('{"a":1}'))).toEqual([null, { a: 1 }]);
  });

  it('returns the error when fn throws', () => {
    const [err, data] = safeWrap(() => JSON.parse('not json'));

    expect(err).toBeInstanceOf(SyntaxError);
    expect(data).toBeNull();
  });
});

describe('toError', () => {
  it('passes errors through', () => {
    const err = new Error('boom');
    expect(toError(err)).toBe(err);
  });

  it('wraps non-error values', () => {
    const err = toError('boom');

    expect(err.message).toBe('error non-error value thrown: boom');
    expect(err.cause).toBe('boom');
  });
});
