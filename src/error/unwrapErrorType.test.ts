import { describe, expect, it } from 'vitest';
import { unwrapErrorNamed, unwrapErrorType } from './unwrapErrorType.js';

class TargetError extends Error {}

class SubTargetError extends TargetError {}

class OtherError extends Error {}

describe('unwrapErrorType', () => {
  it('non-error correctly returns null', () => {
    expect(unwrapErrorType(TargetError, { foo: 'bar' })).toBeNull();
    expect(unwrapErrorType(TargetError, 'boom')).toBeNull();
    expect(unwrapErrorType(TargetError, null)).toBeNull();
  });

  it('returns the error itself when it matches', () => {
    const err = new TargetError('target');
    expect(unwrapErrorType(TargetError, err)).toBe(err);
  });

  it('unwraps 5 layers', () => {
    const err = new TargetError('target');
    let wrapped: Error = err;
    for (let i = 0; i < 5; i += 1) {
      wrapped = new Error(`err${i}`, { cause: wrapped });
    }

    expect(unwrapErrorType(TargetError, wrapped)).toBe(err);
  });

  it('matches subclasses', () => {
    const err = new SubTargetError('sub');
    expect(unwrapErrorType(TargetError, new Error('outer', { cause: err }))).toBe(err);
  });

  it('returns the outermost match', () => {
    const inner = new TargetError('inner');
    const outer = new TargetError('outer', { cause: new Error('middle', { cause: inner }) });

    expect(unwrapErrorType(TargetError, outer)).toBe(outer);
  });

  it('returns null when no layer matches', () => {
    expect(unwrapErrorType(TargetError, new OtherError('other', { cause: new Error('inner') }))).toBeNull();
  });

  it('stops on cyclic causes', () => {
    const a = new Error('a');
    const b = new Error('b', { cause: a });
    a.cause = b;

    expect(unwrapErrorType(TargetError, a)).toBeNull();
  });

  it('stops at a non-error cause', () => {
    expect(unwrapErrorType(TargetError, new Error('outer', { cause: 'string cause' }))).toBeNull();
  });
});

describe('unwrapErrorNamed', () => {
  it('finds errors by name', () => {
    const reason = Object.assign(new Error('aborted'), { name: 'AbortError' });
    expect(unwrapErrorNamed('AbortError', new Error('outer', { cause: reason }))).toBe(reason);
  });

  it('returns null when no name matches', () => {
    expect(unwrapErrorNamed('AbortError', new Error('outer'))).toBeNull();
  });
});
