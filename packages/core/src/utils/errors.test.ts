import { describe, it, expect } from 'vitest';
import { ContractError, HookwrapError, ReturnShapeMismatchError, toErrorMessage } from './errors.js';

describe('toErrorMessage', () => {
  it('returns message from Error instance', () => {
    expect(toErrorMessage(new Error('oops'))).toBe('oops');
  });

  it('returns "Unknown error" for non-Error values', () => {
    expect(toErrorMessage('string error')).toBe('Unknown error');
    expect(toErrorMessage(42)).toBe('Unknown error');
    expect(toErrorMessage(null)).toBe('Unknown error');
    expect(toErrorMessage(undefined)).toBe('Unknown error');
  });
});

describe('ContractError', () => {
  it('carries the method and code', () => {
    const err = new ContractError('bad contract', 'greet');
    expect(err).toBeInstanceOf(HookwrapError);
    expect(err.name).toBe('ContractError');
    expect(err.code).toBe('INVALID_CONTRACT');
    expect(err.method).toBe('greet');
  });
});

describe('ReturnShapeMismatchError', () => {
  it('describes what the method returned', () => {
    expect(new ReturnShapeMismatchError('load', 'deferred-value', 5).message).toBe(
      'Method "load" is declared as deferred-value but returned a number',
    );
    expect(new ReturnShapeMismatchError('load', 'deferred-void', null).message).toBe(
      'Method "load" is declared as deferred-void but returned null',
    );
    expect(new ReturnShapeMismatchError('load', 'light-deferred-value', { id: 1 }).message).toBe(
      'Method "load" is declared as light-deferred-value but returned a non-thenable object',
    );
  });

  it('uses the RETURN_SHAPE_MISMATCH code', () => {
    const err = new ReturnShapeMismatchError('load', 'deferred-void', []);
    expect(err.code).toBe('RETURN_SHAPE_MISMATCH');
    expect(err.actual).toEqual([]);
  });
});
