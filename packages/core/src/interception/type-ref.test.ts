import { describe, it, expect } from 'vitest';
import { GateDecision } from './gate-decision.js';
import { isVoidRef, typeKey, types } from './type-ref.js';

describe('typeKey', () => {
  it('renders plain and generic references', () => {
    expect(typeKey(types.number())).toBe('number');
    expect(typeKey(types.promise(types.number()))).toBe('Promise<number>');
    expect(typeKey(types.eventual(types.named('Map', [types.string(), types.boolean()])))).toBe(
      'Eventual<Map<string, boolean>>',
    );
  });

  it('omits empty generic arguments', () => {
    expect(typeKey(types.promise())).toBe('Promise');
    expect(types.named('List', [])).toEqual({ name: 'List' });
  });
});

describe('isVoidRef', () => {
  it('treats void, undefined and a missing ref as void', () => {
    expect(isVoidRef(types.void())).toBe(true);
    expect(isVoidRef(types.undefined())).toBe(true);
    expect(isVoidRef(undefined)).toBe(true);
    expect(isVoidRef(types.number())).toBe(false);
  });
});

describe('GateDecision', () => {
  it('PROCEED and DONT_PROCEED carry no state', () => {
    expect(GateDecision.PROCEED.shouldProceed).toBe(true);
    expect(GateDecision.PROCEED.state).toBeUndefined();
    expect(GateDecision.DONT_PROCEED.shouldProceed).toBe(false);
  });

  it('proceed(state) keeps the state', () => {
    const decision = GateDecision.proceed({ startedAt: 10 });
    expect(decision.shouldProceed).toBe(true);
    expect(decision.state).toEqual({ startedAt: 10 });
  });
});
