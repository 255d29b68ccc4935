import { describe, it, expect } from 'vitest';
import { sanitizeForLogging } from './sanitize.js';

describe('sanitizeForLogging', () => {
  it('passes null, undefined and numbers through', () => {
    expect(sanitizeForLogging(null)).toBeNull();
    expect(sanitizeForLogging(undefined)).toBeUndefined();
    expect(sanitizeForLogging(7)).toBe(7);
  });

  it('redacts bearer tokens and passwords inside strings', () => {
    expect(sanitizeForLogging('Authorization: Bearer abc.def')).toBe('Authorization: Bearer [REDACTED_TOKEN]');
    expect(sanitizeForLogging('password=test-password')).toBe('[REDACTED_PASSWORD]');
  });

  it('redacts sensitive keys in nested objects and arrays', () => {
    expect(sanitizeForLogging([{ user: 'ada', secret: 'test-secret', nested: { apiKey: 'k' } }])).toEqual([
      { user: 'ada', secret: '[REDACTED]', nested: { apiKey: '[REDACTED]' } },
    ]);
  });

  it('renders functions and bigints as strings', () => {
    function handler() {}
    expect(sanitizeForLogging(handler)).toBe('[Function handler]');
    expect(sanitizeForLogging(BigInt(12))).toBe('12');
  });

  it('truncates deeply nested values', () => {
    const deep = { a: { b: { c: { d: { e: { f: { g: 1 } } } } } } };
    expect(sanitizeForLogging(deep)).toEqual({ a: { b: { c: { d: { e: { f: '[Truncated]' } } } } } });
  });
});
