import { describe, it, expect, vi } from 'vitest';
import { DispatchCache } from './dispatch-cache.js';

describe('DispatchCache', () => {
  it('builds an entry once per key', () => {
    const cache = new DispatchCache<() => string>();
    const factory = vi.fn((key: string) => () => key);

    const first = cache.getOrAdd('Promise<number>', factory);
    const second = cache.getOrAdd('Promise<number>', factory);

    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(cache.size).toBe(1);
  });

  it('keeps separate entries for distinct keys', () => {
    const cache = new DispatchCache<string>();

    cache.getOrAdd('Promise<number>', (key) => key);
    cache.getOrAdd('Eventual<number>', (key) => key);

    expect(cache.size).toBe(2);
  });

  it('builds a fresh entry every time when disabled', () => {
    const cache = new DispatchCache<object>(false);
    const factory = vi.fn(() => ({}));

    const first = cache.getOrAdd('Promise<number>', factory);
    const second = cache.getOrAdd('Promise<number>', factory);

    expect(first).not.toBe(second);
    expect(factory).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(0);
  });
});
