import { describe, it, expect } from 'vitest';
import { Eventual, isThenable } from './eventual.js';

describe('Eventual', () => {
  it('holds a value synchronously', () => {
    const eventual = Eventual.of(3);
    expect(eventual.status).toBe('fulfilled');
    expect(eventual.isSettled).toBe(true);
    expect(eventual.settled()).toEqual({ status: 'fulfilled', value: 3 });
  });

  it('resolves when awaited', async () => {
    expect(await Eventual.of('done')).toBe('done');
  });

  it('shares one completed instance', () => {
    expect(Eventual.completed()).toBe(Eventual.completed());
    expect(Eventual.completed().settled()).toEqual({ status: 'fulfilled', value: undefined });
  });

  it('rejects when awaited after reject()', async () => {
    const error = new Error('nope');
    const eventual = Eventual.reject<number>(error);

    expect(eventual.settled()).toEqual({ status: 'rejected', reason: error });
    await expect(eventual.toPromise()).rejects.toBe(error);
  });

  it('follows a pending thenable until it settles', async () => {
    let resolve: (value: number) => void = () => {};
    const source = new Promise<number>((r) => {
      resolve = r;
    });
    const eventual = Eventual.from(source);

    expect(eventual.status).toBe('pending');
    expect(eventual.settled()).toBeUndefined();

    resolve(9);
    expect(await eventual).toBe(9);
    expect(eventual.settled()).toEqual({ status: 'fulfilled', value: 9 });
  });

  it('records a rejection of the source', async () => {
    const error = new Error('source failed');
    const eventual = Eventual.from(Promise.reject<number>(error));

    await expect(eventual.toPromise()).rejects.toBe(error);
    expect(eventual.status).toBe('rejected');
  });

  it('returns the same instance when adopting an Eventual', () => {
    const eventual = Eventual.of(1);
    expect(Eventual.from(eventual)).toBe(eventual);
  });

  it('wraps a plain value passed to from()', () => {
    expect(Eventual.from(4).settled()).toEqual({ status: 'fulfilled', value: 4 });
  });

  it('captures a throw as a rejection', () => {
    const error = new Error('thrown');
    const eventual = Eventual.capture(() => {
      throw error;
    });
    expect(eventual.settled()).toEqual({ status: 'rejected', reason: error });
  });

  it('reuses its promise across then() calls', () => {
    const eventual = Eventual.of(1);
    expect(eventual.toPromise()).toBe(eventual.toPromise());
  });
});

describe('isThenable', () => {
  it('detects objects and functions with a then method', () => {
    expect(isThenable(Promise.resolve())).toBe(true);
    expect(isThenable(Eventual.of(1))).toBe(true);
    expect(isThenable({ then: () => undefined })).toBe(true);
    const fn = Object.assign(() => undefined, { then: () => undefined });
    expect(isThenable(fn)).toBe(true);
  });

  it('rejects everything else', () => {
    expect(isThenable(null)).toBe(false);
    expect(isThenable(5)).toBe(false);
    expect(isThenable({ then: 'no' })).toBe(false);
  });
});
