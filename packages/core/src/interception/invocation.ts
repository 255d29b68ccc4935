/**
 * MethodInvocation — one call made through an intercepted proxy.
 */

import { randomUUID } from 'node:crypto';
import type { TypeRef } from '@hookwrap/shared';
import type { Invocation } from './types.js';

export type Method = (...args: never[]) => unknown;

export function isMethod(value: unknown): value is Method {
  return typeof value === 'function';
}

export class MethodInvocation implements Invocation {
  readonly id: string = randomUUID();
  returnValue: unknown = undefined;

  private readonly target: object;
  private readonly fn: Method;
  private readonly args: readonly unknown[];

  constructor(
    target: object,
    fn: Method,
    readonly method: string,
    args: readonly unknown[],
    readonly returnType: TypeRef,
  ) {
    this.target = target;
    this.fn = fn;
    this.args = args;
  }

  get arguments(): readonly unknown[] {
    return this.args;
  }

  /** Call the real method on the target and store what it returned. */
  proceed(): void {
    this.returnValue = Reflect.apply(this.fn, this.target, this.args);
  }
}
