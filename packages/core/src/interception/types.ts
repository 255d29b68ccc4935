/**
 * Interception Types
 */

import type { ReturnShapeKind, TypeRef } from '@hookwrap/shared';

/**
 * One intercepted call, owned by the proxy layer. `proceed()` performs the
 * real call and stores its result in `returnValue`; the interceptor leaves its
 * final result in the same slot.
 */
export interface Invocation {
  readonly id: string;
  readonly method: string;
  readonly arguments: readonly unknown[];
  readonly returnType: TypeRef;
  returnValue: unknown;
  proceed(): void;
}

export interface Interceptor {
  intercept(invocation: Invocation): void;
}

type Shape<K extends ReturnShapeKind, Extra = Record<never, never>> = { kind: K } & Extra;

export type ReturnShape =
  | Shape<'void'>
  | Shape<'value', { type: TypeRef }>
  | Shape<'deferred-void'>
  | Shape<'deferred-value', { inner: TypeRef }>
  | Shape<'light-deferred-void'>
  | Shape<'light-deferred-value', { inner: TypeRef }>;

export type DeferredValueShape = Extract<ReturnShape, { kind: 'deferred-value' | 'light-deferred-value' }>;

/** Dispatcher specialised to one concrete `Promise<T>` or `Eventual<T>`. */
export type DeferredDispatcher<TState> = (
  invocation: Invocation,
  state: TState | undefined,
) => PromiseLike<unknown>;

/**
 * Returned from afterCall to deliver the original result unchanged. Any other
 * return value, `null` and `undefined` included, replaces the result.
 */
export const PASS_THROUGH: unique symbol = Symbol('hookwrap.passThrough');
export type PassThrough = typeof PASS_THROUGH;
