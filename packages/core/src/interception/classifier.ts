/**
 * Return-Shape Classifier — maps a declared return type onto one of the six
 * shapes the pipeline knows how to handle.
 *
 * Only Promise and Eventual are awaited. Every other type, including
 * PromiseLike or user-defined deferred types, is an ordinary value.
 */

import type { TypeRef } from '@hookwrap/shared';
import { isVoidRef } from './type-ref.js';
import type { ReturnShape } from './types.js';

export const PROMISE_TYPE = 'Promise';
export const EVENTUAL_TYPE = 'Eventual';

export function classifyReturnType(ref: TypeRef): ReturnShape {
  if (isVoidRef(ref)) return { kind: 'void' };

  const inner = ref.args?.[0];
  switch (ref.name) {
    case PROMISE_TYPE:
      return inner === undefined || isVoidRef(inner)
        ? { kind: 'deferred-void' }
        : { kind: 'deferred-value', inner };
    case EVENTUAL_TYPE:
      return inner === undefined || isVoidRef(inner)
        ? { kind: 'light-deferred-void' }
        : { kind: 'light-deferred-value', inner };
    default:
      return { kind: 'value', type: ref };
  }
}
