/**
 * Default-Value Synthesizer — the result of a call the gate vetoed.
 */

import type { TypeRef } from '@hookwrap/shared';
import { Eventual } from './eventual.js';
import type { ReturnShape } from './types.js';

const BUILTIN_DEFAULTS = new Map<string, () => unknown>([
  ['number', () => 0],
  ['bigint', () => BigInt(0)],
  ['boolean', () => false],
  ['string', () => ''],
  ['void', () => undefined],
  ['undefined', () => undefined],
]);

/**
 * Zero value of a type: the ref's own `default` factory, then the builtin
 * primitive zeros, then `null` for anything else.
 */
export function defaultValueOf(ref: TypeRef): unknown {
  if (ref.default) return ref.default();
  const builtin = BUILTIN_DEFAULTS.get(ref.name);
  return builtin ? builtin() : null;
}

export function synthesizeDefault(shape: ReturnShape): unknown {
  switch (shape.kind) {
    case 'void':
      return undefined;
    case 'value':
      return defaultValueOf(shape.type);
    case 'deferred-void':
      return Promise.resolve();
    case 'deferred-value':
      return Promise.resolve(defaultValueOf(shape.inner));
    case 'light-deferred-void':
      return Eventual.completed();
    case 'light-deferred-value':
      return Eventual.of(defaultValueOf(shape.inner));
  }
}
