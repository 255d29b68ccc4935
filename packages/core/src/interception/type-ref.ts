/**
 * Type reference builders — declare method return types at run time.
 */

import type { TypeRef } from '@hookwrap/shared';

const VOID_NAMES = new Set(['void', 'undefined']);

export function isVoidRef(ref: TypeRef | undefined): boolean {
  return ref === undefined || VOID_NAMES.has(ref.name);
}

/**
 * Canonical key of a type reference, e.g. `Promise<Array<number>>`.
 */
export function typeKey(ref: TypeRef): string {
  if (!ref.args || ref.args.length === 0) return ref.name;
  return `${ref.name}<${ref.args.map(typeKey).join(', ')}>`;
}

function named(name: string, args?: TypeRef[], defaultValue?: () => unknown): TypeRef {
  const ref: TypeRef = { name };
  if (args && args.length > 0) ref.args = args;
  if (defaultValue) ref.default = defaultValue;
  return ref;
}

export const types = {
  void: (): TypeRef => named('void'),
  undefined: (): TypeRef => named('undefined'),
  number: (): TypeRef => named('number'),
  bigint: (): TypeRef => named('bigint'),
  boolean: (): TypeRef => named('boolean'),
  string: (): TypeRef => named('string'),
  /** An object type; `defaultValue` builds its "empty" instance for vetoed calls. */
  object: (name: string, defaultValue?: () => unknown): TypeRef => named(name, undefined, defaultValue),
  named,
  /** `Promise<of>`; omit `of` for `Promise<void>`. */
  promise: (of?: TypeRef): TypeRef => named('Promise', of ? [of] : undefined),
  /** `Eventual<of>`; omit `of` for `Eventual<void>`. */
  eventual: (of?: TypeRef): TypeRef => named('Eventual', of ? [of] : undefined),
};
