/**
 * Intercepted Proxy — routes calls to contracted methods of a target through
 * an interceptor.
 *
 * The contract declares each intercepted method's return type; methods left
 * out of it are called on the target untouched.
 */

import { TypeRefSchema, type TypeRef } from '@hookwrap/shared';
import { ContractError } from '../utils/errors.js';
import { isMethod, MethodInvocation, type Method } from './invocation.js';
import type { Interceptor } from './types.js';

export type MethodKeys<T> = {
  [K in keyof T]: T[K] extends Method ? K : never;
}[keyof T] &
  string;

export type MethodContract<T> = Partial<Record<MethodKeys<T>, TypeRef>>;

function validateContract(target: object, contract: object): Map<string, TypeRef> {
  const declared = new Map<string, TypeRef>();

  for (const method of Object.keys(contract)) {
    const ref: unknown = Reflect.get(contract, method);
    if (ref === undefined) continue;

    const parsed = TypeRefSchema.safeParse(ref);
    if (!parsed.success) {
      const reason = parsed.error.issues.map((issue) => issue.message).join('; ');
      throw new ContractError(`Invalid return type for "${method}": ${reason}`, method);
    }
    if (!isMethod(Reflect.get(target, method))) {
      throw new ContractError(`"${method}" is not a method of the target`, method);
    }

    declared.set(method, parsed.data);
  }

  return declared;
}

export function createInterceptedProxy<T extends object>(
  target: T,
  contract: MethodContract<T>,
  interceptor: Interceptor,
): T {
  const declared = validateContract(target, contract);

  return new Proxy(target, {
    get(obj, property, receiver) {
      const value: unknown = Reflect.get(obj, property, receiver);
      if (typeof property !== 'string' || !isMethod(value)) return value;

      const returnType = declared.get(property);
      if (!returnType) return value;

      return (...args: unknown[]): unknown => {
        const invocation = new MethodInvocation(obj, value, property, args, returnType);
        interceptor.intercept(invocation);
        return invocation.returnValue;
      };
    },
  });
}
