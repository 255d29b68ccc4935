/**
 * Helper to build an interceptor from plain hook functions.
 * Omitted hooks keep the InterceptorBase defaults.
 */

import type { GateDecision } from './gate-decision.js';
import { InterceptorBase, type InterceptorOptions } from './interceptor-base.js';
import type { Invocation } from './types.js';

export interface InterceptorHooks<TState = unknown> {
  beforeCall?(invocation: Invocation): GateDecision<TState>;
  afterCall?(invocation: Invocation, state: TState | undefined, originalResult: unknown): unknown;
  onFailure?(invocation: Invocation, error: unknown, state: TState | undefined): void;
  cleanup?(invocation: Invocation, state: TState | undefined): void;
}

class HookInterceptor<TState> extends InterceptorBase<TState> {
  private readonly hooks: InterceptorHooks<TState>;

  constructor(hooks: InterceptorHooks<TState>, options: InterceptorOptions) {
    super(options);
    this.hooks = hooks;
  }

  protected beforeCall(invocation: Invocation): GateDecision<TState> {
    return this.hooks.beforeCall ? this.hooks.beforeCall(invocation) : super.beforeCall(invocation);
  }

  protected afterCall(invocation: Invocation, state: TState | undefined, originalResult: unknown): unknown {
    return this.hooks.afterCall
      ? this.hooks.afterCall(invocation, state, originalResult)
      : super.afterCall(invocation, state, originalResult);
  }

  protected onFailure(invocation: Invocation, error: unknown, state: TState | undefined): void {
    this.hooks.onFailure?.(invocation, error, state);
  }

  protected cleanup(invocation: Invocation, state: TState | undefined): void {
    this.hooks.cleanup?.(invocation, state);
  }
}

export function defineInterceptor<TState = unknown>(
  hooks: InterceptorHooks<TState>,
  options: InterceptorOptions = {},
): InterceptorBase<TState> {
  return new HookInterceptor(hooks, options);
}
