/**
 * Interceptor Base — async-aware interception pipeline.
 *
 * Instead of a single `intercept`, subclasses override four hooks:
 * `beforeCall`, `afterCall`, `onFailure` and `cleanup`. The pipeline attaches
 * them around the call whatever its return shape: inline for synchronous
 * methods, and as a continuation of the returned Promise or Eventual for
 * deferred ones. Because the pipeline replaces the deferred result with its
 * own, the result can only be changed through `afterCall`.
 */

import type { DispatchConfig } from '@hookwrap/shared';
import type { Logger } from '../logging/logger.js';
import { createNoopLogger } from '../logging/logger.js';
import { ReturnShapeMismatchError } from '../utils/errors.js';
import { classifyReturnType, EVENTUAL_TYPE, PROMISE_TYPE } from './classifier.js';
import { synthesizeDefault } from './defaults.js';
import { DispatchCache } from './dispatch-cache.js';
import { Eventual, isThenable, type Settled } from './eventual.js';
import { GateDecision } from './gate-decision.js';
import { typeKey } from './type-ref.js';
import {
  PASS_THROUGH,
  type DeferredDispatcher,
  type DeferredValueShape,
  type Interceptor,
  type Invocation,
  type ReturnShape,
} from './types.js';

export interface InterceptorOptions {
  logger?: Logger;
  dispatch?: Partial<DispatchConfig>;
}

type SyncShape = Extract<ReturnShape, { kind: 'void' | 'value' }>;
type PromiseShape = Extract<ReturnShape, { kind: 'deferred-void' | 'deferred-value' }>;
type EventualShape = Extract<ReturnShape, { kind: 'light-deferred-void' | 'light-deferred-value' }>;

function carriesValue(shape: ReturnShape): boolean {
  return shape.kind === 'value' || shape.kind === 'deferred-value' || shape.kind === 'light-deferred-value';
}

function attempt(fn: () => unknown): Settled<unknown> {
  try {
    return { status: 'fulfilled', value: fn() };
  } catch (err) {
    return { status: 'rejected', reason: err };
  }
}

/**
 * Start the underlying call of a deferred invocation. A synchronous throw, or a
 * return value that is not awaitable, becomes a rejected Eventual so that it
 * reaches the caller through the deferred result.
 */
function startDeferredCall(invocation: Invocation, shape: ReturnShape): Eventual<unknown> {
  try {
    invocation.proceed();
  } catch (err) {
    return Eventual.reject(err);
  }

  const returned = invocation.returnValue;
  if (!isThenable(returned)) {
    return Eventual.reject(new ReturnShapeMismatchError(invocation.method, shape.kind, returned));
  }
  return Eventual.from(returned);
}

function settle(call: Eventual<unknown>): Promise<Settled<unknown>> {
  return call.then(
    (value): Settled<unknown> => ({ status: 'fulfilled', value }),
    (reason: unknown): Settled<unknown> => ({ status: 'rejected', reason }),
  );
}

export abstract class InterceptorBase<TState = unknown> implements Interceptor {
  protected readonly logger: Logger;
  private readonly dispatchers: DispatchCache<DeferredDispatcher<TState>>;

  constructor(options: InterceptorOptions = {}) {
    this.logger = options.logger ?? createNoopLogger();
    this.dispatchers = new DispatchCache(options.dispatch?.cache ?? true);
  }

  /** Number of `Promise<T>` / `Eventual<T>` dispatchers built and cached so far. */
  get cachedDispatcherCount(): number {
    return this.dispatchers.size;
  }

  intercept(invocation: Invocation): void {
    const shape = classifyReturnType(invocation.returnType);

    const decision = this.beforeCall(invocation);
    if (!decision.shouldProceed) {
      this.logger.trace('Invocation vetoed', {
        invocationId: invocation.id,
        method: invocation.method,
        shape: shape.kind,
      });
      invocation.returnValue = synthesizeDefault(shape);
      return;
    }

    const state = decision.state;

    switch (shape.kind) {
      case 'void':
      case 'value':
        invocation.returnValue = this.proceedSynchronously(invocation, shape, state);
        break;
      case 'deferred-void':
        invocation.returnValue = this.proceedAsPromise(invocation, shape, state);
        break;
      case 'light-deferred-void':
        invocation.returnValue = this.proceedAsEventual(invocation, shape, state);
        break;
      case 'deferred-value':
      case 'light-deferred-value':
        invocation.returnValue = this.getDispatcher(shape)(invocation, state);
        break;
    }
  }

  /**
   * Override to run code before the call. Return `GateDecision.DONT_PROCEED`
   * to skip the call; the caller then receives the return type's default.
   */
  protected beforeCall(_invocation: Invocation): GateDecision<TState> {
    return GateDecision.PROCEED;
  }

  /**
   * Override to run code after the call succeeded. The return value replaces
   * the call's result; return `PASS_THROUGH` to keep it. Ignored for void
   * return types, where `originalResult` is `undefined`.
   */
  protected afterCall(_invocation: Invocation, _state: TState | undefined, originalResult: unknown): unknown {
    return originalResult;
  }

  /**
   * Override to observe a failed call (a throw, or a rejected deferred result).
   * The original error is rethrown afterwards, unless this hook throws its own.
   */
  protected onFailure(_invocation: Invocation, _error: unknown, _state: TState | undefined): void {}

  /** Override to run code once the call has finished, whatever its outcome. */
  protected cleanup(_invocation: Invocation, _state: TState | undefined): void {}

  private proceedSynchronously(invocation: Invocation, shape: SyncShape, state: TState | undefined): unknown {
    const outcome = attempt(() => {
      invocation.proceed();
      return invocation.returnValue;
    });
    return this.complete(invocation, shape, state, outcome);
  }

  private async proceedAsPromise(
    invocation: Invocation,
    shape: PromiseShape,
    state: TState | undefined,
  ): Promise<unknown> {
    const outcome = await settle(startDeferredCall(invocation, shape));
    return this.complete(invocation, shape, state, outcome);
  }

  private proceedAsEventual(
    invocation: Invocation,
    shape: EventualShape,
    state: TState | undefined,
  ): Eventual<unknown> {
    const call = startDeferredCall(invocation, shape);

    // Already settled: finish synchronously without allocating a promise
    const outcome = call.settled();
    if (outcome) {
      return Eventual.capture(() => this.complete(invocation, shape, state, outcome));
    }

    return Eventual.from(
      settle(call).then((settled) => this.complete(invocation, shape, state, settled)),
    );
  }

  /**
   * Run the post-call hooks around a settled outcome. Errors thrown by a later
   * hook replace the one in flight.
   */
  private complete(
    invocation: Invocation,
    shape: ReturnShape,
    state: TState | undefined,
    outcome: Settled<unknown>,
  ): unknown {
    try {
      if (outcome.status === 'rejected') {
        this.onFailure(invocation, outcome.reason, state);
        throw outcome.reason;
      }

      if (!carriesValue(shape)) {
        this.afterCall(invocation, state, undefined);
        return undefined;
      }

      const transformed = this.afterCall(invocation, state, outcome.value);
      return transformed === PASS_THROUGH ? outcome.value : transformed;
    } finally {
      this.cleanup(invocation, state);
    }
  }

  private getDispatcher(shape: DeferredValueShape): DeferredDispatcher<TState> {
    const container = shape.kind === 'deferred-value' ? PROMISE_TYPE : EVENTUAL_TYPE;
    const key = typeKey({ name: container, args: [shape.inner] });
    return this.dispatchers.getOrAdd(key, () => this.createDispatcher(key, shape));
  }

  private createDispatcher(key: string, shape: DeferredValueShape): DeferredDispatcher<TState> {
    this.logger.debug('Dispatcher created', { returnType: key });

    if (shape.kind === 'deferred-value') {
      const promiseShape = shape;
      return (invocation, state) => this.proceedAsPromise(invocation, promiseShape, state);
    }
    const eventualShape = shape;
    return (invocation, state) => this.proceedAsEventual(invocation, eventualShape, state);
  }
}
