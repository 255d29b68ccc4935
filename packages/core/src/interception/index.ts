/**
 * Interception Module
 */

export { InterceptorBase, type InterceptorOptions } from './interceptor-base.js';
export { defineInterceptor, type InterceptorHooks } from './define-interceptor.js';
export { AuditInterceptor, type AuditState, type AuditInterceptorConfig, type AuditInterceptorDeps } from './audit-interceptor.js';
export { GateDecision } from './gate-decision.js';
export { Eventual, isThenable, type Settled, type EventualStatus } from './eventual.js';
export { classifyReturnType, PROMISE_TYPE, EVENTUAL_TYPE } from './classifier.js';
export { synthesizeDefault, defaultValueOf } from './defaults.js';
export { DispatchCache } from './dispatch-cache.js';
export { types, typeKey, isVoidRef } from './type-ref.js';
export { MethodInvocation } from './invocation.js';
export { createInterceptedProxy, type MethodContract, type MethodKeys } from './proxy.js';
export {
  PASS_THROUGH,
  type PassThrough,
  type Invocation,
  type Interceptor,
  type ReturnShape,
  type DeferredValueShape,
  type DeferredDispatcher,
} from './types.js';
