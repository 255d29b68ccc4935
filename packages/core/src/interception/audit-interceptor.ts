/**
 * Audit Interceptor — logs every intercepted call with its duration.
 */

import type { AuditConfig, DispatchConfig } from '@hookwrap/shared';
import type { LogContext, Logger } from '../logging/logger.js';
import { sanitizeForLogging } from '../utils/sanitize.js';
import { toErrorMessage } from '../utils/errors.js';
import { GateDecision } from './gate-decision.js';
import { InterceptorBase } from './interceptor-base.js';
import { PASS_THROUGH, type Invocation } from './types.js';

export interface AuditState {
  startedAt: number;
}

export interface AuditInterceptorConfig {
  audit: AuditConfig;
  dispatch: DispatchConfig;
}

export interface AuditInterceptorDeps {
  logger: Logger;
  now?: () => number;
}

export class AuditInterceptor extends InterceptorBase<AuditState> {
  private readonly includeArguments: boolean;
  private readonly now: () => number;

  constructor(config: AuditInterceptorConfig, deps: AuditInterceptorDeps) {
    super({
      logger: deps.logger.child({ component: 'AuditInterceptor' }),
      dispatch: config.dispatch,
    });
    this.includeArguments = config.audit.includeArguments;
    this.now = deps.now ?? Date.now;
  }

  protected beforeCall(invocation: Invocation): GateDecision<AuditState> {
    const context: LogContext = { invocationId: invocation.id, method: invocation.method };
    if (this.includeArguments) {
      context['arguments'] = sanitizeForLogging(invocation.arguments);
    }
    this.logger.debug('Invocation started', context);
    return GateDecision.proceed({ startedAt: this.now() });
  }

  protected afterCall(invocation: Invocation, state: AuditState | undefined): unknown {
    this.logger.info('Invocation completed', this.context(invocation, state));
    return PASS_THROUGH;
  }

  protected onFailure(invocation: Invocation, error: unknown, state: AuditState | undefined): void {
    this.logger.error('Invocation failed', {
      ...this.context(invocation, state),
      error: toErrorMessage(error),
    });
  }

  protected cleanup(invocation: Invocation, state: AuditState | undefined): void {
    this.logger.debug('Invocation finished', this.context(invocation, state));
  }

  private context(invocation: Invocation, state: AuditState | undefined): LogContext {
    return {
      invocationId: invocation.id,
      method: invocation.method,
      durationMs: state ? this.now() - state.startedAt : undefined,
    };
  }
}
