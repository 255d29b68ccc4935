/**
 * @hookwrap/core
 *
 * Wraps method calls, synchronous or deferred, with four lifecycle hooks:
 * a pre-call gate, a post-success transform, a failure observer and a cleanup.
 */

// Interception
export * from './interception/index.js';

// Configuration
export { loadConfig } from './config/config.js';

// Logging
export {
  createLogger,
  createNoopLogger,
  type Logger,
  type LogContext,
  type LogLevel,
} from './logging/logger.js';

// Errors
export {
  HookwrapError,
  ContractError,
  ReturnShapeMismatchError,
  toErrorMessage,
} from './utils/errors.js';
export { sanitizeForLogging } from './utils/sanitize.js';

export * from '@hookwrap/shared';
