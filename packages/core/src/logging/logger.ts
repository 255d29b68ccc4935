/**
 * Logger for hookwrap
 *
 * pino behind a small interface. Context is run through sanitizeForLogging
 * before it reaches pino, so interceptors can log call arguments.
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import type { LogLevelName, LoggingConfig } from '@hookwrap/shared';
import { sanitizeForLogging } from '../utils/sanitize.js';

export type LogLevel = LogLevelName | 'fatal';

export interface LogContext {
  invocationId?: string;
  method?: string;
  component?: string;
  [key: string]: unknown;
}

export interface Logger {
  trace(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(context: LogContext): Logger;
  level: LogLevel;
}

type LogOutput = LoggingConfig['output'][number];

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createPinoOptions(config: LoggingConfig): LoggerOptions {
  return {
    name: 'hookwrap',
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

function toTarget(output: LogOutput, level: string): pino.TransportTargetOptions {
  if (output.type === 'file') {
    return { target: 'pino/file', options: { destination: output.path, mkdir: true }, level };
  }
  if (output.format === 'pretty') {
    return { target: 'pino-pretty', options: { colorize: true, destination: 1 }, level };
  }
  return { target: 'pino/file', options: { destination: 1 }, level };
}

/**
 * Transport targets for the configured outputs, or `undefined` when JSON on
 * stdout is the only output and pino can write to fd 1 itself.
 */
export function createTransport(config: LoggingConfig): pino.TransportMultiOptions | undefined {
  const jsonStdoutOnly = config.output.every(
    (output) => output.type === 'stdout' && output.format === 'json',
  );
  if (jsonStdoutOnly) {
    return undefined;
  }
  return { targets: config.output.map((output) => toTarget(output, config.level)) };
}

class PinoBackedLogger implements Logger {
  private readonly pino: PinoLogger;
  private readonly defaultContext: LogContext;

  constructor(pino: PinoLogger, defaultContext: LogContext = {}) {
    this.pino = pino;
    this.defaultContext = defaultContext;
  }

  get level(): LogLevel {
    const level = this.pino.level;
    return isLogLevel(level) ? level : 'info';
  }

  private sanitizeContext(context?: LogContext): Record<string, unknown> {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries({ ...this.defaultContext, ...context })) {
      sanitized[key] = sanitizeForLogging(value);
    }
    return sanitized;
  }

  trace(msg: string, context?: LogContext): void {
    this.pino.trace(this.sanitizeContext(context), msg);
  }

  debug(msg: string, context?: LogContext): void {
    this.pino.debug(this.sanitizeContext(context), msg);
  }

  info(msg: string, context?: LogContext): void {
    this.pino.info(this.sanitizeContext(context), msg);
  }

  warn(msg: string, context?: LogContext): void {
    this.pino.warn(this.sanitizeContext(context), msg);
  }

  error(msg: string, context?: LogContext): void {
    this.pino.error(this.sanitizeContext(context), msg);
  }

  fatal(msg: string, context?: LogContext): void {
    this.pino.fatal(this.sanitizeContext(context), msg);
  }

  child(context: LogContext): Logger {
    return new PinoBackedLogger(this.pino, { ...this.defaultContext, ...context });
  }
}

/**
 * Create a logger writing to the outputs named in `config`. Passing
 * `destination` bypasses the outputs and writes every entry there instead.
 */
export function createLogger(config: LoggingConfig, destination?: pino.DestinationStream): Logger {
  const options = createPinoOptions(config);
  if (destination) {
    return new PinoBackedLogger(pino(options, destination));
  }

  const transport = createTransport(config);
  return new PinoBackedLogger(transport ? pino(options, pino.transport(transport)) : pino(options));
}

/**
 * Create a no-op logger that silently discards all messages.
 * Interceptors built without a logger use this one.
 */
export function createNoopLogger(): Logger {
  const noop: Logger = {
    trace: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    fatal: () => {},
    child: () => noop,
    level: 'info',
  };
  return noop;
}
