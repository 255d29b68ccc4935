/**
 * Error Types
 *
 * Each error carries a stable `code` for callers that branch on failures.
 */

import type { ReturnShapeKind } from '@hookwrap/shared';

/**
 * Extracts a readable message from an unknown error value.
 * Use in log context: `logger.error('Invocation failed', { error: toErrorMessage(err) })`
 */
export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

export class HookwrapError extends Error {
  readonly code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'HookwrapError';
    this.code = code;
  }
}

/** A method contract names a non-method or declares an invalid return type. */
export class ContractError extends HookwrapError {
  constructor(
    message: string,
    public readonly method: string,
  ) {
    super(message, 'INVALID_CONTRACT');
    this.name = 'ContractError';
  }
}

/** A method declared to return a Promise or Eventual returned something else. */
export class ReturnShapeMismatchError extends HookwrapError {
  constructor(
    public readonly method: string,
    public readonly expectedShape: ReturnShapeKind,
    public readonly actual: unknown,
  ) {
    super(
      `Method "${method}" is declared as ${expectedShape} but returned ${describe(actual)}`,
      'RETURN_SHAPE_MISMATCH',
    );
    this.name = 'ReturnShapeMismatchError';
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value === 'object' ? 'a non-thenable object' : `a ${typeof value}`;
}
