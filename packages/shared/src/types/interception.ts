/**
 * Interception Types
 *
 * Schemas for declared return types and the return shapes the dispatch core
 * classifies them into.
 */

import { z } from 'zod';

// ─── Type References ────────────────────────────────────────

/**
 * Run-time description of a declared type. `args` holds generic arguments
 * (`Promise<number>` is `{ name: 'Promise', args: [{ name: 'number' }] }`).
 * `default` produces the value a vetoed call returns in place of this type.
 */
export interface TypeRef {
  name: string;
  args?: TypeRef[];
  default?: () => unknown;
}

export const TypeRefSchema: z.ZodType<TypeRef> = z.lazy(() =>
  z.object({
    name: z.string().min(1).max(200),
    args: z.array(TypeRefSchema).optional(),
    default: z
      .custom<() => unknown>((value) => typeof value === 'function', {
        message: 'default must be a function',
      })
      .optional(),
  })
);

// ─── Return Shapes ──────────────────────────────────────────

export const ReturnShapeKindSchema = z.enum([
  'void',
  'value',
  'deferred-void',
  'deferred-value',
  'light-deferred-void',
  'light-deferred-value',
]);

export type ReturnShapeKind = z.infer<typeof ReturnShapeKindSchema>;
