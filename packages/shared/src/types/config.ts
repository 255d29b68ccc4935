/**
 * Configuration Types for hookwrap
 *
 * Every section has defaults, so an empty object parses to a usable config.
 */

import { z } from 'zod';

// Safe path validation (no path traversal)
const SafePathSchema = z.string()
  .min(1)
  .max(4096)
  .refine(
    (path) => !path.includes('..') && !path.includes('\0'),
    { message: 'Path contains forbidden characters' }
  );

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error']);
export type LogLevelName = z.infer<typeof LogLevelSchema>;

// Logging configuration
export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),

  output: z.array(z.discriminatedUnion('type', [
    z.object({
      type: z.literal('file'),
      path: SafePathSchema,
    }),
    z.object({
      type: z.literal('stdout'),
      format: z.enum(['json', 'pretty']).default('json'),
    }),
  ])).default([{ type: 'stdout', format: 'json' }]),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// Dispatcher cache for the generic deferred shapes
export const DispatchConfigSchema = z.object({
  cache: z.boolean().default(true),
}).default({});

export type DispatchConfig = z.infer<typeof DispatchConfigSchema>;

export const AuditConfigSchema = z.object({
  includeArguments: z.boolean().default(false),
}).default({});

export type AuditConfig = z.infer<typeof AuditConfigSchema>;

export const HookwrapConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  dispatch: DispatchConfigSchema,
  audit: AuditConfigSchema,
});

export type HookwrapConfig = z.infer<typeof HookwrapConfigSchema>;
