/**
 * hookwrap Configuration — loads config from environment variables.
 */

import { HookwrapConfigSchema, type HookwrapConfig } from '@hookwrap/shared';

export function loadConfig(env: Record<string, string | undefined> = process.env): HookwrapConfig {
  const format = env['HOOKWRAP_LOG_FORMAT'] ?? 'json';
  const output: Record<string, unknown>[] = [{ type: 'stdout', format }];
  const logFile = env['HOOKWRAP_LOG_FILE'];
  if (logFile) {
    output.push({ type: 'file', path: logFile });
  }

  const raw = {
    logging: {
      level: env['HOOKWRAP_LOG_LEVEL'] ?? 'info',
      output,
    },
    dispatch: {
      cache: parseBool(env['HOOKWRAP_DISPATCH_CACHE'], true),
    },
    audit: {
      includeArguments: parseBool(env['HOOKWRAP_AUDIT_ARGUMENTS'], false),
    },
  };

  return HookwrapConfigSchema.parse(raw);
}

function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value === 'true' || value === '1';
}
