import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  it('returns defaults for an empty environment', () => {
    const config = loadConfig({});
    expect(config.logging.level).toBe('info');
    expect(config.logging.output).toEqual([{ type: 'stdout', format: 'json' }]);
    expect(config.dispatch.cache).toBe(true);
    expect(config.audit.includeArguments).toBe(false);
  });

  it('reads logging settings from the environment', () => {
    const config = loadConfig({
      HOOKWRAP_LOG_LEVEL: 'debug',
      HOOKWRAP_LOG_FORMAT: 'pretty',
      HOOKWRAP_LOG_FILE: '/var/log/hookwrap.log',
    });
    expect(config.logging.level).toBe('debug');
    expect(config.logging.output).toEqual([
      { type: 'stdout', format: 'pretty' },
      { type: 'file', path: '/var/log/hookwrap.log' },
    ]);
  });

  it('parses boolean flags', () => {
    const config = loadConfig({
      HOOKWRAP_DISPATCH_CACHE: 'false',
      HOOKWRAP_AUDIT_ARGUMENTS: '1',
    });
    expect(config.dispatch.cache).toBe(false);
    expect(config.audit.includeArguments).toBe(true);
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ HOOKWRAP_LOG_LEVEL: 'verbose' })).toThrow();
  });

  it('rejects a log file path with traversal', () => {
    expect(() => loadConfig({ HOOKWRAP_LOG_FILE: '../outside.log' })).toThrow('Path contains forbidden characters');
  });
});
