/**
 * Redaction of secrets from values that end up in log context.
 */

const SECRET_PATTERNS: { regex: RegExp; replacement: string }[] = [
  // API keys
  { regex: /sk-[a-zA-Z0-9-_]{20,}/g, replacement: '[REDACTED_API_KEY]' },
  {
    regex: /api[_-]?key["\s:=]+["']?[a-zA-Z0-9-_]{16,}["']?/gi,
    replacement: '[REDACTED_API_KEY]',
  },
  // Tokens
  { regex: /bearer\s+[a-zA-Z0-9-_.]+/gi, replacement: 'Bearer [REDACTED_TOKEN]' },
  // Passwords
  { regex: /password["\s:=]+["']?[^"'\s]{1,}["']?/gi, replacement: '[REDACTED_PASSWORD]' },
];

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'apikey', 'api_key', 'authorization'];

const MAX_DEPTH = 6;

/**
 * Copy `input` with secret-looking strings and sensitive keys redacted.
 * Functions are rendered as `[Function name]`; nesting past MAX_DEPTH as
 * `[Truncated]`.
 */
export function sanitizeForLogging(input: unknown, depth = 0): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (typeof input === 'string') {
    let sanitized = input;
    for (const { regex, replacement } of SECRET_PATTERNS) {
      sanitized = sanitized.replace(regex, replacement);
    }
    return sanitized;
  }

  if (typeof input === 'function') {
    return `[Function ${input.name || 'anonymous'}]`;
  }

  if (typeof input !== 'object') {
    return typeof input === 'bigint' ? input.toString() : input;
  }

  if (depth >= MAX_DEPTH) {
    return '[Truncated]';
  }

  if (Array.isArray(input)) {
    return input.map((item: unknown) => sanitizeForLogging(item, depth + 1));
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_KEYS.some((s) => lowerKey.includes(s))) {
      sanitized[key] = '[REDACTED]';
    } else {
      sanitized[key] = sanitizeForLogging(value, depth + 1);
    }
  }
  return sanitized;
}
