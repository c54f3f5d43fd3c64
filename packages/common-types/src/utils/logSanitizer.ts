/**
 * Log Sanitization Utility
 *
 * Redacts credentials from log messages before they leave the process.
 *
 * Patterns covered:
 * - Bot/Bearer authorization values
 * - Discord bot tokens (three dot-separated base64url segments)
 * - Webhook URLs (the token path segment)
 * - Secret-looking keys in JSON strings
 */

/**
 * Sensitive patterns to redact from logs.
 *
 * IMPORTANT: Order matters! Authorization values must be matched before bare
 * tokens so the "Bot"/"Bearer" prefix survives.
 */
const SENSITIVE_PATTERNS: { pattern: RegExp; replacement: string }[] = [
  // Authorization header values (preserve the scheme)
  { pattern: /\b(Bot|Bearer)\s+[A-Za-z0-9_-]+\.[A-Za-z0-9_.-]+/g, replacement: '$1 [REDACTED]' },

  // Bare bot tokens: <user id>.<timestamp>.<hmac>
  {
    pattern: /[A-Za-z0-9_-]{23,28}\.[A-Za-z0-9_-]{6,7}\.[A-Za-z0-9_-]{27,}/g,
    replacement: '[REDACTED_TOKEN]',
  },

  // Webhook URLs carry their token as the last path segment
  {
    pattern: /(discord(?:app)?\.com\/api\/(?:v\d+\/)?webhooks\/\d+\/)[A-Za-z0-9_-]+/gi,
    replacement: '$1[REDACTED]',
  },

  // Generic secret patterns in JSON
  {
    pattern: /"(token|secret|password|client[_-]?secret)":\s*"[^"]+"/gi,
    replacement: '"$1": "[REDACTED]"',
  },
];

/** Object keys whose values are always redacted */
const SENSITIVE_KEY_FRAGMENTS = ['token', 'secret', 'password', 'authorization'];

/**
 * Sanitizes a string by replacing sensitive patterns with redaction markers.
 */
export function sanitizeLogMessage(message: string): string {
  let sanitized = message;
  for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
    // Reset lastIndex for global patterns (they maintain state)
    pattern.lastIndex = 0;
    sanitized = sanitized.replace(pattern, replacement);
  }
  return sanitized;
}

/**
 * Recursively sanitizes an object, redacting sensitive values in strings.
 *
 * @param depth - Current recursion depth (prevents infinite loops)
 */
export function sanitizeObject(obj: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (obj === null || obj === undefined) {
    return obj;
  }

  if (typeof obj === 'string') {
    return sanitizeLogMessage(obj);
  }

  // Errors keep their identity for the err serializer, which sanitizes them itself
  if (obj instanceof Error) {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(item => sanitizeObject(item, depth + 1));
  }

  if (typeof obj === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEY_FRAGMENTS.some(fragment => lowerKey.includes(fragment))) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitizeObject(value, depth + 1);
      }
    }
    return sanitized;
  }

  return obj;
}
