import { pino, stdSerializers } from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';
import { getConfig } from '../config/index.js';
import { sanitizeObject } from './logSanitizer.js';

/**
 * Serialize an error with pino's standard serializer, then redact credentials
 * from its message, stack and custom properties.
 */
function sanitizedErrorSerializer(err: unknown): unknown {
  if (err instanceof Error) {
    return sanitizeObject(stdSerializers.err(err));
  }
  return sanitizeObject(err);
}

/**
 * Creates a logger instance with environment-aware configuration.
 * Uses pino-pretty transport ONLY when explicitly enabled via ENABLE_PRETTY_LOGS=true.
 * Defaults to plain JSON logging for production compatibility.
 *
 * ⚠️ IMPORTANT: Error Logging Format
 *
 * ✅ CORRECT:
 *   logger.error({ err: error }, 'Description of what failed');
 *
 * ❌ WRONG (will not serialize error properly):
 *   logger.error('Description:', error);
 *
 * @param destination - Explicit output stream; takes precedence over pino-pretty
 */
export function createLogger(name?: string, destination?: DestinationStream): Logger {
  const { LOG_LEVEL, ENABLE_PRETTY_LOGS } = getConfig();

  const config: LoggerOptions = {
    level: LOG_LEVEL,
    name,
    serializers: {
      err: sanitizedErrorSerializer,
    },
    // Sanitize the entire log object before it is written
    formatters: {
      log: (object: Record<string, unknown>) => {
        const sanitized = sanitizeObject(object);
        return typeof sanitized === 'object' && sanitized !== null ? { ...sanitized } : object;
      },
    },
  };

  if (destination !== undefined) {
    return pino(config, destination);
  }

  // Only use pino-pretty when explicitly enabled (requires pino-pretty to be installed)
  if (ENABLE_PRETTY_LOGS) {
    config.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return pino(config);
}
