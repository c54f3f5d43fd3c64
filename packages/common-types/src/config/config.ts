import { z } from 'zod';

/**
 * Environment variable validation schema
 * Validates all configuration read at startup
 */
export const envSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  ENABLE_PRETTY_LOGS: z
    .enum(['true', 'false'])
    .optional()
    .or(z.literal('').transform(() => undefined))
    .transform(val => val === 'true'), // 'true' to route logs through pino-pretty
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validates and returns environment configuration
 * Throws detailed error if validation fails
 */
export function validateEnv(): EnvConfig {
  try {
    return envSchema.parse(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues
        .map(issue => `  - ${issue.path.join('.')}: ${issue.message}`)
        .join('\n');

      throw new Error(
        `Environment validation failed:\n${issues}\n\n` +
          'Please check your .env file and ensure all variables hold accepted values.'
      );
    }
    throw error;
  }
}

/**
 * Cached config instance
 * Can be reset for testing via resetConfig()
 */
let _config: EnvConfig | undefined;

/**
 * Get validated environment configuration
 * Caches the result, but can be reset via resetConfig()
 */
export function getConfig(): EnvConfig {
  _config ??= validateEnv();
  return _config;
}

/**
 * Reset the cached config (primarily for testing)
 *
 * IMPORTANT: Call this in afterEach() to prevent test pollution
 */
export function resetConfig(): void {
  _config = undefined;
}

/**
 * Create config with custom values (for testing)
 * Uses safe test defaults instead of reading from process.env
 */
export function createTestConfig(overrides: Partial<EnvConfig> = {}): EnvConfig {
  const testDefaults: EnvConfig = {
    NODE_ENV: 'test',
    LOG_LEVEL: 'error', // Quiet logs in tests
    ENABLE_PRETTY_LOGS: false,
  };

  return { ...testDefaults, ...overrides };
}
