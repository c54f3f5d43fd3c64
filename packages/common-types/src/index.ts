// Export config (runtime environment variables)
export * from './config/index.js';

// Export constants (compile-time constants)
export * from './constants/index.js';

// Export errors
export { ValidationError } from './errors/ValidationError.js';

// Export utilities
export { createLogger } from './utils/logger.js';
export { sanitizeLogMessage, sanitizeObject } from './utils/logSanitizer.js';
