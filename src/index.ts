/**
 * docker-config-resolver - Main module exports
 * Public API surface for the library
 */

// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger } from './utils/logger.js'
export type { LoggerOptions } from './utils/logger.js'
export { maskSecrets, deepMask, MASKED_VALUE, PINO_REDACT_PATHS } from './utils/masking.js'

// Docker configuration resolution
export * from './modules/docker-config/index.js'
