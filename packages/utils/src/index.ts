/**
 * @perfsweep/utils - Shared utilities package
 *
 * Golden Path: This package exports only:
 * - Logger utilities
 * - Configuration loading
 * - Error handling
 */

// Logger
export { logger, Logger, winstonLogger } from './logger.js';
export type { LogContext } from './logger.js';

// Configuration loading
export * from './config/index.js';

// Error handling
export * from './errors.js';
