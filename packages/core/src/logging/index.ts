/**
 * Logging infrastructure exports
 *
 * Provides structured logging with automatic redaction via pino + fast-redact
 */

export { rootLogger, configureRootLogger } from './pino-setup.js';

export { PinoLogger, NoOpLogger, createScopedLogger } from './logger.js';
export type { ILogger } from './logger.js';
