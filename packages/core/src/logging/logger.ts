import type pino from 'pino';
import { rootLogger } from './pino-setup.js';

/**
 * Logging abstraction used across flowscope packages.
 *
 * Components depend on this seam instead of pino directly, so tests can
 * swap in a {@link NoOpLogger} or a recording implementation.
 * @public
 */
export interface ILogger {
  /**
   * Log a debug message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  debug(message: string, context?: Record<string, unknown>): void;

  /**
   * Log an info message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  info(message: string, context?: Record<string, unknown>): void;

  /**
   * Log a warning message.
   * @param message - The log message
   * @param context - Optional context object for structured logging
   */
  warn(message: string, context?: Record<string, unknown>): void;

  /**
   * Log an error message.
   * @param message - The log message
   * @param error - Optional error object
   * @param context - Optional context object for structured logging
   */
  error(
    message: string,
    error?: Error | unknown,
    context?: Record<string, unknown>,
  ): void;
}

/**
 * Pino-backed logger. Context objects become structured fields, so the
 * root logger's redaction applies to them.
 * @public
 */
export class PinoLogger implements ILogger {
  public constructor(private readonly logger: pino.Logger = rootLogger) {}

  public debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context ?? {}, message);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(context ?? {}, message);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context ?? {}, message);
  }

  public error(
    message: string,
    error?: Error | unknown,
    context?: Record<string, unknown>,
  ): void {
    const errorContext =
      error === undefined
        ? {}
        : { err: error instanceof Error ? error : new Error(String(error)) };
    this.logger.error({ ...context, ...errorContext }, message);
  }
}

/**
 * No-op logger implementation for testing or when logging is disabled.
 * @public
 */
export class NoOpLogger implements ILogger {
  public debug(): void {}
  public info(): void {}
  public warn(): void {}
  public error(): void {}
}

/**
 * Creates a scoped logger: a pino child carrying a `scope` binding.
 * @param scope - The scope label, e.g. `debugger:controller`
 * @public
 */
export function createScopedLogger(scope: string): ILogger {
  return new PinoLogger(rootLogger.child({ scope }));
}
