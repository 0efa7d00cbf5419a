/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Uses fast-redact for path-based redaction of sensitive fields. Flow
 * variables routinely carry credentials typed into automation forms, so
 * anything logged under these keys is censored.
 */

import pino from 'pino';
import { readEnvLogLevel } from '../env/env-reader.js';

/**
 * Redaction paths shared by the root logger and its children.
 * @internal
 */
export const REDACT_PATHS = [
  'password',
  '*.password',
  'token',
  '*.token',
  'api_key',
  '*.api_key',
  'apikey',
  '*.apikey',
  'authorization',
  '*.authorization',
  'cookie',
  '*.cookie',
  '*.secret',
  '*.SECRET',
  '*.credential',
  '*.CREDENTIAL',
];

/**
 * Root logger instance with automatic redaction of sensitive data.
 *
 * The level defaults to 'silent' so embedding applications get no output
 * unless they opt in, either through `FLOWSCOPE_LOG_LEVEL` or
 * {@link configureRootLogger}.
 *
 * @example
 * ```typescript
 * import { rootLogger } from './pino-setup.js';
 *
 * rootLogger.level = 'info';
 * rootLogger.info({ password: 'secret' }); // Logs: { password: '[REDACTED]' }
 * ```
 *
 * @public
 */
const rootLogger = pino({
  level: readEnvLogLevel('FLOWSCOPE_LOG_LEVEL') ?? 'silent',
  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
    remove: false, // Keep the keys, just redact values
  },
  serializers: {
    ...pino.stdSerializers,
    err: pino.stdSerializers.err,
  },
});

/**
 * Adjusts the root logger at runtime.
 * @param options - New level for the root logger and every child created from it
 * @public
 */
export function configureRootLogger(options: {
  level: pino.LevelWithSilent;
}): void {
  rootLogger.level = options.level;
}

export { rootLogger };
