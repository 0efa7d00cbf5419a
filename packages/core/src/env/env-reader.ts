import type pino from 'pino';

const LOG_LEVELS: readonly pino.LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/**
 * Error thrown when an environment variable holds a value that cannot be used.
 * @public
 */
export class EnvironmentResolutionError extends Error {
  public constructor(
    message: string,
    public readonly variable?: string,
  ) {
    super(message);
    this.name = 'EnvironmentResolutionError';
    Object.setPrototypeOf(this, EnvironmentResolutionError.prototype);
  }

  public static invalidInteger(
    variable: string,
    raw: string,
  ): EnvironmentResolutionError {
    return new EnvironmentResolutionError(
      `Environment variable '${variable}' must be a non-negative integer, got '${raw}'`,
      variable,
    );
  }
}

/**
 * Reads a non-negative integer from the environment.
 *
 * Unset and blank values resolve to `undefined` so callers can fall back to
 * their own defaults.
 * @param name - Environment variable name
 * @param envSource - Variable source, `process.env` by default
 * @throws {EnvironmentResolutionError} When the value is set but not an integer
 * @public
 */
export function readEnvInteger(
  name: string,
  envSource: Record<string, string | undefined> = process.env,
): number | undefined {
  const raw = envSource[name]?.trim();
  if (!raw) {
    return undefined;
  }
  if (!/^\d+$/.test(raw)) {
    throw EnvironmentResolutionError.invalidInteger(name, raw);
  }
  return Number.parseInt(raw, 10);
}

/**
 * Reads a pino log level from the environment, ignoring unknown values.
 * @public
 */
export function readEnvLogLevel(
  name: string,
  envSource: Record<string, string | undefined> = process.env,
): pino.LevelWithSilent | undefined {
  const raw = (envSource[name] || '').trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === raw);
}
