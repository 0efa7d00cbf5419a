import { readEnvInteger } from '@flowscope/core';
import {
  DebuggerConfigSchema,
  type DebuggerConfig,
  type DebuggerConfigInput,
} from '@flowscope/schemas';

/**
 * Builds the debugger configuration from environment variables and
 * explicit overrides, overrides winning.
 *
 * - `FLOWSCOPE_MAX_LOG_ENTRIES`: debug log capacity
 * - `FLOWSCOPE_PAUSE_TIMEOUT_MS`: release pauses after this long; `0` keeps
 *   pauses indefinite
 *
 * @throws {EnvironmentResolutionError} When a variable is not an integer
 * @throws {ZodError} When the merged configuration is invalid
 */
export function resolveDebuggerConfig(
  overrides: DebuggerConfigInput = {},
  envSource: Record<string, string | undefined> = process.env,
): DebuggerConfig {
  const fromEnv: DebuggerConfigInput = {};

  const maxLogEntries = readEnvInteger('FLOWSCOPE_MAX_LOG_ENTRIES', envSource);
  if (maxLogEntries !== undefined) {
    fromEnv.maxLogEntries = maxLogEntries;
  }

  const pauseTimeoutMs = readEnvInteger('FLOWSCOPE_PAUSE_TIMEOUT_MS', envSource);
  if (pauseTimeoutMs !== undefined && pauseTimeoutMs > 0) {
    fromEnv.pauseTimeoutMs = pauseTimeoutMs;
  }

  return DebuggerConfigSchema.parse({ ...fromEnv, ...overrides });
}
