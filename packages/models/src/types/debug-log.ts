import type { DebugLogLevel } from '../enums/debug.js';

export interface DebugLogEntry {
  /** Epoch seconds */
  timestamp: number;
  level: DebugLogLevel;
  message: string;
}

/**
 * Outcome of an operation that reports failure instead of throwing.
 */
export interface ExportResult {
  success: boolean;
  message: string;
}
