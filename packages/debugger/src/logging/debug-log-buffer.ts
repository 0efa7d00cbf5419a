import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import {
  DebugLogLevel,
  type DebugLogEntry,
  type ExportResult,
} from '@flowscope/models';
import { createScopedLogger, type ILogger } from '@flowscope/core';
import { formatTimestamp } from './format-time.js';

const DEFAULT_MAX_ENTRIES = 1000;

export interface DebugLogBufferOptions {
  maxEntries?: number;
  /** Epoch seconds */
  clock?: () => number;
  logger?: ILogger;
  /** Called with every entry once it is stored */
  onEntry?: (entry: DebugLogEntry) => void;
}

/**
 * Bounded, level-tagged debug log. Once full, each new entry evicts the
 * oldest one.
 *
 * Entries are mirrored to the scoped pino logger so they also reach the
 * process log when logging is enabled.
 */
export class DebugLogBuffer {
  private entries: DebugLogEntry[] = [];
  private readonly maxEntries: number;
  private readonly clock: () => number;
  private readonly logger: ILogger;
  private readonly onEntry?: (entry: DebugLogEntry) => void;

  public constructor(options: DebugLogBufferOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.clock = options.clock ?? (() => Date.now() / 1000);
    this.logger = options.logger ?? createScopedLogger('debugger:log');
    this.onEntry = options.onEntry;
  }

  public add(level: DebugLogLevel, message: string): DebugLogEntry {
    const entry: DebugLogEntry = { timestamp: this.clock(), level, message };
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    this.mirror(entry);
    this.onEntry?.(entry);
    return entry;
  }

  /**
   * Entries in insertion order, optionally only those of one level.
   */
  public getLogs(filterLevel?: DebugLogLevel): DebugLogEntry[] {
    if (filterLevel) {
      return this.entries.filter((entry) => entry.level === filterLevel);
    }
    return [...this.entries];
  }

  public get size(): number {
    return this.entries.length;
  }

  public clear(): void {
    this.entries = [];
  }

  /**
   * Writes one `[time] [LEVEL] message` line per entry.
   */
  public async exportText(filePath: string): Promise<ExportResult> {
    const content = this.entries
      .map(
        (entry) =>
          `[${formatTimestamp(entry.timestamp)}] [${entry.level}] ${entry.message}\n`,
      )
      .join('');
    return this.writeExport(filePath, content);
  }

  /**
   * Writes a JSON array of entries, each with a `formatted_time` field.
   */
  public async exportJson(filePath: string): Promise<ExportResult> {
    const exported = this.entries.map((entry) => ({
      ...entry,
      formatted_time: formatTimestamp(entry.timestamp),
    }));
    return this.writeExport(filePath, JSON.stringify(exported, null, 2));
  }

  private async writeExport(
    filePath: string,
    content: string,
  ): Promise<ExportResult> {
    try {
      await mkdir(dirname(filePath), { recursive: true });
      await writeFile(filePath, content, 'utf8');
      return { success: true, message: `Logs exported to ${filePath}` };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error('Debug log export failed', error, { filePath });
      return { success: false, message: `Failed to export logs: ${reason}` };
    }
  }

  private mirror(entry: DebugLogEntry): void {
    switch (entry.level) {
      case DebugLogLevel.Debug:
        this.logger.debug(entry.message);
        break;
      case DebugLogLevel.Info:
      case DebugLogLevel.Success:
        this.logger.info(entry.message, { debugLevel: entry.level });
        break;
      case DebugLogLevel.Warning:
        this.logger.warn(entry.message);
        break;
      case DebugLogLevel.Error:
        this.logger.error(entry.message);
        break;
    }
  }
}
