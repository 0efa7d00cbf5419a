import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DebugLogLevel, type DebugLogEntry } from '@flowscope/models';
import { ManualClock, RecordingLogger } from '../../test/utils/fakes.js';
import { DebugLogBuffer } from './debug-log-buffer.js';
import { formatTimestamp } from './format-time.js';

describe('DebugLogBuffer', () => {
  let clock: ManualClock;
  let logger: RecordingLogger;
  let buffer: DebugLogBuffer;

  beforeEach(() => {
    clock = new ManualClock(1_700_000_000);
    logger = new RecordingLogger();
    buffer = new DebugLogBuffer({ maxEntries: 5, clock: clock.read, logger });
  });

  it('stamps entries with the clock', () => {
    const entry = buffer.add(DebugLogLevel.Info, 'Flow loaded');

    expect(entry).toEqual({
      timestamp: 1_700_000_000,
      level: DebugLogLevel.Info,
      message: 'Flow loaded',
    });
  });

  it('keeps the most recent entries in order once full', () => {
    for (let i = 0; i < 10; i += 1) {
      buffer.add(DebugLogLevel.Debug, `entry ${i}`);
    }

    expect(buffer.size).toBe(5);
    expect(buffer.getLogs().map((entry) => entry.message)).toEqual([
      'entry 5',
      'entry 6',
      'entry 7',
      'entry 8',
      'entry 9',
    ]);
  });

  it('filters by level', () => {
    buffer.add(DebugLogLevel.Info, 'one');
    buffer.add(DebugLogLevel.Error, 'two');
    buffer.add(DebugLogLevel.Info, 'three');

    expect(buffer.getLogs(DebugLogLevel.Info).map((entry) => entry.message)).toEqual([
      'one',
      'three',
    ]);
    expect(buffer.getLogs(DebugLogLevel.Warning)).toEqual([]);
  });

  it('returns copies of the entry list', () => {
    buffer.add(DebugLogLevel.Info, 'kept');

    buffer.getLogs().pop();

    expect(buffer.size).toBe(1);
  });

  it('clears all entries', () => {
    buffer.add(DebugLogLevel.Info, 'gone');
    buffer.clear();

    expect(buffer.getLogs()).toEqual([]);
  });

  it('mirrors entries to the process logger by severity', () => {
    buffer.add(DebugLogLevel.Debug, 'd');
    buffer.add(DebugLogLevel.Info, 'i');
    buffer.add(DebugLogLevel.Success, 's');
    buffer.add(DebugLogLevel.Warning, 'w');
    buffer.add(DebugLogLevel.Error, 'e');

    expect(logger.records.map((record) => [record.level, record.message])).toEqual([
      ['debug', 'd'],
      ['info', 'i'],
      ['info', 's'],
      ['warn', 'w'],
      ['error', 'e'],
    ]);
    expect(logger.records[2].context).toEqual({ debugLevel: DebugLogLevel.Success });
  });

  it('hands every stored entry to the listener', () => {
    const seen: DebugLogEntry[] = [];
    const observed = new DebugLogBuffer({
      clock: clock.read,
      logger,
      onEntry: (entry) => seen.push(entry),
    });

    const entry = observed.add(DebugLogLevel.Warning, 'slow step');

    expect(seen).toEqual([entry]);
  });

  describe('export', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(join(tmpdir(), 'flowscope-logs-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('writes one text line per entry, creating parent directories', async () => {
      buffer.add(DebugLogLevel.Info, 'Step #0 (open_page) started');
      clock.advance(1);
      buffer.add(DebugLogLevel.Error, 'Step #0 failed: timeout');
      const filePath = join(directory, 'nested', 'debug.log');

      const result = await buffer.exportText(filePath);

      expect(result).toEqual({ success: true, message: `Logs exported to ${filePath}` });
      const stamp = formatTimestamp(1_700_000_000);
      const later = formatTimestamp(1_700_000_001);
      await expect(readFile(filePath, 'utf8')).resolves.toBe(
        `[${stamp}] [INFO] Step #0 (open_page) started\n` +
          `[${later}] [ERROR] Step #0 failed: timeout\n`,
      );
    });

    it('writes a JSON array with formatted times', async () => {
      buffer.add(DebugLogLevel.Success, 'done');
      const filePath = join(directory, 'debug.json');

      const result = await buffer.exportJson(filePath);

      expect(result.success).toBe(true);
      const exported: unknown = JSON.parse(await readFile(filePath, 'utf8'));
      expect(exported).toEqual([
        {
          timestamp: 1_700_000_000,
          level: 'SUCCESS',
          message: 'done',
          formatted_time: formatTimestamp(1_700_000_000),
        },
      ]);
    });

    it('reports a failed write instead of throwing', async () => {
      const blocker = join(directory, 'occupied');
      await writeFile(blocker, 'not a directory');
      buffer.add(DebugLogLevel.Info, 'unsaved');

      const result = await buffer.exportText(join(blocker, 'debug.log'));

      expect(result.success).toBe(false);
      expect(result.message).toMatch(/^Failed to export logs: /);
      expect(logger.messages('error')).toContain('Debug log export failed');
    });
  });
});

describe('formatTimestamp', () => {
  it('renders local time with zero padding', () => {
    const epoch = new Date(2024, 0, 5, 7, 8, 9).getTime() / 1000;

    expect(formatTimestamp(epoch)).toBe('2024-01-05 07:08:09');
  });
});
