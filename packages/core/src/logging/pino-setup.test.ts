/**
 * Tests for pino-setup redaction and the PinoLogger adapter
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import pino from 'pino';
import { REDACT_PATHS, configureRootLogger, rootLogger } from './pino-setup.js';
import { PinoLogger, createScopedLogger } from './logger.js';

describe('Pino Redaction', () => {
  let testLogger: pino.Logger;
  let logs: string[];

  beforeEach(() => {
    logs = [];
    // Create test logger with the same redaction config
    testLogger = pino(
      {
        level: 'debug',
        redact: {
          paths: REDACT_PATHS,
          censor: '[REDACTED]',
          remove: false,
        },
      },
      {
        write: (msg: string) => {
          logs.push(msg);
        },
      },
    );
  });

  it('redacts password fields', () => {
    testLogger.info({ password: 'test-secret' });

    const logged = JSON.parse(logs[0]);
    expect(logged.password).toBe('[REDACTED]');
  });

  it('redacts nested credentials while keeping siblings', () => {
    testLogger.info({ variable: { secret: 'test-secret', name: 'login' } });

    const logged = JSON.parse(logs[0]);
    expect(logged.variable.secret).toBe('[REDACTED]');
    expect(logged.variable.name).toBe('login');
  });

  describe('PinoLogger', () => {
    it('writes the message with context fields', () => {
      const logger = new PinoLogger(testLogger);

      logger.info('Step started', { stepIndex: 3 });

      const logged = JSON.parse(logs[0]);
      expect(logged.msg).toBe('Step started');
      expect(logged.stepIndex).toBe(3);
      expect(logged.level).toBe(30);
    });

    it('serializes errors under err', () => {
      const logger = new PinoLogger(testLogger);

      logger.error('Export failed', new Error('disk full'), { path: '/tmp/x' });

      const logged = JSON.parse(logs[0]);
      expect(logged.msg).toBe('Export failed');
      expect(logged.err.message).toBe('disk full');
      expect(logged.path).toBe('/tmp/x');
      expect(logged.level).toBe(50);
    });

    it('wraps non-Error values', () => {
      const logger = new PinoLogger(testLogger);

      logger.error('Observer failed', 'boom');

      const logged = JSON.parse(logs[0]);
      expect(logged.err.message).toBe('boom');
    });

    it('respects the logger level', () => {
      testLogger.level = 'info';
      const logger = new PinoLogger(testLogger);

      logger.debug('hidden');
      logger.warn('shown');

      expect(logs).toHaveLength(1);
      expect(JSON.parse(logs[0]).msg).toBe('shown');
    });
  });

  describe('root logger', () => {
    afterEach(() => {
      configureRootLogger({ level: 'silent' });
    });

    it('is silent unless configured', () => {
      expect(rootLogger.level).toBe('silent');
    });

    it('applies a configured level to scoped loggers', () => {
      configureRootLogger({ level: 'warn' });
      const scoped = createScopedLogger('debugger:test');

      expect(rootLogger.level).toBe('warn');
      expect(scoped).toBeInstanceOf(PinoLogger);
    });
  });
});
