/**
 * Tests for logger utilities
 */

import { describe, expect, it, vi } from 'vitest';
import {
  createLogger,
  createSilentLogger,
  isLogLevel,
  LOG_LEVELS,
  resolveLogLevel,
  shouldLog
} from './logger.js';

const fixedNow = () => new Date('2026-01-01T12:00:00Z');

describe('LOG_LEVELS', () => {
  it('should be ordered from least to most verbose', () => {
    expect(LOG_LEVELS.silent).toBeLessThan(LOG_LEVELS.error);
    expect(LOG_LEVELS.error).toBeLessThan(LOG_LEVELS.warn);
    expect(LOG_LEVELS.warn).toBeLessThan(LOG_LEVELS.info);
    expect(LOG_LEVELS.info).toBeLessThan(LOG_LEVELS.debug);
    expect(LOG_LEVELS.debug).toBeLessThan(LOG_LEVELS.trace);
  });
});

describe('shouldLog', () => {
  it('should not log anything at silent level', () => {
    expect(shouldLog('silent', 'error')).toBe(false);
    expect(shouldLog('silent', 'trace')).toBe(false);
  });

  it('should log messages at or below the current level', () => {
    expect(shouldLog('info', 'error')).toBe(true);
    expect(shouldLog('info', 'info')).toBe(true);
    expect(shouldLog('info', 'debug')).toBe(false);
    expect(shouldLog('trace', 'trace')).toBe(true);
  });
});

describe('resolveLogLevel', () => {
  it('should keep the configured level without override', () => {
    expect(resolveLogLevel('warn')).toBe('warn');
  });

  it('should apply a valid override case-insensitively', () => {
    expect(resolveLogLevel('info', ' DEBUG ')).toBe('debug');
  });

  it('should ignore an unknown override', () => {
    expect(resolveLogLevel('info', 'verbose')).toBe('info');
  });

  it('should reject inherited object keys as levels', () => {
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel('trace')).toBe(true);
  });
});

describe('createLogger', () => {
  it('should default to info level', () => {
    expect(createLogger().level).toBe('info');
  });

  it('should respect log level configuration', () => {
    const output = vi.fn();
    const logger = createLogger({ level: 'warn', output, now: fixedNow });

    logger.error('error message');
    logger.warn('warn message');
    logger.info('info message');
    logger.debug('debug message');

    expect(output).toHaveBeenCalledTimes(2);
  });

  it('should format text lines', () => {
    const output = vi.fn();
    const logger = createLogger({ output, now: fixedNow });

    logger.info('outlet 3 is off');

    expect(output).toHaveBeenCalledWith('[2026-01-01T12:00:00.000Z] [INFO] outlet 3 is off');
  });

  it('should append data after the message in text mode', () => {
    const output = vi.fn();
    const logger = createLogger({ output, now: fixedNow });

    logger.warn({ outlet: 4 }, 'still on');

    expect(output).toHaveBeenCalledWith(
      '[2026-01-01T12:00:00.000Z] [WARN] still on {"outlet":4}'
    );
  });

  it('should format JSON lines', () => {
    const output = vi.fn();
    const logger = createLogger({ output, json: true, now: fixedNow });

    logger.info({ pdu: 'pdu-a' }, 'session opened');

    expect(JSON.parse(output.mock.calls[0][0])).toEqual({
      time: '2026-01-01T12:00:00.000Z',
      level: 'info',
      msg: 'session opened',
      data: { pdu: 'pdu-a' }
    });
  });

  it('should create child loggers with combined prefix', () => {
    const output = vi.fn();
    const parent = createLogger({ output, now: fixedNow }).child('orchestrator');
    const child = parent.child('pdu-a');

    child.info('powering off');

    expect(output).toHaveBeenCalledWith(
      '[2026-01-01T12:00:00.000Z] [INFO] [orchestrator][pdu-a] powering off'
    );
  });
});

describe('createSilentLogger', () => {
  it('should create a silent logger', () => {
    const logger = createSilentLogger();
    expect(logger.level).toBe('silent');
    expect(() => logger.error(new Error('ignored'))).not.toThrow();
  });
});
