/**
 * Tests for logging
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  ConsoleLogger,
  InMemoryLogger,
  LogLevel,
  createSessionContext,
  formatEntry,
  parseLogLevel,
} from '../observability';

const TIMESTAMP = new Date('2024-01-02T03:04:05.000Z');

describe('formatEntry', () => {
  it('should format a plain entry', () => {
    expect(formatEntry({ level: LogLevel.Info, message: 'recv: 250 OK', timestamp: TIMESTAMP })).toBe(
      '2024-01-02T03:04:05.000Z [INFO] recv: 250 OK'
    );
  });

  it('should include the session id and fields', () => {
    const line = formatEntry({
      level: LogLevel.Error,
      message: 'send failed',
      timestamp: TIMESTAMP,
      context: createSessionContext('worker-2', 'send_messages'),
      fields: { file: 'a.eml' },
    });

    expect(line).toBe('2024-01-02T03:04:05.000Z [ERROR] [worker-2] send failed {"file":"a.eml"}');
  });
});

describe('parseLogLevel', () => {
  it('should accept level names in any case', () => {
    expect(parseLogLevel('WARN')).toBe(LogLevel.Warn);
    expect(parseLogLevel(' debug ')).toBe(LogLevel.Debug);
  });

  it('should fall back for unknown values', () => {
    expect(parseLogLevel('verbose')).toBe(LogLevel.Info);
    expect(parseLogLevel(undefined, LogLevel.Error)).toBe(LogLevel.Error);
  });
});

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should skip entries below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new ConsoleLogger(LogLevel.Info);

    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(/ \[WARN\] shown$/);
  });

  it('should tag lines with the session id', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = new ConsoleLogger().withContext(createSessionContext('worker-1', 'send_messages'));

    logger.info('send: QUIT');

    expect(info.mock.calls[0]?.[0]).toMatch(/ \[INFO\] \[worker-1\] send: QUIT$/);
  });
});

describe('InMemoryLogger', () => {
  it('should share entries with child loggers', () => {
    const logger = new InMemoryLogger();
    const child = logger.withContext(createSessionContext('worker-1', 'send_messages'));

    logger.info('parent');
    child.info('child');

    expect(logger.getMessages()).toEqual(['parent', 'child']);
    expect(logger.getMessagesFor('worker-1')).toEqual(['child']);
  });

  it('should record error messages as fields', () => {
    const logger = new InMemoryLogger();

    logger.error('failed', new Error('boom'));

    expect(logger.getEntriesByLevel(LogLevel.Error)[0]?.fields).toEqual({ error: 'boom' });
  });

  it('should clear entries', () => {
    const logger = new InMemoryLogger();
    logger.info('x');
    logger.clear();
    expect(logger.getEntries()).toEqual([]);
  });
});
