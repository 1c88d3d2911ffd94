/**
 * Logger Unit Tests
 */

import { describe, it, expect } from 'vitest';

import type { LogLevel } from '@/lib/logger.js';
import { createLogger, isLogLevel } from '@/lib/logger.js';

function captureSink() {
  const lines: { level: LogLevel; entry: unknown }[] = [];
  return {
    lines,
    sink: (level: LogLevel, line: string) => {
      const entry: unknown = JSON.parse(line);
      lines.push({ level, entry });
    },
  };
}

describe('Logger', () => {
  it('should write one JSON entry with service, level and fields', () => {
    const { lines, sink } = captureSink();
    const logger = createLogger({ service: 'licensing-engine', sink });

    logger.info('Device activated', { subscriptionId: 'sub-1', action: 'can_activate' });

    expect(lines).toHaveLength(1);
    expect(lines[0]?.level).toBe('info');
    expect(lines[0]?.entry).toMatchObject({
      level: 'info',
      service: 'licensing-engine',
      message: 'Device activated',
      subscriptionId: 'sub-1',
      action: 'can_activate',
    });
  });

  it('should drop entries below the threshold', () => {
    const { lines, sink } = captureSink();
    const logger = createLogger({ service: 'test', level: 'warn', sink });

    logger.debug('ignored');
    logger.info('ignored');
    logger.warn('kept');
    logger.error('kept too');

    expect(lines.map((line) => line.level)).toEqual(['warn', 'error']);
  });

  it('should carry bindings into child loggers', () => {
    const { lines, sink } = captureSink();
    const logger = createLogger({ service: 'test', sink }).child({ component: 'lock' });

    logger.child({ requestId: 'req-1' }).info('Acquired');

    expect(lines[0]?.entry).toMatchObject({
      component: 'lock',
      requestId: 'req-1',
      message: 'Acquired',
    });
  });

  it('should flatten errors and dates', () => {
    const { lines, sink } = captureSink();
    const logger = createLogger({ service: 'test', sink });

    logger.error('Rollback step failed', {
      error: new Error('outer', { cause: new Error('inner') }),
      at: new Date('2025-06-01T12:00:00.000Z'),
    });

    expect(lines[0]?.entry).toMatchObject({
      error: { name: 'Error', message: 'outer', cause: { message: 'inner' } },
      at: '2025-06-01T12:00:00.000Z',
    });
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});
