import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LogLevel, createLogger, type Logger } from '@dishwatch/core';
import { StructuredLogger } from './structured-logger';

function captureLogger(): { logger: Logger; lines: () => Array<Record<string, unknown>> } {
  const raw: string[] = [];
  const logger = createLogger({
    level: 'debug',
    destination: {
      write(msg: string) {
        raw.push(msg);
      },
    },
  });
  return { logger, lines: () => raw.map((line) => JSON.parse(line)) };
}

describe('StructuredLogger', () => {
  let sink: ReturnType<typeof captureLogger>;
  let logger: StructuredLogger;

  beforeEach(() => {
    sink = captureLogger();
    logger = new StructuredLogger(sink.logger, { bufferSize: 1000 });
  });

  it('should buffer the entry and forward it to the base logger', () => {
    const entry = logger.log(LogLevel.INFO, 'Dish search completed', 'req-1', { results: 12 }, 'trace-1');

    expect(entry).toMatchObject({
      level: LogLevel.INFO,
      message: 'Dish search completed',
      correlationId: 'req-1',
      traceId: 'trace-1',
      extraData: { results: 12 },
    });
    expect(logger.getRecentLogs(10)).toEqual([entry]);

    const [line] = sink.lines();
    expect(line.msg).toBe('Dish search completed');
    expect(line.level).toBe(30);
    expect(line.correlationId).toBe('req-1');
    expect(line.traceId).toBe('trace-1');
    expect(line.results).toBe(12);
  });

  it('should map levels onto the base logger', () => {
    logger.log(LogLevel.DEBUG, 'd');
    logger.log(LogLevel.WARNING, 'w');
    logger.log(LogLevel.ERROR, 'e');
    logger.log(LogLevel.CRITICAL, 'c');

    expect(sink.lines().map((line) => line.level)).toEqual([20, 40, 50, 60]);
  });

  it('should keep only the most recent entries once full', () => {
    for (let i = 0; i < 1200; i++) {
      logger.log(LogLevel.DEBUG, `entry ${i}`);
    }

    const recent = logger.getRecentLogs(1000);
    expect(recent).toHaveLength(1000);
    expect(recent[0].message).toBe('entry 200');
    expect(recent[999].message).toBe('entry 1199');
    expect(recent.some((entry) => entry.message === 'entry 199')).toBe(false);
  });

  it('should return the last n entries oldest first', () => {
    ['a', 'b', 'c'].forEach((message) => logger.log(LogLevel.INFO, message));

    expect(logger.getRecentLogs(2).map((entry) => entry.message)).toEqual(['b', 'c']);
  });

  it('should look up correlation ids by task', () => {
    logger.setCorrelationId('task-7', 'corr-abc');

    expect(logger.getCorrelationId('task-7')).toBe('corr-abc');
    expect(logger.getCorrelationId('task-8')).toBeUndefined();
  });

  it('should bound the correlation table', () => {
    const small = new StructuredLogger(sink.logger, { correlationCacheSize: 2 });
    small.setCorrelationId('t1', 'c1');
    small.setCorrelationId('t2', 'c2');
    small.setCorrelationId('t3', 'c3');

    expect(small.getCorrelationId('t1')).toBeUndefined();
    expect(small.getCorrelationId('t3')).toBe('c3');
  });

  it('should use the ambient correlation id when none is passed', async () => {
    await logger.runWithCorrelationId('corr-ambient', async () => {
      await Promise.resolve();
      logger.log(LogLevel.INFO, 'inside');
      logger.log(LogLevel.INFO, 'explicit', 'corr-explicit');
    });
    logger.log(LogLevel.INFO, 'outside');

    expect(logger.getRecentLogs(3).map((entry) => entry.correlationId)).toEqual([
      'corr-ambient',
      'corr-explicit',
      undefined,
    ]);
  });

  it('should keep the entry when the base logger throws', () => {
    const failing = captureLogger().logger;
    vi.spyOn(failing, 'error').mockImplementation(() => {
      throw new Error('sink closed');
    });
    const guarded = new StructuredLogger(failing);

    expect(() => guarded.log(LogLevel.ERROR, 'boom')).not.toThrow();
    expect(guarded.getRecentLogs(1)[0].message).toBe('boom');
    expect(guarded.getForwardFailures().count).toBe(1);
  });
});
