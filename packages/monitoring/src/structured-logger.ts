import { AsyncLocalStorage } from 'async_hooks';
import { LRUCache } from 'lru-cache';
import {
  DEFAULT_CORRELATION_CACHE_SIZE,
  DEFAULT_LOG_BUFFER_SIZE,
  LogLevel,
  RingBuffer,
  type Logger,
  type StructuredLogEntry,
} from '@dishwatch/core';

export interface StructuredLoggerOptions {
  bufferSize?: number;
  correlationCacheSize?: number;
}

type PinoMethod = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const PINO_METHOD: Record<LogLevel, PinoMethod> = {
  [LogLevel.DEBUG]: 'debug',
  [LogLevel.INFO]: 'info',
  [LogLevel.WARNING]: 'warn',
  [LogLevel.ERROR]: 'error',
  [LogLevel.CRITICAL]: 'fatal',
};

/**
 * Keeps the most recent log entries in memory for the monitoring snapshot
 * and forwards each one to the base pino logger.
 */
export class StructuredLogger {
  private readonly buffer: RingBuffer<StructuredLogEntry>;
  private readonly correlationIds: LRUCache<string, string>;
  private readonly correlationContext = new AsyncLocalStorage<string>();
  private readonly sink: Logger;
  private forwardFailures = 0;
  private lastForwardError: unknown;

  constructor(sink: Logger, options: StructuredLoggerOptions = {}) {
    this.sink = sink;
    this.buffer = new RingBuffer(options.bufferSize ?? DEFAULT_LOG_BUFFER_SIZE);
    this.correlationIds = new LRUCache({ max: options.correlationCacheSize ?? DEFAULT_CORRELATION_CACHE_SIZE });
  }

  log(
    level: LogLevel,
    message: string,
    correlationId?: string,
    extraData?: Record<string, unknown>,
    traceId?: string
  ): StructuredLogEntry {
    const entry: StructuredLogEntry = {
      timestamp: new Date(),
      level: level in PINO_METHOD ? level : LogLevel.DEBUG,
      message,
      correlationId: correlationId ?? this.currentCorrelationId(),
      traceId,
      extraData: { ...(extraData ?? {}) },
    };

    this.buffer.push(entry);
    this.forward(entry);
    return entry;
  }

  /**
   * Advisory mapping from a task identifier (request id, job id) to a
   * correlation id, for call sites that cannot receive it as a parameter.
   */
  setCorrelationId(taskId: string, correlationId: string): void {
    this.correlationIds.set(taskId, correlationId);
  }

  getCorrelationId(taskId: string): string | undefined {
    return this.correlationIds.get(taskId);
  }

  /**
   * Run `fn` with `correlationId` as the ambient id for every `log` call
   * made inside it that does not pass one explicitly.
   */
  runWithCorrelationId<T>(correlationId: string, fn: () => T): T {
    return this.correlationContext.run(correlationId, fn);
  }

  currentCorrelationId(): string | undefined {
    return this.correlationContext.getStore();
  }

  /**
   * The newest `limit` entries, oldest first
   */
  getRecentLogs(limit: number = 100): StructuredLogEntry[] {
    return this.buffer.last(limit);
  }

  get size(): number {
    return this.buffer.size;
  }

  getForwardFailures(): { count: number; lastError: unknown } {
    return { count: this.forwardFailures, lastError: this.lastForwardError };
  }

  private forward(entry: StructuredLogEntry): void {
    const bindings: Record<string, unknown> = { ...entry.extraData };
    if (entry.correlationId !== undefined) bindings.correlationId = entry.correlationId;
    if (entry.traceId !== undefined) bindings.traceId = entry.traceId;

    try {
      this.sink[PINO_METHOD[entry.level]](bindings, entry.message);
    } catch (error) {
      // entry stays buffered even when the sink fails
      this.forwardFailures++;
      this.lastForwardError = error;
    }
  }
}
