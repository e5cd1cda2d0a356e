import { AsyncLocalStorage } from 'async_hooks';
import { LRUCache } from 'lru-cache';
import {
  DEFAULT_MAX_SPANS_PER_TRACE,
  DEFAULT_MAX_TRACES,
  LogLevel,
  generateSpanId,
  generateTraceId,
  type Logger,
  type MonitoringEventBus,
  type Span,
} from '@dishwatch/core';

export interface TracingEngineOptions {
  maxTraces?: number;
  maxSpansPerTrace?: number;
  logger?: Logger;
  events?: MonitoringEventBus;
}

export interface SpanOptions {
  traceId?: string;
  parentSpanId?: string;
}

/**
 * Handle for an in-flight span. Tags and logs written after the span ended
 * are dropped.
 */
export class SpanHandle {
  constructor(
    private readonly span: Span,
    private readonly engine: TracingEngine
  ) {}

  get spanId(): string {
    return this.span.spanId;
  }

  get traceId(): string {
    return this.span.traceId;
  }

  get parentSpanId(): string | undefined {
    return this.span.parentSpanId;
  }

  get operationName(): string {
    return this.span.operationName;
  }

  addTag(key: string, value: string): void {
    this.engine.addSpanTag(this.span.spanId, key, value);
  }

  addLog(message: string, level: LogLevel = LogLevel.INFO): void {
    this.engine.addSpanLog(this.span.spanId, message, level);
  }

  end(): void {
    this.engine.endSpan(this);
  }
}

/**
 * Span lifecycle: begin registers the span as active, end archives a frozen
 * copy onto its trace. A span is archived at most once.
 */
export class TracingEngine {
  private readonly activeSpans = new Map<string, Span>();
  private readonly traces: LRUCache<string, Span[]>;
  private readonly maxSpansPerTrace: number;
  private readonly asyncContext = new AsyncLocalStorage<SpanHandle>();
  private readonly logger?: Logger;
  private readonly events?: MonitoringEventBus;
  private droppedSpans = 0;

  constructor(options: TracingEngineOptions = {}) {
    this.traces = new LRUCache<string, Span[]>({ max: options.maxTraces ?? DEFAULT_MAX_TRACES });
    this.maxSpansPerTrace = options.maxSpansPerTrace ?? DEFAULT_MAX_SPANS_PER_TRACE;
    this.logger = options.logger;
    this.events = options.events;
  }

  /**
   * Start a new span. Callers own the returned handle and must end it on
   * every exit path; prefer `withSpan`, which does that for them.
   */
  beginSpan(operationName: string, traceId?: string, parentSpanId?: string): SpanHandle {
    const span: Span = {
      spanId: generateSpanId(),
      traceId: traceId || generateTraceId(),
      parentSpanId: parentSpanId || undefined,
      operationName,
      startTime: new Date(),
      tags: {},
      logs: [],
    };

    this.activeSpans.set(span.spanId, span);
    return new SpanHandle(span, this);
  }

  endSpan(handle: SpanHandle): void {
    const span = this.activeSpans.get(handle.spanId);
    if (!span) {
      return; // already archived
    }
    this.activeSpans.delete(span.spanId);

    const endTime = new Date();
    const archived: Span = {
      ...span,
      endTime,
      duration: endTime.getTime() - span.startTime.getTime(),
      tags: { ...span.tags },
      logs: span.logs.map((log) => ({ ...log })),
    };
    for (const log of archived.logs) {
      Object.freeze(log);
    }
    Object.freeze(archived.logs);
    Object.freeze(archived.tags);
    Object.freeze(archived);

    this.archive(archived);
    try {
      this.events?.emitSpanEnded(archived);
    } catch (error) {
      this.logger?.warn({ err: error, spanId: archived.spanId, traceId: archived.traceId }, 'Span event listener failed');
    }
  }

  /**
   * Run `fn` inside a span that is ended when `fn` returns, throws or rejects.
   * Without explicit ids, the span joins the trace of the enclosing `withSpan`.
   */
  async withSpan<T>(
    operationName: string,
    fn: (span: SpanHandle) => T | Promise<T>,
    options: SpanOptions = {}
  ): Promise<T> {
    const parent = this.asyncContext.getStore();
    const traceId = options.traceId ?? parent?.traceId;
    const parentSpanId = options.parentSpanId ?? (options.traceId === undefined ? parent?.spanId : undefined);

    const handle = this.beginSpan(operationName, traceId, parentSpanId);
    try {
      return await this.asyncContext.run(handle, () => fn(handle));
    } finally {
      this.endSpan(handle);
    }
  }

  /**
   * Span of the innermost enclosing `withSpan`, if any
   */
  getCurrentSpan(): SpanHandle | undefined {
    return this.asyncContext.getStore();
  }

  addSpanTag(spanId: string, key: string, value: string): void {
    const span = this.activeSpans.get(spanId);
    if (span) {
      span.tags[key] = String(value);
    }
  }

  addSpanLog(spanId: string, message: string, level: LogLevel = LogLevel.INFO): void {
    const span = this.activeSpans.get(spanId);
    if (span) {
      span.logs.push({ timestamp: new Date(), message, level });
    }
  }

  getTrace(traceId: string): Span[] {
    return [...(this.traces.get(traceId) ?? [])];
  }

  /**
   * Copies of every in-flight span, keyed by span id
   */
  getActiveSpans(): Record<string, Span> {
    const result: Record<string, Span> = {};
    for (const [spanId, span] of this.activeSpans) {
      result[spanId] = { ...span, tags: { ...span.tags }, logs: span.logs.map((log) => ({ ...log })) };
    }
    return result;
  }

  get activeSpanCount(): number {
    return this.activeSpans.size;
  }

  get droppedSpanCount(): number {
    return this.droppedSpans;
  }

  /**
   * Archive every span that is still in flight
   */
  shutdown(): void {
    const pending = [...this.activeSpans.values()];
    for (const span of pending) {
      this.endSpan(new SpanHandle(span, this));
    }
    if (pending.length > 0) {
      this.logger?.warn({ count: pending.length }, 'Archived spans still active at shutdown');
    }
  }

  private archive(span: Span): void {
    let spans = this.traces.get(span.traceId);
    if (!spans) {
      spans = [];
      this.traces.set(span.traceId, spans);
    }

    if (spans.length >= this.maxSpansPerTrace) {
      this.droppedSpans++;
      this.logger?.debug({ traceId: span.traceId, limit: this.maxSpansPerTrace }, 'Trace span limit reached, dropping span');
      return;
    }
    spans.push(span);
  }
}
