import {
  LogLevel,
  MetricNames,
  MonitoringEventBus,
  SNAPSHOT_ALERT_HISTORY_LIMIT,
  SNAPSHOT_RECENT_LOGS_LIMIT,
  defaultConfig,
  errorMessage,
  type Alert,
  type Logger,
  type MetricsSnapshot,
  type MonitoringConfig,
  type Span,
  type StructuredLogEntry,
} from '@dishwatch/core';
import { AlertEngine, type AlertRuleInput, type EvaluationSummary } from './alert-engine';
import { DEFAULT_ALERT_RULES } from './default-rules';
import { MetricsRegistry } from './metrics-registry';
import { StructuredLogger } from './structured-logger';
import { TracingEngine, type SpanHandle, type SpanOptions } from './tracing-engine';

export interface MonitoringOptions {
  logger: Logger;
  config?: Partial<MonitoringConfig>;
  /** Rules registered after the defaults */
  rules?: readonly AlertRuleInput[];
  includeDefaultRules?: boolean;
  /** Metric names produced outside the built-in recording helpers */
  knownMetrics?: readonly string[];
  now?: () => Date;
}

export type TickResult =
  | { ok: true; summary: EvaluationSummary; durationMs: number }
  | { ok: false; error: Error };

export interface MonitoringStatistics {
  metricsRecorded: number;
  tracesCreated: number;
  alertsTriggered: number;
  startTime: Date;
}

export interface MonitoringData {
  metrics: MetricsSnapshot;
  activeAlerts: Alert[];
  alertHistory: Alert[];
  recentLogs: StructuredLogEntry[];
  activeSpans: Record<string, Span>;
  statistics: MonitoringStatistics;
  uptime: number; // seconds
}

/**
 * Facade over the metrics registry, tracing engine, structured logger and
 * alert engine. Construct one per process and hand it to collaborators;
 * call `stop()` on shutdown.
 */
export class Monitoring {
  readonly metrics: MetricsRegistry;
  readonly tracing: TracingEngine;
  readonly logging: StructuredLogger;
  readonly alerts: AlertEngine;
  readonly events = new MonitoringEventBus();

  private readonly config: MonitoringConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly knownMetrics: Set<string>;
  private readonly stats: MonitoringStatistics;
  private loopTimer?: NodeJS.Timeout;

  constructor(options: MonitoringOptions) {
    this.config = { ...defaultConfig, ...options.config };
    this.logger = options.logger.child({ component: 'monitoring' });
    this.now = options.now ?? (() => new Date());
    this.knownMetrics = new Set<string>([...Object.values(MetricNames), ...(options.knownMetrics ?? [])]);

    this.metrics = new MetricsRegistry({
      seriesCapacity: this.config.seriesCapacity,
      now: () => this.now().getTime(),
    });
    this.tracing = new TracingEngine({
      maxTraces: this.config.maxTraces,
      maxSpansPerTrace: this.config.maxSpansPerTrace,
      logger: options.logger.child({ component: 'tracing' }),
      events: this.events,
    });
    this.logging = new StructuredLogger(options.logger, {
      bufferSize: this.config.logBufferSize,
      correlationCacheSize: this.config.correlationCacheSize,
    });
    this.alerts = new AlertEngine({
      logger: options.logger.child({ component: 'alerts' }),
      historySize: this.config.alertHistorySize,
      events: this.events,
      now: this.now,
    });

    this.stats = { metricsRecorded: 0, tracesCreated: 0, alertsTriggered: 0, startTime: this.now() };

    const rules = [...(options.includeDefaultRules === false ? [] : DEFAULT_ALERT_RULES), ...(options.rules ?? [])];
    for (const rule of rules) {
      this.addAlertRule(rule);
    }
  }

  /**
   * Register a rule. Warns when its metric is not one the application is
   * known to record, since such a rule can never fire.
   */
  addAlertRule(rule: AlertRuleInput): void {
    const added = this.alerts.addRule(rule);
    if (!this.knownMetrics.has(added.metric) && !this.metrics.knownMetricNames().includes(added.metric)) {
      this.logger.warn(
        { rule: added.name, metric: added.metric },
        'Alert rule references a metric that is never recorded; it will not fire'
      );
    }
  }

  recordQueryMetrics(queryType: string, responseTime: number, success: boolean, resultCount: number = 0): void {
    const labels = { query_type: queryType };

    this.metrics.recordHistogram(MetricNames.QUERY_RESPONSE_TIME, responseTime, labels);
    this.metrics.incrementCounter(MetricNames.QUERY_TOTAL, 1, labels);
    this.metrics.incrementCounter(success ? MetricNames.QUERY_SUCCESS : MetricNames.QUERY_FAILURE, 1, labels);
    if (resultCount > 0) {
      this.metrics.recordHistogram(MetricNames.QUERY_RESULT_COUNT, resultCount, labels);
    }

    const total = this.metrics.getCounter(MetricNames.QUERY_TOTAL, labels);
    const failures = this.metrics.getCounter(MetricNames.QUERY_FAILURE, labels);
    if (total > 0) {
      this.metrics.setGauge(MetricNames.ERROR_RATE, failures / total, labels);
    }

    this.stats.metricsRecorded++;
  }

  recordVectorSearchMetrics(searchType: string, latency: number, resultCount: number, cacheHit: boolean): void {
    const labels = { search_type: searchType };

    this.metrics.recordHistogram(MetricNames.VECTOR_SEARCH_LATENCY, latency, labels);
    this.metrics.recordHistogram(MetricNames.VECTOR_SEARCH_RESULTS, resultCount, labels);
    this.metrics.incrementCounter(MetricNames.VECTOR_SEARCH_TOTAL, 1, labels);
    this.metrics.incrementCounter(
      cacheHit ? MetricNames.VECTOR_SEARCH_CACHE_HIT : MetricNames.VECTOR_SEARCH_CACHE_MISS,
      1,
      labels
    );

    const total = this.metrics.getCounter(MetricNames.VECTOR_SEARCH_TOTAL, labels);
    const hits = this.metrics.getCounter(MetricNames.VECTOR_SEARCH_CACHE_HIT, labels);
    if (total > 0) {
      this.metrics.setGauge(MetricNames.CACHE_HIT_RATE, hits / total, labels);
    }

    this.stats.metricsRecorded++;
  }

  recordSystemMetrics(memoryUsage: number, cpuUsage: number, activeConnections: number): void {
    this.metrics.setGauge(MetricNames.MEMORY_USAGE, memoryUsage);
    this.metrics.setGauge(MetricNames.CPU_USAGE, cpuUsage);
    this.metrics.setGauge(MetricNames.ACTIVE_CONNECTIONS, activeConnections);
    this.stats.metricsRecorded++;
  }

  recordBusinessMetrics(recommendationsGenerated: number, userSatisfaction?: number): void {
    this.metrics.incrementCounter(MetricNames.RECOMMENDATIONS_GENERATED, recommendationsGenerated);
    if (userSatisfaction !== undefined) {
      this.metrics.recordHistogram(MetricNames.USER_SATISFACTION, userSatisfaction);
    }
    this.stats.metricsRecorded++;
  }

  /**
   * Run `fn` inside a span that is archived however `fn` exits
   */
  traceOperation<T>(
    operationName: string,
    fn: (span: SpanHandle) => T | Promise<T>,
    options: SpanOptions = {}
  ): Promise<T> {
    this.stats.tracesCreated++;
    return this.tracing.withSpan(operationName, fn, options);
  }

  /**
   * Without an explicit trace id, the entry is linked to the current span's trace.
   */
  logStructured(
    level: LogLevel,
    message: string,
    correlationId?: string,
    extraData?: Record<string, unknown>,
    traceId?: string
  ): StructuredLogEntry {
    return this.logging.log(
      level,
      message,
      correlationId,
      extraData,
      traceId ?? this.tracing.getCurrentSpan()?.traceId
    );
  }

  /**
   * One supervised evaluation pass. Failures are logged and returned, never thrown.
   */
  evaluateAlerts(): TickResult {
    const started = Date.now();
    try {
      const summary = this.alerts.evaluateAll(this.metrics.snapshot());
      this.stats.alertsTriggered += summary.triggered;
      return { ok: true, summary, durationMs: Date.now() - started };
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(errorMessage(caught));
      this.logger.error({ err: error }, 'Error in monitoring loop');
      return { ok: false, error };
    }
  }

  /**
   * Start evaluating alert rules every `evalIntervalMs`. Calling it again
   * while running has no effect.
   */
  runMonitoringLoop(): void {
    if (this.loopTimer) {
      return;
    }
    this.loopTimer = setInterval(() => {
      this.evaluateAlerts();
    }, this.config.evalIntervalMs);
    this.loopTimer.unref();
    this.logger.info({ intervalMs: this.config.evalIntervalMs }, 'Monitoring loop started');
  }

  get isRunning(): boolean {
    return this.loopTimer !== undefined;
  }

  /**
   * Cancel the monitoring loop and archive spans that are still active
   */
  stop(): void {
    if (this.loopTimer) {
      clearInterval(this.loopTimer);
      this.loopTimer = undefined;
      this.logger.info('Monitoring loop stopped');
    }
    this.tracing.shutdown();
  }

  getMonitoringData(): MonitoringData {
    const now = this.now();
    return {
      metrics: this.metrics.snapshot(),
      activeAlerts: this.alerts.getActiveAlerts(),
      alertHistory: this.alerts.getAlertHistory(SNAPSHOT_ALERT_HISTORY_LIMIT),
      recentLogs: this.logging.getRecentLogs(SNAPSHOT_RECENT_LOGS_LIMIT),
      activeSpans: this.tracing.getActiveSpans(),
      statistics: { ...this.stats },
      uptime: (now.getTime() - this.stats.startTime.getTime()) / 1000,
    };
  }
}
