// Core type definitions for the monitoring core

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
}

export enum Severity {
  INFO = 'info',
  WARNING = 'warning',
  CRITICAL = 'critical',
}

export enum AlertStatus {
  ACTIVE = 'active',
  RESOLVED = 'resolved',
}

export type Labels = Record<string, string>;

// Metrics

export interface MetricPoint {
  readonly timestamp: number; // epoch ms
  readonly value: number;
  readonly labels: Readonly<Labels>;
}

export interface CounterSample {
  name: string;
  labels: Labels;
  value: number;
}

export interface GaugeSample {
  name: string;
  labels: Labels;
  value: number;
  timestamp: number;
  /** Registry-wide write order; breaks ties between equal timestamps */
  sequence: number;
}

export interface SeriesSummary {
  count: number;
  sum: number;
  avg: number;
  min: number;
  max: number;
  latest: number;
  latestTimestamp: number;
}

export interface MetricsSnapshot {
  series: Record<string, SeriesSummary>;
  counters: CounterSample[];
  gauges: GaugeSample[];
  histograms: Record<string, SeriesSummary>;
}

// Distributed Tracing Types

export interface SpanLog {
  timestamp: Date;
  message: string;
  level: LogLevel;
}

export interface Span {
  spanId: string;
  traceId: string;
  parentSpanId?: string;
  operationName: string;
  startTime: Date;
  endTime?: Date;
  duration?: number; // in milliseconds
  tags: Record<string, string>;
  logs: SpanLog[];
}

// Alerting

export type ComparisonOperator = 'gt' | 'lt' | 'eq' | 'gte' | 'lte';

export interface AlertRule {
  name: string;
  metric: string;
  threshold: number;
  operator: ComparisonOperator;
  duration: number; // seconds the breach must be sustained before firing
  severity: Severity;
  message: string;
  labels?: Labels; // restricts gauge lookup to one label set
}

export interface Alert {
  id: string;
  ruleName: string;
  metric: string;
  threshold: number;
  currentValue: number;
  severity: Severity;
  message: string;
  triggeredAt: Date;
  resolvedAt?: Date;
  status: AlertStatus;
}

// Structured logging

export interface StructuredLogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  correlationId?: string;
  traceId?: string;
  extraData: Record<string, unknown>;
}
