export { MetricsRegistry, summarize, type MetricsRegistryOptions } from './metrics-registry';
export { TracingEngine, SpanHandle, type SpanOptions, type TracingEngineOptions } from './tracing-engine';
export { StructuredLogger, type StructuredLoggerOptions } from './structured-logger';
export {
  AlertEngine,
  COMPARISON_OPERATORS,
  alertRuleSchema,
  evaluateCondition,
  resolveMetricValue,
  type AlertEngineOptions,
  type AlertRuleInput,
  type EvaluationSummary,
} from './alert-engine';
export { DEFAULT_ALERT_RULES } from './default-rules';
export { loadRulesFile } from './rules-file';
export {
  Monitoring,
  type MonitoringData,
  type MonitoringOptions,
  type MonitoringStatistics,
  type TickResult,
} from './monitoring';
export { createMonitoringFromEnv, type BootstrapOptions } from './bootstrap';
