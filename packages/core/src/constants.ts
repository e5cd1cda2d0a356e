// Configuration constants for the monitoring core

export const DEFAULT_EVAL_INTERVAL_MS = 60_000;
export const DEFAULT_SERIES_CAPACITY = 1000;
export const DEFAULT_LOG_BUFFER_SIZE = 10_000;
export const DEFAULT_ALERT_HISTORY_SIZE = 1000;
export const DEFAULT_CORRELATION_CACHE_SIZE = 10_000;

// Trace store bounds
export const DEFAULT_MAX_TRACES = 1000;
export const DEFAULT_MAX_SPANS_PER_TRACE = 1000;

// getMonitoringData() window sizes
export const SNAPSHOT_ALERT_HISTORY_LIMIT = 50;
export const SNAPSHOT_RECENT_LOGS_LIMIT = 100;

// Metric names produced by the recording helpers
export const MetricNames = {
  QUERY_RESPONSE_TIME: 'query_response_time',
  QUERY_RESULT_COUNT: 'query_result_count',
  QUERY_TOTAL: 'query_total',
  QUERY_SUCCESS: 'query_success',
  QUERY_FAILURE: 'query_failure',
  ERROR_RATE: 'error_rate',
  VECTOR_SEARCH_LATENCY: 'vector_search_latency',
  VECTOR_SEARCH_RESULTS: 'vector_search_results',
  VECTOR_SEARCH_TOTAL: 'vector_search_total',
  VECTOR_SEARCH_CACHE_HIT: 'vector_search_cache_hit',
  VECTOR_SEARCH_CACHE_MISS: 'vector_search_cache_miss',
  CACHE_HIT_RATE: 'cache_hit_rate',
  MEMORY_USAGE: 'memory_usage',
  CPU_USAGE: 'cpu_usage',
  ACTIVE_CONNECTIONS: 'active_connections',
  RECOMMENDATIONS_GENERATED: 'recommendations_generated',
  USER_SATISFACTION: 'user_satisfaction',
} as const;

export type MetricName = (typeof MetricNames)[keyof typeof MetricNames];
