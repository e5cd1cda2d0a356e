import { MetricNames, Severity } from '@dishwatch/core';
import type { AlertRuleInput } from './alert-engine';

// Five minutes of sustained breach before a default rule fires
const DEFAULT_RULE_DURATION_SECONDS = 300;

export const DEFAULT_ALERT_RULES: readonly AlertRuleInput[] = [
  {
    name: 'high_response_time',
    metric: MetricNames.QUERY_RESPONSE_TIME,
    threshold: 2.0,
    operator: 'gt',
    duration: DEFAULT_RULE_DURATION_SECONDS,
    severity: Severity.WARNING,
    message: 'Query response time is above 2 seconds',
  },
  {
    name: 'high_error_rate',
    metric: MetricNames.ERROR_RATE,
    threshold: 0.05,
    operator: 'gt',
    duration: DEFAULT_RULE_DURATION_SECONDS,
    severity: Severity.CRITICAL,
    message: 'Error rate is above 5%',
  },
  {
    name: 'low_cache_hit_rate',
    metric: MetricNames.CACHE_HIT_RATE,
    threshold: 0.7,
    operator: 'lt',
    duration: DEFAULT_RULE_DURATION_SECONDS,
    severity: Severity.WARNING,
    message: 'Cache hit rate is below 70%',
  },
  {
    name: 'high_memory_usage',
    metric: MetricNames.MEMORY_USAGE,
    threshold: 0.8,
    operator: 'gt',
    duration: DEFAULT_RULE_DURATION_SECONDS,
    severity: Severity.WARNING,
    message: 'Memory usage is above 80%',
  },
];
