import { config as loadDotenv } from 'dotenv';
import { resolve } from 'path';
import { existsSync } from 'fs';
import { z } from 'zod';
import {
  DEFAULT_ALERT_HISTORY_SIZE,
  DEFAULT_CORRELATION_CACHE_SIZE,
  DEFAULT_EVAL_INTERVAL_MS,
  DEFAULT_LOG_BUFFER_SIZE,
  DEFAULT_MAX_SPANS_PER_TRACE,
  DEFAULT_MAX_TRACES,
  DEFAULT_SERIES_CAPACITY,
} from './constants';
import { ConfigurationError } from './errors';

function findProjectRoot(startPath: string = process.cwd()): string {
  let current = resolve(startPath);
  while (current !== resolve(current, '..')) {
    if (existsSync(resolve(current, 'package.json')) && existsSync(resolve(current, 'packages'))) {
      return current;
    }
    current = resolve(current, '..');
  }
  return process.cwd();
}

export interface LoadEnvResult {
  path: string;
  loaded: number;
  error?: string;
}

let envLoaded: LoadEnvResult | null = null;

/**
 * Load `.env` from the project root into process.env, once per process.
 * Variables already set in the environment win.
 */
export function loadEnv(): LoadEnvResult {
  if (envLoaded) return envLoaded;

  const envPath = resolve(findProjectRoot(), '.env');
  if (!existsSync(envPath)) {
    envLoaded = { path: envPath, loaded: 0 };
    return envLoaded;
  }

  const result = loadDotenv({ path: envPath });
  envLoaded = {
    path: envPath,
    loaded: Object.keys(result.parsed ?? {}).length,
    error: result.error?.message,
  };
  return envLoaded;
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const monitoringEnvSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  MONITORING_EVAL_INTERVAL_MS: positiveInt(DEFAULT_EVAL_INTERVAL_MS),
  MONITORING_SERIES_CAPACITY: positiveInt(DEFAULT_SERIES_CAPACITY),
  MONITORING_LOG_BUFFER_SIZE: positiveInt(DEFAULT_LOG_BUFFER_SIZE),
  MONITORING_ALERT_HISTORY_SIZE: positiveInt(DEFAULT_ALERT_HISTORY_SIZE),
  MONITORING_MAX_TRACES: positiveInt(DEFAULT_MAX_TRACES),
  MONITORING_MAX_SPANS_PER_TRACE: positiveInt(DEFAULT_MAX_SPANS_PER_TRACE),
  MONITORING_CORRELATION_CACHE_SIZE: positiveInt(DEFAULT_CORRELATION_CACHE_SIZE),
  MONITORING_RULES_FILE: z.string().min(1).optional(),
});

export interface MonitoringConfig {
  logLevel: z.infer<typeof monitoringEnvSchema>['LOG_LEVEL'];
  evalIntervalMs: number;
  seriesCapacity: number;
  logBufferSize: number;
  alertHistorySize: number;
  maxTraces: number;
  maxSpansPerTrace: number;
  correlationCacheSize: number;
  rulesFile?: string;
}

export const defaultConfig: MonitoringConfig = {
  logLevel: 'info',
  evalIntervalMs: DEFAULT_EVAL_INTERVAL_MS,
  seriesCapacity: DEFAULT_SERIES_CAPACITY,
  logBufferSize: DEFAULT_LOG_BUFFER_SIZE,
  alertHistorySize: DEFAULT_ALERT_HISTORY_SIZE,
  maxTraces: DEFAULT_MAX_TRACES,
  maxSpansPerTrace: DEFAULT_MAX_SPANS_PER_TRACE,
  correlationCacheSize: DEFAULT_CORRELATION_CACHE_SIZE,
};

/**
 * Validate monitoring settings from an environment map.
 * Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MonitoringConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = monitoringEnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid monitoring configuration', issues);
  }

  const values = parsed.data;
  return {
    logLevel: values.LOG_LEVEL,
    evalIntervalMs: values.MONITORING_EVAL_INTERVAL_MS,
    seriesCapacity: values.MONITORING_SERIES_CAPACITY,
    logBufferSize: values.MONITORING_LOG_BUFFER_SIZE,
    alertHistorySize: values.MONITORING_ALERT_HISTORY_SIZE,
    maxTraces: values.MONITORING_MAX_TRACES,
    maxSpansPerTrace: values.MONITORING_MAX_SPANS_PER_TRACE,
    correlationCacheSize: values.MONITORING_CORRELATION_CACHE_SIZE,
    rulesFile: values.MONITORING_RULES_FILE,
  };
}
