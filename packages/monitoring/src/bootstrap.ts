import { createLogger, loadConfig, loadEnv, type Logger } from '@dishwatch/core';
import { Monitoring } from './monitoring';
import { loadRulesFile } from './rules-file';

export interface BootstrapOptions {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Start the alert evaluation loop right away (default true) */
  start?: boolean;
}

/**
 * Build the process-wide Monitoring instance from `.env` and the environment.
 * Throws ConfigurationError on invalid settings or rules.
 */
export function createMonitoringFromEnv(options: BootstrapOptions = {}): Monitoring {
  const envResult = options.env ? undefined : loadEnv();
  const config = loadConfig(options.env ?? process.env);
  const logger = options.logger ?? createLogger({ level: config.logLevel });

  if (envResult?.error) {
    logger.warn({ path: envResult.path, error: envResult.error }, 'Failed to load .env file');
  } else if (envResult && envResult.loaded > 0) {
    logger.info({ count: envResult.loaded }, 'Loaded environment variables from .env');
  }

  const rules = config.rulesFile ? loadRulesFile(config.rulesFile) : [];
  if (rules.length > 0) {
    logger.info({ count: rules.length, path: config.rulesFile }, 'Loaded alert rules');
  }

  const monitoring = new Monitoring({ logger, config, rules });
  if (options.start !== false) {
    monitoring.runMonitoringLoop();
  }
  return monitoring;
}
