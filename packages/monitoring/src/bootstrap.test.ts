import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigurationError, createLogger } from '@dishwatch/core';
import { createMonitoringFromEnv } from './bootstrap';

describe('createMonitoringFromEnv', () => {
  const logger = createLogger({ level: 'silent' });
  let dir: string;
  let rulesPath: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'dishwatch-bootstrap-'));
    rulesPath = join(dir, 'rules.json');
    writeFileSync(
      rulesPath,
      JSON.stringify([
        {
          name: 'many_connections',
          metric: 'active_connections',
          threshold: 500,
          operator: 'gt',
          severity: 'info',
          message: 'Connection count is high',
        },
      ])
    );
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should add rules from the configured file after the defaults', () => {
    const monitoring = createMonitoringFromEnv({
      env: { MONITORING_RULES_FILE: rulesPath },
      logger,
      start: false,
    });

    const names = monitoring.alerts.getRules().map((rule) => rule.name);
    expect(names).toHaveLength(5);
    expect(names[4]).toBe('many_connections');
    expect(monitoring.isRunning).toBe(false);
  });

  it('should start the loop by default', () => {
    const monitoring = createMonitoringFromEnv({ env: { MONITORING_EVAL_INTERVAL_MS: '250' }, logger });

    expect(monitoring.isRunning).toBe(true);
    monitoring.stop();
    expect(monitoring.isRunning).toBe(false);
  });

  it('should fail fast on invalid settings', () => {
    expect(() => createMonitoringFromEnv({ env: { MONITORING_SERIES_CAPACITY: '-3' }, logger, start: false })).toThrow(
      ConfigurationError
    );
  });

  it('should fail fast on a missing rules file', () => {
    expect(() =>
      createMonitoringFromEnv({ env: { MONITORING_RULES_FILE: join(dir, 'nope.json') }, logger, start: false })
    ).toThrow(ConfigurationError);
  });
});
