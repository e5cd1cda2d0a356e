import { z } from 'zod';
import {
  AlertStatus,
  ConfigurationError,
  DEFAULT_ALERT_HISTORY_SIZE,
  RingBuffer,
  Severity,
  generateAlertId,
  labelKey,
  type Alert,
  type AlertRule,
  type ComparisonOperator,
  type GaugeSample,
  type Labels,
  type Logger,
  type MetricsSnapshot,
  type MonitoringEventBus,
} from '@dishwatch/core';

export const COMPARISON_OPERATORS = ['gt', 'lt', 'eq', 'gte', 'lte'] as const satisfies readonly ComparisonOperator[];

export const alertRuleSchema = z.object({
  name: z.string().min(1),
  metric: z.string().min(1),
  threshold: z.number().finite(),
  operator: z.enum(COMPARISON_OPERATORS),
  duration: z.number().int().nonnegative().default(0),
  severity: z.nativeEnum(Severity),
  message: z.string().min(1),
  labels: z.record(z.string(), z.string()).optional(),
});

export type AlertRuleInput = z.input<typeof alertRuleSchema>;

export interface AlertEngineOptions {
  logger: Logger;
  historySize?: number;
  events?: MonitoringEventBus;
  now?: () => Date;
}

export interface EvaluationSummary {
  evaluated: number;
  skipped: number;
  triggered: number;
  resolved: number;
}

/**
 * Compare `value` against `threshold`. Unknown operators never match.
 */
export function evaluateCondition(value: number, operator: string, threshold: number): boolean {
  switch (operator) {
    case 'gt':
      return value > threshold;
    case 'lt':
      return value < threshold;
    case 'eq':
      return value === threshold;
    case 'gte':
      return value >= threshold;
    case 'lte':
      return value <= threshold;
    default:
      return false;
  }
}

/**
 * Current value of `metric` in a snapshot: series latest, then gauge, then
 * histogram latest. For gauges, a rule with labels matches that label set
 * exactly; otherwise the most recently written gauge of the name wins.
 */
export function resolveMetricValue(
  snapshot: MetricsSnapshot,
  metric: string,
  labels?: Labels
): number | undefined {
  const series = snapshot.series[metric];
  if (series) {
    return series.latest;
  }

  const gauge = pickGauge(snapshot.gauges, metric, labels);
  if (gauge) {
    return gauge.value;
  }

  return snapshot.histograms[metric]?.latest;
}

function pickGauge(gauges: GaugeSample[], metric: string, labels?: Labels): GaugeSample | undefined {
  const wanted = labels ? labelKey(labels) : undefined;
  let best: GaugeSample | undefined;
  for (const gauge of gauges) {
    if (gauge.name !== metric) continue;
    if (wanted !== undefined) {
      if (labelKey(gauge.labels) === wanted) return gauge;
      continue;
    }
    if (!best || gauge.sequence > best.sequence) {
      best = gauge;
    }
  }
  return best;
}

type AlertKey = string;

function alertKey(rule: AlertRule): AlertKey {
  return JSON.stringify([rule.name, rule.metric]);
}

/**
 * Threshold rules over registry metrics.
 *
 * Each (rule, metric) pair is a level-triggered machine: clear -> active
 * when the condition holds (for at least `duration` seconds), active ->
 * clear when it stops holding. At most one active alert exists per pair;
 * resolved alerts stay in the bounded history.
 */
export class AlertEngine {
  private readonly rules: AlertRule[] = [];
  private readonly activeAlerts = new Map<AlertKey, Alert>();
  private readonly breachStartedAt = new Map<AlertKey, Date>();
  private readonly history: RingBuffer<Alert>;
  private readonly logger: Logger;
  private readonly events?: MonitoringEventBus;
  private readonly now: () => Date;

  constructor(options: AlertEngineOptions) {
    this.logger = options.logger;
    this.history = new RingBuffer(options.historySize ?? DEFAULT_ALERT_HISTORY_SIZE);
    this.events = options.events;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Validate and register a rule. Throws ConfigurationError for an invalid rule.
   */
  addRule(input: AlertRuleInput): AlertRule {
    const parsed = alertRuleSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      const name = typeof input?.name === 'string' ? ` "${input.name}"` : '';
      throw new ConfigurationError(`Invalid alert rule${name}`, issues);
    }

    const rule: AlertRule = parsed.data;
    this.rules.push(rule);
    return rule;
  }

  getRules(): AlertRule[] {
    return this.rules.map((rule) => ({ ...rule }));
  }

  evaluateAll(snapshot: MetricsSnapshot): EvaluationSummary {
    const summary: EvaluationSummary = { evaluated: 0, skipped: 0, triggered: 0, resolved: 0 };

    for (const rule of this.rules) {
      const value = resolveMetricValue(snapshot, rule.metric, rule.labels);
      if (value === undefined) {
        summary.skipped++;
        continue;
      }

      summary.evaluated++;
      const outcome = this.evaluateRule(rule, value);
      if (outcome === 'triggered') summary.triggered++;
      if (outcome === 'resolved') summary.resolved++;
    }

    return summary;
  }

  getActiveAlerts(): Alert[] {
    return [...this.activeAlerts.values()].map((alert) => ({ ...alert }));
  }

  /**
   * The newest `limit` alerts (active and resolved), oldest first
   */
  getAlertHistory(limit: number = 100): Alert[] {
    return this.history.last(limit).map((alert) => ({ ...alert }));
  }

  private evaluateRule(rule: AlertRule, value: number): 'triggered' | 'resolved' | null {
    const key = alertKey(rule);
    const breached = evaluateCondition(value, rule.operator, rule.threshold);
    const active = this.activeAlerts.get(key);

    if (!breached) {
      this.breachStartedAt.delete(key);
      if (!active) {
        return null;
      }
      this.resolve(key, active);
      return 'resolved';
    }

    if (active) {
      return null;
    }

    const now = this.now();
    const since = this.breachStartedAt.get(key) ?? now;
    this.breachStartedAt.set(key, since);
    if (now.getTime() - since.getTime() < rule.duration * 1000) {
      return null; // still pending
    }

    this.trigger(key, rule, value, now);
    return 'triggered';
  }

  private trigger(key: AlertKey, rule: AlertRule, value: number, now: Date): void {
    const alert: Alert = {
      id: generateAlertId(),
      ruleName: rule.name,
      metric: rule.metric,
      threshold: rule.threshold,
      currentValue: value,
      severity: rule.severity,
      message: rule.message,
      triggeredAt: now,
      status: AlertStatus.ACTIVE,
    };

    this.activeAlerts.set(key, alert);
    this.history.push(alert);
    this.breachStartedAt.delete(key);
    this.logTransition(alert, 'triggered');
    this.publish(alert, () => this.events?.emitAlertTriggered({ ...alert }));
  }

  private resolve(key: AlertKey, alert: Alert): void {
    // history holds the same object, so it sees the resolution too
    alert.resolvedAt = this.now();
    alert.status = AlertStatus.RESOLVED;

    this.activeAlerts.delete(key);
    this.logTransition(alert, 'resolved');
    this.publish(alert, () => this.events?.emitAlertResolved({ ...alert }));
  }

  /**
   * Listener failures are logged and do not stop evaluation of the remaining rules.
   */
  private publish(alert: Alert, emit: () => void): void {
    try {
      emit();
    } catch (error) {
      this.logger.error({ err: error, alertId: alert.id, rule: alert.ruleName }, 'Alert event listener failed');
    }
  }

  private logTransition(alert: Alert, action: 'triggered' | 'resolved'): void {
    this.logger.warn(
      {
        alertId: alert.id,
        severity: alert.severity,
        metric: alert.metric,
        currentValue: alert.currentValue,
        threshold: alert.threshold,
      },
      `Alert ${action}: ${alert.ruleName} - ${alert.message}`
    );
  }
}
