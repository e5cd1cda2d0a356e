import { describe, it, expect, beforeEach } from 'vitest';
import { MonitoringEventBus } from './events';
import { AlertStatus, LogLevel, Severity, type Alert, type Span } from './types';

describe('MonitoringEventBus', () => {
  let eventBus: MonitoringEventBus;

  const alert: Alert = {
    id: 'alert-1',
    ruleName: 'high_error_rate',
    metric: 'error_rate',
    threshold: 0.05,
    currentValue: 0.2,
    severity: Severity.CRITICAL,
    message: 'Error rate is above 5%',
    triggeredAt: new Date('2026-01-01T00:00:00Z'),
    status: AlertStatus.ACTIVE,
  };

  beforeEach(() => {
    eventBus = new MonitoringEventBus();
  });

  it('should emit and receive alert triggered events', () => {
    let received: Alert | null = null;

    eventBus.onAlertTriggered((event) => {
      received = event.alert;
    });

    eventBus.emitAlertTriggered(alert);

    expect(received).toEqual(alert);
  });

  it('should emit and receive alert resolved events', () => {
    const resolved: Alert = { ...alert, status: AlertStatus.RESOLVED, resolvedAt: new Date('2026-01-01T00:05:00Z') };
    let received: Alert | null = null;

    eventBus.onAlertResolved((event) => {
      received = event.alert;
    });

    eventBus.emitAlertResolved(resolved);

    expect(received).toEqual(resolved);
  });

  it('should emit and receive span ended events', () => {
    const span: Span = {
      spanId: 'span-1',
      traceId: 'trace-1',
      operationName: 'search',
      startTime: new Date('2026-01-01T00:00:00Z'),
      endTime: new Date('2026-01-01T00:00:01Z'),
      duration: 1000,
      tags: { city: 'nyc' },
      logs: [{ timestamp: new Date('2026-01-01T00:00:00Z'), message: 'started', level: LogLevel.INFO }],
    };
    let received: Span | null = null;

    eventBus.onSpanEnded((event) => {
      received = event.span;
    });

    eventBus.emitSpanEnded(span);

    expect(received).toEqual(span);
  });

  it('should allow unsubscribing from events', () => {
    let callCount = 0;
    const handler = () => {
      callCount++;
    };

    eventBus.onAlertTriggered(handler);
    eventBus.emitAlertTriggered(alert);
    expect(callCount).toBe(1);

    eventBus.offEvent('alert.triggered', handler);
    eventBus.emitAlertTriggered(alert);
    expect(callCount).toBe(1); // Should not increment
  });
});
