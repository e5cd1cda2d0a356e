import { EventEmitter } from 'events';
import type { Alert, Span } from './types';

export interface AlertTriggeredEvent {
  alert: Alert;
}

export interface AlertResolvedEvent {
  alert: Alert;
}

export interface SpanEndedEvent {
  span: Span;
}

export interface MonitoringEvents {
  'alert.triggered': AlertTriggeredEvent;
  'alert.resolved': AlertResolvedEvent;
  'span.ended': SpanEndedEvent;
}

export class MonitoringEventBus extends EventEmitter {
  emitAlertTriggered(alert: Alert): void {
    this.emit('alert.triggered', { alert } satisfies AlertTriggeredEvent);
  }

  onAlertTriggered(handler: (event: AlertTriggeredEvent) => void): void {
    this.on('alert.triggered', handler);
  }

  emitAlertResolved(alert: Alert): void {
    this.emit('alert.resolved', { alert } satisfies AlertResolvedEvent);
  }

  onAlertResolved(handler: (event: AlertResolvedEvent) => void): void {
    this.on('alert.resolved', handler);
  }

  emitSpanEnded(span: Span): void {
    this.emit('span.ended', { span } satisfies SpanEndedEvent);
  }

  onSpanEnded(handler: (event: SpanEndedEvent) => void): void {
    this.on('span.ended', handler);
  }

  offEvent<K extends keyof MonitoringEvents>(event: K, handler: (event: MonitoringEvents[K]) => void): void {
    this.off(event, handler);
  }
}
