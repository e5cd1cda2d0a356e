// Id generation for spans, traces and alerts

import { randomBytes, randomUUID } from 'crypto';

/**
 * Generate a random 16-byte trace ID (32 hex characters)
 * Follows OpenTelemetry trace ID format
 */
export function generateTraceId(): string {
  return randomBytes(16).toString('hex');
}

/**
 * Generate a random 8-byte span ID (16 hex characters)
 * Follows OpenTelemetry span ID format
 */
export function generateSpanId(): string {
  return randomBytes(8).toString('hex');
}

export function generateAlertId(): string {
  return randomUUID();
}
