import type { Labels } from './types';

/**
 * Coerce caller-supplied labels into a plain string map.
 * Anything that is not a plain object yields `{}`; scalar values are
 * stringified, every other value is dropped.
 */
export function normalizeLabels(labels: unknown): Labels {
  if (labels === null || typeof labels !== 'object' || Array.isArray(labels)) {
    return {};
  }

  const result: Labels = {};
  for (const [key, value] of Object.entries(labels)) {
    if (typeof value === 'string') {
      result[key] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      result[key] = String(value);
    }
  }
  return result;
}

/**
 * Deterministic key for a label set: the entries sorted by name, serialised
 * as a JSON array of pairs. `{}` maps to `[]`.
 */
export function labelKey(labels: Labels): string {
  const entries = Object.entries(labels).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(entries);
}

