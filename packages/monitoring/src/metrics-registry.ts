import {
  DEFAULT_SERIES_CAPACITY,
  RingBuffer,
  labelKey,
  normalizeLabels,
  type CounterSample,
  type GaugeSample,
  type Labels,
  type MetricPoint,
  type MetricsSnapshot,
  type SeriesSummary,
} from '@dishwatch/core';

interface LabeledEntry {
  labels: Labels;
  value: number;
  timestamp: number;
  sequence: number;
}

/**
 * name -> (label key -> entry). The label key is derived from the sorted
 * label entries, so `{a, b}` and `{b, a}` address the same entry.
 */
type LabeledStore = Map<string, Map<string, LabeledEntry>>;

export interface MetricsRegistryOptions {
  seriesCapacity?: number;
  now?: () => number;
}

/**
 * In-memory store for counters, gauges and raw-value series.
 *
 * Every public method runs to completion without yielding, so each call is
 * one atomic critical section on the event loop: a snapshot can never
 * observe a half-applied write. Writes never throw; invalid values are
 * dropped and malformed labels become `{}`.
 */
export class MetricsRegistry {
  private readonly series = new Map<string, RingBuffer<MetricPoint>>();
  private readonly histograms = new Map<string, RingBuffer<MetricPoint>>();
  private readonly counters: LabeledStore = new Map();
  private readonly gauges: LabeledStore = new Map();
  private readonly seriesCapacity: number;
  private readonly now: () => number;
  private writeSequence = 0;

  constructor(options: MetricsRegistryOptions = {}) {
    this.seriesCapacity = options.seriesCapacity ?? DEFAULT_SERIES_CAPACITY;
    this.now = options.now ?? Date.now;
  }

  recordMetric(name: string, value: number, labels?: Labels | null): void {
    this.appendPoint(this.series, name, value, labels);
  }

  recordHistogram(name: string, value: number, labels?: Labels | null): void {
    this.appendPoint(this.histograms, name, value, labels);
  }

  /**
   * Counters only move up: negative, fractional and non-finite deltas are ignored.
   */
  incrementCounter(name: string, delta: number = 1, labels?: Labels | null): void {
    if (!Number.isInteger(delta) || delta < 0) {
      return;
    }
    const entry = this.entryFor(this.counters, name, labels);
    entry.value += delta;
    entry.timestamp = this.now();
    entry.sequence = ++this.writeSequence;
  }

  setGauge(name: string, value: number, labels?: Labels | null): void {
    if (!Number.isFinite(value)) {
      return;
    }
    const entry = this.entryFor(this.gauges, name, labels);
    entry.value = value;
    entry.timestamp = this.now();
    entry.sequence = ++this.writeSequence;
  }

  getCounter(name: string, labels?: Labels | null): number {
    return this.lookup(this.counters, name, labels)?.value ?? 0;
  }

  getGauge(name: string, labels?: Labels | null): number | undefined {
    return this.lookup(this.gauges, name, labels)?.value;
  }

  /**
   * Raw points of a series, oldest first
   */
  getSeries(name: string): MetricPoint[] {
    return this.series.get(name)?.toArray() ?? [];
  }

  getHistogram(name: string): MetricPoint[] {
    return this.histograms.get(name)?.toArray() ?? [];
  }

  knownMetricNames(): string[] {
    const names = new Set<string>([
      ...this.series.keys(),
      ...this.histograms.keys(),
      ...this.counters.keys(),
      ...this.gauges.keys(),
    ]);
    return [...names].sort();
  }

  /**
   * Point-in-time summary of everything tracked. Scans every buffer on each
   * call; nothing is cached.
   */
  snapshot(): MetricsSnapshot {
    return {
      series: summarizeAll(this.series),
      counters: flatten(this.counters).map(({ name, labels, value }): CounterSample => ({ name, labels, value })),
      gauges: flatten(this.gauges),
      histograms: summarizeAll(this.histograms),
    };
  }

  reset(): void {
    this.series.clear();
    this.histograms.clear();
    this.counters.clear();
    this.gauges.clear();
  }

  private appendPoint(
    store: Map<string, RingBuffer<MetricPoint>>,
    name: string,
    value: number,
    labels: Labels | null | undefined
  ): void {
    if (!Number.isFinite(value)) {
      return;
    }

    let buffer = store.get(name);
    if (!buffer) {
      buffer = new RingBuffer<MetricPoint>(this.seriesCapacity);
      store.set(name, buffer);
    }

    buffer.push(
      Object.freeze({
        timestamp: this.now(),
        value,
        labels: Object.freeze(normalizeLabels(labels)),
      })
    );
  }

  private entryFor(store: LabeledStore, name: string, labels: Labels | null | undefined): LabeledEntry {
    const normalized = normalizeLabels(labels);
    const key = labelKey(normalized);

    let byLabels = store.get(name);
    if (!byLabels) {
      byLabels = new Map();
      store.set(name, byLabels);
    }

    let entry = byLabels.get(key);
    if (!entry) {
      entry = { labels: normalized, value: 0, timestamp: 0, sequence: 0 };
      byLabels.set(key, entry);
    }
    return entry;
  }

  private lookup(store: LabeledStore, name: string, labels: Labels | null | undefined): LabeledEntry | undefined {
    return store.get(name)?.get(labelKey(normalizeLabels(labels)));
  }
}

export function summarize(points: readonly MetricPoint[]): SeriesSummary | null {
  const newest = points[points.length - 1];
  if (newest === undefined) {
    return null;
  }

  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const point of points) {
    sum += point.value;
    if (point.value < min) min = point.value;
    if (point.value > max) max = point.value;
  }

  return {
    count: points.length,
    sum,
    avg: sum / points.length,
    min,
    max,
    latest: newest.value,
    latestTimestamp: newest.timestamp,
  };
}

function summarizeAll(store: Map<string, RingBuffer<MetricPoint>>): Record<string, SeriesSummary> {
  const result: Record<string, SeriesSummary> = {};
  for (const [name, buffer] of store) {
    const summary = summarize(buffer.toArray());
    if (summary) {
      result[name] = summary;
    }
  }
  return result;
}

function flatten(store: LabeledStore): GaugeSample[] {
  const samples: GaugeSample[] = [];
  for (const [name, byLabels] of store) {
    for (const entry of byLabels.values()) {
      samples.push({
        name,
        labels: { ...entry.labels },
        value: entry.value,
        timestamp: entry.timestamp,
        sequence: entry.sequence,
      });
    }
  }
  return samples;
}
