/**
 * Metrics — in-process counters and latency histograms for the license
 * server and verifier, exposed through the server's /metrics route.
 */

type Tags = Record<string, string>;

interface CounterEntry {
  value: number;
  tags?: Tags;
}

interface HistogramEntry {
  values: number[];
  count: number;
  sum: number;
  tags?: Tags;
}

export interface HistogramSummary {
  count: number;
  sum: number;
  max: number;
  tags?: Tags;
}

export interface MetricsSnapshot {
  counters: Record<string, CounterEntry[]>;
  histograms: Record<string, HistogramSummary[]>;
  collectedAt: string;
}

/** Samples retained per histogram series; count and sum stay exact */
const MAX_SAMPLES = 1024;

function tagsKey(tags?: Tags): string {
  if (!tags || Object.keys(tags).length === 0) return '';
  return Object.entries(tags).sort(([a], [b]) => a.localeCompare(b)).map(([k, v]) => `${k}=${v}`).join(',');
}

function series<E>(store: Map<string, Map<string, E>>, name: string): Map<string, E> {
  let byTags = store.get(name);
  if (!byTags) {
    byTags = new Map();
    store.set(name, byTags);
  }
  return byTags;
}

export class MetricsCollector {
  private counters = new Map<string, Map<string, CounterEntry>>();
  private histograms = new Map<string, Map<string, HistogramEntry>>();

  /** Increment a counter by 1 (or by `amount`). */
  counter(name: string, tags?: Tags, amount = 1): void {
    const byTags = series(this.counters, name);
    const key = tagsKey(tags);
    const existing = byTags.get(key);
    if (existing) {
      existing.value += amount;
    } else {
      byTags.set(key, tags ? { value: amount, tags } : { value: amount });
    }
  }

  /** Record a histogram value. */
  histogram(name: string, value: number, tags?: Tags): void {
    const byTags = series(this.histograms, name);
    const key = tagsKey(tags);
    let entry = byTags.get(key);
    if (!entry) {
      entry = tags ? { values: [], count: 0, sum: 0, tags } : { values: [], count: 0, sum: 0 };
      byTags.set(key, entry);
    }
    entry.count++;
    entry.sum += value;
    entry.values.push(value);
    if (entry.values.length > MAX_SAMPLES) entry.values.shift();
  }

  getSnapshot(): MetricsSnapshot {
    const counters: MetricsSnapshot['counters'] = {};
    for (const [name, byTags] of this.counters) {
      counters[name] = Array.from(byTags.values(), e => ({ ...e }));
    }

    const histograms: MetricsSnapshot['histograms'] = {};
    for (const [name, byTags] of this.histograms) {
      histograms[name] = Array.from(byTags.values(), e => {
        const summary: HistogramSummary = { count: e.count, sum: e.sum, max: Math.max(...e.values) };
        if (e.tags) summary.tags = e.tags;
        return summary;
      });
    }

    return { counters, histograms, collectedAt: new Date().toISOString() };
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }

  /** Counter value for specific tags, or summed across all tag combinations. */
  getCounter(name: string, tags?: Tags): number {
    const byTags = this.counters.get(name);
    if (!byTags) return 0;
    if (tags) return byTags.get(tagsKey(tags))?.value ?? 0;
    let total = 0;
    for (const entry of byTags.values()) total += entry.value;
    return total;
  }

  /** Retained histogram samples */
  getHistogramValues(name: string, tags?: Tags): number[] {
    const byTags = this.histograms.get(name);
    if (!byTags) return [];
    if (tags) return [...(byTags.get(tagsKey(tags))?.values ?? [])];
    const all: number[] = [];
    for (const entry of byTags.values()) all.push(...entry.values);
    return all;
  }
}

/** Global metrics instance (singleton for convenience). */
export const globalMetrics = new MetricsCollector();
