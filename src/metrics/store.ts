export type MetricLabelKey = readonly string[];

export const REQUEST_DURATION_BUCKETS_MS: readonly number[] = Object.freeze([
  5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000
]);

export const DB_DURATION_BUCKETS_MS: readonly number[] = Object.freeze([
  1, 5, 10, 25, 50, 100, 250, 500, 1000, 2500
]);

type CounterState = {
  key: MetricLabelKey;
  value: number;
};

type HistogramState = {
  key: MetricLabelKey;
  bounds: readonly number[];
  buckets: number[];
  count: number;
  sum: number;
};

export type CounterSample = {
  key: MetricLabelKey;
  value: number;
};

export type HistogramSample = {
  key: MetricLabelKey;
  bounds: readonly number[];
  /** Non-cumulative increments, one per bound. Overflow is only visible through `count`. */
  buckets: number[];
  count: number;
  sum: number;
};

export type MetricsStoreSnapshot = {
  counters: Record<string, CounterSample[]>;
  histograms: Record<string, HistogramSample[]>;
};

export class MetricsStore {
  private readonly counters = new Map<string, Map<string, CounterState>>();
  private readonly histograms = new Map<string, Map<string, HistogramState>>();

  incrementCounter(metric: string, key: MetricLabelKey, amount = 1) {
    const family = getFamily(this.counters, metric);
    const encoded = encodeKey(key);
    const existing = family.get(encoded);
    const delta = Math.trunc(amount);
    if (existing) {
      existing.value += delta;
      return;
    }
    family.set(encoded, { key: [...key], value: delta });
  }

  observeHistogram(metric: string, key: MetricLabelKey, value: number, bounds: readonly number[]) {
    const family = getFamily(this.histograms, metric);
    const encoded = encodeKey(key);
    let state = family.get(encoded);
    if (!state) {
      state = { key: [...key], bounds, buckets: bounds.map(() => 0), count: 0, sum: 0 };
      family.set(encoded, state);
    }

    state.count += 1;
    state.sum += value;
    const index = resolveBucketIndex(value, state.bounds);
    if (index >= 0) {
      state.buckets[index] += 1;
    }
  }

  counterValue(metric: string, key: MetricLabelKey): number {
    return this.counters.get(metric)?.get(encodeKey(key))?.value ?? 0;
  }

  histogram(metric: string, key: MetricLabelKey): HistogramSample | null {
    const state = this.histograms.get(metric)?.get(encodeKey(key));
    return state ? copyHistogram(state) : null;
  }

  snapshot(): MetricsStoreSnapshot {
    const counters: Record<string, CounterSample[]> = {};
    for (const [metric, family] of this.counters) {
      counters[metric] = Array.from(family.values(), state => ({ key: [...state.key], value: state.value }));
    }
    const histograms: Record<string, HistogramSample[]> = {};
    for (const [metric, family] of this.histograms) {
      histograms[metric] = Array.from(family.values(), copyHistogram);
    }
    return { counters, histograms };
  }
}

export function resolveBucketIndex(value: number, bounds: readonly number[]): number {
  for (let index = 0; index < bounds.length; index += 1) {
    if (value <= bounds[index]) {
      return index;
    }
  }
  return -1;
}

export function compareLabelKeys(a: MetricLabelKey, b: MetricLabelKey): number {
  const length = Math.min(a.length, b.length);
  for (let index = 0; index < length; index += 1) {
    if (a[index] !== b[index]) {
      return a[index] < b[index] ? -1 : 1;
    }
  }
  return a.length - b.length;
}

function copyHistogram(state: HistogramState): HistogramSample {
  return {
    key: [...state.key],
    bounds: state.bounds,
    buckets: [...state.buckets],
    count: state.count,
    sum: state.sum
  };
}

function encodeKey(key: MetricLabelKey): string {
  return JSON.stringify(key);
}

function getFamily<T>(families: Map<string, Map<string, T>>, metric: string): Map<string, T> {
  const existing = families.get(metric);
  if (existing) {
    return existing;
  }
  const created = new Map<string, T>();
  families.set(metric, created);
  return created;
}
