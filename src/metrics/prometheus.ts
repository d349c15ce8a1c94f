import { compareLabelKeys, type CounterSample, type HistogramSample, type MetricLabelKey } from './store.js';

export type PrometheusFamilyOptions = {
  metricName: string;
  help: string;
  labelNames: readonly string[];
};

export type PrometheusGaugeSample = {
  key: MetricLabelKey;
  value: number;
};

export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

export function formatCounterFamily(options: PrometheusFamilyOptions, samples: readonly CounterSample[]): string[] {
  const lines = formatHeader(options, 'counter');
  for (const sample of sortByKey(samples)) {
    const labels = formatPrometheusLabels(zipLabels(options.labelNames, sample.key));
    lines.push(`${options.metricName}${labels} ${formatPrometheusInteger(sample.value)}`);
  }
  return lines;
}

export function formatGaugeFamily(options: PrometheusFamilyOptions, samples: readonly PrometheusGaugeSample[]): string[] {
  const lines = formatHeader(options, 'gauge');
  for (const sample of sortByKey(samples)) {
    const labels = formatPrometheusLabels(zipLabels(options.labelNames, sample.key));
    lines.push(`${options.metricName}${labels} ${formatPrometheusValue(sample.value)}`);
  }
  return lines;
}

export function formatHistogramFamily(options: PrometheusFamilyOptions, samples: readonly HistogramSample[]): string[] {
  const { metricName } = options;
  const lines = formatHeader(options, 'histogram');

  for (const sample of sortByKey(samples)) {
    const baseLabels = zipLabels(options.labelNames, sample.key);
    const baseLabelString = formatPrometheusLabels(baseLabels);

    let cumulative = 0;
    sample.bounds.forEach((bound, index) => {
      cumulative += sample.buckets[index] ?? 0;
      const bucketLabels: Array<[string, string]> = [...baseLabels, ['le', formatPrometheusValue(bound)]];
      lines.push(`${metricName}_bucket${formatPrometheusLabels(bucketLabels)} ${cumulative}`);
    });

    // observations above the last bound only exist in count
    const infLabels: Array<[string, string]> = [...baseLabels, ['le', '+Inf']];
    lines.push(`${metricName}_bucket${formatPrometheusLabels(infLabels)} ${formatPrometheusInteger(sample.count)}`);
    lines.push(`${metricName}_sum${baseLabelString} ${formatPrometheusValue(sample.sum)}`);
    lines.push(`${metricName}_count${baseLabelString} ${formatPrometheusInteger(sample.count)}`);
  }

  return lines;
}

function formatHeader(options: PrometheusFamilyOptions, type: 'counter' | 'gauge' | 'histogram'): string[] {
  return [`# HELP ${options.metricName} ${escapePrometheusHelp(options.help)}`, `# TYPE ${options.metricName} ${type}`];
}

function sortByKey<T extends { key: MetricLabelKey }>(samples: readonly T[]): T[] {
  return [...samples].sort((a, b) => compareLabelKeys(a.key, b.key));
}

function zipLabels(names: readonly string[], values: MetricLabelKey): Array<[string, string]> {
  return names.map((name, index) => [name, values[index] ?? '']);
}

export function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapePrometheusHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, ' ');
}

export function formatPrometheusLabels(labels: ReadonlyArray<readonly [string, string]>): string {
  if (labels.length === 0) {
    return '';
  }
  const rendered = labels.map(([key, value]) => `${key}="${escapePrometheusLabelValue(value)}"`);
  return `{${rendered.join(',')}}`;
}

export function formatPrometheusValue(value: number): string {
  if (!Number.isFinite(value)) {
    return '0';
  }
  const fixed = value.toFixed(6).replace(/0+$/, '').replace(/\.$/, '');
  return fixed.length > 0 && fixed !== '-0' ? fixed : '0';
}

function formatPrometheusInteger(value: number): string {
  return Number.isFinite(value) ? String(Math.trunc(value)) : '0';
}
