import type { ChannelLabels, SensorLabels } from '../types.js';

type MetricType = 'gauge' | 'counter';

type LabelInput = readonly string[] | Record<string, string>;

type MetricDefinition = {
  name: string;
  help: string;
  labelNames?: readonly string[];
  /** Samples of evictable families can be dropped by `evictStale`. */
  evictable?: boolean;
};

type MetricSample = {
  labels: string[];
  value: number;
  cycle: number;
};

type MetricFamily = {
  name: string;
  help: string;
  type: MetricType;
  labelNames: string[];
  evictable: boolean;
  samples: Map<string, MetricSample>;
};

type MetricFamilySnapshot = {
  name: string;
  help: string;
  type: MetricType;
  labelNames: string[];
  samples: Array<{ labels: Record<string, string>; value: number }>;
};

export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

export const CHANNEL_VALUE_METRIC = 'prtg_channel_value';
export const SENSOR_VALUE_METRIC = 'prtg_sensor_lastvalue';

export const CHANNEL_LABEL_NAMES = [
  'sensor_id',
  'device',
  'sensor',
  'channel',
  'unit',
  'probe',
  'group'
] as const;

export const SENSOR_LABEL_NAMES = ['sensor_id', 'device', 'sensor', 'probe', 'group'] as const;

export const REFRESH_TOTAL_METRIC = 'prtg_exporter_refresh_total';
export const REFRESH_DURATION_METRIC = 'prtg_exporter_last_refresh_duration_seconds';
export const REFRESH_SUCCESS_METRIC = 'prtg_exporter_last_refresh_success_timestamp_seconds';
export const REFRESH_SKIPPED_METRIC = 'prtg_exporter_refresh_skipped_total';
export const CHANNEL_FAILURES_METRIC = 'prtg_exporter_channel_fetch_failures_total';
export const EVICTED_SAMPLES_METRIC = 'prtg_exporter_evicted_samples_total';
export const LOG_MESSAGES_METRIC = 'prtg_exporter_log_messages_total';

class MetricsRegistry {
  private readonly families = new Map<string, MetricFamily>();
  private cycle = 0;

  registerGauge(definition: MetricDefinition) {
    this.register('gauge', definition);
  }

  registerCounter(definition: MetricDefinition) {
    this.register('counter', definition);
  }

  has(name: string): boolean {
    return this.families.has(name);
  }

  /** Upserts one sample. An existing label tuple keeps its position in the output. */
  set(name: string, labels: LabelInput, value: number) {
    const family = this.requireFamily(name);
    const values = resolveLabelValues(family, labels);
    const key = JSON.stringify(values);
    const existing = family.samples.get(key);
    if (existing) {
      existing.value = value;
      existing.cycle = this.cycle;
      return;
    }
    family.samples.set(key, { labels: values, value, cycle: this.cycle });
  }

  increment(name: string, labels: LabelInput = [], by = 1) {
    const family = this.requireFamily(name);
    if (family.type === 'counter' && by < 0) {
      throw new Error(`Counter ${name} cannot be decremented`);
    }
    const current = this.get(name, labels) ?? 0;
    this.set(name, labels, current + by);
  }

  get(name: string, labels: LabelInput = []): number | undefined {
    const family = this.requireFamily(name);
    const key = JSON.stringify(resolveLabelValues(family, labels));
    return family.samples.get(key)?.value;
  }

  setSensorValue(labels: SensorLabels, value: number) {
    this.set(SENSOR_VALUE_METRIC, labels, value);
  }

  setChannelValue(labels: ChannelLabels, value: number) {
    this.set(CHANNEL_VALUE_METRIC, labels, value);
  }

  incrementLogLevel(level: string) {
    if (this.has(LOG_MESSAGES_METRIC)) {
      this.increment(LOG_MESSAGES_METRIC, [level]);
    }
  }

  get currentCycle(): number {
    return this.cycle;
  }

  beginCycle(): number {
    this.cycle += 1;
    return this.cycle;
  }

  /**
   * Drops samples of evictable families that were not written during the last
   * `maxAgeCycles` cycles. Returns the number of samples removed.
   */
  evictStale(maxAgeCycles: number): number {
    if (!Number.isInteger(maxAgeCycles) || maxAgeCycles <= 0) {
      return 0;
    }

    const threshold = this.cycle - maxAgeCycles;
    let removed = 0;
    for (const family of this.families.values()) {
      if (!family.evictable) {
        continue;
      }
      for (const [key, sample] of family.samples) {
        if (sample.cycle <= threshold) {
          family.samples.delete(key);
          removed += 1;
        }
      }
    }
    return removed;
  }

  collect(): MetricFamilySnapshot[] {
    return Array.from(this.families.values(), family => ({
      name: family.name,
      help: family.help,
      type: family.type,
      labelNames: [...family.labelNames],
      samples: Array.from(family.samples.values(), sample => ({
        labels: Object.fromEntries(
          family.labelNames.map((labelName, index) => [labelName, sample.labels[index] ?? ''])
        ),
        value: sample.value
      }))
    }));
  }

  /** Renders every registered family in the Prometheus text exposition format. */
  snapshot(): string {
    const blocks: string[] = [];
    for (const family of this.families.values()) {
      const lines = [
        `# HELP ${family.name} ${escapePrometheusHelp(family.help)}`,
        `# TYPE ${family.name} ${family.type}`
      ];
      for (const sample of family.samples.values()) {
        const labelString = formatPrometheusLabels(family.labelNames, sample.labels);
        lines.push(`${family.name}${labelString} ${formatPrometheusValue(sample.value)}`);
      }
      blocks.push(lines.join('\n'));
    }
    return blocks.length > 0 ? `${blocks.join('\n')}\n` : '';
  }

  reset() {
    for (const family of this.families.values()) {
      family.samples.clear();
    }
    this.cycle = 0;
  }

  private register(type: MetricType, definition: MetricDefinition) {
    const name = sanitizePrometheusMetricName(definition.name);
    const labelNames = (definition.labelNames ?? []).map(sanitizePrometheusLabelName);
    const existing = this.families.get(name);
    if (existing) {
      if (existing.type !== type || existing.labelNames.join(',') !== labelNames.join(',')) {
        throw new Error(`Metric ${name} is already registered with a different shape`);
      }
      return;
    }

    this.families.set(name, {
      name,
      help: definition.help,
      type,
      labelNames,
      evictable: definition.evictable === true,
      samples: new Map()
    });
  }

  private requireFamily(name: string): MetricFamily {
    const family = this.families.get(name);
    if (!family) {
      throw new Error(`Metric ${name} is not registered`);
    }
    return family;
  }
}

function resolveLabelValues(family: MetricFamily, labels: LabelInput): string[] {
  if (isLabelTuple(labels)) {
    if (labels.length !== family.labelNames.length) {
      throw new Error(
        `Metric ${family.name} expects ${family.labelNames.length} label values, received ${labels.length}`
      );
    }
    return [...labels];
  }
  return family.labelNames.map(labelName => labels[labelName] ?? '');
}

function isLabelTuple(labels: LabelInput): labels is readonly string[] {
  return Array.isArray(labels);
}

export function registerExporterMetrics(registry: MetricsRegistry) {
  registry.registerGauge({
    name: CHANNEL_VALUE_METRIC,
    help: 'PRTG channel last numeric value',
    labelNames: CHANNEL_LABEL_NAMES,
    evictable: true
  });
  registry.registerGauge({
    name: SENSOR_VALUE_METRIC,
    help: 'PRTG sensor lastvalue (best-effort numeric of the primary channel)',
    labelNames: SENSOR_LABEL_NAMES,
    evictable: true
  });
  registry.registerCounter({
    name: REFRESH_TOTAL_METRIC,
    help: 'Refresh cycles by result',
    labelNames: ['result']
  });
  registry.registerCounter({
    name: REFRESH_SKIPPED_METRIC,
    help: 'Scheduled refresh ticks skipped because the previous refresh was still running'
  });
  registry.registerGauge({
    name: REFRESH_DURATION_METRIC,
    help: 'Duration of the last completed refresh cycle'
  });
  registry.registerGauge({
    name: REFRESH_SUCCESS_METRIC,
    help: 'Unix time of the last refresh whose sensor listing succeeded'
  });
  registry.registerCounter({
    name: CHANNEL_FAILURES_METRIC,
    help: 'Channel fetches that failed after retries'
  });
  registry.registerCounter({
    name: EVICTED_SAMPLES_METRIC,
    help: 'PRTG samples evicted after going stale'
  });
  registry.registerCounter({
    name: LOG_MESSAGES_METRIC,
    help: 'Log messages emitted by level',
    labelNames: ['level']
  });
  return registry;
}

export function createMetricsRegistry(): MetricsRegistry {
  return registerExporterMetrics(new MetricsRegistry());
}

function sanitizePrometheusMetricName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_:]/g, '_');
  const collapsed = sanitized.replace(/_{2,}/g, '_').replace(/^_+|_+$/g, '');
  const lower = collapsed.toLowerCase();
  if (!lower) {
    throw new Error(`Invalid metric name "${name}"`);
  }
  if (/^[0-9]/.test(lower)) {
    return `prtg_${lower}`;
  }
  return lower;
}

function sanitizePrometheusLabelName(name: string): string {
  const sanitized = name.replace(/[^A-Za-z0-9_]/g, '_');
  const lower = sanitized.toLowerCase();
  if (!lower) {
    return 'label';
  }
  if (/^[0-9]/.test(lower)) {
    return `_${lower}`;
  }
  return lower;
}

export function escapePrometheusLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

function escapePrometheusHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}

function formatPrometheusLabels(labelNames: readonly string[], values: readonly string[]): string {
  if (labelNames.length === 0) {
    return '';
  }
  const rendered = labelNames.map(
    (labelName, index) => `${labelName}="${escapePrometheusLabelValue(values[index] ?? '')}"`
  );
  return `{${rendered.join(',')}}`;
}

export function formatPrometheusValue(value: number): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }
  if (value === Number.POSITIVE_INFINITY) {
    return '+Inf';
  }
  if (value === Number.NEGATIVE_INFINITY) {
    return '-Inf';
  }
  if (Object.is(value, -0)) {
    return '0';
  }
  return value.toString();
}

const defaultRegistry = createMetricsRegistry();

export type { LabelInput, MetricDefinition, MetricFamilySnapshot, MetricType };
export { MetricsRegistry };
export default defaultRegistry;
