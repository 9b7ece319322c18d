import { LoopMonitor } from '../state/loopMonitor';

type GaugeMetricName =
  | 'sampler_db_up'
  | 'sampler_power_loop_ok'
  | 'sampler_inverter_loop_ok'
  | 'sampler_inverter_watermark_seconds';

type CounterMetricName =
  | 'sampler_poll_total'
  | 'sampler_poll_retries_total'
  | 'sampler_cycle_skipped_total'
  | 'sampler_points_written_total'
  | 'sampler_inverter_readings_dropped_total'
  | 'sampler_rollover_total';

type HistogramMetricName = 'sampler_cycle_duration_seconds' | 'sampler_poll_latency_seconds';

type MetricName = GaugeMetricName | CounterMetricName | HistogramMetricName;
type Labels = Record<string, string | number>;

type MetricDef = { help: string; type: 'gauge' | 'counter' | 'histogram' };
const metricDefs: Record<MetricName, MetricDef> = {
  sampler_db_up: { help: 'Database connectivity (1=healthy,0=down)', type: 'gauge' },
  sampler_power_loop_ok: { help: 'Power loop status (1=running,0=stalled/error)', type: 'gauge' },
  sampler_inverter_loop_ok: { help: 'Inverter loop status (1=running,0=stalled/error)', type: 'gauge' },
  sampler_inverter_watermark_seconds: {
    help: 'Epoch seconds of the newest inverter point found in the store (0 when none)',
    type: 'gauge',
  },
  sampler_poll_total: { help: 'Device polls grouped by loop and result', type: 'counter' },
  sampler_poll_retries_total: { help: 'Power poll retries after a timeout', type: 'counter' },
  sampler_cycle_skipped_total: {
    help: 'Cycles skipped grouped by loop and failure kind',
    type: 'counter',
  },
  sampler_points_written_total: { help: 'Points written grouped by bucket', type: 'counter' },
  sampler_inverter_readings_dropped_total: {
    help: 'Inverter readings dropped because they were at or before the watermark',
    type: 'counter',
  },
  sampler_rollover_total: { help: 'Daily rollovers executed grouped by loop', type: 'counter' },
  sampler_cycle_duration_seconds: {
    help: 'Duration of a sampling cycle (seconds)',
    type: 'histogram',
  },
  sampler_poll_latency_seconds: {
    help: 'Latency of device polls including retries (seconds)',
    type: 'histogram',
  },
};

const gaugeValues: Record<GaugeMetricName, number> = {
  sampler_db_up: 0,
  sampler_power_loop_ok: 0,
  sampler_inverter_loop_ok: 0,
  sampler_inverter_watermark_seconds: 0,
};

const labeledCounters: Record<CounterMetricName, Map<string, number>> = {
  sampler_poll_total: new Map(),
  sampler_poll_retries_total: new Map(),
  sampler_cycle_skipped_total: new Map(),
  sampler_points_written_total: new Map(),
  sampler_inverter_readings_dropped_total: new Map(),
  sampler_rollover_total: new Map(),
};

const histogramBucketsSeconds = [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30, 60];

type HistogramStore = { buckets: number[]; counts: number[]; sum: number; count: number };

const histograms: Record<HistogramMetricName, { buckets: number[]; data: Map<string, HistogramStore> }> = {
  sampler_cycle_duration_seconds: { buckets: histogramBucketsSeconds, data: new Map() },
  sampler_poll_latency_seconds: { buckets: histogramBucketsSeconds, data: new Map() },
};

function isGauge(name: MetricName): name is GaugeMetricName {
  return metricDefs[name].type === 'gauge';
}

function isCounter(name: MetricName): name is CounterMetricName {
  return metricDefs[name].type === 'counter';
}

function isHistogram(name: MetricName): name is HistogramMetricName {
  return metricDefs[name].type === 'histogram';
}

export async function collectHealthMetrics(
  pingDb: () => Promise<unknown>,
  monitor: LoopMonitor,
): Promise<void> {
  try {
    await pingDb();
    gaugeValues.sampler_db_up = 1;
  } catch {
    gaugeValues.sampler_db_up = 0;
  }

  const loops = monitor.snapshot();
  const ok = (status: string) => (status !== 'error' && status !== 'stalled' ? 1 : 0);
  gaugeValues.sampler_power_loop_ok = ok(loops.power.status);
  gaugeValues.sampler_inverter_loop_ok = ok(loops.inverter.status);
}

function labelsToKey(labels: Labels): string {
  const parts = Object.keys(labels)
    .sort()
    .map((k) => `${k}="${labels[k]}"`);
  return parts.length ? `{${parts.join(',')}}` : '';
}

function renderLabeledCounters(name: CounterMetricName): string[] {
  const lines: string[] = [];
  labeledCounters[name].forEach((value, labelKey) => {
    lines.push(`${name}${labelKey} ${value}`);
  });
  return lines;
}

function renderHistograms(name: HistogramMetricName): string[] {
  const lines: string[] = [];
  const hist = histograms[name];
  hist.data.forEach((store, labelKey) => {
    let cumulative = 0;
    store.buckets.forEach((bucket, idx) => {
      cumulative += store.counts[idx];
      const labels = labelKey ? `${labelKey.slice(0, -1)},le="${bucket}"}` : `{le="${bucket}"}`;
      lines.push(`${name}_bucket${labels} ${cumulative}`);
    });
    const labels = labelKey ? `${labelKey.slice(0, -1)},le="+Inf"}` : '{le="+Inf"}';
    lines.push(`${name}_bucket${labels} ${store.count}`);
    lines.push(`${name}_sum${labelKey} ${store.sum}`);
    lines.push(`${name}_count${labelKey} ${store.count}`);
  });
  if (hist.data.size === 0) {
    hist.buckets.forEach((bucket) => {
      lines.push(`${name}_bucket{le="${bucket}"} 0`);
    });
    lines.push(`${name}_bucket{le="+Inf"} 0`);
    lines.push(`${name}_sum 0`);
    lines.push(`${name}_count 0`);
  }
  return lines;
}

export function metricsContentType(): string {
  return 'text/plain; version=0.0.4';
}

export function renderPrometheus(): string {
  const lines: string[] = [];
  (Object.keys(metricDefs) as MetricName[]).forEach((name) => {
    const def = metricDefs[name];
    lines.push(`# HELP ${name} ${def.help}`);
    lines.push(`# TYPE ${name} ${def.type}`);
    if (isGauge(name)) {
      lines.push(`${name} ${gaugeValues[name]}`);
    } else if (isCounter(name)) {
      lines.push(...renderLabeledCounters(name));
    } else if (isHistogram(name)) {
      lines.push(...renderHistograms(name));
    }
  });
  return lines.join('\n') + '\n';
}

export function setGaugeValue(name: GaugeMetricName, value: number): void {
  gaugeValues[name] = value;
}

export function incrementCounter(name: CounterMetricName, labels: Labels = {}, amount = 1): void {
  const key = labelsToKey(labels);
  const current = labeledCounters[name].get(key) ?? 0;
  labeledCounters[name].set(key, current + amount);
}

export function observeHistogram(name: HistogramMetricName, value: number, labels: Labels = {}): void {
  const hist = histograms[name];
  const key = labelsToKey(labels);
  const store = hist.data.get(key) ?? {
    buckets: [...hist.buckets],
    counts: hist.buckets.map(() => 0),
    sum: 0,
    count: 0,
  };
  hist.data.set(key, store);

  store.count += 1;
  store.sum += value;
  store.buckets.forEach((bucket, idx) => {
    if (value <= bucket) {
      store.counts[idx] += 1;
    }
  });
}

export function resetMetricsForTest(): void {
  (Object.keys(gaugeValues) as GaugeMetricName[]).forEach((name) => {
    gaugeValues[name] = 0;
  });
  (Object.keys(labeledCounters) as CounterMetricName[]).forEach((name) => labeledCounters[name].clear());
  (Object.keys(histograms) as HistogramMetricName[]).forEach((name) => histograms[name].data.clear());
}
