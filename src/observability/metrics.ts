/**
 * Stream metrics: a collector seam plus the recorder the runner reports through
 */

type Labels = Record<string, string>;

export interface MetricsCollector {
  incrementCounter(name: string, value: number, labels?: Labels): void;
  recordHistogram(name: string, value: number, labels?: Labels): void;
  setGauge(name: string, value: number, labels?: Labels): void;
}

/**
 * Metric names emitted by the stream runner
 */
export const MetricNames = {
  STREAMS_STARTED: 'chat_stream.streams.started',
  STREAMS_ACTIVE: 'chat_stream.streams.active',
  STREAMS_FINISHED: 'chat_stream.streams.finished',
  STREAM_DURATION_MS: 'chat_stream.streams.duration_ms',
  CHUNKS_DELIVERED: 'chat_stream.chunks.delivered',
  DECODE_ERRORS: 'chat_stream.parser.decode_errors',
  TRANSPORT_ERRORS: 'chat_stream.transport.errors',
} as const;

export interface MetricsSnapshot {
  counters: Record<string, number>;
  histograms: Record<string, number[]>;
  gauges: Record<string, number>;
}

function metricKey(name: string, labels?: Labels): string {
  if (!labels || Object.keys(labels).length === 0) {
    return name;
  }
  const labelStr = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`)
    .join(',');
  return `${name}{${labelStr}}`;
}

/**
 * Keeps every value in memory. Meant for tests and local debugging.
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly counters = new Map<string, number>();
  private readonly histograms = new Map<string, number[]>();
  private readonly gauges = new Map<string, number>();

  incrementCounter(name: string, value: number, labels?: Labels): void {
    const key = metricKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  recordHistogram(name: string, value: number, labels?: Labels): void {
    const key = metricKey(name, labels);
    this.histograms.set(key, [...(this.histograms.get(key) ?? []), value]);
  }

  setGauge(name: string, value: number, labels?: Labels): void {
    this.gauges.set(metricKey(name, labels), value);
  }

  getCounter(name: string, labels?: Labels): number {
    return this.counters.get(metricKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels?: Labels): number[] {
    return this.histograms.get(metricKey(name, labels)) ?? [];
  }

  getGauge(name: string, labels?: Labels): number | undefined {
    return this.gauges.get(metricKey(name, labels));
  }

  /**
   * Copies every series, keyed as `name` or `name{label=value,...}`
   */
  snapshot(): MetricsSnapshot {
    return {
      counters: Object.fromEntries(this.counters),
      histograms: Object.fromEntries([...this.histograms].map(([k, v]) => [k, [...v]])),
      gauges: Object.fromEntries(this.gauges),
    };
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
    this.gauges.clear();
  }
}

export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(_name: string, _value: number, _labels?: Labels): void {}
  recordHistogram(_name: string, _value: number, _labels?: Labels): void {}
  setGauge(_name: string, _value: number, _labels?: Labels): void {}
}

export type StreamStatus = 'completed' | 'cancelled' | 'failed';

/**
 * Translates stream lifecycle events into metric updates
 */
export class StreamMetrics {
  constructor(private readonly collector: MetricsCollector = new NoopMetricsCollector()) {}

  streamStarted(active: number): void {
    this.collector.incrementCounter(MetricNames.STREAMS_STARTED, 1);
    this.collector.setGauge(MetricNames.STREAMS_ACTIVE, active);
  }

  streamFinished(status: StreamStatus, durationMs: number, active: number): void {
    this.collector.incrementCounter(MetricNames.STREAMS_FINISHED, 1, { status });
    this.collector.recordHistogram(MetricNames.STREAM_DURATION_MS, durationMs);
    this.collector.setGauge(MetricNames.STREAMS_ACTIVE, active);
  }

  chunkDelivered(): void {
    this.collector.incrementCounter(MetricNames.CHUNKS_DELIVERED, 1);
  }

  decodeFailed(): void {
    this.collector.incrementCounter(MetricNames.DECODE_ERRORS, 1);
  }

  transportFailed(): void {
    this.collector.incrementCounter(MetricNames.TRANSPORT_ERRORS, 1);
  }
}
