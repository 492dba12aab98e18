// src/providers/metrics.ts
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-grpc'
import {
  AggregationType,
  InstrumentType,
  MeterProvider,
  PeriodicExportingMetricReader,
} from '@opentelemetry/sdk-metrics'
import type { MeterProviderOptions, PushMetricExporter } from '@opentelemetry/sdk-metrics'
import type { Resource } from '@opentelemetry/resources'
import { setupSignal } from './base.js'
import type { ProviderHandle } from './base.js'
import type { MetricsAggregation, MetricsAggregationConfig } from '../core/config.js'

export type MetricsProviderHandle = ProviderHandle<MeterProvider>

type ViewOptions = NonNullable<MeterProviderOptions['views']>[number]
type AggregationOption = NonNullable<ViewOptions['aggregation']>

export const DEFAULT_EXPORT_INTERVAL_MS = 60_000
const DEFAULT_EXPORT_TIMEOUT_MS = 30_000

/** Histogram buckets in seconds, from 250µs to 5s. */
export const DEFAULT_HISTOGRAM_BOUNDARIES: readonly number[] = [
  0.00025, 0.0005, 0.001, 0.0025, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1.0, 2.5, 5.0,
]

export const DEFAULT_AGGREGATION: Required<MetricsAggregationConfig> = {
  counter: { kind: 'sum' },
  gauge: { kind: 'lastValue' },
  histogram: {
    kind: 'explicitBucketHistogram',
    boundaries: DEFAULT_HISTOGRAM_BOUNDARIES,
    recordMinMax: true,
  },
}

const INSTRUMENTS: Record<keyof MetricsAggregationConfig, InstrumentType[]> = {
  counter: [
    InstrumentType.COUNTER,
    InstrumentType.UP_DOWN_COUNTER,
    InstrumentType.OBSERVABLE_COUNTER,
    InstrumentType.OBSERVABLE_UP_DOWN_COUNTER,
  ],
  gauge: [InstrumentType.GAUGE, InstrumentType.OBSERVABLE_GAUGE],
  histogram: [InstrumentType.HISTOGRAM],
}

export function otlpMetricExporter(endpoint: string): PushMetricExporter {
  return new OTLPMetricExporter({ url: endpoint })
}

export function toAggregationOption(aggregation: MetricsAggregation): AggregationOption {
  switch (aggregation.kind) {
    case 'drop':
      return { type: AggregationType.DROP }
    case 'sum':
      return { type: AggregationType.SUM }
    case 'lastValue':
      return { type: AggregationType.LAST_VALUE }
    case 'explicitBucketHistogram':
      return {
        type: AggregationType.EXPLICIT_BUCKET_HISTOGRAM,
        options: {
          boundaries: [...aggregation.boundaries],
          recordMinMax: aggregation.recordMinMax,
        },
      }
  }
}

/** One view per instrument type, applying the configured or default aggregation. */
export function aggregationViews(overrides: MetricsAggregationConfig = {}): ViewOptions[] {
  const kinds: Array<keyof MetricsAggregationConfig> = ['counter', 'gauge', 'histogram']
  return kinds.flatMap((kind) =>
    INSTRUMENTS[kind].map((instrumentType) => ({
      instrumentType,
      aggregation: toAggregationOption(overrides[kind] ?? DEFAULT_AGGREGATION[kind]),
    })),
  )
}

export interface MetricsProviderOptions {
  exporter?: (endpoint: string) => PushMetricExporter
  aggregation?: MetricsAggregationConfig
  exportIntervalMs?: number
}

export function createMetricsProvider(
  endpoint: string,
  resource: Resource,
  opts: MetricsProviderOptions = {},
): MetricsProviderHandle {
  return setupSignal('metrics', endpoint, () => {
    const exporter = (opts.exporter ?? otlpMetricExporter)(endpoint)
    const interval = opts.exportIntervalMs ?? DEFAULT_EXPORT_INTERVAL_MS
    const reader = new PeriodicExportingMetricReader({
      exporter,
      exportIntervalMillis: interval,
      // the reader rejects a timeout longer than the interval
      exportTimeoutMillis: Math.min(DEFAULT_EXPORT_TIMEOUT_MS, interval),
    })
    return new MeterProvider({
      resource,
      readers: [reader],
      views: aggregationViews(opts.aggregation),
    })
  })
}
