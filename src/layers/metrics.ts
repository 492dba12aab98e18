// src/layers/metrics.ts
import type { Attributes, Counter, Gauge, Histogram, Meter, UpDownCounter } from '@opentelemetry/api'
import type { Layer } from './base.js'
import type { TelemetryEvent } from '../core/types.js'

export type InstrumentKind = 'monotonicCounter' | 'counter' | 'histogram' | 'gauge'

const PREFIXES: ReadonlyArray<[string, InstrumentKind]> = [
  ['monotonic_counter.', 'monotonicCounter'],
  ['counter.', 'counter'],
  ['histogram.', 'histogram'],
  ['gauge.', 'gauge'],
]

export interface InstrumentField {
  kind: InstrumentKind
  name: string
}

/** `monotonic_counter.http.requests` → a monotonic counter named `http.requests`. */
export function parseInstrumentField(key: string): InstrumentField | undefined {
  for (const [prefix, kind] of PREFIXES) {
    if (key.startsWith(prefix) && key.length > prefix.length) {
      return { kind, name: key.slice(prefix.length) }
    }
  }
  return undefined
}

/**
 * Records numeric event fields whose key carries an instrument prefix. The
 * event's other scalar fields become the measurement's attributes.
 */
export class MetricsLayer implements Layer {
  readonly name = 'metrics'
  private readonly counters = new Map<string, Counter>()
  private readonly upDownCounters = new Map<string, UpDownCounter>()
  private readonly histograms = new Map<string, Histogram>()
  private readonly gauges = new Map<string, Gauge>()

  constructor(private readonly meter: Meter) {}

  onEvent(event: TelemetryEvent): void {
    const measurements: Array<InstrumentField & { value: number }> = []
    const attributes: Attributes = {}

    for (const [key, value] of Object.entries(event.fields)) {
      const field = parseInstrumentField(key)
      if (field === undefined) {
        if (!Array.isArray(value)) attributes[key] = value
      } else if (typeof value === 'number') {
        measurements.push({ ...field, value })
      }
    }

    for (const m of measurements) this.record(m, m.value, attributes)
  }

  private record(field: InstrumentField, value: number, attributes: Attributes): void {
    switch (field.kind) {
      case 'monotonicCounter':
        cached(this.counters, field.name, () => this.meter.createCounter(field.name)).add(value, attributes)
        break
      case 'counter':
        cached(this.upDownCounters, field.name, () => this.meter.createUpDownCounter(field.name)).add(
          value,
          attributes,
        )
        break
      case 'histogram':
        cached(this.histograms, field.name, () => this.meter.createHistogram(field.name)).record(
          value,
          attributes,
        )
        break
      case 'gauge':
        cached(this.gauges, field.name, () => this.meter.createGauge(field.name)).record(value, attributes)
        break
    }
  }
}

function cached<T>(map: Map<string, T>, key: string, create: () => T): T {
  let instrument = map.get(key)
  if (instrument === undefined) {
    instrument = create()
    map.set(key, instrument)
  }
  return instrument
}
