// src/providers/trace.ts
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-grpc'
import { BasicTracerProvider, BatchSpanProcessor } from '@opentelemetry/sdk-trace-base'
import type { SpanExporter } from '@opentelemetry/sdk-trace-base'
import type { Resource } from '@opentelemetry/resources'
import { setupSignal } from './base.js'
import type { ProviderHandle } from './base.js'

export type TraceProviderHandle = ProviderHandle<BasicTracerProvider>

export function otlpSpanExporter(endpoint: string): SpanExporter {
  return new OTLPTraceExporter({ url: endpoint })
}

export interface TraceProviderOptions {
  exporter?: (endpoint: string) => SpanExporter
}

export function createTraceProvider(
  endpoint: string,
  resource: Resource,
  opts: TraceProviderOptions = {},
): TraceProviderHandle {
  return setupSignal('traces', endpoint, () => {
    const exporter = (opts.exporter ?? otlpSpanExporter)(endpoint)
    return new BasicTracerProvider({
      resource,
      spanProcessors: [new BatchSpanProcessor(exporter)],
    })
  })
}
