// src/providers/logs.ts
import { OTLPLogExporter } from '@opentelemetry/exporter-logs-otlp-grpc'
import { BatchLogRecordProcessor, LoggerProvider } from '@opentelemetry/sdk-logs'
import type { LogRecordExporter } from '@opentelemetry/sdk-logs'
import type { Resource } from '@opentelemetry/resources'
import { setupSignal } from './base.js'
import type { ProviderHandle } from './base.js'

export type LogProviderHandle = ProviderHandle<LoggerProvider>

export function otlpLogExporter(endpoint: string): LogRecordExporter {
  return new OTLPLogExporter({ url: endpoint })
}

export interface LogProviderOptions {
  exporter?: (endpoint: string) => LogRecordExporter
}

export function createLogProvider(
  endpoint: string,
  resource: Resource,
  opts: LogProviderOptions = {},
): LogProviderHandle {
  return setupSignal('logs', endpoint, () => {
    const exporter = (opts.exporter ?? otlpLogExporter)(endpoint)
    return new LoggerProvider({
      resource,
      processors: [new BatchLogRecordProcessor(exporter)],
    })
  })
}
