// src/providers/base.ts
import type { SpanExporter } from '@opentelemetry/sdk-trace-base'
import type { PushMetricExporter } from '@opentelemetry/sdk-metrics'
import type { LogRecordExporter } from '@opentelemetry/sdk-logs'
import { AlreadyShutdownError, ExportSetupError } from '../core/errors.js'
import type { SignalKind } from '../core/types.js'

/** Builds the exporter for one signal, bound to one endpoint. */
export interface ExporterFactories {
  traces: (endpoint: string) => SpanExporter
  metrics: (endpoint: string) => PushMetricExporter
  logs: (endpoint: string) => LogRecordExporter
}

/** What the SDK's tracer, meter and logger providers have in common. */
export interface SdkProvider {
  forceFlush(): Promise<void>
  shutdown(): Promise<void>
}

/** The part of a handle the lifecycle manager needs. */
export interface ManagedProvider {
  readonly signal: SignalKind
  forceFlush(): Promise<void>
  shutdown(): Promise<void>
}

/**
 * Owns one SDK provider and, through it, the exporter and its background
 * flush task. Shutting down twice rejects with AlreadyShutdownError.
 */
export class ProviderHandle<P extends SdkProvider> implements ManagedProvider {
  private closed = false

  constructor(
    readonly signal: SignalKind,
    readonly endpoint: string,
    readonly provider: P,
  ) {}

  get isShutdown(): boolean {
    return this.closed
  }

  async forceFlush(): Promise<void> {
    if (this.closed) throw new AlreadyShutdownError(this.signal)
    await this.provider.forceFlush()
  }

  async shutdown(): Promise<void> {
    if (this.closed) throw new AlreadyShutdownError(this.signal)
    this.closed = true
    await this.provider.shutdown()
  }
}

/** Runs a provider constructor, turning anything it throws into ExportSetupError. */
export function setupSignal<P extends SdkProvider>(
  signal: SignalKind,
  endpoint: string,
  build: () => P,
): ProviderHandle<P> {
  try {
    return new ProviderHandle(signal, endpoint, build())
  } catch (err) {
    throw new ExportSetupError(signal, err)
  }
}
