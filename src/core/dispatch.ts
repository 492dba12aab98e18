// src/core/dispatch.ts
import { context, diag, DiagLogLevel, propagation } from '@opentelemetry/api'
import { AsyncLocalStorageContextManager } from '@opentelemetry/context-async-hooks'
import { W3CTraceContextPropagator } from '@opentelemetry/core'
import { RegistryAlreadyInitializedError } from './errors.js'
import type { EnvFilter } from './filter.js'
import { internalLogger, pinoDiagLogger } from './logger.js'
import type { EventLevel, SpanData, TelemetryEvent } from './types.js'
import type { Layer } from '../layers/base.js'

export interface FilteredLayer {
  readonly layer: Layer
  readonly filter: EnvFilter
}

/**
 * Fans every span and event out to each layer whose own filter enables it.
 * No layer can suppress another, and one that throws is reported and skipped.
 */
export class Dispatch {
  constructor(readonly layers: readonly FilteredLayer[]) {}

  /** True when at least one layer wants this level/target. */
  enabled(level: EventLevel, target: string): boolean {
    return this.layers.some(({ filter }) => filter.enabled(level, target))
  }

  spanStart(span: SpanData): void {
    this.each(span.level, span.target, (layer) => layer.onSpanStart?.(span))
  }

  spanEnd(span: SpanData): void {
    this.each(span.level, span.target, (layer) => layer.onSpanEnd?.(span))
  }

  event(event: TelemetryEvent): void {
    this.each(event.level, event.target, (layer) => layer.onEvent?.(event))
  }

  private each(level: EventLevel, target: string, fn: (layer: Layer) => void): void {
    for (const { layer, filter } of this.layers) {
      if (!filter.enabled(level, target)) continue
      try {
        fn(layer)
      } catch (err) {
        internalLogger().error({ layer: layer.name, err }, 'telemetry layer failed')
      }
    }
  }
}

export function composeDispatch(layers: ReadonlyArray<[Layer, EnvFilter]>): Dispatch {
  return new Dispatch(layers.map(([layer, filter]) => ({ layer, filter })))
}

let installed: Dispatch | undefined

export function isDispatchInstalled(): boolean {
  return installed !== undefined
}

export function currentDispatch(): Dispatch | undefined {
  return installed
}

/**
 * Installs the process-wide dispatch together with the W3C trace-context
 * propagator and an async context manager. Only one install per process.
 */
export function installDispatch(dispatch: Dispatch): void {
  if (installed !== undefined) throw new RegistryAlreadyInitializedError()
  installed = dispatch

  diag.setLogger(pinoDiagLogger(internalLogger()), {
    logLevel: DiagLogLevel.WARN,
    suppressOverrideMessage: true,
  })
  propagation.setGlobalPropagator(new W3CTraceContextPropagator())

  const manager = new AsyncLocalStorageContextManager()
  manager.enable()
  if (!context.setGlobalContextManager(manager)) {
    // the host already registered one; spans nest through it instead
    manager.disable()
  }
}
