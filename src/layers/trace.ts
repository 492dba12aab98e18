// src/layers/trace.ts
import { context, SpanStatusCode } from '@opentelemetry/api'
import type { Span, Tracer } from '@opentelemetry/api'
import type { Layer } from './base.js'
import type { SpanData, TelemetryEvent } from '../core/types.js'

/**
 * Turns spans into OpenTelemetry spans and events into span events on the
 * nearest enclosing span this layer exported. Events outside any span are
 * dropped here; the log bridge still sees them.
 */
export class TraceLayer implements Layer {
  readonly name = 'traces'
  private readonly open = new Map<number, Span>()

  constructor(private readonly tracer: Tracer) {}

  onSpanStart(data: SpanData): void {
    // the active context already carries the nearest exported ancestor
    const span = this.tracer.startSpan(
      data.name,
      {
        startTime: data.startTime,
        attributes: {
          ...data.fields,
          'code.namespace': data.target,
          level: data.level.toUpperCase(),
        },
      },
      context.active(),
    )
    this.open.set(data.id, span)
    data.otelContext = span.spanContext()
  }

  onSpanEnd(data: SpanData): void {
    const span = this.open.get(data.id)
    if (span === undefined) return
    this.open.delete(data.id)
    span.end(data.endTime)
  }

  onEvent(event: TelemetryEvent): void {
    const span = this.nearest(event.span)
    if (span === undefined) return

    span.addEvent(
      event.message,
      { ...event.fields, level: event.level.toUpperCase(), target: event.target },
      event.timestamp,
    )
    if (event.level === 'error') {
      span.setStatus({ code: SpanStatusCode.ERROR, message: event.message })
    }
  }

  private nearest(data: SpanData | undefined): Span | undefined {
    for (let s = data; s !== undefined; s = s.parent) {
      const span = this.open.get(s.id)
      if (span !== undefined) return span
    }
    return undefined
  }
}
