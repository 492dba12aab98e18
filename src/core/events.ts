// src/core/events.ts
// Emission side of the fabric: application code logs and opens spans here,
// and whatever dispatch is installed decides where it goes.
import { context, createContextKey, propagation, trace } from '@opentelemetry/api'
import type { Context, SpanContext } from '@opentelemetry/api'
import { currentDispatch } from './dispatch.js'
import type { EventLevel, Fields, SpanData } from './types.js'

export const DEFAULT_TARGET = 'app'

const SPAN_KEY = createContextKey('otlp-bootstrap.span')

let nextSpanId = 1

class SpanRecord implements SpanData {
  endTime: number | undefined = undefined
  otelContext: SpanContext | undefined = undefined

  constructor(
    readonly id: number,
    readonly name: string,
    readonly target: string,
    readonly level: EventLevel,
    readonly fields: Fields,
    readonly parent: SpanData | undefined,
    readonly startTime: number,
  ) {}
}

export function currentSpan(): SpanData | undefined {
  const value = context.active().getValue(SPAN_KEY)
  return value instanceof SpanRecord ? value : undefined
}

export interface EmitFn {
  (message: string): void
  (fields: Fields, message: string): void
}

export interface EventLogger {
  readonly target: string
  trace: EmitFn
  debug: EmitFn
  info: EmitFn
  warn: EmitFn
  error: EmitFn
  enabled(level: EventLevel): boolean
}

export function getLogger(target: string = DEFAULT_TARGET): EventLogger {
  const emitter =
    (level: EventLevel) =>
    (first: Fields | string, message?: string): void => {
      const dispatch = currentDispatch()
      if (dispatch === undefined) return
      const fields = typeof first === 'string' ? {} : first
      dispatch.event({
        level,
        target,
        message: typeof first === 'string' ? first : (message ?? ''),
        fields,
        timestamp: Date.now(),
        span: currentSpan(),
      })
    }

  return {
    target,
    trace: emitter('trace'),
    debug: emitter('debug'),
    info: emitter('info'),
    warn: emitter('warn'),
    error: emitter('error'),
    enabled: (level) => currentDispatch()?.enabled(level, target) ?? false,
  }
}

export interface SpanOptions {
  level?: EventLevel
  target?: string
  fields?: Fields
}

/**
 * Run `fn` inside a span. Async functions keep the span open until their
 * promise settles. When no layer wants the span, `fn` runs untouched.
 */
export function inSpan<T>(name: string, fn: () => Promise<T>, opts?: SpanOptions): Promise<T>
export function inSpan<T>(name: string, fn: () => T, opts?: SpanOptions): T
export function inSpan(name: string, fn: () => unknown, opts: SpanOptions = {}): unknown {
  const level = opts.level ?? 'info'
  const target = opts.target ?? DEFAULT_TARGET
  const dispatch = currentDispatch()
  if (dispatch === undefined || !dispatch.enabled(level, target)) return fn()

  const span = new SpanRecord(nextSpanId++, name, target, level, opts.fields ?? {}, currentSpan(), Date.now())
  dispatch.spanStart(span)

  let ctx = context.active().setValue(SPAN_KEY, span)
  if (span.otelContext !== undefined) ctx = trace.setSpanContext(ctx, span.otelContext)

  const end = (): void => {
    span.endTime = Date.now()
    dispatch.spanEnd(span)
  }

  let result: unknown
  try {
    result = context.with(ctx, fn)
  } catch (err) {
    end()
    throw err
  }
  if (result instanceof Promise) return result.finally(end)
  end()
  return result
}

/** Writes the active trace context into `carrier` (e.g. outgoing HTTP headers). */
export function injectTraceContext(carrier: Record<string, string>): void {
  propagation.inject(context.active(), carrier)
}

/** Reads a trace context from `carrier`; run work under it with `withTraceContext`. */
export function extractTraceContext(carrier: Record<string, string | string[] | undefined>): Context {
  return propagation.extract(context.active(), carrier)
}

export function withTraceContext<T>(ctx: Context, fn: () => T): T {
  return context.with(ctx, fn)
}
