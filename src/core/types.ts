// src/core/types.ts
import type { SpanContext } from '@opentelemetry/api'

/** Severity levels from least to most verbose. */
export const LEVELS = ['off', 'error', 'warn', 'info', 'debug', 'trace'] as const

export type Level = (typeof LEVELS)[number]

/** Levels an event or span can carry; `off` only makes sense as a filter. */
export type EventLevel = Exclude<Level, 'off'>

export type SignalKind = 'traces' | 'metrics' | 'logs'

export type SinkName = SignalKind | 'stdout'

export type FieldValue = string | number | boolean | string[]

export type Fields = Record<string, FieldValue>

export interface SpanData {
  readonly id: number
  readonly name: string
  readonly target: string
  readonly level: EventLevel
  readonly fields: Fields
  readonly parent: SpanData | undefined
  readonly startTime: number
  endTime: number | undefined
  /** Set by the trace bridge when it exports this span. */
  otelContext: SpanContext | undefined
}

export interface TelemetryEvent {
  readonly level: EventLevel
  readonly target: string
  readonly message: string
  readonly fields: Fields
  readonly timestamp: number
  readonly span: SpanData | undefined
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export function isLevel(value: string): value is Level {
  return (LEVELS as readonly string[]).includes(value)
}

export function levelRank(level: Level): number {
  return LEVELS.indexOf(level)
}
