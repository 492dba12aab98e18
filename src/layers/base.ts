// src/layers/base.ts
import type { SinkName, SpanData, TelemetryEvent } from '../core/types.js'

/**
 * One sink of the dispatch fabric. Filtering happens before a layer is
 * called, so a layer only sees spans and events its filter enabled.
 */
export interface Layer {
  readonly name: SinkName
  onSpanStart?(span: SpanData): void
  onSpanEnd?(span: SpanData): void
  onEvent?(event: TelemetryEvent): void
}

/** Names of the enclosing spans, outermost first. */
export function spanPath(span: SpanData | undefined): string[] {
  const names: string[] = []
  for (let s = span; s !== undefined; s = s.parent) names.unshift(s.name)
  return names
}
