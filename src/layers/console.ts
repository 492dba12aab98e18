// src/layers/console.ts
import type pino from 'pino'
import type { Layer } from './base.js'
import { spanPath } from './base.js'
import type { Fields, TelemetryEvent } from '../core/types.js'

// keys the console line itself writes; event fields with these names get a `field.` prefix
const RESERVED = new Set(['level', 'time', 'msg', 'target', 'spans'])

export class ConsoleLayer implements Layer {
  readonly name = 'stdout'

  constructor(private readonly log: pino.Logger) {}

  onEvent(event: TelemetryEvent): void {
    const spans = spanPath(event.span)
    this.log[event.level](
      {
        ...withoutReserved(event.fields),
        target: event.target,
        ...(spans.length > 0 ? { spans } : {}),
      },
      event.message,
    )
  }
}

function withoutReserved(fields: Fields): Fields {
  const out: Fields = {}
  for (const [key, value] of Object.entries(fields)) {
    out[RESERVED.has(key) ? `field.${key}` : key] = value
  }
  return out
}
