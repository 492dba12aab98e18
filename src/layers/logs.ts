// src/layers/logs.ts
import { SeverityNumber } from '@opentelemetry/api-logs'
import type { Logger as OtelLogger } from '@opentelemetry/api-logs'
import type { Layer } from './base.js'
import type { EventLevel, TelemetryEvent } from '../core/types.js'

export const SEVERITY: Record<EventLevel, SeverityNumber> = {
  error: SeverityNumber.ERROR,
  warn: SeverityNumber.WARN,
  info: SeverityNumber.INFO,
  debug: SeverityNumber.DEBUG,
  trace: SeverityNumber.TRACE,
}

/** Emits every event as a log record. Trace correlation comes from the active context. */
export class LogLayer implements Layer {
  readonly name = 'logs'

  constructor(private readonly logger: OtelLogger) {}

  onEvent(event: TelemetryEvent): void {
    this.logger.emit({
      timestamp: event.timestamp,
      severityNumber: SEVERITY[event.level],
      severityText: event.level.toUpperCase(),
      body: event.message,
      attributes: { ...event.fields, 'log.target': event.target },
    })
  }
}
