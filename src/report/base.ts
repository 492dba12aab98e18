// src/report/base.ts
import type { AttributeValue } from '@opentelemetry/api'
import type { TelemetryPlan } from '../core/pipeline.js'
import type { SinkName } from '../core/types.js'

export interface TelemetryReport {
  mode: TelemetryPlan['mode']
  endpoint: string | null
  filters: Record<SinkName, string>
  resource: Record<string, AttributeValue>
}

export interface ReportFormatter {
  format(report: TelemetryReport): string
}

export function buildReport(plan: TelemetryPlan): TelemetryReport {
  const resource: Record<string, AttributeValue> = {}
  for (const [key, value] of Object.entries(plan.resource.attributes)) {
    if (value !== undefined) resource[key] = value
  }
  return {
    mode: plan.mode,
    endpoint: plan.config.otlpEndpoint ?? null,
    filters: {
      traces: plan.filters.traces.toString(),
      metrics: plan.filters.metrics.toString(),
      logs: plan.filters.logs.toString(),
      stdout: plan.filters.stdout.toString(),
    },
    resource,
  }
}
