// src/report/json.ts
import type { ReportFormatter, TelemetryReport } from './base.js'

export class JsonFormatter implements ReportFormatter {
  format(report: TelemetryReport): string {
    return JSON.stringify(report, null, 2)
  }
}
