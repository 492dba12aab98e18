// src/report/markdown.ts
import type { AttributeValue } from '@opentelemetry/api'
import type { ReportFormatter, TelemetryReport } from './base.js'

export class MarkdownFormatter implements ReportFormatter {
  format(report: TelemetryReport): string {
    const lines: string[] = [
      `## Telemetry: ${report.mode}`,
      report.endpoint === null ? '> console only' : `> endpoint: ${report.endpoint}`,
      '',
      '| Sink | Filter |',
      '|---|---|',
    ]

    for (const [sink, filter] of Object.entries(report.filters)) {
      lines.push(`| ${sink} | \`${filter}\` |`)
    }

    lines.push('', '| Attribute | Value |', '|---|---|')
    for (const key of Object.keys(report.resource).sort()) {
      const value = report.resource[key]
      if (value === undefined) continue
      lines.push(`| ${key} | ${escape(render(value))} |`)
    }

    return lines.join('\n')
  }
}

function render(value: AttributeValue): string {
  return Array.isArray(value) ? value.map(String).join(' ') : String(value)
}

function escape(cell: string): string {
  return cell.replace(/\|/g, '\\|')
}
