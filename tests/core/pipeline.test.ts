import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { context, diag, propagation } from '@opentelemetry/api'
import { InMemorySpanExporter } from '@opentelemetry/sdk-trace-base'
import { InMemoryLogRecordExporter } from '@opentelemetry/sdk-logs'
import { AggregationTemporality, InMemoryMetricExporter } from '@opentelemetry/sdk-metrics'
import { planTelemetry } from '../../src/core/pipeline.js'
import type { Logger } from '../../src/core/pipeline.js'
import type { ExporterFactories } from '../../src/providers/base.js'

type Pipeline = typeof import('../../src/core/pipeline.js')
type Events = typeof import('../../src/core/events.js')
type Errors = typeof import('../../src/core/errors.js')

const ENDPOINT = 'http://localhost:4317'

const ENV_VARS = [
  'OTEL_EXPORTER_OTLP_ENDPOINT',
  'OTEL_SERVICE_NAME',
  'OTEL_SERVICE_NAMESPACE',
  'OTEL_SERVICE_VERSION',
  'OTEL_SERVICE_INSTANCE_ID',
  'OTEL_DEPLOYMENT_ENVIRONMENT',
  'OTEL_METRIC_EXPORT_INTERVAL',
  'OTEL_RESOURCE_ATTRIBUTES',
  'LOG_LEVEL',
]

interface Sinks {
  spans: InMemorySpanExporter
  logs: InMemoryLogRecordExporter
  metrics: InMemoryMetricExporter
  exporters: ExporterFactories
}

function memorySinks(): Sinks {
  const spans = new InMemorySpanExporter()
  const logs = new InMemoryLogRecordExporter()
  const metrics = new InMemoryMetricExporter(AggregationTemporality.CUMULATIVE)
  return { spans, logs, metrics, exporters: { traces: () => spans, metrics: () => metrics, logs: () => logs } }
}

function consoleCapture(): { lines: () => Array<Record<string, unknown>>; stream: { write(msg: string): void } } {
  const raw: string[] = []
  return {
    lines: () => raw.map((l) => JSON.parse(l) as Record<string, unknown>),
    stream: { write: (msg: string) => { raw.push(msg) } },
  }
}

describe('planTelemetry', () => {
  it('selects console-only mode without an endpoint', () => {
    expect(planTelemetry({}, {}).mode).toBe('StdoutOnly')
  })

  it('selects the exporting mode from the environment endpoint', () => {
    const plan = planTelemetry({}, { OTEL_EXPORTER_OTLP_ENDPOINT: ENDPOINT })
    expect(plan.mode).toBe('WithEndpoint')
    expect(plan.config.otlpEndpoint).toBe(ENDPOINT)
  })

  it('resolves the console filter from the log level when none is given', () => {
    const plan = planTelemetry({ logLevel: 'error' }, {})
    expect(plan.filters.stdout.toString()).toBe('error')
    expect(plan.filters.traces.toString()).toBe('error')
  })
})

describe('initialization', () => {
  let pipeline: Pipeline
  let events: Events
  let errors: Errors

  beforeEach(async () => {
    for (const name of ENV_VARS) vi.stubEnv(name, '')
    vi.resetModules()
    pipeline = await import('../../src/core/pipeline.js')
    events = await import('../../src/core/events.js')
    errors = await import('../../src/core/errors.js')
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    context.disable()
    propagation.disable()
    diag.disable()
  })

  it('routes one span and two events to each sink by its own level', async () => {
    const sinks = memorySinks()
    const out = consoleCapture()
    const result = pipeline.initWithConfig({
      otlpEndpoint: ENDPOINT,
      serviceName: 'svc-a',
      traceLevel: 'info',
      logLevel: 'error',
      stdout: out.stream,
      exporters: sinks.exporters,
      shutdownOnExit: false,
    })
    if (!result.ok) throw result.error
    expect(result.value.kind).toBe('WithEndpoint')

    const log = events.getLogger('svc')
    events.inSpan('handle-request', () => {
      log.info('request received')
      log.error('request failed')
    })
    await result.value.forceFlush()

    const [span] = sinks.spans.getFinishedSpans()
    expect(span?.name).toBe('handle-request')
    expect(span?.events.map((e) => e.name)).toEqual(['request received', 'request failed'])
    expect(span?.resource.attributes['service.name']).toBe('svc-a')

    const records = sinks.logs.getFinishedLogRecords()
    expect(records.map((r) => [r.body, r.severityText])).toEqual([['request failed', 'ERROR']])
    expect(records[0]?.spanContext?.traceId).toBe(span?.spanContext().traceId)

    expect(out.lines().map((l) => [l['level'], l['msg']])).toEqual([['error', 'request failed']])

    await expect(result.value.shutdown()).resolves.toBeUndefined()
    await expect(result.value.shutdown()).resolves.toBeUndefined()
    expect(result.value.kind === 'WithEndpoint' ? result.value.state : undefined).toBe('ShutDown')
  })

  it('installs only the console sink without an endpoint', async () => {
    const out = consoleCapture()
    const result = pipeline.initWithConfig({ stdout: out.stream, logLevel: 'info' })
    if (!result.ok) throw result.error
    expect(result.value.kind).toBe('StdoutOnly')

    const log = events.getLogger()
    log.debug('hidden')
    log.info({ user: 'u-1' }, 'shown')

    expect(out.lines().map((l) => [l['msg'], l['user']])).toEqual([['shown', 'u-1']])
    await expect(result.value.shutdown()).resolves.toBeUndefined()
  })

  it('takes per-target directives from LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'warn,jobs=debug')
    const out = consoleCapture()
    const result = pipeline.initWithConfig({ stdout: out.stream })
    if (!result.ok) throw result.error

    events.getLogger('jobs.runner').debug('picked up')
    events.getLogger('http').info('ignored')

    expect(out.lines().map((l) => l['msg'])).toEqual(['picked up'])
  })

  it('rejects a second initialization', () => {
    const first = pipeline.initWithConfig({ stdout: consoleCapture().stream })
    expect(first.ok).toBe(true)

    const second = pipeline.initWithConfig({ stdout: consoleCapture().stream })
    expect(second.ok).toBe(false)
    if (second.ok) return
    expect(second.error).toBeInstanceOf(errors.TryInitError)
    expect(second.error.cause).toBeInstanceOf(errors.RegistryAlreadyInitializedError)
  })

  it('names the signal whose exporter failed and installs nothing', () => {
    const sinks = memorySinks()
    const result = pipeline.initWithConfig({
      otlpEndpoint: ENDPOINT,
      exporters: {
        ...sinks.exporters,
        metrics: () => {
          throw new Error('no route to collector')
        },
      },
      shutdownOnExit: false,
    })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.signal).toBe('metrics')
    expect(result.error.message).toBe('Error initializing telemetry: Failed to initialize the metrics pipeline')
    expect(result.error.cause).toBeInstanceOf(errors.ExportSetupError)

    const retry = pipeline.initWithConfig({ stdout: consoleCapture().stream })
    expect(retry.ok).toBe(true)
  })

  it('reports an invalid endpoint as a configuration error', () => {
    const result = pipeline.initWithConfig({ otlpEndpoint: 'not a url' })
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.cause).toBeInstanceOf(errors.ConfigurationError)
    expect(result.error.signal).toBeUndefined()
  })

  it('throws from init when initialization fails', () => {
    pipeline.initWithConfig({ stdout: consoleCapture().stream })
    expect(() => pipeline.init()).toThrow(errors.TryInitError)
  })

  it('shuts down after the scoped function returns', async () => {
    const sinks = memorySinks()
    const seen: { logger?: Logger } = {}
    const value = await pipeline.withTelemetry(
      async (logger) => {
        seen.logger = logger
        events.inSpan('scoped', () => events.getLogger().info('inside'))
        return 42
      },
      { otlpEndpoint: ENDPOINT, exporters: sinks.exporters, stdout: consoleCapture().stream },
    )

    expect(value).toBe(42)
    expect(seen.logger?.kind === 'WithEndpoint' ? seen.logger.state : undefined).toBe('ShutDown')
  })

  it('shuts down when the scoped function throws', async () => {
    const sinks = memorySinks()
    const seen: { logger?: Logger } = {}
    await expect(
      pipeline.withTelemetry(
        (logger) => {
          seen.logger = logger
          throw new Error('job crashed')
        },
        { otlpEndpoint: ENDPOINT, exporters: sinks.exporters, stdout: consoleCapture().stream },
      ),
    ).rejects.toThrow('job crashed')
    expect(seen.logger?.kind === 'WithEndpoint' ? seen.logger.state : undefined).toBe('ShutDown')
  })
})
