// src/core/config.ts
import { z } from 'zod'
import type pino from 'pino'
import { ConfigurationError } from './errors.js'
import { internalLogger } from './logger.js'
import { LEVELS } from './types.js'
import type { Level } from './types.js'
import type { ExporterFactories } from '../providers/base.js'

export type MetricsAggregation =
  | { kind: 'drop' }
  | { kind: 'sum' }
  | { kind: 'lastValue' }
  | { kind: 'explicitBucketHistogram'; boundaries: readonly number[]; recordMinMax: boolean }

/** Per-instrument-kind aggregation overrides; unset kinds keep the defaults. */
export interface MetricsAggregationConfig {
  /** Counters, up/down counters and their observable forms. */
  readonly counter?: MetricsAggregation
  /** Gauges and observable gauges. */
  readonly gauge?: MetricsAggregation
  readonly histogram?: MetricsAggregation
}

export interface TelemetryConfig {
  readonly serviceName?: string
  readonly serviceNamespace?: string
  readonly serviceVersion?: string
  readonly serviceInstanceId?: string
  readonly deploymentEnvironment?: string
  /** OTLP collector endpoint. Leaving it unset selects console-only mode. */
  readonly otlpEndpoint?: string
  readonly traceLevel?: Level
  readonly metricsLevel?: Level
  readonly logLevel?: Level
  /** Console sink level; falls back to `logLevel` when unset. */
  readonly stdoutLevel?: Level
  readonly metricsAggregation?: MetricsAggregationConfig
  readonly metricsExportIntervalMs?: number
  /** Extra resource attributes, applied after the service identity fields. */
  readonly resourceAttributes?: Readonly<Record<string, string>>
  /** Console sink destination. Defaults to stdout. */
  readonly stdout?: pino.DestinationStream
  readonly exporters?: Partial<ExporterFactories>
  /** Shut down on `beforeExit` when the caller never did. Defaults to true. */
  readonly shutdownOnExit?: boolean
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] }

export class ConfigBuilder {
  private readonly fields: Mutable<TelemetryConfig> = {}

  serviceName(value: string | undefined): this {
    return this.set('serviceName', value)
  }

  serviceNamespace(value: string | undefined): this {
    return this.set('serviceNamespace', value)
  }

  serviceVersion(value: string | undefined): this {
    return this.set('serviceVersion', value)
  }

  serviceInstanceId(value: string | undefined): this {
    return this.set('serviceInstanceId', value)
  }

  deploymentEnvironment(value: string | undefined): this {
    return this.set('deploymentEnvironment', value)
  }

  otlpEndpoint(value: string | undefined): this {
    return this.set('otlpEndpoint', value)
  }

  traceLevel(value: Level | undefined): this {
    return this.set('traceLevel', value)
  }

  metricsLevel(value: Level | undefined): this {
    return this.set('metricsLevel', value)
  }

  logLevel(value: Level | undefined): this {
    return this.set('logLevel', value)
  }

  stdoutLevel(value: Level | undefined): this {
    return this.set('stdoutLevel', value)
  }

  metricsAggregation(value: MetricsAggregationConfig | undefined): this {
    return this.set('metricsAggregation', value)
  }

  metricsExportIntervalMs(value: number | undefined): this {
    return this.set('metricsExportIntervalMs', value)
  }

  resourceAttributes(value: Readonly<Record<string, string>> | undefined): this {
    return this.set('resourceAttributes', value)
  }

  stdout(value: pino.DestinationStream | undefined): this {
    return this.set('stdout', value)
  }

  exporters(value: Partial<ExporterFactories> | undefined): this {
    return this.set('exporters', value)
  }

  shutdownOnExit(value: boolean | undefined): this {
    return this.set('shutdownOnExit', value)
  }

  build(): TelemetryConfig {
    return Object.freeze({ ...this.fields })
  }

  private set<K extends keyof TelemetryConfig>(key: K, value: TelemetryConfig[K]): this {
    if (value === undefined) {
      delete this.fields[key]
    } else {
      this.fields[key] = value
    }
    return this
  }
}

export function configBuilder(): ConfigBuilder {
  return new ConfigBuilder()
}

export class MetricsAggregationBuilder {
  private readonly fields: Mutable<MetricsAggregationConfig> = {}

  counter(value: MetricsAggregation): this {
    this.fields.counter = value
    return this
  }

  gauge(value: MetricsAggregation): this {
    this.fields.gauge = value
    return this
  }

  histogram(value: MetricsAggregation): this {
    this.fields.histogram = value
    return this
  }

  build(): MetricsAggregationConfig {
    return Object.freeze({ ...this.fields })
  }
}

export function metricsAggregationBuilder(): MetricsAggregationBuilder {
  return new MetricsAggregationBuilder()
}

export type Env = Readonly<Record<string, string | undefined>>

/** Values read from the environment. Only consulted for fields the caller left unset. */
export interface EnvConfig {
  otlpEndpoint: string | undefined
  serviceName: string | undefined
  serviceNamespace: string | undefined
  serviceVersion: string | undefined
  serviceInstanceId: string | undefined
  deploymentEnvironment: string | undefined
  logDirective: string | undefined
  metricsExportIntervalMs: number | undefined
  resourceAttributes: string | undefined
}

export function loadConfig(env: Env = process.env): EnvConfig {
  return {
    otlpEndpoint: env['OTEL_EXPORTER_OTLP_ENDPOINT'] || undefined,
    serviceName: env['OTEL_SERVICE_NAME'] || undefined,
    serviceNamespace: env['OTEL_SERVICE_NAMESPACE'] || undefined,
    serviceVersion: env['OTEL_SERVICE_VERSION'] || undefined,
    serviceInstanceId: env['OTEL_SERVICE_INSTANCE_ID'] || undefined,
    deploymentEnvironment: env['OTEL_DEPLOYMENT_ENVIRONMENT'] || undefined,
    logDirective: env['LOG_LEVEL'] || undefined,
    metricsExportIntervalMs: parseInterval(env['OTEL_METRIC_EXPORT_INTERVAL']),
    resourceAttributes: env['OTEL_RESOURCE_ATTRIBUTES'] || undefined,
  }
}

export interface ResolvedConfig extends TelemetryConfig {
  /** Severity directive used by every sink without an explicit level. */
  readonly logDirective?: string
  /** Raw `OTEL_RESOURCE_ATTRIBUTES` value. */
  readonly envResourceAttributes?: string
}

/** Fill every field the caller left unset from the environment. Explicit values always win. */
export function resolveConfig(config: TelemetryConfig, env: Env = process.env): ResolvedConfig {
  const fromEnv = loadConfig(env)
  return {
    ...config,
    serviceName: config.serviceName ?? fromEnv.serviceName,
    serviceNamespace: config.serviceNamespace ?? fromEnv.serviceNamespace,
    serviceVersion: config.serviceVersion ?? fromEnv.serviceVersion,
    serviceInstanceId: config.serviceInstanceId ?? fromEnv.serviceInstanceId,
    deploymentEnvironment: config.deploymentEnvironment ?? fromEnv.deploymentEnvironment,
    otlpEndpoint: config.otlpEndpoint ?? fromEnv.otlpEndpoint,
    metricsExportIntervalMs: config.metricsExportIntervalMs ?? fromEnv.metricsExportIntervalMs,
    logDirective: fromEnv.logDirective,
    envResourceAttributes: fromEnv.resourceAttributes,
  }
}

const aggregationSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('drop') }),
  z.object({ kind: z.literal('sum') }),
  z.object({ kind: z.literal('lastValue') }),
  z.object({
    kind: z.literal('explicitBucketHistogram'),
    boundaries: z
      .array(z.number().finite())
      .refine((b) => b.every((v, i) => i === 0 || v > (b[i - 1] ?? v)), {
        message: 'histogram boundaries must be strictly increasing',
      }),
    recordMinMax: z.boolean(),
  }),
])

const levelSchema = z.enum(LEVELS)

const configSchema = z.object({
  otlpEndpoint: z.string().url().optional(),
  traceLevel: levelSchema.optional(),
  metricsLevel: levelSchema.optional(),
  logLevel: levelSchema.optional(),
  stdoutLevel: levelSchema.optional(),
  metricsExportIntervalMs: z.number().int().positive().optional(),
  metricsAggregation: z
    .object({
      counter: aggregationSchema.optional(),
      gauge: aggregationSchema.optional(),
      histogram: aggregationSchema.optional(),
    })
    .optional(),
})

/** Checks the values downstream consumers rely on. Throws ConfigurationError. */
export function validateConfig(config: ResolvedConfig): ResolvedConfig {
  const parsed = configSchema.safeParse(config)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    throw new ConfigurationError(`Invalid telemetry configuration (${issues.join('; ')})`, issues)
  }
  return config
}

function parseInterval(raw: string | undefined): number | undefined {
  if (!raw) return undefined
  const value = Number(raw)
  if (Number.isInteger(value) && value > 0) return value
  internalLogger().warn({ value: raw }, 'ignoring invalid OTEL_METRIC_EXPORT_INTERVAL')
  return undefined
}
