// src/core/pipeline.ts
import type { Resource } from '@opentelemetry/resources'
import { resolveConfig, validateConfig } from './config.js'
import type { Env, ResolvedConfig, TelemetryConfig } from './config.js'
import { composeDispatch, installDispatch, isDispatchInstalled } from './dispatch.js'
import {
  ConfigurationError,
  ExportSetupError,
  RegistryAlreadyInitializedError,
  TryInitError,
} from './errors.js'
import type { ShutdownError } from './errors.js'
import { resolveSinkFilters } from './filter.js'
import type { EnvFilter, SinkFilters } from './filter.js'
import { TelemetryLifecycle } from './lifecycle.js'
import type { LifecycleState } from './lifecycle.js'
import { createConsoleLogger, internalLogger } from './logger.js'
import { assembleResource, LIBRARY_NAME, LIBRARY_VERSION } from './resource.js'
import type { Result } from './types.js'
import { ConsoleLayer } from '../layers/console.js'
import { LogLayer } from '../layers/logs.js'
import { MetricsLayer } from '../layers/metrics.js'
import { TraceLayer } from '../layers/trace.js'
import type { Layer } from '../layers/base.js'
import type { ManagedProvider } from '../providers/base.js'
import { createLogProvider } from '../providers/logs.js'
import type { LogProviderHandle } from '../providers/logs.js'
import { createMetricsProvider } from '../providers/metrics.js'
import type { MetricsProviderHandle } from '../providers/metrics.js'
import { createTraceProvider } from '../providers/trace.js'
import type { TraceProviderHandle } from '../providers/trace.js'

export interface SignalProviders {
  readonly traces: TraceProviderHandle
  readonly metrics: MetricsProviderHandle
  readonly logs: LogProviderHandle
}

interface LoggerBase {
  /** Flush, then release every provider. Idempotent; never rejects. */
  shutdown(): Promise<ShutdownError | undefined>
  forceFlush(): Promise<void>
}

export interface WithEndpointLogger extends LoggerBase {
  readonly kind: 'WithEndpoint'
  readonly providers: SignalProviders
  readonly state: LifecycleState
}

export interface StdoutOnlyLogger extends LoggerBase {
  readonly kind: 'StdoutOnly'
}

export type Logger = WithEndpointLogger | StdoutOnlyLogger

export interface TelemetryPlan {
  config: ResolvedConfig
  mode: Logger['kind']
  resource: Resource
  filters: SinkFilters
}

/** Everything initialization decides before it touches global state. Throws ConfigurationError. */
export function planTelemetry(config: TelemetryConfig = {}, env: Env = process.env): TelemetryPlan {
  const resolved = validateConfig(resolveConfig(config, env))
  return {
    config: resolved,
    mode: resolved.otlpEndpoint === undefined ? 'StdoutOnly' : 'WithEndpoint',
    resource: assembleResource(resolved),
    filters: resolveSinkFilters(resolved),
  }
}

/** Reads every setting from the environment. Throws TryInitError on failure. */
export function init(): Logger {
  const result = tryInit()
  if (!result.ok) throw result.error
  return result.value
}

export function tryInit(): Result<Logger, TryInitError> {
  return initWithConfig({})
}

/** Fields the caller sets are used as-is; unset ones fall back to the environment. */
export function initWithConfig(config: TelemetryConfig): Result<Logger, TryInitError> {
  try {
    return { ok: true, value: install(planTelemetry(config)) }
  } catch (err) {
    return { ok: false, error: toTryInitError(err) }
  }
}

/** Scoped form: the logger is shut down when `fn` settles, whatever the outcome. */
export async function withTelemetry<T>(
  fn: (logger: Logger) => T | Promise<T>,
  config: TelemetryConfig = {},
): Promise<T> {
  const result = initWithConfig({ shutdownOnExit: false, ...config })
  if (!result.ok) throw result.error
  try {
    return await fn(result.value)
  } finally {
    await result.value.shutdown()
  }
}

function install(plan: TelemetryPlan): Logger {
  // checked up front so a rejected install never builds providers
  if (isDispatchInstalled()) throw new RegistryAlreadyInitializedError()
  warnRejectedDirectives(plan.filters)

  const { config, resource, filters } = plan
  const stdoutLayer = new ConsoleLayer(createConsoleLogger(config.stdout))

  if (config.otlpEndpoint === undefined) {
    installDispatch(composeDispatch([[stdoutLayer, filters.stdout]]))
    return stdoutOnly()
  }

  const providers = buildProviders(config.otlpEndpoint, resource, config)
  const layers: Array<[Layer, EnvFilter]> = [
    [stdoutLayer, filters.stdout],
    [new TraceLayer(providers.traces.provider.getTracer(LIBRARY_NAME, LIBRARY_VERSION)), filters.traces],
    [new MetricsLayer(providers.metrics.provider.getMeter(LIBRARY_NAME, LIBRARY_VERSION)), filters.metrics],
    [new LogLayer(providers.logs.provider.getLogger(LIBRARY_NAME, LIBRARY_VERSION)), filters.logs],
  ]
  installDispatch(composeDispatch(layers))

  const lifecycle = new TelemetryLifecycle([providers.traces, providers.metrics, providers.logs], {
    shutdownOnExit: config.shutdownOnExit,
  })
  return {
    kind: 'WithEndpoint',
    providers,
    get state() {
      return lifecycle.state
    },
    shutdown: () => lifecycle.shutdown(),
    forceFlush: () => lifecycle.forceFlush(),
  }
}

function stdoutOnly(): StdoutOnlyLogger {
  return {
    kind: 'StdoutOnly',
    shutdown: () => Promise.resolve(undefined),
    forceFlush: () => Promise.resolve(),
  }
}

/** All three or none: a failure releases whatever was already built. */
function buildProviders(endpoint: string, resource: Resource, config: ResolvedConfig): SignalProviders {
  const built: ManagedProvider[] = []
  try {
    const traces = createTraceProvider(endpoint, resource, { exporter: config.exporters?.traces })
    built.push(traces)
    const metrics = createMetricsProvider(endpoint, resource, {
      exporter: config.exporters?.metrics,
      aggregation: config.metricsAggregation,
      exportIntervalMs: config.metricsExportIntervalMs,
    })
    built.push(metrics)
    const logs = createLogProvider(endpoint, resource, { exporter: config.exporters?.logs })
    return { traces, metrics, logs }
  } catch (err) {
    void new TelemetryLifecycle(built, { shutdownOnExit: false }).shutdown()
    throw err
  }
}

function warnRejectedDirectives(filters: SinkFilters): void {
  const rejected = new Set<string>()
  for (const filter of Object.values(filters)) {
    for (const segment of filter.rejected) rejected.add(segment)
  }
  if (rejected.size > 0) {
    internalLogger().warn({ rejected: [...rejected] }, 'ignoring invalid LOG_LEVEL directives')
  }
}

function toTryInitError(err: unknown): TryInitError {
  if (err instanceof ConfigurationError) {
    return new TryInitError('Failed to configure telemetry', err)
  }
  if (err instanceof ExportSetupError) {
    return new TryInitError(`Failed to initialize the ${err.signal} pipeline`, err, err.signal)
  }
  if (err instanceof RegistryAlreadyInitializedError) {
    return new TryInitError('Could not install the telemetry dispatch', err)
  }
  return new TryInitError('Unexpected failure', err)
}
