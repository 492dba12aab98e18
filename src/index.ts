// src/index.ts
export { init, tryInit, initWithConfig, withTelemetry, planTelemetry } from './core/pipeline.js'
export type {
  Logger,
  WithEndpointLogger,
  StdoutOnlyLogger,
  SignalProviders,
  TelemetryPlan,
} from './core/pipeline.js'
export {
  configBuilder,
  ConfigBuilder,
  metricsAggregationBuilder,
  MetricsAggregationBuilder,
  loadConfig,
  resolveConfig,
} from './core/config.js'
export type {
  TelemetryConfig,
  ResolvedConfig,
  MetricsAggregation,
  MetricsAggregationConfig,
} from './core/config.js'
export {
  getLogger,
  inSpan,
  currentSpan,
  injectTraceContext,
  extractTraceContext,
  withTraceContext,
} from './core/events.js'
export type { EventLogger, SpanOptions } from './core/events.js'
export { EnvFilter, resolveFilter, resolveSinkFilters, parseDirectives } from './core/filter.js'
export { assembleResource } from './core/resource.js'
export { TelemetryLifecycle } from './core/lifecycle.js'
export type { LifecycleState } from './core/lifecycle.js'
export {
  ConfigurationError,
  ExportSetupError,
  RegistryAlreadyInitializedError,
  AlreadyShutdownError,
  ShutdownError,
  TryInitError,
} from './core/errors.js'
export type { Level, EventLevel, SignalKind, Fields, Result } from './core/types.js'
export type { ExporterFactories } from './providers/base.js'
