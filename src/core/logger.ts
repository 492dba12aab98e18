// src/core/logger.ts
import pino from 'pino'
import type { DiagLogger } from '@opentelemetry/api'

export interface LoggerOptions {
  level?: string
  file?: string
}

export function createLogger(opts: LoggerOptions = {}): pino.Logger {
  const level = opts.level ?? 'info'

  if (opts.file) {
    return pino({ level }, pino.destination(opts.file))
  }

  // Always log to stderr — stdout belongs to the console sink
  return pino({ level }, process.stderr)
}

let internal: pino.Logger | undefined

/** Logger for the library's own warnings (rejected directives, shutdown failures, layer errors). */
export function internalLogger(): pino.Logger {
  internal ??= createLogger({
    level: process.env['OTLP_BOOTSTRAP_LOG_LEVEL'] ?? 'warn',
    file: process.env['OTLP_BOOTSTRAP_LOG_FILE'] || undefined,
  })
  return internal
}

/**
 * Logger behind the console sink. Filtering happens in the dispatch layer, so
 * pino itself accepts every level.
 */
export function createConsoleLogger(destination: pino.DestinationStream = process.stdout): pino.Logger {
  return pino(
    {
      level: 'trace',
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label }),
      },
    },
    destination,
  )
}

/** Routes OpenTelemetry's own diagnostics into a pino logger. */
export function pinoDiagLogger(log: pino.Logger): DiagLogger {
  return {
    error: (message, ...args) => log.error({ args, source: 'otel' }, message),
    warn: (message, ...args) => log.warn({ args, source: 'otel' }, message),
    info: (message, ...args) => log.info({ args, source: 'otel' }, message),
    debug: (message, ...args) => log.debug({ args, source: 'otel' }, message),
    verbose: (message, ...args) => log.trace({ args, source: 'otel' }, message),
  }
}
