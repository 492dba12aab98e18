#!/usr/bin/env node
// src/cli/index.ts
import { realpathSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { Command, InvalidArgumentError } from 'commander'
import type { Env, TelemetryConfig } from '../core/config.js'
import { getLogger, inSpan } from '../core/events.js'
import { initWithConfig, planTelemetry } from '../core/pipeline.js'
import type { Logger } from '../core/pipeline.js'
import { LIBRARY_NAME, LIBRARY_VERSION } from '../core/resource.js'
import { isLevel } from '../core/types.js'
import type { Level, Result } from '../core/types.js'
import type { TryInitError } from '../core/errors.js'
import { buildReport } from '../report/base.js'
import { JsonFormatter } from '../report/json.js'
import { MarkdownFormatter } from '../report/markdown.js'

interface CliDeps {
  env?: Env
  init?: (config: TelemetryConfig) => Result<Logger, TryInitError>
  write?: (s: string) => void
}

interface ConfigOptions {
  endpoint?: string
  serviceName?: string
  environment?: string
  traceLevel?: Level
  metricsLevel?: Level
  logLevel?: Level
  stdoutLevel?: Level
}

export function buildCli(deps: CliDeps = {}): Command {
  const write = deps.write ?? ((s: string) => process.stdout.write(s + '\n'))

  const program = new Command()
  program
    .name(LIBRARY_NAME)
    .description('Inspect and exercise the OpenTelemetry bootstrap')
    .version(LIBRARY_VERSION)

  // ---- inspect command ----
  withConfigOptions(program.command('inspect'))
    .description('Print the resolved resource and per-sink filters')
    .option('--output <fmt>', 'output format: json | markdown', 'json')
    .action((opts: ConfigOptions & { output: string }) => {
      const plan = planTelemetry(toConfig(opts), deps.env ?? process.env)
      const formatter = opts.output === 'markdown' ? new MarkdownFormatter() : new JsonFormatter()
      write(formatter.format(buildReport(plan)))
    })

  // ---- demo command ----
  withConfigOptions(program.command('demo'))
    .description('Initialize telemetry, emit a span, events and metrics, then shut down')
    .action(async (opts: ConfigOptions) => {
      const result = (deps.init ?? initWithConfig)({ ...toConfig(opts), shutdownOnExit: false })
      if (!result.ok) throw result.error

      const log = getLogger(`${LIBRARY_NAME}.demo`)
      await inSpan('demo', async () => {
        log.info({ 'monotonic_counter.demo.runs': 1 }, 'demo started')
        log.debug({ a: 5, b: 2, 'histogram.demo.sum': 7 }, 'adding two numbers')
        log.warn('demo warning event')
        log.error('demo error event')
      })

      const failure = await result.value.shutdown()
      write(JSON.stringify({ mode: result.value.kind, shutdown: failure?.message ?? 'ok' }, null, 2))
    })

  return program
}

function withConfigOptions(cmd: Command): Command {
  return cmd
    .option('-e, --endpoint <url>', 'OTLP collector endpoint')
    .option('-s, --service-name <name>', 'service.name resource attribute')
    .option('--environment <name>', 'deployment.environment.name resource attribute')
    .option('--trace-level <level>', 'trace sink level', parseLevel)
    .option('--metrics-level <level>', 'metrics sink level', parseLevel)
    .option('--log-level <level>', 'log sink level', parseLevel)
    .option('--stdout-level <level>', 'console sink level', parseLevel)
}

function toConfig(opts: ConfigOptions): TelemetryConfig {
  return {
    otlpEndpoint: opts.endpoint,
    serviceName: opts.serviceName,
    deploymentEnvironment: opts.environment,
    traceLevel: opts.traceLevel,
    metricsLevel: opts.metricsLevel,
    logLevel: opts.logLevel,
    stdoutLevel: opts.stdoutLevel,
  }
}

function parseLevel(value: string): Level {
  const level = value.toLowerCase()
  if (!isLevel(level)) throw new InvalidArgumentError(`unknown level "${value}"`)
  return level
}

/** True when `scriptPath` (usually `process.argv[1]`, possibly a bin symlink) resolves to `moduleUrl`. */
export function isEntrypoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (scriptPath === undefined) return false
  try {
    return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl))
  } catch {
    return false
  }
}

// Direct entrypoint - only runs when file is executed directly
if (isEntrypoint(process.argv[1], import.meta.url)) {
  const program = buildCli()
  program.parseAsync(process.argv).catch((e: unknown) => {
    process.stderr.write(String(e) + '\n')
    process.exit(1)
  })
}
