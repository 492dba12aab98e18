// src/core/filter.ts
import { isLevel, levelRank } from './types.js'
import type { EventLevel, Level, SinkName } from './types.js'

/** Level applied when neither an explicit level nor a usable LOG_LEVEL names one. */
export const DEFAULT_LEVEL: Level = 'error'

export interface Directive {
  readonly target: string
  readonly level: Level
}

export interface ParsedDirectives {
  defaultLevel: Level | undefined
  directives: Directive[]
  /** Segments that could not be parsed; they are skipped. */
  rejected: string[]
}

/**
 * Parse a directive string such as `warn,http=debug,db.pool=off`.
 *
 * A bare level sets the default, `target=level` overrides it for a target and
 * everything below it, and a bare target enables it at `trace`.
 */
export function parseDirectives(input: string): ParsedDirectives {
  const parsed: ParsedDirectives = { defaultLevel: undefined, directives: [], rejected: [] }

  for (const raw of input.split(',')) {
    const segment = raw.trim()
    if (!segment) continue

    const eq = segment.indexOf('=')
    if (eq === -1) {
      const level = segment.toLowerCase()
      if (isLevel(level)) {
        parsed.defaultLevel = level
      } else if (isTarget(segment)) {
        parsed.directives.push({ target: segment, level: 'trace' })
      } else {
        parsed.rejected.push(segment)
      }
      continue
    }

    const target = segment.slice(0, eq).trim()
    const level = segment.slice(eq + 1).trim().toLowerCase()
    if (isTarget(target) && isLevel(level)) {
      parsed.directives.push({ target, level })
    } else {
      parsed.rejected.push(segment)
    }
  }

  return parsed
}

export class EnvFilter {
  readonly directives: readonly Directive[]

  constructor(
    readonly defaultLevel: Level,
    directives: readonly Directive[] = [],
    readonly rejected: readonly string[] = [],
  ) {
    // longest target first so the most specific directive matches
    this.directives = [...directives].sort((a, b) => b.target.length - a.target.length)
  }

  static level(level: Level): EnvFilter {
    return new EnvFilter(level)
  }

  /**
   * Without a bare level, targets no directive names are off when some
   * directive was given, and at DEFAULT_LEVEL when none parsed at all.
   */
  static parse(directive: string): EnvFilter {
    const parsed = parseDirectives(directive)
    const fallback = parsed.directives.length > 0 ? 'off' : DEFAULT_LEVEL
    return new EnvFilter(parsed.defaultLevel ?? fallback, parsed.directives, parsed.rejected)
  }

  maxLevel(target: string): Level {
    for (const d of this.directives) {
      if (matchesTarget(d.target, target)) return d.level
    }
    return this.defaultLevel
  }

  enabled(level: EventLevel, target: string): boolean {
    const max = this.maxLevel(target)
    return max !== 'off' && levelRank(level) <= levelRank(max)
  }

  toString(): string {
    return [this.defaultLevel, ...this.directives.map((d) => `${d.target}=${d.level}`)].join(',')
  }
}

/**
 * Effective filter for one sink. An explicit level is used as-is and ignores
 * any per-target directives from the environment.
 */
export function resolveFilter(explicit: Level | undefined, envDirective: string | undefined): EnvFilter {
  if (explicit !== undefined) return EnvFilter.level(explicit)
  return envDirective === undefined ? EnvFilter.level(DEFAULT_LEVEL) : EnvFilter.parse(envDirective)
}

export interface SinkLevels {
  traceLevel?: Level
  metricsLevel?: Level
  logLevel?: Level
  stdoutLevel?: Level
  logDirective?: string
}

export type SinkFilters = Record<SinkName, EnvFilter>

/** The console follows the log signal unless it has its own level. */
export function resolveSinkFilters(levels: SinkLevels): SinkFilters {
  return {
    traces: resolveFilter(levels.traceLevel, levels.logDirective),
    metrics: resolveFilter(levels.metricsLevel, levels.logDirective),
    logs: resolveFilter(levels.logLevel, levels.logDirective),
    stdout: resolveFilter(levels.stdoutLevel ?? levels.logLevel, levels.logDirective),
  }
}

function matchesTarget(directive: string, target: string): boolean {
  if (target === directive) return true
  return target.startsWith(directive) && ['.', ':', '/'].includes(target.charAt(directive.length))
}

function isTarget(value: string): boolean {
  return /^[\w.:/@-]+$/.test(value)
}
