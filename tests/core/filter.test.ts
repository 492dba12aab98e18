import { describe, it, expect } from 'vitest'
import { EnvFilter, parseDirectives, resolveFilter, resolveSinkFilters } from '../../src/core/filter.js'

describe('parseDirectives', () => {
  it('reads a default level and per-target overrides', () => {
    expect(parseDirectives('warn,http=debug,db.pool=off')).toEqual({
      defaultLevel: 'warn',
      directives: [
        { target: 'http', level: 'debug' },
        { target: 'db.pool', level: 'off' },
      ],
      rejected: [],
    })
  })

  it('treats a bare target as trace', () => {
    expect(parseDirectives('worker').directives).toEqual([{ target: 'worker', level: 'trace' }])
  })

  it('ignores case and whitespace', () => {
    const parsed = parseDirectives(' INFO , api = Debug ')
    expect(parsed.defaultLevel).toBe('info')
    expect(parsed.directives).toEqual([{ target: 'api', level: 'debug' }])
  })

  it('skips segments it cannot parse', () => {
    const parsed = parseDirectives('info,api=loud,=debug,a b')
    expect(parsed.defaultLevel).toBe('info')
    expect(parsed.directives).toEqual([])
    expect(parsed.rejected).toEqual(['api=loud', '=debug', 'a b'])
  })
})

describe('EnvFilter', () => {
  it('enables levels up to the threshold', () => {
    const filter = EnvFilter.level('warn')
    expect(filter.enabled('error', 'app')).toBe(true)
    expect(filter.enabled('warn', 'app')).toBe(true)
    expect(filter.enabled('info', 'app')).toBe(false)
  })

  it('disables everything at off', () => {
    const filter = EnvFilter.level('off')
    expect(filter.enabled('error', 'app')).toBe(false)
  })

  it('uses the most specific matching directive', () => {
    const filter = EnvFilter.parse('info,db=warn,db.pool=trace')
    expect(filter.maxLevel('db.pool.acquire')).toBe('trace')
    expect(filter.maxLevel('db.query')).toBe('warn')
    expect(filter.maxLevel('db')).toBe('warn')
    expect(filter.maxLevel('http')).toBe('info')
  })

  it('matches targets only on a segment boundary', () => {
    const filter = EnvFilter.parse('error,db=trace')
    expect(filter.maxLevel('db:pool')).toBe('trace')
    expect(filter.maxLevel('db/pool')).toBe('trace')
    expect(filter.maxLevel('dbx')).toBe('error')
  })

  it('turns unnamed targets off when only target directives are given', () => {
    const filter = EnvFilter.parse('db=trace')
    expect(filter.defaultLevel).toBe('off')
    expect(filter.enabled('info', 'db.pool')).toBe(true)
    expect(filter.enabled('error', 'http')).toBe(false)
  })

  it('falls back to error when no segment parses', () => {
    const filter = EnvFilter.parse('bogus!!')
    expect(filter.toString()).toBe('error')
    expect(filter.rejected).toEqual(['bogus!!'])
    expect(filter.enabled('error', 'app')).toBe(true)
    expect(filter.enabled('warn', 'app')).toBe(false)
  })

  it('prints back as a directive string', () => {
    expect(EnvFilter.parse('warn,a=debug,abc=off').toString()).toBe('warn,abc=off,a=debug')
  })
})

describe('resolveFilter', () => {
  it('uses an explicit level and ignores env directives', () => {
    const filter = resolveFilter('error', 'trace,db=trace')
    expect(filter.toString()).toBe('error')
    expect(filter.enabled('debug', 'db')).toBe(false)
  })

  it('parses the env directive when no explicit level is given', () => {
    const filter = resolveFilter(undefined, 'warn,db=debug')
    expect(filter.enabled('debug', 'db')).toBe(true)
    expect(filter.enabled('info', 'app')).toBe(false)
  })

  it('defaults to error with neither', () => {
    const filter = resolveFilter(undefined, undefined)
    expect(filter.toString()).toBe('error')
    expect(filter.enabled('info', 'app')).toBe(false)
    expect(filter.enabled('error', 'app')).toBe(true)
  })
})

describe('resolveSinkFilters', () => {
  it('resolves each sink independently', () => {
    const filters = resolveSinkFilters({ traceLevel: 'trace', metricsLevel: 'off', logDirective: 'warn' })
    expect(filters.traces.toString()).toBe('trace')
    expect(filters.metrics.toString()).toBe('off')
    expect(filters.logs.toString()).toBe('warn')
    expect(filters.stdout.toString()).toBe('warn')
  })

  it('falls back to the log level for the console', () => {
    const filters = resolveSinkFilters({ logLevel: 'error', logDirective: 'trace' })
    expect(filters.stdout.toString()).toBe('error')
  })

  it('uses the env directive for the console when both levels are unset', () => {
    const filters = resolveSinkFilters({ logDirective: 'debug,http=off' })
    expect(filters.stdout.toString()).toBe('debug,http=off')
  })

  it('lets an explicit console level override the log level', () => {
    const filters = resolveSinkFilters({ logLevel: 'error', stdoutLevel: 'debug' })
    expect(filters.stdout.toString()).toBe('debug')
    expect(filters.logs.toString()).toBe('error')
  })
})
