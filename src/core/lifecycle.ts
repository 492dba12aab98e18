// src/core/lifecycle.ts
import { AlreadyShutdownError, ShutdownError, toError } from './errors.js'
import type { ShutdownFailure } from './errors.js'
import { internalLogger } from './logger.js'
import type { ManagedProvider } from '../providers/base.js'

export type LifecycleState = 'Active' | 'ShuttingDown' | 'ShutDown'

export interface LifecycleOptions {
  /** Register a `beforeExit` hook that shuts down if the caller never did. */
  shutdownOnExit?: boolean
}

/**
 * Owns the provider handles and releases them exactly once. Every provider
 * gets its flush attempt even when another one fails; failures are collected
 * into a ShutdownError that is logged and returned, never thrown.
 */
export class TelemetryLifecycle {
  private current: LifecycleState = 'Active'
  private pending: Promise<ShutdownError | undefined> | undefined
  private readonly exitHook: (() => void) | undefined

  constructor(
    private readonly providers: readonly ManagedProvider[],
    opts: LifecycleOptions = {},
  ) {
    if (opts.shutdownOnExit ?? true) {
      this.exitHook = () => {
        void this.shutdown()
      }
      process.once('beforeExit', this.exitHook)
    }
  }

  get state(): LifecycleState {
    return this.current
  }

  shutdown(): Promise<ShutdownError | undefined> {
    if (this.current === 'ShutDown') return Promise.resolve(undefined)
    if (this.pending !== undefined) return this.pending

    this.current = 'ShuttingDown'
    if (this.exitHook !== undefined) process.off('beforeExit', this.exitHook)

    this.pending = this.release().finally(() => {
      this.current = 'ShutDown'
      this.pending = undefined
    })
    return this.pending
  }

  /** Flushes every provider without releasing it. Failures are logged. */
  async forceFlush(): Promise<void> {
    if (this.current !== 'Active') return
    const failures = await settle(this.providers, (p) => p.forceFlush())
    if (failures.length > 0) {
      internalLogger().warn({ err: new ShutdownError(failures) }, 'telemetry flush completed with errors')
    }
  }

  private async release(): Promise<ShutdownError | undefined> {
    const failures = await settle(this.providers, (p) => p.shutdown())
    if (failures.length === 0) return undefined

    const error = new ShutdownError(failures)
    internalLogger().warn({ err: error }, 'telemetry shutdown completed with errors')
    return error
  }
}

async function settle(
  providers: readonly ManagedProvider[],
  op: (provider: ManagedProvider) => Promise<void>,
): Promise<ShutdownFailure[]> {
  const settlements = await Promise.allSettled(providers.map(op))
  const failures: ShutdownFailure[] = []

  settlements.forEach((s, i) => {
    const provider = providers[i]
    if (s.status === 'fulfilled' || provider === undefined) return
    if (s.reason instanceof AlreadyShutdownError) return
    failures.push({ signal: provider.signal, error: toError(s.reason) })
  })

  return failures
}
