import { describe, it, expect, vi } from 'vitest'
import { TelemetryLifecycle } from '../../src/core/lifecycle.js'
import { AlreadyShutdownError, ShutdownError } from '../../src/core/errors.js'
import type { ManagedProvider } from '../../src/providers/base.js'
import type { SignalKind } from '../../src/core/types.js'

function fakeProvider(signal: SignalKind, shutdown: () => Promise<void> = async () => {}): ManagedProvider {
  return {
    signal,
    forceFlush: vi.fn().mockResolvedValue(undefined),
    shutdown: vi.fn(shutdown),
  }
}

describe('TelemetryLifecycle', () => {
  it('shuts down every provider once and ends in ShutDown', async () => {
    const providers = [fakeProvider('traces'), fakeProvider('metrics'), fakeProvider('logs')]
    const lifecycle = new TelemetryLifecycle(providers, { shutdownOnExit: false })
    expect(lifecycle.state).toBe('Active')

    await expect(lifecycle.shutdown()).resolves.toBeUndefined()
    expect(lifecycle.state).toBe('ShutDown')
    for (const p of providers) expect(p.shutdown).toHaveBeenCalledOnce()
  })

  it('treats a second shutdown as a no-op', async () => {
    const providers = [fakeProvider('traces'), fakeProvider('metrics'), fakeProvider('logs')]
    const lifecycle = new TelemetryLifecycle(providers, { shutdownOnExit: false })

    const first = await lifecycle.shutdown()
    const second = await lifecycle.shutdown()
    expect(first).toBeUndefined()
    expect(second).toBeUndefined()
    for (const p of providers) expect(p.shutdown).toHaveBeenCalledOnce()
  })

  it('joins a shutdown already in progress', async () => {
    let release: () => void = () => {}
    const slow = fakeProvider('traces', () => new Promise<void>((resolve) => { release = resolve }))
    const lifecycle = new TelemetryLifecycle([slow], { shutdownOnExit: false })

    const a = lifecycle.shutdown()
    const b = lifecycle.shutdown()
    expect(lifecycle.state).toBe('ShuttingDown')
    expect(b).toBe(a)
    release()
    await a
    expect(slow.shutdown).toHaveBeenCalledOnce()
  })

  it('lets the others finish when one provider fails and reports exactly that one', async () => {
    const traces = fakeProvider('traces')
    const metrics = fakeProvider('metrics', async () => {
      throw new Error('collector unreachable')
    })
    const logs = fakeProvider('logs')
    const lifecycle = new TelemetryLifecycle([traces, metrics, logs], { shutdownOnExit: false })

    const error = await lifecycle.shutdown()
    expect(error).toBeInstanceOf(ShutdownError)
    expect(error?.failures).toHaveLength(1)
    expect(error?.failures[0]?.signal).toBe('metrics')
    expect(error?.failures[0]?.error.message).toBe('collector unreachable')
    expect(traces.shutdown).toHaveBeenCalledOnce()
    expect(logs.shutdown).toHaveBeenCalledOnce()
    expect(lifecycle.state).toBe('ShutDown')
  })

  it('drops AlreadyShutdownError from the aggregate', async () => {
    const done = fakeProvider('logs', async () => {
      throw new AlreadyShutdownError('logs')
    })
    const lifecycle = new TelemetryLifecycle([done, fakeProvider('traces')], { shutdownOnExit: false })
    await expect(lifecycle.shutdown()).resolves.toBeUndefined()
  })

  it('wraps non-Error rejections', async () => {
    const odd = fakeProvider('traces', () => Promise.reject('string reason'))
    const error = await new TelemetryLifecycle([odd], { shutdownOnExit: false }).shutdown()
    expect(error?.failures[0]?.error.message).toBe('string reason')
  })

  it('flushes without releasing', async () => {
    const providers = [fakeProvider('traces'), fakeProvider('logs')]
    const lifecycle = new TelemetryLifecycle(providers, { shutdownOnExit: false })
    await lifecycle.forceFlush()
    for (const p of providers) {
      expect(p.forceFlush).toHaveBeenCalledOnce()
      expect(p.shutdown).not.toHaveBeenCalled()
    }
    expect(lifecycle.state).toBe('Active')
  })

  it('registers a beforeExit hook and removes it on shutdown', async () => {
    const before = process.listenerCount('beforeExit')
    const lifecycle = new TelemetryLifecycle([fakeProvider('traces')])
    expect(process.listenerCount('beforeExit')).toBe(before + 1)
    await lifecycle.shutdown()
    expect(process.listenerCount('beforeExit')).toBe(before)
  })

  it('shuts down from the beforeExit hook when the caller never did', async () => {
    const provider = fakeProvider('traces')
    const lifecycle = new TelemetryLifecycle([provider])
    process.emit('beforeExit', 0)
    await vi.waitFor(() => expect(lifecycle.state).toBe('ShutDown'))
    expect(provider.shutdown).toHaveBeenCalledOnce()
  })
})
