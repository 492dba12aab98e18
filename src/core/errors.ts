// src/core/errors.ts
import type { SignalKind } from './types.js'

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export class ExportSetupError extends Error {
  constructor(
    public readonly signal: SignalKind,
    cause: unknown,
  ) {
    super(`Failed to set up ${signal} exporter: ${describe(cause)}`, { cause })
    this.name = 'ExportSetupError'
  }
}

export class RegistryAlreadyInitializedError extends Error {
  constructor() {
    super('A telemetry dispatch is already installed for this process')
    this.name = 'RegistryAlreadyInitializedError'
  }
}

export class AlreadyShutdownError extends Error {
  constructor(public readonly signal: SignalKind) {
    super(`${signal} provider is already shut down`)
    this.name = 'AlreadyShutdownError'
  }
}

export interface ShutdownFailure {
  signal: SignalKind
  error: Error
}

export class ShutdownError extends Error {
  constructor(public readonly failures: readonly ShutdownFailure[]) {
    super(
      `Telemetry shutdown failed for ${failures.length} provider(s): ` +
        failures.map((f) => `${f.signal}: ${f.error.message}`).join('; '),
    )
    this.name = 'ShutdownError'
  }
}

export class TryInitError extends Error {
  constructor(
    message: string,
    cause: unknown,
    public readonly signal?: SignalKind,
  ) {
    super(`Error initializing telemetry: ${message}`, { cause })
    this.name = 'TryInitError'
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

function describe(value: unknown): string {
  return value instanceof Error ? value.message : String(value)
}
