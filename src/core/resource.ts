// src/core/resource.ts
import { defaultResource, emptyResource, resourceFromAttributes } from '@opentelemetry/resources'
import type { Resource } from '@opentelemetry/resources'
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions'
import type { Attributes } from '@opentelemetry/api'
import type { ResolvedConfig } from './config.js'

export const LIBRARY_NAME = 'otlp-bootstrap'
export const LIBRARY_VERSION = '0.1.0'

// Incubating semantic convention keys, pinned here rather than importing the unstable entry point
export const ATTR_SERVICE_NAMESPACE = 'service.namespace'
export const ATTR_SERVICE_INSTANCE_ID = 'service.instance.id'
export const ATTR_DEPLOYMENT_ENVIRONMENT_NAME = 'deployment.environment.name'
export const ATTR_TELEMETRY_DISTRO_NAME = 'telemetry.distro.name'
export const ATTR_TELEMETRY_DISTRO_VERSION = 'telemetry.distro.version'
export const ATTR_OS_TYPE = 'os.type'
export const ATTR_PROCESS_COMMAND_ARGS = 'process.command_args'
export const ATTR_PROCESS_PID = 'process.pid'
export const ATTR_PROCESS_EXECUTABLE_PATH = 'process.executable.path'

export type ResourceDetector = () => Attributes

export interface ProcessInfo {
  argv: readonly string[]
  pid: number
  platform: NodeJS.Platform
  execPath: () => string
}

const OS_TYPES: Partial<Record<NodeJS.Platform, string>> = {
  win32: 'windows',
  sunos: 'solaris',
}

export function currentProcess(): ProcessInfo {
  return {
    argv: process.argv,
    pid: process.pid,
    platform: process.platform,
    execPath: () => process.execPath,
  }
}

/** `telemetry.sdk.*` plus the SDK's fallback `service.name`. */
export function sdkDetector(): Attributes {
  return defaultResource().attributes
}

export function libraryDetector(): Attributes {
  return {
    [ATTR_TELEMETRY_DISTRO_NAME]: LIBRARY_NAME,
    [ATTR_TELEMETRY_DISTRO_VERSION]: LIBRARY_VERSION,
  }
}

export function osDetector(info: ProcessInfo = currentProcess()): Attributes {
  return { [ATTR_OS_TYPE]: OS_TYPES[info.platform] ?? info.platform }
}

export function processDetector(info: ProcessInfo = currentProcess()): Attributes {
  return {
    [ATTR_PROCESS_COMMAND_ARGS]: [...info.argv],
    [ATTR_PROCESS_PID]: info.pid,
    [ATTR_PROCESS_EXECUTABLE_PATH]: executablePath(info),
  }
}

/** Parses `OTEL_RESOURCE_ATTRIBUTES` (`key=value,key2=value2`, values percent-encoded). */
export function envAttributes(raw: string | undefined): Attributes {
  const attributes: Attributes = {}
  if (!raw) return attributes

  for (const pair of raw.split(',')) {
    const eq = pair.indexOf('=')
    if (eq <= 0) continue
    const key = pair.slice(0, eq).trim()
    const value = decodeValue(pair.slice(eq + 1).trim())
    if (key && value !== undefined) attributes[key] = value
  }
  return attributes
}

export function explicitAttributes(config: ResolvedConfig): Attributes {
  const attributes: Attributes = {}
  if (config.serviceName !== undefined) attributes[ATTR_SERVICE_NAME] = config.serviceName
  if (config.serviceNamespace !== undefined) attributes[ATTR_SERVICE_NAMESPACE] = config.serviceNamespace
  if (config.serviceVersion !== undefined) attributes[ATTR_SERVICE_VERSION] = config.serviceVersion
  if (config.serviceInstanceId !== undefined) attributes[ATTR_SERVICE_INSTANCE_ID] = config.serviceInstanceId
  if (config.deploymentEnvironment !== undefined) {
    attributes[ATTR_DEPLOYMENT_ENVIRONMENT_NAME] = config.deploymentEnvironment
  }
  return { ...attributes, ...config.resourceAttributes }
}

export interface ResourceDetectors {
  sdk: ResourceDetector
  library: ResourceDetector
  os: ResourceDetector
  process: ResourceDetector
}

export const defaultDetectors: ResourceDetectors = {
  sdk: sdkDetector,
  library: libraryDetector,
  os: () => osDetector(),
  process: () => processDetector(),
}

/**
 * Merge detected and explicit attributes. Later sources win on key collision:
 * sdk, library, os, process, OTEL_RESOURCE_ATTRIBUTES, then the caller's fields.
 */
export function assembleResource(
  config: ResolvedConfig,
  detectors: ResourceDetectors = defaultDetectors,
): Resource {
  const sources: Attributes[] = [
    detectors.sdk(),
    detectors.library(),
    detectors.os(),
    detectors.process(),
    envAttributes(config.envResourceAttributes),
    explicitAttributes(config),
  ]
  return sources.reduce<Resource>(
    (resource, attributes) => resource.merge(resourceFromAttributes(attributes)),
    emptyResource(),
  )
}

function executablePath(info: ProcessInfo): string {
  try {
    return info.execPath()
  } catch {
    return ''
  }
}

function decodeValue(value: string): string | undefined {
  try {
    return decodeURIComponent(value)
  } catch {
    return undefined
  }
}
