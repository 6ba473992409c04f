import { CONFIG_FILE_PATH } from './config'
import { asRecord } from './env-config'

export type ServiceSpec = {
  override: 'replace' | 'merge'
  summary?: string
  startup: 'enabled' | 'disabled'
  command: string
  environment: Record<string, string>
}

export type ServiceLayer = {
  summary?: string
  description?: string
  services: Record<string, ServiceSpec>
}

export type ServicePlan = {
  services: Record<string, unknown>
}

export const buildServiceEnvironment = (podAddress: string): Record<string, string> => ({
  GOTRACEBACK: 'crash',
  GRPC_GO_LOG_VERBOSITY_LEVEL: '99',
  GRPC_GO_LOG_SEVERITY_LEVEL: 'info',
  GRPC_TRACE: 'all',
  GRPC_VERBOSITY: 'DEBUG',
  POD_IP: podAddress,
  MANAGED_BY_CONFIG_POD: 'true',
})

export const buildServiceLayer = (serviceName: string, podAddress: string): ServiceLayer => ({
  services: {
    [serviceName]: {
      override: 'replace',
      startup: 'enabled',
      command: `/bin/ausf --ausfcfg ${CONFIG_FILE_PATH}`,
      environment: buildServiceEnvironment(podAddress),
    },
  },
})

export const canonicalizeForCompare = (value: unknown): unknown => {
  if (value == null) return null
  if (Array.isArray(value)) return value.map((entry) => canonicalizeForCompare(entry))
  if (typeof value !== 'object') return value

  const record = asRecord(value)
  if (!record) return value

  const output: Record<string, unknown> = {}
  for (const key of Object.keys(record).sort()) {
    const entry = record[key]
    if (entry === undefined) continue
    output[key] = canonicalizeForCompare(entry)
  }
  return output
}

export const stableJsonStringify = (value: unknown) => JSON.stringify(canonicalizeForCompare(value))

export const servicesEqual = (current: Record<string, unknown>, desired: Record<string, unknown>) =>
  stableJsonStringify(current) === stableJsonStringify(desired)
