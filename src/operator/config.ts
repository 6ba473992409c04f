import { hostname } from 'node:os'
import { isAbsolute } from 'node:path'
import { fileURLToPath } from 'node:url'

import { parseBooleanEnv, parseNumberEnv, readEnv } from './env-config'
import { OperatorConfigError } from './errors'

export const AUSF_GROUP_ID = 'ausfGroup001'
export const SBI_PORT = 29509
export const SBI_PORT_NAME = 'sbi'
export const CONFIG_DIR = '/free5gc/config'
export const CONFIG_FILE_NAME = 'ausfcfg.conf'
export const CONFIG_FILE_PATH = `${CONFIG_DIR}/${CONFIG_FILE_NAME}`
export const CONFIG_TEMPLATE_NAME = 'ausfcfg.conf.tmpl'
// The workload reads its TLS material from these fixed locations.
export const CERTS_DIR_PATH = '/support/TLS'
export const PRIVATE_KEY_NAME = 'ausf.key'
export const CSR_NAME = 'ausf.csr'
export const CERTIFICATE_NAME = 'ausf.pem'
export const CERTIFICATE_COMMON_NAME = 'ausf.sdcore'
export const NRF_RELATION_NAME = 'fiveg_nrf'
export const CERTIFICATES_RELATION_NAME = 'certificates'

const DEFAULT_APP_NAME = 'ausf'
const DEFAULT_WORKLOAD_ROOT = '/'
const DEFAULT_STATE_DIR = '/var/lib/ausf-operator'
const DEFAULT_NAMESPACE = 'default'
const DEFAULT_LEASE_DURATION_SECONDS = 60
const DEFAULT_TEMPLATE_DIR = fileURLToPath(new URL('../../templates', import.meta.url))

export type LeaderElectionConfig = {
  enabled: boolean
  leaseName: string
  leaseDurationSeconds: number
}

export type OperatorConfig = {
  appName: string
  containerName: string
  serviceName: string
  namespace: string
  identity: string
  workloadRoot: string
  stateDir: string
  templateDir: string
  pebbleSocketPath: string
  leaderElection: LeaderElectionConfig
  servicePatchEnabled: boolean
}

const readAbsolutePath = (env: NodeJS.ProcessEnv, name: string, fallback: string) => {
  const value = readEnv(env, name)
  if (!value) return fallback
  if (!isAbsolute(value)) {
    throw new OperatorConfigError(name, `expected an absolute path, got ${value}`)
  }
  return value
}

export const loadOperatorConfig = (env: NodeJS.ProcessEnv = process.env): OperatorConfig => {
  const appName = readEnv(env, 'AUSF_OPERATOR_APP_NAME') ?? DEFAULT_APP_NAME
  if (!/^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/.test(appName)) {
    throw new OperatorConfigError('AUSF_OPERATOR_APP_NAME', `${appName} is not a valid DNS label`)
  }
  const containerName = 'ausf'
  return {
    appName,
    containerName,
    serviceName: containerName,
    namespace: readEnv(env, 'POD_NAMESPACE') ?? DEFAULT_NAMESPACE,
    identity: readEnv(env, 'POD_NAME') ?? hostname(),
    workloadRoot: readAbsolutePath(env, 'AUSF_OPERATOR_WORKLOAD_ROOT', DEFAULT_WORKLOAD_ROOT),
    stateDir: readAbsolutePath(env, 'AUSF_OPERATOR_STATE_DIR', DEFAULT_STATE_DIR),
    templateDir: readAbsolutePath(env, 'AUSF_OPERATOR_TEMPLATE_DIR', DEFAULT_TEMPLATE_DIR),
    pebbleSocketPath: readAbsolutePath(
      env,
      'AUSF_OPERATOR_PEBBLE_SOCKET',
      `/charm/containers/${containerName}/pebble.socket`,
    ),
    leaderElection: {
      enabled: parseBooleanEnv(env.AUSF_OPERATOR_LEADER_ELECTION_ENABLED, true),
      leaseName: `${appName}-operator-leader`,
      leaseDurationSeconds: parseNumberEnv(
        env.AUSF_OPERATOR_LEASE_DURATION_SECONDS,
        DEFAULT_LEASE_DURATION_SECONDS,
        1,
      ),
    },
    servicePatchEnabled: parseBooleanEnv(env.AUSF_OPERATOR_SERVICE_PATCH_ENABLED, true),
  }
}
