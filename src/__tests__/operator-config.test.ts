import { hostname } from 'node:os'

import { describe, expect, it } from 'vitest'

import { loadOperatorConfig } from '~/operator/config'
import { parseBooleanEnv, parseNumberEnv, readEnv } from '~/operator/env-config'
import { OperatorConfigError } from '~/operator/errors'

describe('env parsing', () => {
  it('trims values and treats blanks as unset', () => {
    expect(readEnv({ NAME: '  ausf ' }, 'NAME')).toBe('ausf')
    expect(readEnv({ NAME: '   ' }, 'NAME')).toBeUndefined()
    expect(readEnv({}, 'NAME')).toBeUndefined()
  })

  it('parses booleans with a fallback', () => {
    expect(parseBooleanEnv('Yes', false)).toBe(true)
    expect(parseBooleanEnv('off', true)).toBe(false)
    expect(parseBooleanEnv('maybe', true)).toBe(true)
    expect(parseBooleanEnv(undefined, false)).toBe(false)
  })

  it('parses numbers above a minimum', () => {
    expect(parseNumberEnv('30', 60, 1)).toBe(30)
    expect(parseNumberEnv('0', 60, 1)).toBe(60)
    expect(parseNumberEnv('soon', 60)).toBe(60)
  })
})

describe('operator config', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadOperatorConfig({})

    expect(config).toMatchObject({
      appName: 'ausf',
      containerName: 'ausf',
      serviceName: 'ausf',
      namespace: 'default',
      identity: hostname(),
      workloadRoot: '/',
      stateDir: '/var/lib/ausf-operator',
      pebbleSocketPath: '/charm/containers/ausf/pebble.socket',
      leaderElection: { enabled: true, leaseName: 'ausf-operator-leader', leaseDurationSeconds: 60 },
      servicePatchEnabled: true,
    })
    expect(config.templateDir.endsWith('/templates')).toBe(true)
  })

  it('reads overrides from the environment', () => {
    const config = loadOperatorConfig({
      AUSF_OPERATOR_APP_NAME: 'ausf-edge',
      POD_NAMESPACE: 'core',
      POD_NAME: 'ausf-edge-0',
      AUSF_OPERATOR_STATE_DIR: '/tmp/ausf-state',
      AUSF_OPERATOR_LEADER_ELECTION_ENABLED: 'false',
      AUSF_OPERATOR_LEASE_DURATION_SECONDS: '15',
      AUSF_OPERATOR_SERVICE_PATCH_ENABLED: '0',
    })

    expect(config.appName).toBe('ausf-edge')
    expect(config.namespace).toBe('core')
    expect(config.identity).toBe('ausf-edge-0')
    expect(config.stateDir).toBe('/tmp/ausf-state')
    expect(config.leaderElection).toEqual({
      enabled: false,
      leaseName: 'ausf-edge-operator-leader',
      leaseDurationSeconds: 15,
    })
    expect(config.servicePatchEnabled).toBe(false)
  })

  it('rejects app names that are not dns labels', () => {
    expect(() => loadOperatorConfig({ AUSF_OPERATOR_APP_NAME: 'Ausf_1' })).toThrow(
      'Invalid AUSF_OPERATOR_APP_NAME: Ausf_1 is not a valid DNS label',
    )
  })

  it('rejects relative paths', () => {
    expect(() => loadOperatorConfig({ AUSF_OPERATOR_STATE_DIR: 'state' })).toThrow(OperatorConfigError)
  })
})
