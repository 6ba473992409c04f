import { request } from 'node:http'

import YAML from 'yaml'

import type { Logger } from '~/logger'

import { asRecord, asString } from './env-config'
import { PebbleApiError, PebbleChangeError } from './errors'
import type { ContainerConnection } from './precondition-gate'
import type { ServiceLayer, ServicePlan } from './service-spec'
import type { ProcessSupervisor } from './service-supervisor'

type RawResponse = {
  statusCode: number
  body: string
}

type PebbleEnvelope = {
  type: string
  statusCode: number
  result: unknown
  change: string | null
}

export type PebbleClient = ContainerConnection & ProcessSupervisor

const sendRequest = (socketPath: string, method: string, path: string, body?: unknown) =>
  new Promise<RawResponse>((resolve, reject) => {
    const payload = body === undefined ? undefined : JSON.stringify(body)
    const req = request(
      {
        socketPath,
        path,
        method,
        headers: payload
          ? { 'content-type': 'application/json', 'content-length': Buffer.byteLength(payload) }
          : { accept: 'application/json' },
      },
      (res) => {
        let data = ''
        res.setEncoding('utf8')
        res.on('data', (chunk: string) => {
          data += chunk
        })
        res.on('end', () => resolve({ statusCode: res.statusCode ?? 0, body: data }))
        res.on('error', reject)
      },
    )
    req.on('error', reject)
    if (payload) req.write(payload)
    req.end()
  })

const parseEnvelope = (response: RawResponse): PebbleEnvelope => {
  let parsed: unknown
  try {
    parsed = JSON.parse(response.body)
  } catch {
    throw new PebbleApiError(response.statusCode, `unexpected response body: ${response.body.slice(0, 200)}`)
  }
  const record = asRecord(parsed)
  if (!record) {
    throw new PebbleApiError(response.statusCode, 'response is not a JSON object')
  }
  const type = asString(record.type) ?? 'unknown'
  const rawStatusCode = record['status-code']
  const statusCode = typeof rawStatusCode === 'number' ? rawStatusCode : response.statusCode
  if (type === 'error' || statusCode >= 400) {
    const message = asString(asRecord(record.result)?.message) ?? asString(record.status) ?? 'unknown error'
    throw new PebbleApiError(statusCode, message)
  }
  return { type, statusCode, result: record.result ?? null, change: asString(record.change) }
}

export const createPebbleClient = (deps: { socketPath: string; logger: Logger }): PebbleClient => {
  const call = async (method: string, path: string, body?: unknown) =>
    parseEnvelope(await sendRequest(deps.socketPath, method, path, body))

  const waitChange = async (changeId: string) => {
    const envelope = await call('GET', `/v1/changes/${encodeURIComponent(changeId)}/wait`)
    const change = asRecord(envelope.result)
    const err = asString(change?.err)
    if (err) throw new PebbleChangeError(changeId, err)
  }

  return {
    canConnect: async () => {
      try {
        await call('GET', '/v1/system-info')
        return true
      } catch (error) {
        deps.logger.debug({ err: error, socketPath: deps.socketPath }, 'pebble is not reachable')
        return false
      }
    },
    getPlan: async (): Promise<ServicePlan> => {
      const envelope = await call('GET', '/v1/plan?format=yaml')
      const text = typeof envelope.result === 'string' ? envelope.result : ''
      const plan = asRecord(YAML.parse(text))
      return { services: asRecord(plan?.services) ?? {} }
    },
    addLayer: async (label: string, layer: ServiceLayer, options: { combine: boolean }) => {
      await call('POST', '/v1/layers', {
        action: 'add',
        combine: options.combine,
        label,
        format: 'yaml',
        layer: YAML.stringify(layer),
      })
    },
    restart: async (serviceName: string) => {
      const envelope = await call('POST', '/v1/services', { action: 'restart', services: [serviceName] })
      if (envelope.change) await waitChange(envelope.change)
    },
  }
}
