import { mkdtemp, rm } from 'node:fs/promises'
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import YAML from 'yaml'

import { PebbleApiError, PebbleChangeError } from '~/operator/errors'
import { createPebbleClient } from '~/operator/pebble-client'
import { buildServiceLayer } from '~/operator/service-spec'
import { silentLogger } from '~/test-utils/operator-fakes'

type RecordedRequest = { method: string; url: string; body: unknown }

type Route = (request: RecordedRequest) => { status: number; body: Record<string, unknown> }

const readBody = (req: IncomingMessage) =>
  new Promise<string>((resolve, reject) => {
    let data = ''
    req.setEncoding('utf8')
    req.on('data', (chunk: string) => {
      data += chunk
    })
    req.on('end', () => resolve(data))
    req.on('error', reject)
  })

const sync = (result: unknown) => ({ status: 200, body: { type: 'sync', 'status-code': 200, status: 'OK', result } })

describe('pebble client', () => {
  let dir = ''
  let socketPath = ''
  let server: Server | null = null
  const requests: RecordedRequest[] = []

  const serve = async (route: Route) => {
    server = createServer((req: IncomingMessage, res: ServerResponse) => {
      readBody(req)
        .then((raw) => {
          const recorded = { method: req.method ?? '', url: req.url ?? '', body: raw ? JSON.parse(raw) : null }
          requests.push(recorded)
          const { status, body } = route(recorded)
          res.writeHead(status, { 'content-type': 'application/json' })
          res.end(JSON.stringify(body))
        })
        .catch((error: unknown) => {
          res.writeHead(500)
          res.end(String(error))
        })
    })
    const listening = server
    await new Promise<void>((resolve) => listening.listen(socketPath, resolve))
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ausf-pebble-'))
    socketPath = join(dir, 'pebble.socket')
    requests.length = 0
  })

  afterEach(async () => {
    const running = server
    server = null
    if (running) {
      running.closeAllConnections()
      await new Promise<void>((resolve) => running.close(() => resolve()))
    }
    await rm(dir, { recursive: true, force: true })
  })

  it('reports the container as unreachable when the socket is missing', async () => {
    const client = createPebbleClient({ socketPath, logger: silentLogger() })
    await expect(client.canConnect()).resolves.toBe(false)
  })

  it('connects through system info', async () => {
    await serve(() => sync({ version: '1.10.0' }))
    const client = createPebbleClient({ socketPath, logger: silentLogger() })

    await expect(client.canConnect()).resolves.toBe(true)
    expect(requests).toEqual([{ method: 'GET', url: '/v1/system-info', body: null }])
  })

  it('parses services out of the yaml plan', async () => {
    await serve(() => sync('services:\n  ausf:\n    override: replace\n    command: /bin/ausf\n'))
    const client = createPebbleClient({ socketPath, logger: silentLogger() })

    await expect(client.getPlan()).resolves.toEqual({
      services: { ausf: { override: 'replace', command: '/bin/ausf' } },
    })
    expect(requests[0]?.url).toBe('/v1/plan?format=yaml')
  })

  it('returns an empty plan when nothing is configured', async () => {
    await serve(() => sync('{}\n'))
    const client = createPebbleClient({ socketPath, logger: silentLogger() })

    await expect(client.getPlan()).resolves.toEqual({ services: {} })
  })

  it('posts layers as yaml', async () => {
    await serve(() => sync(true))
    const client = createPebbleClient({ socketPath, logger: silentLogger() })
    const layer = buildServiceLayer('ausf', '10.1.2.3')

    await client.addLayer('ausf', layer, { combine: true })

    expect(requests).toEqual([
      {
        method: 'POST',
        url: '/v1/layers',
        body: { action: 'add', combine: true, label: 'ausf', format: 'yaml', layer: YAML.stringify(layer) },
      },
    ])
  })

  it('restarts the service and waits for the change', async () => {
    await serve((request) =>
      request.url === '/v1/services'
        ? { status: 202, body: { type: 'async', 'status-code': 202, status: 'Accepted', change: '7', result: null } }
        : sync({ id: '7', status: 'Done', ready: true }),
    )
    const client = createPebbleClient({ socketPath, logger: silentLogger() })

    await client.restart('ausf')

    expect(requests.map((request) => `${request.method} ${request.url}`)).toEqual([
      'POST /v1/services',
      'GET /v1/changes/7/wait',
    ])
    expect(requests[0]?.body).toEqual({ action: 'restart', services: ['ausf'] })
  })

  it('raises when the restart change fails', async () => {
    await serve((request) =>
      request.url === '/v1/services'
        ? { status: 202, body: { type: 'async', 'status-code': 202, status: 'Accepted', change: '8', result: null } }
        : sync({ id: '8', status: 'Error', ready: true, err: 'cannot start service: exited quickly' }),
    )
    const client = createPebbleClient({ socketPath, logger: silentLogger() })

    await expect(client.restart('ausf')).rejects.toThrow(
      new PebbleChangeError('8', 'cannot start service: exited quickly'),
    )
  })

  it('surfaces error envelopes with their message', async () => {
    await serve(() => ({
      status: 400,
      body: { type: 'error', 'status-code': 400, status: 'Bad Request', result: { message: 'layer is invalid' } },
    }))
    const client = createPebbleClient({ socketPath, logger: silentLogger() })

    const failure = client.addLayer('ausf', buildServiceLayer('ausf', '10.1.2.3'), { combine: true })
    await expect(failure).rejects.toBeInstanceOf(PebbleApiError)
    await expect(failure).rejects.toThrow('Pebble API error (400): layer is invalid')
  })
})
