import { fileURLToPath } from 'node:url'

import pino from 'pino'

import { CERTS_DIR_PATH, CONFIG_DIR, NRF_RELATION_NAME } from '~/operator/config'
import type { ContainerStore } from '~/operator/container-store'
import { createMemoryDeferredEventQueue } from '~/operator/deferred-queue'
import { createOperator, type OperatorSetup } from '~/operator/index'
import type { ServiceLayer } from '~/operator/service-spec'
import type { ProcessSupervisor } from '~/operator/service-supervisor'
import { createFileTemplateRenderer } from '~/operator/template'
import type { TlsPrimitives } from '~/operator/tls'
import type { UnitStatus } from '~/operator/types'

export const TEMPLATE_DIR = fileURLToPath(new URL('../../templates', import.meta.url))

export const silentLogger = () => pino({ level: 'silent' })

export const createMemoryContainerStore = (options: { files?: Record<string, string>; directories?: string[] } = {}) => {
  const files = new Map(Object.entries(options.files ?? {}))
  const directories = new Set(options.directories ?? [])
  const writes: string[] = []

  const parentOf = (path: string) => path.slice(0, path.lastIndexOf('/'))

  const store: ContainerStore = {
    exists: async (path) =>
      files.has(path) || directories.has(path) || [...files.keys()].some((file) => file.startsWith(`${path}/`)),
    read: async (path) => files.get(path) ?? null,
    write: async (path, content, options = {}) => {
      if (options.makeDirs) directories.add(parentOf(path))
      files.set(path, content)
      writes.push(path)
    },
    remove: async (path) => {
      files.delete(path)
    },
  }

  return { store, files, directories, writes }
}

export const createFakeProcessSupervisor = (initialServices: Record<string, unknown> = {}) => {
  let services: Record<string, unknown> = structuredClone(initialServices)
  const restarts: string[] = []
  const layers: Array<{ label: string; layer: ServiceLayer; combine: boolean }> = []

  const supervisor: ProcessSupervisor = {
    getPlan: async () => ({ services: structuredClone(services) }),
    addLayer: async (label, layer, options) => {
      layers.push({ label, layer, combine: options.combine })
      services = { ...services, ...structuredClone(layer.services) }
    },
    restart: async (serviceName) => {
      restarts.push(serviceName)
    },
  }

  return { supervisor, restarts, layers, getServices: () => services }
}

export const createCountingTlsPrimitives = () => {
  const counters = { keys: 0, csrs: 0 }
  const tls: TlsPrimitives = {
    generatePrivateKey: () => {
      counters.keys += 1
      return `private-key-${counters.keys}`
    },
    generateCsr: ({ subject }) => {
      counters.csrs += 1
      return `csr-${counters.csrs}-${subject}`
    },
  }
  return { tls, counters }
}

export type World = {
  canConnect: boolean
  relations: Set<string>
  nrfUrl: string | null
  podAddress: string | null
}

export const createOperatorHarness = (
  options: { world?: Partial<World>; files?: Record<string, string>; directories?: string[] } = {},
) => {
  const world: World = {
    canConnect: true,
    relations: new Set([NRF_RELATION_NAME]),
    nrfUrl: 'http://nrf.test:29510',
    podAddress: '10.1.2.3',
    ...options.world,
  }
  const memory = createMemoryContainerStore({
    files: options.files,
    directories: options.directories ?? [CONFIG_DIR, CERTS_DIR_PATH],
  })
  const supervisor = createFakeProcessSupervisor()
  const { tls, counters } = createCountingTlsPrimitives()
  const certificateRequests: string[] = []
  const statuses: UnitStatus[] = []
  const deferredQueue = createMemoryDeferredEventQueue()

  const setup: OperatorSetup = {
    containerName: 'ausf',
    serviceName: 'ausf',
    logger: silentLogger(),
    store: memory.store,
    container: { canConnect: async () => world.canConnect },
    supervisor: supervisor.supervisor,
    relations: { isCreated: async (name) => world.relations.has(name) },
    nrf: { nrfUrl: async () => world.nrfUrl },
    podAddress: { currentPodAddress: async () => world.podAddress },
    certificateAuthority: {
      requestCertificateCreation: async (csr) => {
        certificateRequests.push(csr)
      },
    },
    renderer: createFileTemplateRenderer(TEMPLATE_DIR),
    tls,
    status: {
      set: async (status) => {
        statuses.push(status)
      },
    },
    deferredQueue,
  }
  const operator = createOperator(setup)

  return { world, memory, supervisor, counters, certificateRequests, statuses, deferredQueue, setup, operator }
}
