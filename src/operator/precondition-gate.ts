import { CONFIG_DIR, NRF_RELATION_NAME } from './config'
import type { ContainerStore } from './container-store'
import { block, deferRetry, type GateResult } from './types'

export interface ContainerConnection {
  canConnect: () => Promise<boolean>
}

export interface RelationDirectory {
  isCreated: (relationName: string) => Promise<boolean>
}

export interface NrfRegistrationClient {
  nrfUrl: () => Promise<string | null>
}

export interface PodAddressResolver {
  currentPodAddress: () => Promise<string | null>
}

export type ReadinessFacts = {
  podAddress: string
  nrfUrl: string
}

export type PreconditionGate = ReturnType<typeof createPreconditionGate>

export const createPreconditionGate = (deps: {
  container: ContainerConnection
  relations: RelationDirectory
  nrf: NrfRegistrationClient
  store: ContainerStore
  podAddress: PodAddressResolver
}) => {
  const checkReadiness = async (): Promise<GateResult<ReadinessFacts>> => {
    if (!(await deps.container.canConnect())) {
      return deferRetry('Waiting for container to start')
    }
    if (!(await deps.relations.isCreated(NRF_RELATION_NAME))) {
      return block(`Waiting for ${NRF_RELATION_NAME} relation`)
    }
    const nrfUrl = await deps.nrf.nrfUrl()
    if (!nrfUrl) {
      return deferRetry('Waiting for NRF data to be available')
    }
    if (!(await deps.store.exists(CONFIG_DIR))) {
      return deferRetry('Waiting for storage to be attached')
    }
    const podAddress = await deps.podAddress.currentPodAddress()
    if (!podAddress) {
      return deferRetry('Waiting for pod IP address to be available')
    }
    return { _tag: 'Proceed', facts: { podAddress, nrfUrl } }
  }

  return { checkReadiness }
}
