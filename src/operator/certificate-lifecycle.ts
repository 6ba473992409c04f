import type { Logger } from '~/logger'

import { CERTIFICATE_COMMON_NAME } from './config'
import {
  getIdentityLifecycleStatus,
  type IdentityLifecycleActor,
  restoreIdentityLifecycleActor,
  transitionIdentity,
} from './identity-machine'
import type { IdentityStore } from './identity-store'
import type { TlsPrimitives } from './tls'
import type { EventOutcome } from './types'

export interface CertificateAuthorityClient {
  requestCertificateCreation: (certificateSigningRequest: string) => Promise<void>
}

export type CertificateAvailable = {
  certificate: string
  certificateSigningRequest: string
  ca?: string
  chain?: readonly string[]
}

export type CertificateExpiring = {
  certificate: string
  expiry?: string
}

export type CertificateLifecycleManager = ReturnType<typeof createCertificateLifecycleManager>

export const createCertificateLifecycleManager = (deps: {
  identityStore: IdentityStore
  tls: TlsPrimitives
  certificateAuthority: CertificateAuthorityClient
  canConnect: () => Promise<boolean>
  reconcile: () => Promise<EventOutcome>
  logger: Logger
}) => {
  const { identityStore, logger } = deps

  const restoreActor = async () =>
    restoreIdentityLifecycleActor({
      privateKey: await identityStore.isStored('privateKey'),
      csr: await identityStore.isStored('csr'),
      certificate: await identityStore.isStored('certificate'),
    })

  const logTransition = (actor: IdentityLifecycleActor, from: string) => {
    const to = getIdentityLifecycleStatus(actor)
    if (from !== to) logger.debug({ from, to }, 'identity lifecycle transition')
  }

  const requestNewCertificate = async (actor: IdentityLifecycleActor) => {
    const privateKey = await identityStore.read('privateKey')
    if (privateKey == null) return false
    const from = getIdentityLifecycleStatus(actor)
    const csr = deps.tls.generateCsr({
      privateKey,
      subject: CERTIFICATE_COMMON_NAME,
      sansDns: [CERTIFICATE_COMMON_NAME],
    })
    await identityStore.store('csr', csr)
    await deps.certificateAuthority.requestCertificateCreation(csr)
    transitionIdentity(actor, 'CSR_REQUESTED')
    logTransition(actor, from)
    return true
  }

  const onRelationCreated = async (): Promise<EventOutcome> => {
    if (!(await deps.canConnect())) return 'deferred'
    const actor = await restoreActor()
    const from = getIdentityLifecycleStatus(actor)
    if (!transitionIdentity(actor, 'KEY_GENERATED')) return 'ignored'
    await identityStore.store('privateKey', deps.tls.generatePrivateKey())
    logTransition(actor, from)
    return 'completed'
  }

  const onRelationJoined = async (): Promise<EventOutcome> => {
    if (!(await deps.canConnect())) return 'deferred'
    const actor = await restoreActor()
    if (getIdentityLifecycleStatus(actor) === 'noIdentity') return 'deferred'
    return (await requestNewCertificate(actor)) ? 'completed' : 'deferred'
  }

  const onCertificateAvailable = async (event: CertificateAvailable): Promise<EventOutcome> => {
    if (!(await deps.canConnect())) return 'deferred'
    const storedCsr = await identityStore.read('csr')
    if (storedCsr == null) {
      logger.warn('Certificate is available but no CSR is stored')
      return 'ignored'
    }
    if (event.certificateSigningRequest !== storedCsr) {
      logger.debug("Stored CSR doesn't match one in certificate available event")
      return 'ignored'
    }
    const actor = await restoreActor()
    const from = getIdentityLifecycleStatus(actor)
    await identityStore.store('certificate', event.certificate)
    if (!transitionIdentity(actor, 'CERTIFICATE_STORED')) {
      logger.warn({ state: from }, 'Stored certificate while no private key is stored')
    }
    logTransition(actor, from)
    return deps.reconcile()
  }

  const onCertificateExpiring = async (event: CertificateExpiring): Promise<EventOutcome> => {
    if (!(await deps.canConnect())) return 'deferred'
    const storedCertificate = await identityStore.read('certificate')
    if (storedCertificate == null || event.certificate !== storedCertificate) {
      logger.debug('Expiring certificate is not the one stored')
      return 'ignored'
    }
    const actor = await restoreActor()
    if (!(await requestNewCertificate(actor))) {
      logger.warn('Certificate is expiring but no private key is stored')
      return 'ignored'
    }
    logger.info({ expiry: event.expiry ?? null }, 'Requested renewal of expiring certificate')
    return 'completed'
  }

  const onRelationBroken = async (): Promise<EventOutcome> => {
    if (!(await deps.canConnect())) return 'deferred'
    const actor = await restoreActor()
    const from = getIdentityLifecycleStatus(actor)
    await identityStore.removeAll()
    transitionIdentity(actor, 'TEARDOWN')
    logTransition(actor, from)
    return deps.reconcile()
  }

  return {
    onRelationCreated,
    onRelationJoined,
    onCertificateAvailable,
    onCertificateExpiring,
    onRelationBroken,
  }
}
