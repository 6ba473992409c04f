import type { Logger } from '~/logger'

import type { CertificateLifecycleManager } from './certificate-lifecycle'
import type { ConfigReconciler } from './config-reconciler'
import { buildDesiredConfigInputs } from './config-reconciler'
import type { DeferredEventQueue } from './deferred-queue'
import type { OperatorEvent } from './events'
import type { StatusReporter } from './host-state'
import type { IdentityStore } from './identity-store'
import type { PreconditionGate } from './precondition-gate'
import type { ServiceSupervisor } from './service-supervisor'
import { activeStatus, type EventOutcome, type UnitStatus } from './types'

export type DispatchReport = {
  handled: Array<{ kind: OperatorEvent['kind']; outcome: EventOutcome }>
  deferred: number
  status: UnitStatus | null
}

export type ReconciliationDispatcher = ReturnType<typeof createReconciliationDispatcher>

export const createReconciliationDispatcher = (deps: {
  gate: PreconditionGate
  configReconciler: ConfigReconciler
  serviceSupervisor: ServiceSupervisor
  identityStore: IdentityStore
  status: StatusReporter
  logger: Logger
}) => {
  let lastStatus: UnitStatus | null = null

  const setStatus = async (status: UnitStatus) => {
    lastStatus = status
    await deps.status.set(status)
  }

  /** One full reconciliation pass; identical for every triggering event. */
  const configure = async (): Promise<EventOutcome> => {
    const readiness = await deps.gate.checkReadiness()
    if (readiness._tag === 'Block') {
      await setStatus({ _tag: 'Blocked', reason: readiness.reason })
      return 'completed'
    }
    if (readiness._tag === 'DeferRetry') {
      await setStatus({ _tag: 'Waiting', reason: readiness.reason })
      return 'deferred'
    }
    const inputs = buildDesiredConfigInputs({
      podAddress: readiness.facts.podAddress,
      nrfUrl: readiness.facts.nrfUrl,
      certificateStored: await deps.identityStore.isStored('certificate'),
    })
    const configResult = await deps.configReconciler.reconcile(inputs)
    await deps.serviceSupervisor.ensureRunning({
      podAddress: readiness.facts.podAddress,
      configChanged: configResult === 'changed',
    })
    await setStatus(activeStatus())
    return 'completed'
  }

  return {
    configure,
    getLastStatus: () => lastStatus,
  }
}

export type EventRouter = ReturnType<typeof createEventRouter>

export const createEventRouter = (deps: {
  dispatcher: ReconciliationDispatcher
  certificates: CertificateLifecycleManager
  deferredQueue: DeferredEventQueue
  logger: Logger
}) => {
  const handle = async (event: OperatorEvent): Promise<EventOutcome> => {
    switch (event.kind) {
      case 'ausf-pebble-ready':
      case 'fiveg-nrf-relation-joined':
      case 'nrf-available':
        return deps.dispatcher.configure()
      case 'certificates-relation-created':
        return deps.certificates.onRelationCreated()
      case 'certificates-relation-joined':
        return deps.certificates.onRelationJoined()
      case 'certificates-relation-broken':
        return deps.certificates.onRelationBroken()
      case 'certificate-available':
        return deps.certificates.onCertificateAvailable(event)
      case 'certificate-expiring':
        return deps.certificates.onCertificateExpiring(event)
      case 'update-status':
        return 'completed'
    }
  }

  /**
   * Re-emits previously deferred events before the incoming one, then stores whatever
   * deferred again. A failing handler leaves the queue as it was loaded.
   */
  const dispatch = async (event: OperatorEvent): Promise<DispatchReport> => {
    const pending = await deps.deferredQueue.load()
    const handled: DispatchReport['handled'] = []
    const stillDeferred: OperatorEvent[] = []
    for (const next of [...pending, event]) {
      const outcome = await handle(next)
      deps.logger.debug({ event: next.kind, outcome }, 'event handled')
      handled.push({ kind: next.kind, outcome })
      if (outcome === 'deferred') {
        stillDeferred.push(next)
        deps.logger.info({ event: next.kind }, 'deferring event')
      }
    }
    await deps.deferredQueue.save(stillDeferred)
    return { handled, deferred: stillDeferred.length, status: deps.dispatcher.getLastStatus() }
  }

  return { handle, dispatch }
}
