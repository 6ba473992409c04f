import { createActor, createMachine } from 'xstate'

const identityLifecycleMachine = createMachine({
  id: 'identityLifecycle',
  initial: 'noIdentity',
  states: {
    noIdentity: {
      on: {
        KEY_GENERATED: 'keyOnly',
        TEARDOWN: 'noIdentity',
      },
    },
    keyOnly: {
      on: {
        CSR_REQUESTED: 'csrPending',
        TEARDOWN: 'noIdentity',
      },
    },
    csrPending: {
      on: {
        CSR_REQUESTED: 'csrPending',
        CERTIFICATE_STORED: 'certified',
        TEARDOWN: 'noIdentity',
      },
    },
    certified: {
      on: {
        CSR_REQUESTED: 'csrPending',
        CERTIFICATE_STORED: 'certified',
        TEARDOWN: 'noIdentity',
      },
    },
  },
})

export type IdentityLifecycleActor = ReturnType<typeof createIdentityLifecycleActor>
export type IdentityLifecycleStatus = 'noIdentity' | 'keyOnly' | 'csrPending' | 'certified'
export type IdentityLifecycleEvent = 'KEY_GENERATED' | 'CSR_REQUESTED' | 'CERTIFICATE_STORED' | 'TEARDOWN'

export type StoredIdentityArtifacts = {
  privateKey: boolean
  csr: boolean
  certificate: boolean
}

const toStatus = (snapshot: ReturnType<IdentityLifecycleActor['getSnapshot']>): IdentityLifecycleStatus => {
  if (snapshot.matches('keyOnly')) return 'keyOnly'
  if (snapshot.matches('csrPending')) return 'csrPending'
  if (snapshot.matches('certified')) return 'certified'
  return 'noIdentity'
}

export const createIdentityLifecycleActor = () => {
  const actor = createActor(identityLifecycleMachine)
  actor.start()
  return actor
}

/**
 * Rebuilds the lifecycle position from what is stored in the workload. A renewal in flight
 * (new CSR stored next to the certificate still in use) resolves to `certified`.
 */
export const restoreIdentityLifecycleActor = (stored: StoredIdentityArtifacts) => {
  const actor = createIdentityLifecycleActor()
  if (!stored.privateKey) return actor
  actor.send({ type: 'KEY_GENERATED' })
  if (!stored.csr) return actor
  actor.send({ type: 'CSR_REQUESTED' })
  if (!stored.certificate) return actor
  actor.send({ type: 'CERTIFICATE_STORED' })
  return actor
}

export const getIdentityLifecycleStatus = (actor: IdentityLifecycleActor): IdentityLifecycleStatus =>
  toStatus(actor.getSnapshot())

export const canTransitionIdentity = (actor: IdentityLifecycleActor, event: IdentityLifecycleEvent) =>
  actor.getSnapshot().can({ type: event })

export const transitionIdentity = (actor: IdentityLifecycleActor, event: IdentityLifecycleEvent) => {
  if (!canTransitionIdentity(actor, event)) return false
  actor.send({ type: event })
  return true
}
