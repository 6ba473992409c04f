import { CoordinationV1Api, KubeConfig, type V1Lease } from '@kubernetes/client-node'

import type { Logger } from '~/logger'

import type { LeaderElectionConfig } from './config'
import { asRecord } from './env-config'
import { ScalingNotSupportedError } from './errors'

export type LeaseApi = {
  read: (name: string, namespace: string) => Promise<V1Lease | null>
  create: (namespace: string, lease: V1Lease) => Promise<V1Lease>
  replace: (name: string, namespace: string, lease: V1Lease) => Promise<V1Lease>
}

export type LeadershipResult = {
  isLeader: boolean
  holder: string | null
}

const isKubeNotFoundError = (error: unknown) => {
  const record = asRecord(error)
  if (record?.code === 404 || record?.statusCode === 404) return true
  const message = error instanceof Error ? error.message : String(error)
  const normalized = message.toLowerCase()
  return normalized.includes('notfound') || normalized.includes(' not found')
}

export const createKubernetesLeaseApi = (): LeaseApi => {
  const kubeConfig = new KubeConfig()
  kubeConfig.loadFromDefault()
  const api = kubeConfig.makeApiClient(CoordinationV1Api)
  return {
    read: async (name, namespace) => {
      try {
        return await api.readNamespacedLease({ name, namespace })
      } catch (error) {
        if (isKubeNotFoundError(error)) return null
        throw error
      }
    },
    create: (namespace, lease) => api.createNamespacedLease({ namespace, body: lease }),
    replace: (name, namespace, lease) => api.replaceNamespacedLease({ name, namespace, body: lease }),
  }
}

const toMillis = (value: Date | string | undefined) => {
  if (!value) return null
  const millis = value instanceof Date ? value.getTime() : Date.parse(value)
  return Number.isFinite(millis) ? millis : null
}

export const isLeaseExpired = (lease: V1Lease, now: Date, fallbackDurationSeconds: number) => {
  const renewed = toMillis(lease.spec?.renewTime) ?? toMillis(lease.spec?.acquireTime)
  if (renewed === null) return true
  const durationSeconds = lease.spec?.leaseDurationSeconds ?? fallbackDurationSeconds
  return renewed + durationSeconds * 1000 < now.getTime()
}

/**
 * Claims the lease for this instance. The holder renews on every dispatch; another
 * instance may only take over once the lease has expired.
 */
export const acquireLeadership = async (deps: {
  api: LeaseApi
  config: LeaderElectionConfig
  namespace: string
  identity: string
  now?: () => Date
}): Promise<LeadershipResult> => {
  const now = (deps.now ?? (() => new Date()))()
  const { leaseName, leaseDurationSeconds } = deps.config
  const existing = await deps.api.read(leaseName, deps.namespace)
  if (!existing) {
    await deps.api.create(deps.namespace, {
      metadata: { name: leaseName, namespace: deps.namespace },
      spec: {
        holderIdentity: deps.identity,
        leaseDurationSeconds,
        acquireTime: now,
        renewTime: now,
        leaseTransitions: 0,
      },
    })
    return { isLeader: true, holder: deps.identity }
  }

  const holder = existing.spec?.holderIdentity ?? null
  const heldByUs = holder === deps.identity
  if (!heldByUs && holder && !isLeaseExpired(existing, now, leaseDurationSeconds)) {
    return { isLeader: false, holder }
  }

  await deps.api.replace(leaseName, deps.namespace, {
    ...existing,
    spec: {
      ...existing.spec,
      holderIdentity: deps.identity,
      leaseDurationSeconds,
      renewTime: now,
      acquireTime: heldByUs ? existing.spec?.acquireTime : now,
      leaseTransitions: (existing.spec?.leaseTransitions ?? 0) + (heldByUs ? 0 : 1),
    },
  })
  return { isLeader: true, holder: deps.identity }
}

/** Pod ordinal when `identity` is a pod of the named StatefulSet, otherwise null. */
export const statefulSetOrdinal = (identity: string, statefulSetName: string) => {
  const prefix = `${statefulSetName}-`
  if (!identity.startsWith(prefix)) return null
  const suffix = identity.slice(prefix.length)
  return /^\d+$/.test(suffix) ? Number.parseInt(suffix, 10) : null
}

/**
 * Only ordinal 0 of the StatefulSet may run; higher ordinals are refused even when the lease
 * has expired. Identities outside the StatefulSet rely on the lease alone.
 */
export const ensureSingleActiveInstance = async (deps: {
  api: LeaseApi
  config: LeaderElectionConfig
  namespace: string
  identity: string
  statefulSetName: string
  logger: Logger
  now?: () => Date
}) => {
  const ordinal = statefulSetOrdinal(deps.identity, deps.statefulSetName)
  if (ordinal !== null && ordinal > 0) {
    throw new ScalingNotSupportedError(`${deps.statefulSetName}-0`)
  }
  const result = await acquireLeadership(deps)
  if (!result.isLeader) {
    throw new ScalingNotSupportedError(result.holder)
  }
  deps.logger.debug({ lease: deps.config.leaseName, identity: deps.identity }, 'holding operator lease')
}
