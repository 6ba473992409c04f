import { CoreV1Api, KubeConfig, type V1Service, type V1ServicePort } from '@kubernetes/client-node'

import type { Logger } from '~/logger'

export type ServiceApi = {
  read: (name: string, namespace: string) => Promise<V1Service>
  replace: (name: string, namespace: string, service: V1Service) => Promise<V1Service>
}

export const createKubernetesServiceApi = (): ServiceApi => {
  const kubeConfig = new KubeConfig()
  kubeConfig.loadFromDefault()
  const api = kubeConfig.makeApiClient(CoreV1Api)
  return {
    read: (name, namespace) => api.readNamespacedService({ name, namespace }),
    replace: (name, namespace, service) => api.replaceNamespacedService({ name, namespace, body: service }),
  }
}

const samePort = (left: V1ServicePort, right: V1ServicePort) =>
  left.name === right.name && left.port === right.port && (left.protocol ?? 'TCP') === (right.protocol ?? 'TCP')

/** Returns the ports the service should expose, or null when it already exposes all of them. */
export const mergeServicePorts = (current: readonly V1ServicePort[], desired: readonly V1ServicePort[]) => {
  const missing = desired.filter((port) => !current.some((existing) => samePort(existing, port)))
  if (missing.length === 0) return null
  const names = new Set(missing.map((port) => port.name))
  return [...current.filter((port) => !names.has(port.name)), ...missing]
}

export const publishServicePorts = async (deps: {
  api: ServiceApi
  serviceName: string
  namespace: string
  ports: V1ServicePort[]
  logger: Logger
}) => {
  const service = await deps.api.read(deps.serviceName, deps.namespace)
  const merged = mergeServicePorts(service.spec?.ports ?? [], deps.ports)
  if (!merged) return false
  await deps.api.replace(deps.serviceName, deps.namespace, {
    ...service,
    spec: { ...service.spec, ports: merged },
  })
  deps.logger.info(
    { service: deps.serviceName, ports: deps.ports.map((port) => `${port.name}:${port.port}`) },
    'published service ports',
  )
  return true
}
