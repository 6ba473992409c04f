import type { Logger } from '~/logger'

import { buildServiceLayer, type ServiceLayer, type ServicePlan, servicesEqual } from './service-spec'

export interface ProcessSupervisor {
  getPlan: () => Promise<ServicePlan>
  addLayer: (label: string, layer: ServiceLayer, options: { combine: boolean }) => Promise<void>
  restart: (serviceName: string) => Promise<void>
}

export type ServiceSupervisor = ReturnType<typeof createServiceSupervisor>

export const createServiceSupervisor = (deps: {
  supervisor: ProcessSupervisor
  containerName: string
  serviceName: string
  logger: Logger
}) => {
  /**
   * Applies the desired layer on every pass and restarts when the plan changed or when the
   * configuration file changed on disk, since the layer only references the file by path.
   */
  const ensureRunning = async (options: { podAddress: string; configChanged: boolean }) => {
    const layer = buildServiceLayer(deps.serviceName, options.podAddress)
    const plan = await deps.supervisor.getPlan()
    const specChanged = !servicesEqual(plan.services, layer.services)
    await deps.supervisor.addLayer(deps.containerName, layer, { combine: true })
    if (!specChanged && !options.configChanged) {
      deps.logger.debug({ service: deps.serviceName }, 'service specification and config unchanged')
      return false
    }
    await deps.supervisor.restart(deps.serviceName)
    deps.logger.info(
      { service: deps.serviceName, specChanged, configChanged: options.configChanged },
      `Restarted container ${deps.serviceName}`,
    )
    return true
  }

  return { ensureRunning }
}
