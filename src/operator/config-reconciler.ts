import type { Logger } from '~/logger'

import { AUSF_GROUP_ID, CONFIG_FILE_NAME, CONFIG_FILE_PATH, CONFIG_TEMPLATE_NAME, SBI_PORT } from './config'
import type { ContainerStore } from './container-store'
import type { TemplateRenderer } from './template'
import type { ConfigReconcileResult } from './types'

export type Scheme = 'http' | 'https'

export type DesiredConfigInputs = {
  ausfGroupId: string
  ausfIp: string
  nrfUrl: string
  sbiPort: number
  scheme: Scheme
}

export const buildDesiredConfigInputs = (observed: {
  podAddress: string
  nrfUrl: string
  certificateStored: boolean
}): DesiredConfigInputs => ({
  ausfGroupId: AUSF_GROUP_ID,
  ausfIp: observed.podAddress,
  nrfUrl: observed.nrfUrl,
  sbiPort: SBI_PORT,
  scheme: observed.certificateStored ? 'https' : 'http',
})

export type ConfigReconciler = ReturnType<typeof createConfigReconciler>

export const createConfigReconciler = (deps: { store: ContainerStore; renderer: TemplateRenderer; logger: Logger }) => {
  const render = (inputs: DesiredConfigInputs) =>
    deps.renderer.render(CONFIG_TEMPLATE_NAME, {
      ausfGroupId: inputs.ausfGroupId,
      ausfIp: inputs.ausfIp,
      nrfUrl: inputs.nrfUrl,
      sbiPort: inputs.sbiPort,
      scheme: inputs.scheme,
    })

  const reconcile = async (inputs: DesiredConfigInputs): Promise<ConfigReconcileResult> => {
    const content = await render(inputs)
    const existing = await deps.store.read(CONFIG_FILE_PATH)
    if (existing === content) return 'unchanged'
    await deps.store.write(CONFIG_FILE_PATH, content, { makeDirs: true })
    deps.logger.info({ path: CONFIG_FILE_PATH, scheme: inputs.scheme }, `Pushed ${CONFIG_FILE_NAME} config file`)
    return 'changed'
  }

  return { render, reconcile }
}
