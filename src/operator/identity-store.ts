import type { Logger } from '~/logger'

import { CERTIFICATE_NAME, CERTS_DIR_PATH, CSR_NAME, PRIVATE_KEY_NAME } from './config'
import type { ContainerStore } from './container-store'

export type IdentityArtifact = 'privateKey' | 'csr' | 'certificate'

export const IDENTITY_ARTIFACTS: readonly IdentityArtifact[] = ['privateKey', 'csr', 'certificate']

const ARTIFACT_FILE_NAMES: Record<IdentityArtifact, string> = {
  privateKey: PRIVATE_KEY_NAME,
  csr: CSR_NAME,
  certificate: CERTIFICATE_NAME,
}

const ARTIFACT_LABELS: Record<IdentityArtifact, string> = {
  privateKey: 'private key',
  csr: 'CSR',
  certificate: 'certificate',
}

export const identityArtifactPath = (artifact: IdentityArtifact) => `${CERTS_DIR_PATH}/${ARTIFACT_FILE_NAMES[artifact]}`

export type IdentityStore = ReturnType<typeof createIdentityStore>

export const createIdentityStore = (deps: { store: ContainerStore; logger: Logger }) => {
  const isStored = (artifact: IdentityArtifact) => deps.store.exists(identityArtifactPath(artifact))

  const read = (artifact: IdentityArtifact) => deps.store.read(identityArtifactPath(artifact))

  const store = async (artifact: IdentityArtifact, content: string) => {
    await deps.store.write(identityArtifactPath(artifact), content)
    deps.logger.info({ artifact }, `Pushed ${ARTIFACT_LABELS[artifact]} to workload`)
  }

  const remove = async (artifact: IdentityArtifact) => {
    if (!(await isStored(artifact))) return
    await deps.store.remove(identityArtifactPath(artifact))
    deps.logger.info({ artifact }, `Removed ${ARTIFACT_LABELS[artifact]} from workload`)
  }

  const removeAll = async () => {
    for (const artifact of IDENTITY_ARTIFACTS) {
      await remove(artifact)
    }
  }

  return { isStored, read, store, remove, removeAll }
}
