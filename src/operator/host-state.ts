import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'

import * as S from '@effect/schema/Schema'
import { formatErrorSync } from '@effect/schema/TreeFormatter'
import * as Either from 'effect/Either'

import type { Logger } from '~/logger'

import type { CertificateAuthorityClient } from './certificate-lifecycle'
import { NRF_RELATION_NAME } from './config'
import { OperatorError } from './errors'
import type { NrfRegistrationClient, RelationDirectory } from './precondition-gate'
import { formatUnitStatus, type UnitStatus } from './types'

export const RELATIONS_FILE = 'relations.json'
export const CERTIFICATE_REQUESTS_FILE = 'certificate-requests.json'
export const STATUS_FILE = 'status.json'

const RelationSnapshotSchema = S.Struct({
  relations: S.optional(
    S.Record({
      key: S.String,
      value: S.Struct({
        data: S.optional(S.Record({ key: S.String, value: S.String })),
      }),
    }),
  ),
})

export type RelationSnapshot = S.Schema.Type<typeof RelationSnapshotSchema>

const CertificateRequestsSchema = S.Struct({
  certificate_signing_requests: S.Array(
    S.Struct({
      certificate_signing_request: S.String,
      ca: S.optional(S.Boolean),
    }),
  ),
})

type CertificateRequests = S.Schema.Type<typeof CertificateRequestsSchema>

const isNotFoundError = (error: unknown) => error instanceof Error && 'code' in error && error.code === 'ENOENT'

export const readJsonFile = async (path: string): Promise<unknown> => {
  let raw: string
  try {
    raw = await readFile(path, 'utf8')
  } catch (error) {
    if (isNotFoundError(error)) return null
    throw error
  }
  try {
    return JSON.parse(raw)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new OperatorError(`invalid JSON in ${path}: ${message}`)
  }
}

/** Writes through a temporary file so a reader never sees a partial document. */
export const writeJsonFile = async (path: string, value: unknown) => {
  await mkdir(dirname(path), { recursive: true })
  const temporary = `${path}.tmp`
  await writeFile(temporary, `${JSON.stringify(value, null, 2)}\n`, 'utf8')
  await rename(temporary, path)
}

const decodeWith = <A, I>(schema: S.Schema<A, I>, path: string, input: unknown): A => {
  const decoded = S.decodeUnknownEither(schema)(input)
  if (Either.isLeft(decoded)) {
    throw new OperatorError(`invalid ${path}: ${formatErrorSync(decoded.left)}`)
  }
  return decoded.right
}

export const createRelationSnapshotReader = (stateDir: string) => {
  const path = join(stateDir, RELATIONS_FILE)

  const read = async (): Promise<RelationSnapshot> => {
    const raw = await readJsonFile(path)
    if (raw == null) return {}
    return decodeWith(RelationSnapshotSchema, path, raw)
  }

  const relations: RelationDirectory = {
    isCreated: async (relationName) => {
      const snapshot = await read()
      return snapshot.relations?.[relationName] !== undefined
    },
  }

  const nrf: NrfRegistrationClient = {
    nrfUrl: async () => {
      const snapshot = await read()
      const url = snapshot.relations?.[NRF_RELATION_NAME]?.data?.url?.trim()
      return url ? url : null
    },
  }

  return { read, relations, nrf }
}

export const createCertificateRequestOutbox = (deps: { stateDir: string; logger: Logger }) => {
  const path = join(deps.stateDir, CERTIFICATE_REQUESTS_FILE)

  const list = async (): Promise<CertificateRequests> => {
    const raw = await readJsonFile(path)
    if (raw == null) return { certificate_signing_requests: [] }
    return decodeWith(CertificateRequestsSchema, path, raw)
  }

  const client: CertificateAuthorityClient = {
    requestCertificateCreation: async (certificateSigningRequest) => {
      const current = await list()
      const exists = current.certificate_signing_requests.some(
        (entry) => entry.certificate_signing_request === certificateSigningRequest,
      )
      if (exists) {
        deps.logger.info('Certificate request was already sent')
        return
      }
      await writeJsonFile(path, {
        certificate_signing_requests: [
          ...current.certificate_signing_requests,
          { certificate_signing_request: certificateSigningRequest, ca: false },
        ],
      })
      deps.logger.info('Certificate request sent')
    },
  }

  return { list, client }
}

export interface StatusReporter {
  set: (status: UnitStatus) => Promise<void>
}

export const createStatusFileReporter = (deps: { stateDir: string; logger: Logger }): StatusReporter => {
  const path = join(deps.stateDir, STATUS_FILE)
  return {
    set: async (status) => {
      await writeJsonFile(path, {
        status: status._tag.toLowerCase(),
        message: status._tag === 'Active' ? '' : status.reason,
      })
      deps.logger.info({ status: formatUnitStatus(status) }, 'unit status updated')
    },
  }
}
