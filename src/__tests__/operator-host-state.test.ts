import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { OperatorError } from '~/operator/errors'
import {
  CERTIFICATE_REQUESTS_FILE,
  createCertificateRequestOutbox,
  createRelationSnapshotReader,
  createStatusFileReporter,
  RELATIONS_FILE,
  STATUS_FILE,
} from '~/operator/host-state'
import { silentLogger } from '~/test-utils/operator-fakes'

describe('host state', () => {
  let stateDir = ''

  beforeEach(async () => {
    stateDir = await mkdtemp(join(tmpdir(), 'ausf-host-'))
  })

  afterEach(async () => {
    await rm(stateDir, { recursive: true, force: true })
  })

  const writeRelations = (value: unknown) =>
    writeFile(join(stateDir, RELATIONS_FILE), JSON.stringify(value), 'utf8')

  describe('relation snapshot', () => {
    it('reports nothing when no snapshot was written', async () => {
      const reader = createRelationSnapshotReader(stateDir)

      await expect(reader.relations.isCreated('fiveg_nrf')).resolves.toBe(false)
      await expect(reader.nrf.nrfUrl()).resolves.toBeNull()
    })

    it('treats a relation without data as created but not ready', async () => {
      await writeRelations({ relations: { fiveg_nrf: {} } })
      const reader = createRelationSnapshotReader(stateDir)

      await expect(reader.relations.isCreated('fiveg_nrf')).resolves.toBe(true)
      await expect(reader.relations.isCreated('certificates')).resolves.toBe(false)
      await expect(reader.nrf.nrfUrl()).resolves.toBeNull()
    })

    it('returns the trimmed nrf url', async () => {
      await writeRelations({ relations: { fiveg_nrf: { data: { url: ' http://nrf.test:29510 ' } } } })
      const reader = createRelationSnapshotReader(stateDir)

      await expect(reader.nrf.nrfUrl()).resolves.toBe('http://nrf.test:29510')
    })

    it('rejects a malformed snapshot', async () => {
      await writeRelations({ relations: { fiveg_nrf: { data: { url: 5 } } } })
      const reader = createRelationSnapshotReader(stateDir)

      await expect(reader.nrf.nrfUrl()).rejects.toBeInstanceOf(OperatorError)
    })
  })

  describe('certificate request outbox', () => {
    it('appends each csr once', async () => {
      const outbox = createCertificateRequestOutbox({ stateDir, logger: silentLogger() })

      await outbox.client.requestCertificateCreation('csr-1')
      await outbox.client.requestCertificateCreation('csr-1')
      await outbox.client.requestCertificateCreation('csr-2')

      const stored: unknown = JSON.parse(await readFile(join(stateDir, CERTIFICATE_REQUESTS_FILE), 'utf8'))
      expect(stored).toEqual({
        certificate_signing_requests: [
          { certificate_signing_request: 'csr-1', ca: false },
          { certificate_signing_request: 'csr-2', ca: false },
        ],
      })
    })
  })

  describe('status reporter', () => {
    it('writes the status name and message', async () => {
      const reporter = createStatusFileReporter({ stateDir, logger: silentLogger() })
      const readStatus = async (): Promise<unknown> =>
        JSON.parse(await readFile(join(stateDir, STATUS_FILE), 'utf8'))

      await reporter.set({ _tag: 'Blocked', reason: 'Waiting for fiveg_nrf relation' })
      await expect(readStatus()).resolves.toEqual({ status: 'blocked', message: 'Waiting for fiveg_nrf relation' })

      await reporter.set({ _tag: 'Active' })
      await expect(readStatus()).resolves.toEqual({ status: 'active', message: '' })
    })
  })
})
