import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { createFilesystemContainerStore } from '~/operator/container-store'
import { OperatorError } from '~/operator/errors'

describe('filesystem container store', () => {
  let root = ''

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'ausf-store-'))
  })

  afterEach(async () => {
    await rm(root, { recursive: true, force: true })
  })

  it('maps container paths under the workload root', async () => {
    const store = createFilesystemContainerStore(root)

    await store.write('/free5gc/config/ausfcfg.conf', 'sbi: {}\n', { makeDirs: true })

    await expect(readFile(join(root, 'free5gc/config/ausfcfg.conf'), 'utf8')).resolves.toBe('sbi: {}\n')
    await expect(store.exists('/free5gc/config')).resolves.toBe(true)
    await expect(store.read('/free5gc/config/ausfcfg.conf')).resolves.toBe('sbi: {}\n')
  })

  it('reports missing files as absent', async () => {
    const store = createFilesystemContainerStore(root)

    await expect(store.exists('/support/TLS/ausf.pem')).resolves.toBe(false)
    await expect(store.read('/support/TLS/ausf.pem')).resolves.toBeNull()
  })

  it('fails to write into a directory that does not exist without makeDirs', async () => {
    const store = createFilesystemContainerStore(root)

    await expect(store.write('/support/TLS/ausf.key', 'key')).rejects.toMatchObject({ code: 'ENOENT' })
  })

  it('removes files and tolerates removing them twice', async () => {
    const store = createFilesystemContainerStore(root)
    await store.write('/support/TLS/ausf.key', 'key', { makeDirs: true })

    await store.remove('/support/TLS/ausf.key')
    await store.remove('/support/TLS/ausf.key')

    await expect(store.exists('/support/TLS/ausf.key')).resolves.toBe(false)
  })

  it('refuses paths that escape the root', async () => {
    const store = createFilesystemContainerStore(root)

    await expect(store.read('/../outside.txt')).rejects.toBeInstanceOf(OperatorError)
  })
})
