import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises'
import { dirname, join, relative, resolve } from 'node:path'

import { OperatorError } from './errors'

export type WriteOptions = {
  makeDirs?: boolean
}

/** Filesystem of the managed workload container, addressed by absolute container paths. */
export interface ContainerStore {
  exists: (path: string) => Promise<boolean>
  read: (path: string) => Promise<string | null>
  write: (path: string, content: string, options?: WriteOptions) => Promise<void>
  remove: (path: string) => Promise<void>
}

const isNotFoundError = (error: unknown) =>
  error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')

export const createFilesystemContainerStore = (root: string): ContainerStore => {
  const resolvedRoot = resolve(root)

  const toHostPath = (path: string) => {
    const hostPath = resolve(join(resolvedRoot, path))
    const rel = relative(resolvedRoot, hostPath)
    if (rel.startsWith('..')) {
      throw new OperatorError(`path ${path} escapes the workload root`)
    }
    return hostPath
  }

  return {
    exists: async (path) => {
      try {
        await stat(toHostPath(path))
        return true
      } catch (error) {
        if (isNotFoundError(error)) return false
        throw error
      }
    },
    read: async (path) => {
      try {
        return await readFile(toHostPath(path), 'utf8')
      } catch (error) {
        if (isNotFoundError(error)) return null
        throw error
      }
    },
    write: async (path, content, options = {}) => {
      const hostPath = toHostPath(path)
      if (options.makeDirs) {
        await mkdir(dirname(hostPath), { recursive: true })
      }
      await writeFile(hostPath, content, 'utf8')
    },
    remove: async (path) => {
      await rm(toHostPath(path), { force: true })
    },
  }
}
