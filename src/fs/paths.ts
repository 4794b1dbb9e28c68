import { existsSync } from 'node:fs'
import { mkdir, readdir } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'

import { safe } from '../log/safe.js'

import type { Dirent } from 'node:fs'

export type StatePaths = {
  root: string
  recordsDir: string
  queueDir: string
  queueReadyDir: string
  queueInflightDir: string
  log: string
}

export const buildPaths = (workDir: string): StatePaths => {
  const root = workDir
  const queueDir = join(root, 'queue')
  return {
    root,
    recordsDir: join(root, 'records'),
    queueDir,
    queueReadyDir: join(queueDir, 'ready'),
    queueInflightDir: join(queueDir, 'inflight'),
    log: join(root, 'log.jsonl'),
  }
}

export const ensureDir = async (path: string): Promise<void> => {
  await mkdir(path, { recursive: true })
}

export const ensureStateDirs = async (paths: StatePaths): Promise<void> => {
  await ensureDir(paths.root)
  await ensureDir(paths.recordsDir)
  await ensureDir(paths.queueReadyDir)
  await ensureDir(paths.queueInflightDir)
}

export const listFiles = (dir: string): Promise<Dirent[]> =>
  safe('listFiles: readdir', () => readdir(dir, { withFileTypes: true }), {
    fallback: [],
    meta: { dir },
    ignoreCodes: ['ENOENT'],
  })

let projectRoot: string | null = null

/** Nearest directory above this module holding package.json; same from src and dist. */
export const resolveProjectRoot = (): string => {
  if (projectRoot) return projectRoot
  let dir = dirname(fileURLToPath(import.meta.url))
  while (!existsSync(join(dir, 'package.json'))) {
    const parent = dirname(dir)
    if (parent === dir) throw new Error('project root not found')
    dir = parent
  }
  projectRoot = dir
  return dir
}
