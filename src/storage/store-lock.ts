import { mkdir, open, stat, unlink } from 'node:fs/promises'
import { dirname, join } from 'node:path'

import { bestEffort, logSafeError } from '../log/safe.js'
import { readErrorCode } from '../shared/errors.js'
import { sleep } from '../shared/utils.js'

type StoreLockOptions = {
  lockPath?: string
  timeoutMs?: number
  pollIntervalMs?: number
  staleMs?: number
}

const DEFAULT_TIMEOUT_MS = 10_000
const DEFAULT_POLL_MS = 10
const DEFAULT_STALE_MS = 30_000

const resolveLockPath = (targetPath: string, override?: string): string => {
  if (override) return override
  if (/\.[a-z0-9]+$/i.test(targetPath)) return `${targetPath}.lock`
  return join(targetPath, '.lock')
}

const acquire = async (
  lockPath: string,
  opts: Required<Omit<StoreLockOptions, 'lockPath'>>,
): Promise<void> => {
  const startedAt = Date.now()
  for (;;) {
    try {
      const handle = await open(lockPath, 'wx')
      try {
        await handle.writeFile(
          JSON.stringify({ pid: process.pid, startedAt: Date.now() }),
          'utf8',
        )
      } finally {
        await handle.close()
      }
      return
    } catch (error) {
      if (readErrorCode(error) !== 'EEXIST') throw error

      const now = Date.now()
      if (now - startedAt > opts.timeoutMs)
        throw new Error(`timeout acquiring store lock: ${lockPath}`)

      try {
        const info = await stat(lockPath)
        if (now - info.mtimeMs > opts.staleMs) {
          await unlink(lockPath)
          continue
        }
      } catch (statError) {
        if (readErrorCode(statError) === 'ENOENT') continue
        await logSafeError('withStoreLock: stat', statError, {
          meta: { path: lockPath },
        })
      }

      await sleep(opts.pollIntervalMs)
    }
  }
}

/**
 * Cross-process mutual exclusion over `targetPath` using an exclusive lock
 * file. Locks older than `staleMs` are taken over.
 */
export const withStoreLock = async <T>(
  targetPath: string,
  fn: () => Promise<T>,
  opts: StoreLockOptions = {},
): Promise<T> => {
  const lockPath = resolveLockPath(targetPath, opts.lockPath)
  await mkdir(dirname(lockPath), { recursive: true })
  await acquire(lockPath, {
    timeoutMs: opts.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    pollIntervalMs: opts.pollIntervalMs ?? DEFAULT_POLL_MS,
    staleMs: opts.staleMs ?? DEFAULT_STALE_MS,
  })
  try {
    return await fn()
  } finally {
    await bestEffort('withStoreLock: unlink', () => unlink(lockPath), {
      meta: { path: lockPath },
    })
  }
}
