import { readdir, rename, unlink } from 'node:fs/promises'
import { join } from 'node:path'

import { z } from 'zod'

import { readJson, writeJson } from '../fs/json.js'
import { ensureDir } from '../fs/paths.js'
import { appendLog } from '../log/append.js'
import { bestEffort } from '../log/safe.js'
import { readErrorCode } from '../shared/errors.js'
import { waitForSignal } from '../shared/signal-primitives.js'
import { newId } from '../shared/utils.js'

import { runSerialized } from './serialized-lock.js'
import { withStoreLock } from './store-lock.js'
import { taskDescriptorSchema } from './task-record-schema.js'
import { buildOrderKey, createWakeup } from './work-queue.js'

import type {
  QueueLease,
  QueueStats,
  QueueTimings,
  WorkQueue,
} from './work-queue.js'
import type { TaskDescriptor } from '../types/index.js'

const queueEntrySchema = z.object({
  descriptor: taskDescriptorSchema,
  enqueuedAt: z.number(),
  deliveries: z.number().int().nonnegative(),
  visibleAt: z.number().optional(),
  leaseId: z.string().optional(),
  leasedUntil: z.number().optional(),
})

type QueueEntry = {
  descriptor: TaskDescriptor
  enqueuedAt: number
  deliveries: number
  visibleAt?: number
  leaseId?: string
  leasedUntil?: number
}

type QueueDirs = {
  root: string
  ready: string
  inflight: string
  logPath?: string
}

const ENTRY_EXT = '.json'

const toEntry = (parsed: z.infer<typeof queueEntrySchema>): QueueEntry => ({
    descriptor: parsed.descriptor,
    enqueuedAt: parsed.enqueuedAt,
    deliveries: parsed.deliveries,
    ...(parsed.visibleAt !== undefined ? { visibleAt: parsed.visibleAt } : {}),
    ...(parsed.leaseId !== undefined ? { leaseId: parsed.leaseId } : {}),
    ...(parsed.leasedUntil !== undefined
      ? { leasedUntil: parsed.leasedUntil }
      : {}),
})

const unleased = (entry: QueueEntry): QueueEntry => {
  const { leaseId: _leaseId, leasedUntil: _leasedUntil, ...rest } = entry
  return rest
}

const listKeys = async (dir: string): Promise<string[]> => {
  try {
    const names = await readdir(dir)
    return names
      .filter((name) => name.endsWith(ENTRY_EXT))
      .map((name) => name.slice(0, -ENTRY_EXT.length))
      .sort()
  } catch (error) {
    if (readErrorCode(error) === 'ENOENT') return []
    throw error
  }
}

/**
 * Durable FIFO over two directories. Claiming renames an entry from
 * `ready/` to `inflight/`; an expired lease renames it back under the same
 * key, so it keeps its place in line. All mutations hold one queue lock,
 * which makes the directory safe to share between processes.
 */
export const createFileWorkQueue = (
  dirs: QueueDirs,
  timings: QueueTimings,
): WorkQueue => {
  const wakeup = createWakeup()
  const closed = new AbortController()
  const readyPath = (key: string) => join(dirs.ready, `${key}${ENTRY_EXT}`)
  const inflightPath = (key: string) =>
    join(dirs.inflight, `${key}${ENTRY_EXT}`)

  const withQueueLock = <T>(fn: () => Promise<T>): Promise<T> =>
    runSerialized(dirs.root, () => withStoreLock(dirs.root, fn))

  const log = async (entry: Record<string, unknown>): Promise<void> => {
    const { logPath } = dirs
    if (!logPath) return
    await bestEffort('workQueue: appendLog', () => appendLog(logPath, entry))
  }

  // unreadable entries are moved out of the way so the rest stay claimable
  const setAside = async (path: string, issues: string[]): Promise<void> => {
    await log({ event: 'queue_entry_invalid', path, issues })
    await rename(path, `${path}.corrupt`)
  }

  const readEntry = async (path: string): Promise<QueueEntry | undefined> => {
    let raw: unknown
    try {
      raw = await readJson(path)
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error
      await setAside(path, [error.message])
      return undefined
    }
    if (raw === undefined) return undefined
    const parsed = queueEntrySchema.safeParse(raw)
    if (parsed.success) return toEntry(parsed.data)
    await setAside(path, parsed.error.issues.map((issue) => issue.message))
    return undefined
  }

  const requeueExpired = async (now: number): Promise<void> => {
    for (const key of await listKeys(dirs.inflight)) {
      const path = inflightPath(key)
      const entry = await readEntry(path)
      if (!entry) continue
      if (entry.leasedUntil !== undefined && entry.leasedUntil > now) continue
      await writeJson(path, unleased(entry))
      await rename(path, readyPath(key))
      await log({
        event: 'queue_lease_expired',
        taskId: entry.descriptor.taskId,
        key,
        deliveries: entry.deliveries,
      })
    }
  }

  const claimNext = (): Promise<QueueLease | null> =>
    withQueueLock(async () => {
      const now = Date.now()
      await requeueExpired(now)
      for (const key of await listKeys(dirs.ready)) {
        const path = readyPath(key)
        const entry = await readEntry(path)
        if (!entry) continue
        if (entry.visibleAt !== undefined && entry.visibleAt > now) continue
        const lease: QueueLease = {
          leaseId: newId(),
          key,
          descriptor: entry.descriptor,
          deliveries: entry.deliveries + 1,
          leasedUntil: now + timings.visibilityTimeoutMs,
        }
        await rename(path, inflightPath(key))
        await writeJson(inflightPath(key), {
          ...entry,
          deliveries: lease.deliveries,
          leaseId: lease.leaseId,
          leasedUntil: lease.leasedUntil,
        })
        return lease
      }
      return null
    })

  // runs `fn` on the inflight entry only while `lease` still owns it
  const withHeldLease = (
    lease: QueueLease,
    fn: (entry: QueueEntry, path: string) => Promise<void>,
  ): Promise<boolean> =>
    withQueueLock(async () => {
      const path = inflightPath(lease.key)
      const entry = await readEntry(path)
      if (!entry || entry.leaseId !== lease.leaseId) return false
      await fn(entry, path)
      return true
    })

  return {
    enqueue: async (descriptor) => {
      await ensureDir(dirs.ready)
      await ensureDir(dirs.inflight)
      const key = buildOrderKey(descriptor.taskId)
      const entry: QueueEntry = {
        descriptor,
        enqueuedAt: Date.now(),
        deliveries: 0,
      }
      await withQueueLock(() => writeJson(readyPath(key), entry))
      wakeup.notify()
    },

    dequeue: async (options = {}) => {
      for (;;) {
        if (closed.signal.aborted || options.signal?.aborted) return null
        const wake = wakeup.signal
        const lease = await claimNext()
        if (lease) return lease
        await waitForSignal({
          signals: [options.signal, closed.signal, wake],
          timeoutMs: timings.pollMs,
        })
      }
    },

    extend: (lease) =>
      withHeldLease(lease, async (entry, path) => {
        const leasedUntil = Date.now() + timings.visibilityTimeoutMs
        await writeJson(path, { ...entry, leasedUntil })
        lease.leasedUntil = leasedUntil
      }),

    ack: (lease) =>
      withHeldLease(lease, async (_entry, path) => {
        await unlink(path)
      }),

    release: async (lease, options = {}) => {
      const released = await withHeldLease(lease, async (entry, path) => {
        const delayMs = Math.max(0, options.delayMs ?? 0)
        await writeJson(path, {
          ...unleased(entry),
          ...(delayMs > 0 ? { visibleAt: Date.now() + delayMs } : {}),
        })
        await rename(path, readyPath(lease.key))
      })
      if (released) wakeup.notify()
      return released
    },

    stats: async (): Promise<QueueStats> => {
      const [ready, inflight] = await Promise.all([
        listKeys(dirs.ready),
        listKeys(dirs.inflight),
      ])
      return { ready: ready.length, inflight: inflight.length }
    },

    close: () => {
      if (!closed.signal.aborted) closed.abort()
    },
  }
}
