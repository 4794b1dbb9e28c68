import { waitForSignal } from '../shared/signal-primitives.js'
import { newId } from '../shared/utils.js'

import { buildOrderKey, createWakeup } from './work-queue.js'

import type { QueueLease, QueueTimings, WorkQueue } from './work-queue.js'
import type { TaskDescriptor } from '../types/index.js'

type MemoryEntry = {
  key: string
  descriptor: TaskDescriptor
  deliveries: number
  visibleAt: number
  leaseId?: string
  leasedUntil?: number
}

/** Process-local queue with the same lease semantics as the file driver. */
export const createMemoryWorkQueue = (timings: QueueTimings): WorkQueue => {
  const wakeup = createWakeup()
  const closed = new AbortController()
  const ready: MemoryEntry[] = []
  const inflight = new Map<string, MemoryEntry>()

  const insertReady = (entry: MemoryEntry): void => {
    const index = ready.findIndex((item) => item.key > entry.key)
    if (index < 0) ready.push(entry)
    else ready.splice(index, 0, entry)
  }

  const requeueExpired = (now: number): void => {
    for (const [key, entry] of inflight) {
      if ((entry.leasedUntil ?? 0) > now) continue
      inflight.delete(key)
      insertReady({
        key: entry.key,
        descriptor: entry.descriptor,
        deliveries: entry.deliveries,
        visibleAt: now,
      })
    }
  }

  const claimNext = (): QueueLease | null => {
    const now = Date.now()
    requeueExpired(now)
    const index = ready.findIndex((entry) => entry.visibleAt <= now)
    if (index < 0) return null
    const [entry] = ready.splice(index, 1)
    if (!entry) return null
    const lease: QueueLease = {
      leaseId: newId(),
      key: entry.key,
      descriptor: entry.descriptor,
      deliveries: entry.deliveries + 1,
      leasedUntil: now + timings.visibilityTimeoutMs,
    }
    inflight.set(entry.key, {
      ...entry,
      deliveries: lease.deliveries,
      leaseId: lease.leaseId,
      leasedUntil: lease.leasedUntil,
    })
    return lease
  }

  const held = (lease: QueueLease): MemoryEntry | undefined => {
    const entry = inflight.get(lease.key)
    return entry?.leaseId === lease.leaseId ? entry : undefined
  }

  return {
    enqueue: (descriptor) => {
      insertReady({
        key: buildOrderKey(descriptor.taskId),
        descriptor: structuredClone(descriptor),
        deliveries: 0,
        visibleAt: 0,
      })
      wakeup.notify()
      return Promise.resolve()
    },

    dequeue: async (options = {}) => {
      for (;;) {
        if (closed.signal.aborted || options.signal?.aborted) return null
        const wake = wakeup.signal
        const lease = claimNext()
        if (lease) return lease
        await waitForSignal({
          signals: [options.signal, closed.signal, wake],
          timeoutMs: timings.pollMs,
        })
      }
    },

    extend: (lease) => {
      const entry = held(lease)
      if (!entry) return Promise.resolve(false)
      entry.leasedUntil = Date.now() + timings.visibilityTimeoutMs
      lease.leasedUntil = entry.leasedUntil
      return Promise.resolve(true)
    },

    ack: (lease) => {
      if (!held(lease)) return Promise.resolve(false)
      inflight.delete(lease.key)
      return Promise.resolve(true)
    },

    release: (lease, options = {}) => {
      const entry = held(lease)
      if (!entry) return Promise.resolve(false)
      inflight.delete(lease.key)
      insertReady({
        key: entry.key,
        descriptor: entry.descriptor,
        deliveries: entry.deliveries,
        visibleAt: Date.now() + Math.max(0, options.delayMs ?? 0),
      })
      wakeup.notify()
      return Promise.resolve(true)
    },

    stats: () =>
      Promise.resolve({ ready: ready.length, inflight: inflight.size }),

    close: () => {
      if (!closed.signal.aborted) closed.abort()
    },
  }
}
