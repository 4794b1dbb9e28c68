import { abortController } from '../shared/signal-primitives.js'

import type { Id, TaskDescriptor } from '../types/index.js'

export type QueueLease = {
  leaseId: Id
  /** Stable FIFO key of the entry; kept across redeliveries. */
  key: string
  descriptor: TaskDescriptor
  /** How many times the entry has been claimed, this claim included. */
  deliveries: number
  leasedUntil: number
}

export type QueueStats = {
  ready: number
  inflight: number
}

export type DequeueOptions = {
  signal?: AbortSignal
}

export type ReleaseOptions = {
  delayMs?: number
}

export type WorkQueue = {
  enqueue: (descriptor: TaskDescriptor) => Promise<void>
  /**
   * Waits for the next visible entry and leases it. Resolves to `null` once
   * `signal` aborts or the queue is closed.
   */
  dequeue: (options?: DequeueOptions) => Promise<QueueLease | null>
  /** Renews a held lease. Resolves to `false` when the lease was lost. */
  extend: (lease: QueueLease) => Promise<boolean>
  ack: (lease: QueueLease) => Promise<boolean>
  release: (lease: QueueLease, options?: ReleaseOptions) => Promise<boolean>
  stats: () => Promise<QueueStats>
  close: () => void
}

export type QueueTimings = {
  visibilityTimeoutMs: number
  pollMs: number
}

const ORDER_WIDTH = 15
const SEQ_WIDTH = 6

let lastOrderMs = 0
let orderSeq = 0

/** Sortable key: enqueue time, then a per-process sequence, then the id. */
export const buildOrderKey = (taskId: Id, now = Date.now()): string => {
  if (now === lastOrderMs) orderSeq += 1
  else {
    lastOrderMs = now
    orderSeq = 0
  }
  return [
    String(now).padStart(ORDER_WIDTH, '0'),
    String(orderSeq).padStart(SEQ_WIDTH, '0'),
    taskId,
  ].join('-')
}

/** Wakes local consumers blocked in `dequeue` when something changes. */
export const createWakeup = () => {
  let controller = new AbortController()
  return {
    get signal(): AbortSignal {
      return controller.signal
    },
    notify: (): void => {
      const previous = controller
      controller = new AbortController()
      abortController(previous)
    },
  }
}
