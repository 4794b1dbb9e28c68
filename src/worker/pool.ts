import PQueue from 'p-queue'

import { appendLog } from '../log/append.js'
import { bestEffort, logSafeError } from '../log/safe.js'
import { abortController, waitForSignal } from '../shared/signal-primitives.js'
import { errorMessage } from '../shared/utils.js'

import { executeLease } from './run-task.js'

import type { LeaseOutcome } from './run-task.js'
import type { RetryPolicy } from './run-retry.js'
import type { TaskRecordStore } from '../storage/task-records.js'
import type { QueueLease, WorkQueue } from '../storage/work-queue.js'
import type { TaskHandlers } from '../tasks/handlers.js'
import type { Id } from '../types/index.js'

export type WorkerPoolOptions = {
  concurrency: number
  store: TaskRecordStore
  queue: WorkQueue
  handlers: TaskHandlers
  retry: RetryPolicy
  visibilityTimeoutMs: number
  logPath?: string
  /** Called after every lease; used by tests and status reporting. */
  onLeaseDone?: (lease: QueueLease, outcome: LeaseOutcome) => void
}

export type WorkerPoolStatus = {
  started: boolean
  stopping: boolean
  concurrency: number
  activeTasks: number
  activeTaskIds: Id[]
  processed: number
}

const DEQUEUE_ERROR_BACKOFF_MS = 1_000

/**
 * Fixed number of executors over one work queue. Each executor holds one
 * lease at a time; the dispatch loop only dequeues when a slot is free.
 */
export class WorkerPool {
  private readonly options: WorkerPoolOptions
  private readonly executors: PQueue
  private readonly stopController = new AbortController()
  private readonly abortRunning = new AbortController()
  private readonly active = new Set<Id>()
  private loop: Promise<void> | null = null
  private processed = 0

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1)
      throw new Error(`invalid worker concurrency: ${options.concurrency}`)
    this.options = options
    this.executors = new PQueue({ concurrency: options.concurrency })
  }

  start(): void {
    if (this.loop || this.stopController.signal.aborted) return
    this.loop = this.dispatchLoop()
  }

  getStatus(): WorkerPoolStatus {
    return {
      started: this.loop !== null,
      stopping: this.stopController.signal.aborted,
      concurrency: this.options.concurrency,
      activeTasks: this.active.size,
      activeTaskIds: [...this.active],
      processed: this.processed,
    }
  }

  /**
   * Stops dequeuing and waits for running tasks. With `graceMs`, tasks still
   * running after the grace period are aborted and their leases released.
   */
  async stop(options: { graceMs?: number } = {}): Promise<void> {
    abortController(this.stopController)
    await this.loop
    const idle = this.executors.onIdle()
    if (options.graceMs === undefined) {
      await idle
      return
    }
    const settled = new AbortController()
    const waitIdle = idle.then(() => abortController(settled))
    await waitForSignal({
      signals: [settled.signal],
      timeoutMs: options.graceMs,
    })
    if (this.executors.pending > 0) abortController(this.abortRunning)
    await waitIdle
  }

  private async log(entry: Record<string, unknown>): Promise<void> {
    const { logPath } = this.options
    if (!logPath) return
    await bestEffort('workerPool: appendLog', () => appendLog(logPath, entry))
  }

  private waitForSlot(): Promise<void> {
    const isFull = () =>
      this.executors.pending + this.executors.size >= this.options.concurrency
    if (!isFull()) return Promise.resolve()
    return new Promise<void>((resolve) => {
      const { signal } = this.stopController
      const check = () => {
        if (isFull() && !signal.aborted) return
        this.executors.off('next', check)
        signal.removeEventListener('abort', check)
        resolve()
      }
      this.executors.on('next', check)
      signal.addEventListener('abort', check, { once: true })
    })
  }

  private async dispatchLoop(): Promise<void> {
    const { signal } = this.stopController
    await this.log({
      event: 'worker_pool_start',
      concurrency: this.options.concurrency,
    })
    while (!signal.aborted) {
      await this.waitForSlot()
      if (signal.aborted) break
      let lease: QueueLease | null
      try {
        lease = await this.options.queue.dequeue({ signal })
      } catch (error) {
        await this.log({ event: 'queue_dequeue_failed', error: errorMessage(error) })
        await waitForSignal({
          signals: [signal],
          timeoutMs: DEQUEUE_ERROR_BACKOFF_MS,
        })
        continue
      }
      if (!lease) break
      const claimed = lease
      void this.executors
        .add(() => this.runLease(claimed))
        .catch((error: unknown) =>
          logSafeError('workerPool: runLease', error, {
            meta: { taskId: claimed.descriptor.taskId },
            ...(this.options.logPath ? { logPath: this.options.logPath } : {}),
          }),
        )
    }
    await this.log({ event: 'worker_pool_stop', active: this.active.size })
  }

  private async runLease(lease: QueueLease): Promise<void> {
    const { taskId } = lease.descriptor
    this.active.add(taskId)
    try {
      const outcome = await executeLease(
        {
          store: this.options.store,
          queue: this.options.queue,
          handlers: this.options.handlers,
          retry: this.options.retry,
          visibilityTimeoutMs: this.options.visibilityTimeoutMs,
          signal: this.abortRunning.signal,
          ...(this.options.logPath ? { logPath: this.options.logPath } : {}),
        },
        lease,
      )
      this.options.onLeaseDone?.(lease, outcome)
    } finally {
      this.active.delete(taskId)
      this.processed += 1
    }
  }
}
