import { appendLog } from '../log/append.js'
import { bestEffort, logSafeError } from '../log/safe.js'
import {
  attemptsLeft,
  isTerminal,
  markCompleted,
  markFailed,
  markReleased,
} from '../tasks/task-state.js'

import { toTaskErrorInfo } from './error-utils.js'
import { TaskInterruptedError, runTaskWithRetry } from './run-retry.js'

import type { RetryPolicy } from './run-retry.js'
import type { TaskRecordStore } from '../storage/task-records.js'
import type { QueueLease, WorkQueue } from '../storage/work-queue.js'
import type { TaskHandlers } from '../tasks/handlers.js'
import type { TaskRecord } from '../types/index.js'

export type LeaseOutcome =
  | 'completed'
  | 'failed'
  | 'skipped'
  | 'missing'
  | 'released'
  | 'unacked'

export type ExecuteLeaseDeps = {
  store: TaskRecordStore
  queue: WorkQueue
  handlers: TaskHandlers
  retry: RetryPolicy
  visibilityTimeoutMs: number
  /** Aborted when the pool stops without waiting for running work. */
  signal: AbortSignal
  logPath?: string
}

const startLeaseHeartbeat = (
  deps: ExecuteLeaseDeps,
  lease: QueueLease,
): (() => void) => {
  const intervalMs = Math.max(10, Math.floor(deps.visibilityTimeoutMs / 3))
  let inFlight = false
  const timer = setInterval(() => {
    if (inFlight) return
    inFlight = true
    void bestEffort(
      'executeLease: extend',
      async () => {
        const held = await deps.queue.extend(lease)
        if (!held && deps.logPath)
          await appendLog(deps.logPath, {
            event: 'queue_lease_lost',
            taskId: lease.descriptor.taskId,
            leaseId: lease.leaseId,
          })
      },
      { meta: { taskId: lease.descriptor.taskId } },
    ).finally(() => {
      inFlight = false
    })
  }, intervalMs)
  timer.unref()
  return () => clearInterval(timer)
}

/**
 * Executes one delivered lease to a terminal record, then acks it. The lease
 * is acked only after the terminal write succeeds; otherwise it expires and
 * the task is delivered again.
 */
export const executeLease = async (
  deps: ExecuteLeaseDeps,
  lease: QueueLease,
): Promise<LeaseOutcome> => {
  const { descriptor } = lease
  const { taskId, taskType } = descriptor
  const { logPath } = deps
  const log = (entry: Record<string, unknown>) =>
    logPath
      ? bestEffort('executeLease: appendLog', () => appendLog(logPath, entry))
      : Promise.resolve()
  const ack = async (): Promise<void> => {
    const acked = await deps.queue.ack(lease)
    if (!acked)
      await log({ event: 'queue_ack_missing', taskId, leaseId: lease.leaseId })
  }

  const record = await deps.store.get(taskId)
  if (!record) {
    await log({ event: 'task_record_missing', taskId, taskType })
    await ack()
    return 'missing'
  }
  if (isTerminal(record)) {
    await log({
      event: 'task_redelivered_terminal',
      taskId,
      status: record.status,
      deliveries: lease.deliveries,
    })
    await ack()
    return 'skipped'
  }

  if (attemptsLeft(record) <= 0) {
    await deps.store.update(taskId, (current) =>
      markFailed(current, {
        code: 'attempts_exhausted',
        message: `no attempts left after ${current.attempts} of ${current.maxAttempts}`,
        retryable: false,
      }),
    )
    await log({ event: 'task_attempts_exhausted', taskId, taskType })
    await ack()
    return 'failed'
  }

  let finished: TaskRecord
  const stopHeartbeat = startLeaseHeartbeat(deps, lease)
  const startedAt = Date.now()
  try {
    await log({
      event: 'worker_start',
      taskId,
      taskType,
      deliveries: lease.deliveries,
    })
    try {
      const result = await runTaskWithRetry({
        store: deps.store,
        handler: deps.handlers[taskType],
        descriptor,
        record,
        retry: deps.retry,
        signal: deps.signal,
        ...(logPath ? { logPath } : {}),
      })
      finished = await deps.store.update(taskId, (current) =>
        markCompleted(current, result),
      )
    } catch (error) {
      if (error instanceof TaskInterruptedError || deps.signal.aborted) {
        const interrupted =
          error instanceof TaskInterruptedError && error.attemptInterrupted
        // the record is updated before the lease is visible to other workers
        if (interrupted)
          await bestEffort(
            'executeLease: markReleased',
            () => deps.store.update(taskId, (current) => markReleased(current)),
            { meta: { taskId }, ...(logPath ? { logPath } : {}) },
          )
        await deps.queue.release(lease)
        await log({ event: 'worker_aborted', taskId, taskType, interrupted })
        return 'released'
      }
      const info = toTaskErrorInfo(error)
      finished = await deps.store.update(taskId, (current) =>
        markFailed(current, info),
      )
    }
  } catch (error) {
    await logSafeError('executeLease: finalize', error, {
      meta: { taskId, leaseId: lease.leaseId },
      ...(logPath ? { logPath } : {}),
    })
    return 'unacked'
  } finally {
    stopHeartbeat()
  }

  await log({
    event: finished.status === 'completed' ? 'worker_end' : 'worker_failed',
    taskId,
    taskType,
    status: finished.status,
    attempts: finished.attempts,
    elapsedMs: Math.max(0, Date.now() - startedAt),
    ...(finished.error ? { error: finished.error.message } : {}),
  })
  await ack()
  return finished.status === 'completed' ? 'completed' : 'failed'
}
