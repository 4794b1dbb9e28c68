import pRetry, { AbortError } from 'p-retry'

import { appendLog } from '../log/append.js'
import { bestEffort } from '../log/safe.js'
import { markProgress, markRunning } from '../tasks/task-state.js'

import { isRetryableTaskError, toError } from './error-utils.js'

import type { TaskRecordStore } from '../storage/task-records.js'
import type { TaskHandler } from '../tasks/handlers.js'
import type {
  Id,
  TaskDescriptor,
  TaskRecord,
  TaskResult,
} from '../types/index.js'

export type RetryPolicy = {
  backoffMs: number
  maxBackoffMs: number
}

export type RunWithRetryParams = {
  store: TaskRecordStore
  handler: TaskHandler
  descriptor: TaskDescriptor
  record: TaskRecord
  retry: RetryPolicy
  signal: AbortSignal
  logPath?: string
}

const BACKOFF_FACTOR = 2

/**
 * Raised instead of the underlying error once the pool aborts the run.
 * `attemptInterrupted` is set when an attempt was running and never failed
 * on its own.
 */
export class TaskInterruptedError extends Error {
  readonly taskId: Id
  readonly attemptInterrupted: boolean

  constructor(taskId: Id, attemptInterrupted: boolean) {
    super(`task ${taskId} interrupted by worker stop`)
    this.name = 'TaskInterruptedError'
    this.taskId = taskId
    this.attemptInterrupted = attemptInterrupted
  }
}

/** Delay before the retry that follows failed attempt `attemptNumber`. */
export const computeBackoffMs = (
  policy: RetryPolicy,
  attemptNumber: number,
): number =>
  Math.min(
    Math.round(
      Math.max(policy.backoffMs, 1) * BACKOFF_FACTOR ** (attemptNumber - 1),
    ),
    Math.max(policy.backoffMs, policy.maxBackoffMs),
  )

/**
 * Runs the handler for the attempts the record has left. Every attempt
 * first moves the record to `running`; a failure that will be retried is
 * written as progress, never as `failed`.
 */
export const runTaskWithRetry = async (
  params: RunWithRetryParams,
): Promise<TaskResult> => {
  const { store, descriptor, record, retry, signal, logPath } = params
  const { taskId } = descriptor
  const { maxAttempts } = record
  const retries = Math.max(0, maxAttempts - record.attempts - 1)
  let attempt = record.attempts
  let attemptRunning = false

  const log = (entry: Record<string, unknown>) =>
    logPath
      ? bestEffort('runTaskWithRetry: appendLog', () =>
          appendLog(logPath, entry),
        )
      : Promise.resolve()

  const run = () =>
    pRetry(
      async () => {
        if (signal.aborted) throw new AbortError('worker stopped')
        attempt += 1
        const current = attempt
        await store.update(taskId, (existing) => markRunning(existing, current))
        attemptRunning = true
        await log({
          event: 'worker_attempt_start',
          taskId,
          taskType: descriptor.taskType,
          attempt: current,
          maxAttempts,
        })
        try {
          return await params.handler(descriptor.payload, {
            taskId,
            taskType: descriptor.taskType,
            attempt: current,
            maxAttempts,
            signal,
            reportProgress: async (stage) => {
              await store.update(taskId, (existing) =>
                markProgress(existing, stage),
              )
            },
          })
        } catch (error) {
          const err = toError(error)
          if (signal.aborted) throw new AbortError(err)
          attemptRunning = false
          if (!isRetryableTaskError(error)) throw new AbortError(err)
          throw err
        }
      },
      {
        retries,
        signal,
        factor: BACKOFF_FACTOR,
        minTimeout: retry.backoffMs,
        maxTimeout: Math.max(retry.backoffMs, retry.maxBackoffMs),
        randomize: false,
        onFailedAttempt: async ({ error, attemptNumber, retriesLeft }) => {
          if (retriesLeft <= 0) return
          const backoffMs = computeBackoffMs(retry, attemptNumber)
          await store.update(taskId, (existing) =>
            markProgress(
              existing,
              `attempt ${attempt}/${maxAttempts} failed: ${error.message}; retrying in ${backoffMs}ms`,
            ),
          )
          await log({
            event: 'worker_retry',
            taskId,
            attempt,
            maxAttempts,
            backoffMs,
            error: error.message,
          })
        },
      },
    )

  try {
    return await run()
  } catch (error) {
    if (signal.aborted) throw new TaskInterruptedError(taskId, attemptRunning)
    throw error
  }
}
