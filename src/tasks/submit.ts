import { appendLog } from '../log/append.js'
import { bestEffort } from '../log/safe.js'
import {
  buildInvalidPayloadError,
  buildInvalidTaskTypeError,
  buildQueueUnavailableError,
} from '../shared/errors.js'
import { errorMessage, newId, nowIso } from '../shared/utils.js'
import { isTaskType } from '../types/index.js'

import { createPendingRecord, markFailed } from './task-state.js'
import { parseTaskPayload } from './task-types.js'

import type { TaskRecordStore } from '../storage/task-records.js'
import type { WorkQueue } from '../storage/work-queue.js'
import type { Id, TaskDescriptor } from '../types/index.js'

export type SubmitDeps = {
  store: TaskRecordStore
  queue: WorkQueue
  maxAttempts: number
  logPath?: string
}

export type SubmitInput = {
  taskType: unknown
  payload: unknown
}

/**
 * Validates the request, creates the pending record, then enqueues the
 * descriptor. Resolves with the task id before any work starts.
 */
export const submitTask = async (
  deps: SubmitDeps,
  input: SubmitInput,
): Promise<Id> => {
  const { taskType } = input
  if (!isTaskType(taskType)) throw buildInvalidTaskTypeError(taskType)
  const parsed = parseTaskPayload(taskType, input.payload)
  if (!parsed.ok) throw buildInvalidPayloadError(taskType, parsed.issues)

  const descriptor: TaskDescriptor = {
    taskId: newId(),
    taskType,
    payload: parsed.payload,
    createdAt: nowIso(),
  }
  const { logPath } = deps
  const log = (entry: Record<string, unknown>) =>
    logPath
      ? bestEffort('submitTask: appendLog', () => appendLog(logPath, entry))
      : Promise.resolve()

  await deps.store.create(createPendingRecord(descriptor, deps.maxAttempts))

  try {
    await deps.queue.enqueue(descriptor)
  } catch (error) {
    const queueError = buildQueueUnavailableError(descriptor.taskId, error)
    await deps.store.update(descriptor.taskId, (record) =>
      markFailed(record, {
        code: queueError.code,
        message: queueError.message,
        name: queueError.name,
        retryable: true,
      }),
    )
    await log({
      event: 'task_enqueue_failed',
      taskId: descriptor.taskId,
      taskType,
      error: errorMessage(error),
    })
    throw queueError
  }

  await log({ event: 'task_submitted', taskId: descriptor.taskId, taskType })
  return descriptor.taskId
}
