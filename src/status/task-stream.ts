import { buildNotFoundError } from '../shared/errors.js'
import { waitForSignal } from '../shared/signal-primitives.js'
import { isTerminalStatus } from '../types/index.js'

import type { TaskRecordStore } from '../storage/task-records.js'
import type { Id, TaskRecord, TaskStatus } from '../types/index.js'

export const STREAM_TIMEOUT_MESSAGE = 'Task processing timed out'

export type TaskTimeoutPayload = {
  taskId: Id
  status: 'timeout'
  lastStatus: TaskStatus
  error: string
}

export type TaskStreamEvent =
  | { type: 'update'; record: TaskRecord }
  | { type: 'timeout'; payload: TaskTimeoutPayload }

export type WatchTaskOptions = {
  pollMs: number
  maxDurationMs: number
  signal?: AbortSignal
}

/**
 * Follows one task record. Yields the current snapshot first, then every
 * newer revision, and returns after a terminal update. When the task does
 * not finish within `maxDurationMs` a single timeout event is yielded; the
 * task itself keeps running. Rejects with `not_found` before yielding
 * anything when the record does not exist.
 */
export async function* watchTask(
  store: TaskRecordStore,
  taskId: Id,
  options: WatchTaskOptions,
): AsyncGenerator<TaskStreamEvent, void, undefined> {
  const startedAt = Date.now()
  const initial = await store.get(taskId)
  if (!initial) throw buildNotFoundError(taskId)
  let last = initial
  yield { type: 'update', record: initial }
  if (isTerminalStatus(initial.status)) return

  for (;;) {
    const remainingMs = options.maxDurationMs - (Date.now() - startedAt)
    if (remainingMs <= 0) {
      yield {
        type: 'timeout',
        payload: {
          taskId,
          status: 'timeout',
          lastStatus: last.status,
          error: STREAM_TIMEOUT_MESSAGE,
        },
      }
      return
    }
    await waitForSignal({
      signals: [options.signal],
      timeoutMs: Math.min(options.pollMs, remainingMs),
    })
    if (options.signal?.aborted) return
    const next = await store.get(taskId)
    // purged by retention while watching; nothing further to report
    if (!next) return
    if (next.revision <= last.revision) continue
    last = next
    yield { type: 'update', record: next }
    if (isTerminalStatus(next.status)) return
  }
}
