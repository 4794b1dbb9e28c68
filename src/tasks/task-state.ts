import { buildInvalidTransitionError } from '../shared/errors.js'
import { nowIso } from '../shared/utils.js'
import { isTerminalStatus } from '../types/index.js'

import type {
  TaskDescriptor,
  TaskErrorInfo,
  TaskRecord,
  TaskResult,
  TaskStatus,
} from '../types/index.js'

const assertTransition = (
  record: TaskRecord,
  to: TaskStatus,
  allowed: TaskStatus[],
): void => {
  if (allowed.includes(record.status)) return
  throw buildInvalidTransitionError(record.taskId, record.status, to)
}

const touch = (record: TaskRecord, now: string): TaskRecord => ({
  ...record,
  revision: record.revision + 1,
  updatedAt: now,
})

const withoutProgress = (record: TaskRecord): TaskRecord => {
  const { progress: _progress, ...rest } = record
  return rest
}

export const createPendingRecord = (
  descriptor: TaskDescriptor,
  maxAttempts: number,
  now = nowIso(),
): TaskRecord => ({
  taskId: descriptor.taskId,
  taskType: descriptor.taskType,
  status: 'pending',
  attempts: 0,
  maxAttempts,
  revision: 1,
  createdAt: descriptor.createdAt,
  updatedAt: now,
})

/**
 * Starts attempt number `attempt`. A running record may be restarted when a
 * retry begins or when a lease is redelivered after a crash.
 */
export const markRunning = (
  record: TaskRecord,
  attempt: number,
  now = nowIso(),
): TaskRecord => {
  assertTransition(record, 'running', ['pending', 'running'])
  return touch(
    {
      ...record,
      status: 'running',
      attempts: Math.max(record.attempts, attempt),
      startedAt: record.startedAt ?? now,
    },
    now,
  )
}

export const markProgress = (
  record: TaskRecord,
  progress: string,
  now = nowIso(),
): TaskRecord => {
  assertTransition(record, 'running', ['running'])
  if (record.progress === progress) return record
  return touch({ ...record, progress }, now)
}

/**
 * Gives back an attempt that a worker stop cut short. The record stays
 * `running` until another worker picks the task up again.
 */
export const markReleased = (
  record: TaskRecord,
  now = nowIso(),
): TaskRecord => {
  assertTransition(record, 'running', ['running'])
  const attempts = Math.max(0, record.attempts - 1)
  return touch(
    {
      ...record,
      attempts,
      progress: `attempt ${record.attempts}/${record.maxAttempts} interrupted; waiting for redelivery`,
    },
    now,
  )
}

export const markCompleted = (
  record: TaskRecord,
  result: TaskResult,
  now = nowIso(),
): TaskRecord => {
  assertTransition(record, 'completed', ['running'])
  return touch(
    { ...withoutProgress(record), status: 'completed', result, completedAt: now },
    now,
  )
}

export const markFailed = (
  record: TaskRecord,
  error: TaskErrorInfo,
  now = nowIso(),
): TaskRecord => {
  // pending may only fail when it could not be scheduled
  const allowed: TaskStatus[] =
    error.code === 'queue_unavailable' ? ['pending', 'running'] : ['running']
  assertTransition(record, 'failed', allowed)
  return touch(
    { ...withoutProgress(record), status: 'failed', error, completedAt: now },
    now,
  )
}

export const isTerminal = (record: TaskRecord): boolean =>
  isTerminalStatus(record.status)

export const attemptsLeft = (record: TaskRecord): number =>
  Math.max(0, record.maxAttempts - record.attempts)
