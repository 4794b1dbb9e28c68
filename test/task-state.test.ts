import { expect, test } from 'vitest'

import { OrchestrationError } from '../src/shared/errors.js'
import {
  attemptsLeft,
  createPendingRecord,
  markCompleted,
  markFailed,
  markProgress,
  markReleased,
  markRunning,
} from '../src/tasks/task-state.js'

import type { TaskDescriptor } from '../src/types/index.js'

const descriptor: TaskDescriptor = {
  taskId: 'task-1',
  taskType: 'extract-ad-concept',
  payload: { image_url: 'https://example.com/ad.png' },
  createdAt: '2026-01-01T00:00:00.000Z',
}

const T1 = '2026-01-01T00:00:01.000Z'
const T2 = '2026-01-01T00:00:02.000Z'
const T3 = '2026-01-01T00:00:03.000Z'

test('createPendingRecord starts at revision 1 with no attempts', () => {
  const record = createPendingRecord(descriptor, 3, T1)
  expect(record).toEqual({
    taskId: 'task-1',
    taskType: 'extract-ad-concept',
    status: 'pending',
    attempts: 0,
    maxAttempts: 3,
    revision: 1,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: T1,
  })
  expect(attemptsLeft(record)).toBe(3)
})

test('markRunning sets startedAt once and tracks the attempt number', () => {
  const first = markRunning(createPendingRecord(descriptor, 3, T1), 1, T2)
  expect(first.status).toBe('running')
  expect(first.attempts).toBe(1)
  expect(first.startedAt).toBe(T2)
  expect(first.revision).toBe(2)

  const second = markRunning(first, 2, T3)
  expect(second.attempts).toBe(2)
  expect(second.startedAt).toBe(T2)
  expect(second.updatedAt).toBe(T3)
  expect(attemptsLeft(second)).toBe(1)
})

test('markProgress returns the same record when the stage is unchanged', () => {
  const running = markRunning(createPendingRecord(descriptor, 3, T1), 1, T2)
  const staged = markProgress(running, 'fetching image', T3)
  expect(staged.progress).toBe('fetching image')
  expect(staged.revision).toBe(3)
  expect(markProgress(staged, 'fetching image', T3)).toBe(staged)
})

test('markReleased gives back the interrupted attempt', () => {
  const running = markRunning(createPendingRecord(descriptor, 3, T1), 1, T2)
  const released = markReleased(running, T3)
  expect(released).toMatchObject({
    status: 'running',
    attempts: 0,
    revision: 3,
    startedAt: T2,
    updatedAt: T3,
    progress: 'attempt 1/3 interrupted; waiting for redelivery',
  })
  expect(attemptsLeft(released)).toBe(3)
  expect(() => markReleased(createPendingRecord(descriptor, 3, T1))).toThrow(
    OrchestrationError,
  )
})

test('markCompleted clears progress and stores the result', () => {
  const running = markProgress(
    markRunning(createPendingRecord(descriptor, 3, T1), 1, T2),
    'fetching image',
    T2,
  )
  const done = markCompleted(running, { title: 'Summer sale' }, T3)
  expect(done.status).toBe('completed')
  expect(done.result).toEqual({ title: 'Summer sale' })
  expect(done.completedAt).toBe(T3)
  expect('progress' in done).toBe(false)
})

test('terminal records reject further transitions', () => {
  const running = markRunning(createPendingRecord(descriptor, 3, T1), 1, T2)
  const failed = markFailed(running, { code: 'analysis_failed', message: 'boom' }, T3)
  expect(failed.status).toBe('failed')
  expect(failed.error).toEqual({ code: 'analysis_failed', message: 'boom' })

  expect(() => markRunning(failed, 2)).toThrow(OrchestrationError)
  expect(() => markCompleted(failed, {})).toThrow(
    'task task-1 cannot move from failed to completed',
  )
  expect(() => markProgress(failed, 'late')).toThrow(OrchestrationError)
})

test('pending records fail only when they could not be scheduled', () => {
  const pending = createPendingRecord(descriptor, 3, T1)
  expect(() =>
    markFailed(pending, { code: 'analysis_failed', message: 'boom' }),
  ).toThrow('task task-1 cannot move from pending to failed')

  const failed = markFailed(
    pending,
    { code: 'queue_unavailable', message: 'queue down', retryable: true },
    T2,
  )
  expect(failed.status).toBe('failed')
  expect(failed.attempts).toBe(0)
  expect(failed.completedAt).toBe(T2)
})
