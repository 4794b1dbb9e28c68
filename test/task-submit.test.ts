import { expect, test, vi } from 'vitest'

vi.mock('../src/log/append.js', () => ({
  appendLog: vi.fn(async () => {}),
}))

import { appendLog } from '../src/log/append.js'
import { OrchestrationError } from '../src/shared/errors.js'
import { createMemoryTaskRecordStore } from '../src/storage/task-records.js'
import { createMemoryWorkQueue } from '../src/storage/work-queue-memory.js'
import { submitTask } from '../src/tasks/submit.js'

import type { WorkQueue } from '../src/storage/work-queue.js'

const timings = { visibilityTimeoutMs: 60_000, pollMs: 10 }

const setup = (queue: WorkQueue = createMemoryWorkQueue(timings)) => {
  const store = createMemoryTaskRecordStore()
  return {
    store,
    queue,
    deps: { store, queue, maxAttempts: 3, logPath: '/tmp/adlens-test.log' },
  }
}

test('submitTask creates a pending record and enqueues its descriptor', async () => {
  const { store, queue, deps } = setup()
  const taskId = await submitTask(deps, {
    taskType: 'extract-ad-concept',
    payload: { image_url: ' https://example.com/ad.png ' },
  })

  expect(taskId).toMatch(/^[0-9a-f]{32}$/)
  const record = await store.get(taskId)
  expect(record).toMatchObject({
    taskId,
    taskType: 'extract-ad-concept',
    status: 'pending',
    attempts: 0,
    maxAttempts: 3,
    revision: 1,
  })

  const lease = await queue.dequeue()
  expect(lease?.descriptor).toMatchObject({
    taskId,
    taskType: 'extract-ad-concept',
    payload: { image_url: 'https://example.com/ad.png' },
  })
  expect(vi.mocked(appendLog)).toHaveBeenCalledWith('/tmp/adlens-test.log', {
    event: 'task_submitted',
    taskId,
    taskType: 'extract-ad-concept',
  })
})

test('submitTask rejects an unknown task type before touching the store', async () => {
  const { store, deps } = setup()
  const create = vi.spyOn(store, 'create')
  const error = await submitTask(deps, {
    taskType: 'summarize-video',
    payload: {},
  }).catch((reason: unknown) => reason)

  expect(error).toBeInstanceOf(OrchestrationError)
  expect(error).toMatchObject({
    code: 'invalid_task_type',
    statusCode: 400,
    message: 'unknown task type: summarize-video',
  })
  expect(create).not.toHaveBeenCalled()
})

test('submitTask reports every payload issue', async () => {
  const { deps } = setup()
  const error = await submitTask(deps, {
    taskType: 'generate-ad-recipe',
    payload: { image_url: 'ftp://example.com/ad.png' },
  }).catch((reason: unknown) => reason)

  expect(error).toBeInstanceOf(OrchestrationError)
  if (!(error instanceof OrchestrationError)) return
  expect(error.code).toBe('invalid_payload')
  expect(error.statusCode).toBe(422)
  expect(error.issues?.map((issue) => issue.path)).toEqual([
    'ad_archive_id',
    'image_url',
    'sales_url',
  ])
})

test('submitTask marks the record failed when the queue rejects', async () => {
  const queue: WorkQueue = {
    ...createMemoryWorkQueue(timings),
    enqueue: async () => {
      throw new Error('disk full')
    },
  }
  const { store, deps } = setup(queue)
  const error = await submitTask(deps, {
    taskType: 'extract-sales-page',
    payload: { page_url: 'https://example.com/product' },
  }).catch((reason: unknown) => reason)

  expect(error).toBeInstanceOf(OrchestrationError)
  if (!(error instanceof OrchestrationError)) return
  expect(error.code).toBe('queue_unavailable')
  expect(error.statusCode).toBe(503)
  if (!error.taskId) throw new Error('expected taskId on the error')

  const record = await store.get(error.taskId)
  expect(record?.status).toBe('failed')
  expect(record?.error).toEqual({
    code: 'queue_unavailable',
    message: 'work queue unavailable, task was not scheduled',
    name: 'OrchestrationError',
    retryable: true,
  })
})
