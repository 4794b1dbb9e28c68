import { afterEach, expect, test, vi } from 'vitest'

vi.mock('../src/log/append.js', () => ({
  appendLog: vi.fn(async () => {}),
}))

import { appendLog } from '../src/log/append.js'
import { startRetentionSweeper } from '../src/orchestrator/retention.js'
import { createMemoryTaskRecordStore } from '../src/storage/task-records.js'
import {
  createPendingRecord,
  markCompleted,
  markRunning,
} from '../src/tasks/task-state.js'

import type { RetentionSweeper } from '../src/orchestrator/retention.js'

const sweepers: RetentionSweeper[] = []

afterEach(() => {
  for (const sweeper of sweepers.splice(0)) sweeper.stop()
})

const record = (taskId: string) =>
  createPendingRecord(
    {
      taskId,
      taskType: 'extract-ad-concept',
      payload: { image_url: 'https://example.com/ad.png' },
      createdAt: '2026-01-01T00:00:00.000Z',
    },
    3,
  )

test('sweep purges finished records past the ttl and logs them', async () => {
  const store = createMemoryTaskRecordStore()
  await store.create(
    markCompleted(
      markRunning(record('task-old'), 1, '2026-01-01T00:00:00.000Z'),
      {},
      '2026-01-01T00:00:00.000Z',
    ),
  )
  await store.create(record('task-waiting'))

  const sweeper = startRetentionSweeper({
    store,
    ttlMs: 60_000,
    intervalMs: 3_600_000,
    logPath: '/tmp/adlens-test.log',
  })
  sweepers.push(sweeper)

  expect(await sweeper.sweep()).toBe(1)
  expect(await store.get('task-old')).toBeUndefined()
  expect(await store.get('task-waiting')).toBeDefined()
  expect(vi.mocked(appendLog)).toHaveBeenCalledWith('/tmp/adlens-test.log', {
    event: 'retention_purged',
    count: 1,
    taskIds: ['task-old'],
  })

  expect(await sweeper.sweep()).toBe(0)
})
