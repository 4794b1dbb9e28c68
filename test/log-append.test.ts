import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, expect, test } from 'vitest'

import { appendLog, closeLogs } from '../src/log/append.js'
import { safe } from '../src/log/safe.js'

const tmpDirs: string[] = []

afterEach(async () => {
  await closeLogs()
  await Promise.all(
    tmpDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })),
  )
})

const readLines = async (path: string): Promise<Record<string, unknown>[]> => {
  const text = await readFile(path, 'utf8')
  return text
    .split('\n')
    .filter((line) => line.trim())
    .map((line) => {
      const parsed: unknown = JSON.parse(line)
      if (typeof parsed !== 'object' || parsed === null)
        throw new Error(`not a log object: ${line}`)
      return { ...parsed }
    })
}

test('appendLog writes one JSON line per entry with derived fields', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'adlens-log-'))
  tmpDirs.push(dir)
  const path = join(dir, 'log.jsonl')

  await appendLog(path, { event: 'task_submitted', taskId: 'task-1' })
  await appendLog(path, { event: 'worker_retry', taskId: 'task-1', attempt: 1 })
  await appendLog(path, { event: 'error', context: 'test' })
  await closeLogs()

  const lines = await readLines(path)
  expect(lines.map((line) => [line['event'], line['level']])).toEqual([
    ['task_submitted', 30],
    ['worker_retry', 40],
    ['error', 50],
  ])
  expect(lines[0]).toMatchObject({ schema: 'adlens.log.v1', taskId: 'task-1' })
  // entries of one task share a trace id
  expect(lines[0]?.['traceId']).toMatch(/^[0-9a-f]{16}$/)
  expect(lines[1]?.['traceId']).toBe(lines[0]?.['traceId'])
  expect(lines[2]?.['traceId']).not.toBe(lines[0]?.['traceId'])
})

test('safe resolves to the fallback and logs the failure', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'adlens-log-'))
  tmpDirs.push(dir)
  const path = join(dir, 'log.jsonl')

  const value = await safe(
    'test: failing read',
    () => {
      throw new Error('boom')
    },
    { fallback: 42, logPath: path, meta: { taskId: 'task-9' } },
  )
  await closeLogs()

  expect(value).toBe(42)
  const [line] = await readLines(path)
  expect(line).toMatchObject({
    event: 'error',
    context: 'test: failing read',
    error: 'boom',
    errorName: 'Error',
    meta: { taskId: 'task-9' },
  })
})

test('safe skips logging for ignored error codes', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'adlens-log-'))
  tmpDirs.push(dir)
  const path = join(dir, 'log.jsonl')

  const value = await safe(
    'test: missing file',
    () => {
      throw Object.assign(new Error('missing'), { code: 'ENOENT' })
    },
    { fallback: 'none', logPath: path, ignoreCodes: ['ENOENT'] },
  )
  expect(value).toBe('none')
  await expect(readFile(path, 'utf8')).rejects.toMatchObject({ code: 'ENOENT' })
})
