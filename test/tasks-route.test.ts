import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterEach, expect, test, vi } from 'vitest'

vi.mock('../src/log/append.js', () => ({
  appendLog: vi.fn(async () => {}),
}))

import { defaultConfig } from '../src/config.js'
import { buildHttpApp } from '../src/http/index.js'
import { Orchestrator } from '../src/orchestrator/orchestrator.js'

import type { AppConfig } from '../src/config.js'
import type { TaskHandler, TaskHandlers } from '../src/tasks/handlers.js'
import type { FastifyInstance } from 'fastify'

const cleanups: Array<() => Promise<void>> = []

afterEach(async () => {
  for (const cleanup of cleanups.splice(0).reverse()) await cleanup()
})

const sameHandler = (handler: TaskHandler): TaskHandlers => ({
  'extract-ad-concept': handler,
  'extract-sales-page': handler,
  'generate-ad-recipe': handler,
})

const createApp = async (
  options: {
    handler?: TaskHandler
    configure?: (config: AppConfig) => void
  } = {},
): Promise<{ app: FastifyInstance; orchestrator: Orchestrator }> => {
  const workDir = await mkdtemp(join(tmpdir(), 'adlens-http-'))
  const config = defaultConfig({ workDir })
  config.storage.driver = 'memory'
  config.queue.pollMs = 10
  config.stream.pollMs = 10
  config.worker.retry.backoffMs = 1
  config.worker.retry.maxBackoffMs = 1
  options.configure?.(config)
  const orchestrator = new Orchestrator(config, {
    handlers: sameHandler(options.handler ?? (async () => ({ title: 'ok' }))),
  })
  await orchestrator.init()
  const app = buildHttpApp(orchestrator, config)
  cleanups.push(async () => {
    await app.close()
    await orchestrator.stop({ graceMs: 0 })
    await rm(workDir, { recursive: true, force: true })
  })
  return { app, orchestrator }
}

type SseEvent = { event: string; data: unknown }

const parseSse = (body: string): SseEvent[] =>
  body
    .split('\n\n')
    .filter((block) => block.startsWith('event: '))
    .map((block) => {
      const [eventLine = '', dataLine = ''] = block.split('\n')
      return {
        event: eventLine.slice('event: '.length),
        data: JSON.parse(dataLine.slice('data: '.length)),
      }
    })

const summarizeUpdate = (data: unknown): string => {
  if (typeof data !== 'object' || data === null) return String(data)
  const status = 'status' in data ? String(data.status) : ''
  const progress = 'progress' in data ? String(data.progress) : ''
  return `${status}:${progress}`
}

const STATUS_ORDER = ['pending', 'running', 'completed']

const waitForStatus = async (
  app: FastifyInstance,
  taskId: string,
  status: string,
): Promise<void> => {
  const deadline = Date.now() + 3_000
  while (Date.now() < deadline) {
    const response = await app.inject({
      method: 'GET',
      url: `/api/v1/tasks/${taskId}`,
    })
    if (response.json<{ status: string }>().status === status) return
    await new Promise((resolve) => setTimeout(resolve, 10))
  }
  throw new Error(`task ${taskId} did not reach ${status}`)
}

test('POST /api/v1/tasks accepts a task and returns links', async () => {
  const { app } = await createApp()
  const response = await app.inject({
    method: 'POST',
    url: '/api/v1/tasks',
    payload: {
      taskType: 'extract-ad-concept',
      payload: { image_url: 'https://example.com/ad.png' },
    },
  })

  expect(response.statusCode).toBe(202)
  const body = response.json<{ taskId: string }>()
  expect(body).toEqual({
    taskId: body.taskId,
    status: 'pending',
    message: 'Ad concept extraction started',
    links: {
      self: `/api/v1/tasks/${body.taskId}`,
      stream: `/api/v1/tasks/${body.taskId}/stream`,
    },
  })
  expect(response.headers['location']).toBe(`/api/v1/tasks/${body.taskId}`)

  const record = await app.inject({
    method: 'GET',
    url: `/api/v1/tasks/${body.taskId}`,
  })
  expect(record.statusCode).toBe(200)
  expect(record.json()).toMatchObject({
    taskId: body.taskId,
    taskType: 'extract-ad-concept',
    status: 'pending',
    attempts: 0,
  })
})

test('POST /api/v1/<taskType> takes the payload as the body', async () => {
  const { app } = await createApp()
  const response = await app.inject({
    method: 'POST',
    url: '/api/v1/generate-ad-recipe',
    payload: {
      ad_archive_id: '1234567890',
      image_url: 'https://example.com/ad.png',
      sales_url: 'https://example.com/product',
    },
  })
  expect(response.statusCode).toBe(202)
  expect(response.json()).toMatchObject({
    status: 'pending',
    message: 'Ad recipe generation started',
  })
})

test('an unknown task type is rejected with 400', async () => {
  const { app } = await createApp()
  const response = await app.inject({
    method: 'POST',
    url: '/api/v1/tasks',
    payload: { taskType: 'summarize-video', payload: {} },
  })
  expect(response.statusCode).toBe(400)
  expect(response.json()).toEqual({
    error: 'unknown task type: summarize-video',
    code: 'invalid_task_type',
  })
})

test('an invalid payload is rejected with 422 and its issues', async () => {
  const { app } = await createApp()
  const response = await app.inject({
    method: 'POST',
    url: '/api/v1/extract-sales-page',
    payload: { page_url: 'not a url' },
  })
  expect(response.statusCode).toBe(422)
  const body = response.json<{
    code: string
    issues: Array<{ path: string }>
  }>()
  expect(body.code).toBe('invalid_payload')
  expect(body.issues[0]?.path).toBe('page_url')
})

test('malformed JSON is rejected with 400', async () => {
  const { app } = await createApp()
  const response = await app.inject({
    method: 'POST',
    url: '/api/v1/tasks',
    headers: { 'content-type': 'application/json' },
    payload: '{"taskType":',
  })
  expect(response.statusCode).toBe(400)
})

test('GET of an unknown task returns 404', async () => {
  const { app } = await createApp()
  const response = await app.inject({
    method: 'GET',
    url: '/api/v1/tasks/task-missing',
  })
  expect(response.statusCode).toBe(404)
  expect(response.json()).toEqual({
    error: 'Task not found',
    code: 'not_found',
    taskId: 'task-missing',
  })
})

test('health, status and unknown routes', async () => {
  const { app } = await createApp()

  const health = await app.inject({ method: 'GET', url: '/health' })
  expect(health.json()).toEqual({ ok: true })

  const status = await app.inject({ method: 'GET', url: '/api/status' })
  expect(status.json()).toEqual({
    ok: true,
    storage: 'memory',
    worker: null,
    queue: { ready: 0, inflight: 0 },
  })

  const missing = await app.inject({ method: 'GET', url: '/api/v2/anything' })
  expect(missing.statusCode).toBe(404)
  expect(missing.json()).toEqual({ error: 'not found' })
})

test('a submitted task runs to completion once workers start', async () => {
  const { app, orchestrator } = await createApp({
    handler: async (payload) => ({
      title: 'Summer sale',
      from: payload['image_url'],
    }),
  })
  orchestrator.startWorkers()
  const accepted = await app.inject({
    method: 'POST',
    url: '/api/v1/extract-ad-concept',
    payload: { image_url: 'https://example.com/ad.png' },
  })
  const { taskId } = accepted.json<{ taskId: string }>()

  const deadline = Date.now() + 3_000
  let status = 'pending'
  while (status !== 'completed' && Date.now() < deadline) {
    await new Promise((resolve) => setTimeout(resolve, 10))
    const response = await app.inject({
      method: 'GET',
      url: `/api/v1/tasks/${taskId}`,
    })
    status = response.json<{ status: string }>().status
  }
  expect(status).toBe('completed')

  const record = await app.inject({
    method: 'GET',
    url: `/api/v1/tasks/${taskId}`,
  })
  expect(record.json()).toMatchObject({
    status: 'completed',
    attempts: 1,
    result: { title: 'Summer sale', from: 'https://example.com/ad.png' },
  })
})

test('the stream of a finished task sends one update and closes', async () => {
  const { app, orchestrator } = await createApp()
  orchestrator.startWorkers()
  const taskId = await orchestrator.submit('extract-ad-concept', {
    image_url: 'https://example.com/ad.png',
  })
  const deadline = Date.now() + 3_000
  while (
    (await orchestrator.getTask(taskId)).status !== 'completed' &&
    Date.now() < deadline
  )
    await new Promise((resolve) => setTimeout(resolve, 10))

  const response = await app.inject({
    method: 'GET',
    url: `/api/v1/tasks/${taskId}/stream`,
  })
  expect(response.statusCode).toBe(200)
  expect(response.headers['content-type']).toBe(
    'text/event-stream; charset=utf-8',
  )
  expect(response.body.startsWith('retry: 3000\n\n')).toBe(true)

  const events = parseSse(response.body)
  expect(events).toHaveLength(1)
  expect(events[0]?.event).toBe('update')
  expect(events[0]?.data).toMatchObject({
    taskId,
    status: 'completed',
    result: { title: 'ok' },
  })
})

test('the stream gives up with a timeout event when the task does not finish', async () => {
  const { app, orchestrator } = await createApp({
    configure: (config) => {
      config.stream.maxDurationMs = 50
    },
  })
  const taskId = await orchestrator.submit('extract-ad-concept', {
    image_url: 'https://example.com/ad.png',
  })

  const response = await app.inject({
    method: 'GET',
    url: `/api/v1/tasks/${taskId}/stream`,
  })
  const events = parseSse(response.body)
  expect(events.map((event) => event.event)).toEqual(['update', 'timeout'])
  expect(events[1]?.data).toEqual({
    taskId,
    status: 'timeout',
    lastStatus: 'pending',
    error: 'Task processing timed out',
  })
})

test('a stream opened before the task runs follows it to completion', async () => {
  const { app, orchestrator } = await createApp({
    handler: async (_payload, context) => {
      await context.reportProgress('fetching image')
      await new Promise((resolve) => setTimeout(resolve, 100))
      return { title: 'Summer sale' }
    },
  })
  const taskId = await orchestrator.submit('extract-ad-concept', {
    image_url: 'https://x/1.jpg',
  })
  const streaming = app.inject({
    method: 'GET',
    url: `/api/v1/tasks/${taskId}/stream`,
  })
  orchestrator.startWorkers()
  const response = await streaming

  const events = parseSse(response.body)
  expect(events.every((event) => event.event === 'update')).toBe(true)
  const seen = events.map((event) => summarizeUpdate(event.data))
  expect(seen).toContain('running:fetching image')
  expect(seen.indexOf('running:fetching image')).toBe(seen.length - 2)
  expect(seen.at(-1)).toBe('completed:')
  // statuses never go backwards
  const ranks = seen.map((entry) =>
    STATUS_ORDER.indexOf(entry.split(':')[0] ?? ''),
  )
  expect(ranks).toEqual([...ranks].sort((a, b) => a - b))
  expect(events.at(-1)?.data).toMatchObject({
    taskId,
    status: 'completed',
    result: { title: 'Summer sale' },
  })
})

test('a task keeps running after its stream times out', async () => {
  const { app, orchestrator } = await createApp({
    configure: (config) => {
      config.stream.maxDurationMs = 50
    },
  })
  const taskId = await orchestrator.submit('extract-ad-concept', {
    image_url: 'https://example.com/ad.png',
  })
  const response = await app.inject({
    method: 'GET',
    url: `/api/v1/tasks/${taskId}/stream`,
  })
  expect(parseSse(response.body).map((event) => event.event)).toEqual([
    'update',
    'timeout',
  ])

  orchestrator.startWorkers()
  await waitForStatus(app, taskId, 'completed')
  const record = await app.inject({
    method: 'GET',
    url: `/api/v1/tasks/${taskId}`,
  })
  expect(record.json()).toMatchObject({
    taskId,
    status: 'completed',
    attempts: 1,
    result: { title: 'ok' },
  })
})

test('the stream of an unknown task returns 404 before streaming', async () => {
  const { app } = await createApp()
  const response = await app.inject({
    method: 'GET',
    url: '/api/v1/tasks/task-missing/stream',
  })
  expect(response.statusCode).toBe(404)
  expect(response.json()).toEqual({
    error: 'Task not found',
    code: 'not_found',
    taskId: 'task-missing',
  })
})
