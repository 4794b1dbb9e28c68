import { createHash } from 'node:crypto'
import { once } from 'node:events'
import { mkdir } from 'node:fs/promises'
import { basename, dirname } from 'node:path'

import pino, { type Logger } from 'pino'
import { createStream, type RotatingFileStream } from 'rotating-file-stream'

const MAX_BYTES = 10 * 1024 * 1024
const MAX_TOTAL_BYTES = 200 * 1024 * 1024
const MAX_FILES = Math.max(1, Math.ceil(MAX_TOTAL_BYTES / MAX_BYTES))

type LoggerBundle = {
  logger: Logger
  stream: RotatingFileStream
}

const loggers = new Map<string, Promise<LoggerBundle>>()

const buildBundle = async (path: string): Promise<LoggerBundle> => {
  const dir = dirname(path)
  await mkdir(dir, { recursive: true })
  const stream = createStream(basename(path), {
    size: `${Math.floor(MAX_BYTES / (1024 * 1024))}M`,
    interval: '1d',
    path: dir,
    compress: 'gzip',
    maxFiles: MAX_FILES,
  })
  stream.on('error', (error) => {
    console.error('[log] stream error', error)
  })
  const logger = pino(
    {
      base: { schema: 'adlens.log.v1', pid: process.pid },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    stream,
  )
  return { logger, stream }
}

// one bundle per path, shared by concurrent first writers
const getBundle = (path: string): Promise<LoggerBundle> => {
  const existing = loggers.get(path)
  if (existing) return existing
  const created = buildBundle(path)
  loggers.set(path, created)
  created.catch(() => loggers.delete(path))
  return created
}

const flushIfNeeded = async (stream: RotatingFileStream): Promise<void> => {
  if (!stream.writableNeedDrain) return
  await once(stream, 'drain')
}

const readTrimmed = (value: unknown): string | undefined => {
  if (typeof value !== 'string') return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

const deriveTraceSeed = (entry: Record<string, unknown>): string => {
  const explicit = readTrimmed(entry['traceId'])
  if (explicit) return explicit
  const taskId = readTrimmed(entry['taskId'])
  if (taskId) return `task:${taskId}`
  const leaseId = readTrimmed(entry['leaseId'])
  if (leaseId) return `lease:${leaseId}`
  return JSON.stringify(entry)
}

const deriveTraceId = (entry: Record<string, unknown>): string =>
  createHash('sha1').update(deriveTraceSeed(entry)).digest('hex').slice(0, 16)

const resolveLevel = (
  entry: Record<string, unknown>,
): 'info' | 'warn' | 'error' => {
  const explicit = entry['level']
  if (explicit === 'info' || explicit === 'warn' || explicit === 'error')
    return explicit
  const event = typeof entry['event'] === 'string' ? entry['event'] : ''
  if (event === 'error') return 'error'
  if (/fail|retry|timeout|invalid|abort|expired|missing|exhausted/i.test(event))
    return 'warn'
  return 'info'
}

export const appendLog = async (
  path: string,
  entry: Record<string, unknown>,
): Promise<void> => {
  const { logger, stream } = await getBundle(path)
  const level = resolveLevel(entry)
  const traceId = deriveTraceId(entry)
  const { level: _ignoredLevel, ...payload } = entry
  logger[level]({
    traceId,
    ...payload,
  })
  await flushIfNeeded(stream)
}

export const closeLogs = async (): Promise<void> => {
  const bundles = await Promise.allSettled([...loggers.values()])
  loggers.clear()
  await Promise.all(
    bundles.map(async (settled) => {
      if (settled.status !== 'fulfilled') return
      const { stream } = settled.value
      if (stream.writableEnded) return
      stream.end()
      await once(stream, 'finish')
    }),
  )
}
