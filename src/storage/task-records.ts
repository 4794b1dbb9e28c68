import { unlink } from 'node:fs/promises'
import { join } from 'node:path'

import { readJson, writeJson } from '../fs/json.js'
import { ensureDir, listFiles } from '../fs/paths.js'
import { buildNotFoundError, readErrorCode } from '../shared/errors.js'
import { elapsedSince } from '../shared/utils.js'
import { isTerminalStatus } from '../types/index.js'

import { runSerialized } from './serialized-lock.js'
import { withStoreLock } from './store-lock.js'
import { parseTaskRecord } from './task-record-schema.js'

import type { Id, TaskRecord } from '../types/index.js'

export type TaskRecordUpdater = (record: TaskRecord) => TaskRecord

export type PurgeParams = {
  ttlMs: number
  now?: number
}

export type TaskRecordStore = {
  /** Fails when a record with the same id already exists. */
  create: (record: TaskRecord) => Promise<void>
  get: (taskId: Id) => Promise<TaskRecord | undefined>
  /**
   * Atomic read-modify-write. Returning the same object skips the write.
   * Rejects with `not_found` when the record is absent.
   */
  update: (taskId: Id, updater: TaskRecordUpdater) => Promise<TaskRecord>
  /** Deletes terminal records completed more than `ttlMs` ago. */
  purgeExpired: (params: PurgeParams) => Promise<Id[]>
}

const TASK_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/

export const isValidTaskId = (taskId: string): boolean =>
  TASK_ID_RE.test(taskId)

const isExpired = (record: TaskRecord, params: PurgeParams): boolean =>
  isTerminalStatus(record.status) &&
  record.completedAt !== undefined &&
  elapsedSince(record.completedAt, params.now) >= params.ttlMs

const recordExistsError = (taskId: Id): Error =>
  new Error(`task record already exists: ${taskId}`)

export const createFileTaskRecordStore = (params: {
  recordsDir: string
}): TaskRecordStore => {
  const { recordsDir } = params
  const recordPath = (taskId: Id): string => join(recordsDir, `${taskId}.json`)

  const readRecord = async (taskId: Id): Promise<TaskRecord | undefined> => {
    if (!isValidTaskId(taskId)) return undefined
    const raw = await readJson(recordPath(taskId))
    return raw === undefined ? undefined : parseTaskRecord(raw)
  }

  const locked = <T>(taskId: Id, fn: () => Promise<T>): Promise<T> => {
    const path = recordPath(taskId)
    return runSerialized(path, () => withStoreLock(path, fn))
  }

  return {
    create: async (record) => {
      if (!isValidTaskId(record.taskId))
        throw new Error(`invalid task id: ${record.taskId}`)
      await ensureDir(recordsDir)
      await locked(record.taskId, async () => {
        const existing = await readRecord(record.taskId)
        if (existing) throw recordExistsError(record.taskId)
        await writeJson(recordPath(record.taskId), record)
      })
    },

    get: readRecord,

    update: (taskId, updater) => {
      if (!isValidTaskId(taskId))
        return Promise.reject(buildNotFoundError(taskId))
      return locked(taskId, async () => {
        const current = await readRecord(taskId)
        if (!current) throw buildNotFoundError(taskId)
        const next = updater(current)
        if (next === current) return current
        await writeJson(recordPath(taskId), next)
        return next
      })
    },

    purgeExpired: async (purge) => {
      const entries = await listFiles(recordsDir)
      const purged: Id[] = []
      for (const entry of entries) {
        if (!entry.isFile() || !entry.name.endsWith('.json')) continue
        const taskId = entry.name.slice(0, -'.json'.length)
        const removed = await locked(taskId, async () => {
          const record = await readRecord(taskId)
          if (!record || !isExpired(record, purge)) return false
          try {
            await unlink(recordPath(taskId))
          } catch (error) {
            if (readErrorCode(error) !== 'ENOENT') throw error
          }
          return true
        })
        if (removed) purged.push(taskId)
      }
      return purged
    },
  }
}

export const createMemoryTaskRecordStore = (): TaskRecordStore => {
  const records = new Map<Id, TaskRecord>()
  const clone = (record: TaskRecord): TaskRecord => structuredClone(record)

  return {
    create: (record) => {
      if (records.has(record.taskId))
        return Promise.reject(recordExistsError(record.taskId))
      records.set(record.taskId, clone(record))
      return Promise.resolve()
    },

    get: (taskId) => {
      const record = records.get(taskId)
      return Promise.resolve(record ? clone(record) : undefined)
    },

    update: (taskId, updater) => {
      const current = records.get(taskId)
      if (!current) return Promise.reject(buildNotFoundError(taskId))
      try {
        const next = updater(clone(current))
        records.set(taskId, clone(next))
        return Promise.resolve(clone(next))
      } catch (error) {
        return Promise.reject(error)
      }
    },

    purgeExpired: (purge) => {
      const purged: Id[] = []
      for (const [taskId, record] of records) {
        if (!isExpired(record, purge)) continue
        records.delete(taskId)
        purged.push(taskId)
      }
      return Promise.resolve(purged)
    },
  }
}
