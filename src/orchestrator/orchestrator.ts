import { createOpenAiAnalyzer } from '../analysis/analyzer.js'
import { buildPaths, ensureStateDirs } from '../fs/paths.js'
import { appendLog } from '../log/append.js'
import { bestEffort } from '../log/safe.js'
import { buildNotFoundError } from '../shared/errors.js'
import { watchTask } from '../status/task-stream.js'
import {
  createFileTaskRecordStore,
  createMemoryTaskRecordStore,
  isValidTaskId,
} from '../storage/task-records.js'
import { createFileWorkQueue } from '../storage/work-queue-file.js'
import { createMemoryWorkQueue } from '../storage/work-queue-memory.js'
import { createAnalysisHandlers } from '../tasks/handlers.js'
import { submitTask } from '../tasks/submit.js'
import { WorkerPool } from '../worker/pool.js'

import { startRetentionSweeper } from './retention.js'

import type { AppConfig } from '../config.js'
import type { StatePaths } from '../fs/paths.js'
import type { RetentionSweeper } from './retention.js'
import type { TaskStreamEvent } from '../status/task-stream.js'
import type { TaskRecordStore } from '../storage/task-records.js'
import type { QueueStats, WorkQueue } from '../storage/work-queue.js'
import type { TaskHandlers } from '../tasks/handlers.js'
import type { WorkerPoolStatus } from '../worker/pool.js'
import type { Id, TaskRecord } from '../types/index.js'

export type OrchestratorDeps = {
  store?: TaskRecordStore
  queue?: WorkQueue
  handlers?: TaskHandlers
}

export type OrchestratorStatus = {
  ok: boolean
  storage: AppConfig['storage']['driver']
  worker: WorkerPoolStatus | null
  queue: QueueStats
}

const createStore = (config: AppConfig, paths: StatePaths): TaskRecordStore =>
  config.storage.driver === 'memory'
    ? createMemoryTaskRecordStore()
    : createFileTaskRecordStore({ recordsDir: paths.recordsDir })

const createQueue = (config: AppConfig, paths: StatePaths): WorkQueue => {
  const timings = {
    visibilityTimeoutMs: config.queue.visibilityTimeoutMs,
    pollMs: config.queue.pollMs,
  }
  if (config.storage.driver === 'memory') return createMemoryWorkQueue(timings)
  return createFileWorkQueue(
    {
      root: paths.queueDir,
      ready: paths.queueReadyDir,
      inflight: paths.queueInflightDir,
      logPath: paths.log,
    },
    timings,
  )
}

const createDefaultHandlers = (config: AppConfig, paths: StatePaths) =>
  createAnalysisHandlers({
    analyzer: createOpenAiAnalyzer(
      {
        model: config.analysis.model,
        baseUrl: config.analysis.baseUrl,
        timeoutMs: config.analysis.timeoutMs,
        ...(config.analysis.apiKey ? { apiKey: config.analysis.apiKey } : {}),
      },
      { logPath: paths.log },
    ),
    pageTimeoutMs: config.analysis.timeoutMs,
  })

/**
 * Wires the record store, work queue and worker pool from config. The API
 * role only needs submit/get/watch; the worker role additionally calls
 * `startWorkers`.
 */
export class Orchestrator {
  readonly config: AppConfig
  readonly paths: StatePaths
  private readonly store: TaskRecordStore
  private readonly queue: WorkQueue
  private readonly handlers: TaskHandlers
  private pool: WorkerPool | null = null
  private sweeper: RetentionSweeper | null = null

  constructor(config: AppConfig, deps: OrchestratorDeps = {}) {
    this.config = config
    this.paths = buildPaths(config.workDir)
    this.store = deps.store ?? createStore(config, this.paths)
    this.queue = deps.queue ?? createQueue(config, this.paths)
    this.handlers = deps.handlers ?? createDefaultHandlers(config, this.paths)
  }

  async init(): Promise<void> {
    if (this.config.storage.driver === 'file')
      await ensureStateDirs(this.paths)
  }

  submit(taskType: unknown, payload: unknown): Promise<Id> {
    return submitTask(
      {
        store: this.store,
        queue: this.queue,
        maxAttempts: this.config.worker.retry.maxAttempts,
        logPath: this.paths.log,
      },
      { taskType, payload },
    )
  }

  async getTask(taskId: Id): Promise<TaskRecord> {
    const record = isValidTaskId(taskId)
      ? await this.store.get(taskId)
      : undefined
    if (!record) throw buildNotFoundError(taskId)
    return record
  }

  watchTask(
    taskId: Id,
    options: { signal?: AbortSignal } = {},
  ): AsyncGenerator<TaskStreamEvent, void, undefined> {
    return watchTask(this.store, taskId, {
      pollMs: this.config.stream.pollMs,
      maxDurationMs: this.config.stream.maxDurationMs,
      ...(options.signal ? { signal: options.signal } : {}),
    })
  }

  startWorkers(): void {
    if (this.pool) return
    this.pool = new WorkerPool({
      concurrency: this.config.worker.concurrency,
      store: this.store,
      queue: this.queue,
      handlers: this.handlers,
      retry: {
        backoffMs: this.config.worker.retry.backoffMs,
        maxBackoffMs: this.config.worker.retry.maxBackoffMs,
      },
      visibilityTimeoutMs: this.config.queue.visibilityTimeoutMs,
      logPath: this.paths.log,
    })
    this.pool.start()
    this.sweeper = startRetentionSweeper({
      store: this.store,
      ttlMs: this.config.retention.ttlMs,
      intervalMs: this.config.retention.sweepIntervalMs,
      logPath: this.paths.log,
    })
  }

  async getStatus(): Promise<OrchestratorStatus> {
    return {
      ok: true,
      storage: this.config.storage.driver,
      worker: this.pool ? this.pool.getStatus() : null,
      queue: await this.queue.stats(),
    }
  }

  async stop(options: { graceMs?: number } = {}): Promise<void> {
    this.sweeper?.stop()
    this.sweeper = null
    const { pool } = this
    this.pool = null
    if (pool) await pool.stop(options)
    this.queue.close()
    await bestEffort('orchestrator: appendLog', () =>
      appendLog(this.paths.log, { event: 'orchestrator_stopped' }),
    )
  }
}
