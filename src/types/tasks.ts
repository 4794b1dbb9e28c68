import type { ISODate, Id } from './index.js'

export const TASK_TYPES = [
  'extract-ad-concept',
  'extract-sales-page',
  'generate-ad-recipe',
] as const

export type TaskType = (typeof TASK_TYPES)[number]

export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed'

export const TERMINAL_STATUSES: readonly TaskStatus[] = ['completed', 'failed']

export type TaskPayload = Record<string, unknown>

export type TaskResult = Record<string, unknown>

export type TaskErrorInfo = {
  code: string
  message: string
  name?: string
  retryable?: boolean
}

/** Unit of work carried by the queue. Never holds status. */
export type TaskDescriptor = {
  taskId: Id
  taskType: TaskType
  payload: TaskPayload
  createdAt: ISODate
}

export type TaskRecord = {
  taskId: Id
  taskType: TaskType
  status: TaskStatus
  progress?: string
  result?: TaskResult
  error?: TaskErrorInfo
  attempts: number
  maxAttempts: number
  /** Bumped on every write; readers compare it to detect change. */
  revision: number
  createdAt: ISODate
  updatedAt: ISODate
  startedAt?: ISODate
  completedAt?: ISODate
}

export const isTaskType = (value: unknown): value is TaskType =>
  typeof value === 'string' &&
  TASK_TYPES.some((taskType) => taskType === value)

export const isTerminalStatus = (status: TaskStatus): boolean =>
  TERMINAL_STATUSES.includes(status)
