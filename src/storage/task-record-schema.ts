import { z } from 'zod'

import { TASK_TYPES } from '../types/index.js'

import type { TaskErrorInfo, TaskRecord } from '../types/index.js'

const taskErrorSchema = z.object({
  code: z.string().min(1),
  message: z.string(),
  name: z.string().optional(),
  retryable: z.boolean().optional(),
})

export const taskRecordSchema = z.object({
  taskId: z.string().min(1),
  taskType: z.enum(TASK_TYPES),
  status: z.enum(['pending', 'running', 'completed', 'failed']),
  progress: z.string().optional(),
  result: z.record(z.unknown()).optional(),
  error: taskErrorSchema.optional(),
  attempts: z.number().int().nonnegative(),
  maxAttempts: z.number().int().positive(),
  revision: z.number().int().positive(),
  createdAt: z.string(),
  updatedAt: z.string(),
  startedAt: z.string().optional(),
  completedAt: z.string().optional(),
})

export const taskDescriptorSchema = z.object({
  taskId: z.string().min(1),
  taskType: z.enum(TASK_TYPES),
  payload: z.record(z.unknown()),
  createdAt: z.string(),
})

const toTaskError = (
  parsed: z.infer<typeof taskErrorSchema>,
): TaskErrorInfo => ({
  code: parsed.code,
  message: parsed.message,
  ...(parsed.name !== undefined ? { name: parsed.name } : {}),
  ...(parsed.retryable !== undefined ? { retryable: parsed.retryable } : {}),
})

export const parseTaskRecord = (value: unknown): TaskRecord => {
  const parsed = taskRecordSchema.parse(value)
  return {
    taskId: parsed.taskId,
    taskType: parsed.taskType,
    status: parsed.status,
    attempts: parsed.attempts,
    maxAttempts: parsed.maxAttempts,
    revision: parsed.revision,
    createdAt: parsed.createdAt,
    updatedAt: parsed.updatedAt,
    ...(parsed.progress !== undefined ? { progress: parsed.progress } : {}),
    ...(parsed.result !== undefined ? { result: parsed.result } : {}),
    ...(parsed.error !== undefined ? { error: toTaskError(parsed.error) } : {}),
    ...(parsed.startedAt !== undefined ? { startedAt: parsed.startedAt } : {}),
    ...(parsed.completedAt !== undefined
      ? { completedAt: parsed.completedAt }
      : {}),
  }
}
