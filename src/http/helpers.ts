import { z } from 'zod'

import { buildNotFoundError } from '../shared/errors.js'

import type { Id, TaskType } from '../types/index.js'

const taskIdParamsSchema = z.object({
  id: z.string().trim().min(1),
})

const submitBodySchema = z
  .object({
    taskType: z.unknown(),
    payload: z.unknown(),
  })
  .passthrough()

export const resolveTaskIdParam = (params: unknown): Id => {
  const parsed = taskIdParamsSchema.safeParse(params)
  if (!parsed.success) throw buildNotFoundError('')
  return parsed.data.id
}

/** Splits a generic submission body; validation happens in submitTask. */
export const parseSubmitBody = (
  body: unknown,
): { taskType: unknown; payload: unknown } => {
  const parsed = submitBodySchema.safeParse(body)
  if (!parsed.success) return { taskType: undefined, payload: undefined }
  return { taskType: parsed.data.taskType, payload: parsed.data.payload }
}

const ACCEPTED_MESSAGES: Record<TaskType, string> = {
  'extract-ad-concept': 'Ad concept extraction started',
  'extract-sales-page': 'Sales page extraction started',
  'generate-ad-recipe': 'Ad recipe generation started',
}

export const API_PREFIX = '/api/v1'

export const buildAcceptedBody = (taskId: Id, taskType: TaskType) => ({
  taskId,
  status: 'pending' as const,
  message: ACCEPTED_MESSAGES[taskType],
  links: {
    self: `${API_PREFIX}/tasks/${taskId}`,
    stream: `${API_PREFIX}/tasks/${taskId}/stream`,
  },
})
