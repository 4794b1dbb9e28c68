import type { Id } from '../types/index.js'

export type OrchestrationErrorCode =
  | 'invalid_task_type'
  | 'invalid_payload'
  | 'queue_unavailable'
  | 'not_found'
  | 'invalid_transition'

const STATUS_BY_CODE: Record<OrchestrationErrorCode, number> = {
  invalid_task_type: 400,
  invalid_payload: 422,
  queue_unavailable: 503,
  not_found: 404,
  invalid_transition: 409,
}

export type PayloadIssue = {
  path: string
  message: string
}

export class OrchestrationError extends Error {
  readonly code: OrchestrationErrorCode
  readonly statusCode: number
  readonly taskId?: Id
  readonly issues?: PayloadIssue[]

  constructor(params: {
    code: OrchestrationErrorCode
    message: string
    taskId?: Id
    issues?: PayloadIssue[]
    cause?: unknown
  }) {
    super(
      params.message,
      params.cause === undefined ? undefined : { cause: params.cause },
    )
    this.name = 'OrchestrationError'
    this.code = params.code
    this.statusCode = STATUS_BY_CODE[params.code]
    if (params.taskId !== undefined) this.taskId = params.taskId
    if (params.issues !== undefined) this.issues = params.issues
  }
}

export const buildInvalidTaskTypeError = (taskType: unknown): OrchestrationError =>
  new OrchestrationError({
    code: 'invalid_task_type',
    message: `unknown task type: ${String(taskType)}`,
  })

export const buildInvalidPayloadError = (
  taskType: string,
  issues: PayloadIssue[],
): OrchestrationError =>
  new OrchestrationError({
    code: 'invalid_payload',
    message: `invalid payload for ${taskType}: ${issues
      .map((issue) => `${issue.path || '<root>'} ${issue.message}`)
      .join('; ')}`,
    issues,
  })

export const buildQueueUnavailableError = (
  taskId: Id,
  cause: unknown,
): OrchestrationError =>
  new OrchestrationError({
    code: 'queue_unavailable',
    message: 'work queue unavailable, task was not scheduled',
    taskId,
    cause,
  })

export const buildNotFoundError = (taskId: Id): OrchestrationError =>
  new OrchestrationError({
    code: 'not_found',
    message: 'Task not found',
    taskId,
  })

export const buildInvalidTransitionError = (
  taskId: Id,
  from: string,
  to: string,
): OrchestrationError =>
  new OrchestrationError({
    code: 'invalid_transition',
    message: `task ${taskId} cannot move from ${from} to ${to}`,
    taskId,
  })

export const isOrchestrationError = (
  error: unknown,
  code?: OrchestrationErrorCode,
): error is OrchestrationError =>
  error instanceof OrchestrationError && (code === undefined || error.code === code)

export const readErrorCode = (error: unknown): string | undefined => {
  if (!error || typeof error !== 'object' || !('code' in error))
    return undefined
  const { code } = error
  if (typeof code === 'string' && code) return code
  if (typeof code === 'number') return String(code)
  return undefined
}
