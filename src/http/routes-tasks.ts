import { buildInvalidTaskTypeError } from '../shared/errors.js'
import { TASK_TYPES, isTaskType } from '../types/index.js'

import {
  API_PREFIX,
  buildAcceptedBody,
  parseSubmitBody,
  resolveTaskIdParam,
} from './helpers.js'

import type { Orchestrator } from '../orchestrator/orchestrator.js'
import type { TaskType } from '../types/index.js'
import type { FastifyInstance, FastifyReply } from 'fastify'

type TaskApi = Pick<Orchestrator, 'submit' | 'getTask' | 'getStatus'>

const sendAccepted = (reply: FastifyReply, taskId: string, taskType: TaskType) =>
  reply
    .code(202)
    .header('Location', `${API_PREFIX}/tasks/${taskId}`)
    .send(buildAcceptedBody(taskId, taskType))

export const registerTaskRoutes = (
  app: FastifyInstance,
  orchestrator: TaskApi,
): void => {
  app.post(`${API_PREFIX}/tasks`, async (request, reply) => {
    const { taskType, payload } = parseSubmitBody(request.body)
    if (!isTaskType(taskType)) throw buildInvalidTaskTypeError(taskType)
    const taskId = await orchestrator.submit(taskType, payload)
    return sendAccepted(reply, taskId, taskType)
  })

  for (const taskType of TASK_TYPES) {
    app.post(`${API_PREFIX}/${taskType}`, async (request, reply) => {
      const taskId = await orchestrator.submit(taskType, request.body)
      return sendAccepted(reply, taskId, taskType)
    })
  }

  app.get(`${API_PREFIX}/tasks/:id`, async (request) =>
    orchestrator.getTask(resolveTaskIdParam(request.params)),
  )

  app.get('/api/status', async () => orchestrator.getStatus())

  app.get('/health', () => ({ ok: true }))
}
