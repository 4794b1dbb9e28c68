import { logSafeError } from '../log/safe.js'
import { OrchestrationError, readErrorCode } from '../shared/errors.js'

import type { FastifyInstance } from 'fastify'

const resolveStatusCode = (error: unknown): number | undefined => {
  if (typeof error !== 'object' || !error) return undefined
  if (!('statusCode' in error)) return undefined
  const { statusCode } = error
  return typeof statusCode === 'number' ? statusCode : undefined
}

export const registerErrorHandler = (app: FastifyInstance): void => {
  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof OrchestrationError) {
      if (error.statusCode >= 500)
        await logSafeError('http: request', error, {
          meta: { url: request.url },
        })
      reply.code(error.statusCode).send({
        error: error.message,
        code: error.code,
        ...(error.taskId !== undefined ? { taskId: error.taskId } : {}),
        ...(error.issues !== undefined ? { issues: error.issues } : {}),
      })
      return
    }
    const code = readErrorCode(error)
    if (code === 'FST_ERR_CTP_INVALID_JSON_BODY' || code === 'FST_ERR_CTP_EMPTY_JSON_BODY') {
      reply.code(400).send({ error: 'invalid JSON' })
      return
    }
    const statusCode = resolveStatusCode(error)
    const message = error instanceof Error ? error.message : String(error)
    if (statusCode && statusCode >= 400 && statusCode < 500) {
      reply.code(statusCode).send({ error: message })
      return
    }
    await logSafeError('http: request', error, { meta: { url: request.url } })
    reply.code(500).send({ error: message })
  })
}
