import fastify from 'fastify'

import { logSafeError } from '../log/safe.js'

import { registerErrorHandler } from './error-handler.js'
import { registerTaskStreamRoute } from './routes-task-stream.js'
import { registerTaskRoutes } from './routes-tasks.js'

import type { AppConfig } from '../config.js'
import type { Orchestrator } from '../orchestrator/orchestrator.js'
import type { FastifyInstance } from 'fastify'

export const buildHttpApp = (
  orchestrator: Orchestrator,
  config: AppConfig,
): FastifyInstance => {
  const app = fastify({ bodyLimit: config.server.bodyLimitBytes })
  registerErrorHandler(app)
  registerTaskRoutes(app, orchestrator)
  registerTaskStreamRoute(app, orchestrator, {
    heartbeatMs: config.stream.heartbeatMs,
  })
  app.setNotFoundHandler((_request, reply) => {
    reply.code(404).send({ error: 'not found' })
  })
  return app
}

export const createHttpServer = async (
  orchestrator: Orchestrator,
  config: AppConfig,
  port: number,
): Promise<FastifyInstance> => {
  const app = buildHttpApp(orchestrator, config)
  try {
    const address = await app.listen({ port, host: config.server.host })
    console.log(`[http] listening on ${address}`)
  } catch (error) {
    await logSafeError('http: listen', error)
    throw error
  }
  return app
}
