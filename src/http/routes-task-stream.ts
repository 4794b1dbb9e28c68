import { logSafeError } from '../log/safe.js'
import { abortController } from '../shared/signal-primitives.js'
import { errorMessage } from '../shared/utils.js'

import { API_PREFIX, resolveTaskIdParam } from './helpers.js'
import { createSseStream } from './sse.js'

import type { SseStream } from './sse.js'
import type { Orchestrator } from '../orchestrator/orchestrator.js'
import type { TaskStreamEvent } from '../status/task-stream.js'
import type { FastifyInstance } from 'fastify'

type StreamApi = Pick<Orchestrator, 'watchTask'>

const writeStreamEvent = (stream: SseStream, event: TaskStreamEvent): boolean =>
  event.type === 'update'
    ? stream.writeEvent('update', event.record)
    : stream.writeEvent('timeout', event.payload)

export const registerTaskStreamRoute = (
  app: FastifyInstance,
  orchestrator: StreamApi,
  options: { heartbeatMs: number },
): void => {
  app.get(`${API_PREFIX}/tasks/:id/stream`, async (request, reply) => {
    const taskId = resolveTaskIdParam(request.params)
    const disconnect = new AbortController()
    const events = orchestrator.watchTask(taskId, { signal: disconnect.signal })
    // unknown ids reject here, before the response is taken over
    const first = await events.next()
    const stream = createSseStream(request, reply, {
      heartbeatMs: options.heartbeatMs,
      onClose: () => abortController(disconnect),
    })
    try {
      if (!first.done && writeStreamEvent(stream, first.value)) {
        for await (const event of events) {
          if (!writeStreamEvent(stream, event)) break
        }
      }
    } catch (error) {
      await logSafeError('http: task stream', error, { meta: { taskId } })
      stream.writeEvent('error', { taskId, error: errorMessage(error) })
    } finally {
      abortController(disconnect)
      await events.return(undefined)
      stream.cleanup()
    }
  })
}
