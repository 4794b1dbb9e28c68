import type { FastifyReply, FastifyRequest } from 'fastify'

const SSE_RETRY_MS = 3_000

export type SseStream = {
  isClosed: () => boolean
  writeEvent: (event: string, payload: unknown) => boolean
  cleanup: () => void
}

/**
 * Takes over the raw response and writes `text/event-stream` frames.
 * `onClose` fires once when the client goes away.
 */
export const createSseStream = (
  request: FastifyRequest,
  reply: FastifyReply,
  options: { heartbeatMs: number; onClose?: () => void },
): SseStream => {
  reply.hijack()
  const response = reply.raw
  response.statusCode = 200
  response.setHeader('Content-Type', 'text/event-stream; charset=utf-8')
  response.setHeader('Cache-Control', 'no-cache, no-transform')
  response.setHeader('Connection', 'keep-alive')
  response.setHeader('X-Accel-Buffering', 'no')
  response.write(`retry: ${SSE_RETRY_MS}\n\n`)

  let closed = false
  const markClosed = () => {
    if (closed) return
    closed = true
    options.onClose?.()
  }
  request.raw.once('aborted', markClosed)
  response.once('close', markClosed)

  const isClosed = (): boolean =>
    closed || response.destroyed || response.writableEnded

  const heartbeat = setInterval(() => {
    if (!isClosed()) response.write(': ping\n\n')
  }, options.heartbeatMs)
  heartbeat.unref()

  return {
    isClosed,
    writeEvent: (event, payload) => {
      if (isClosed()) return false
      response.write(`event: ${event}\ndata: ${JSON.stringify(payload)}\n\n`)
      return true
    },
    cleanup: () => {
      clearInterval(heartbeat)
      request.raw.off('aborted', markClosed)
      response.off('close', markClosed)
      if (!isClosed()) response.end()
    },
  }
}
