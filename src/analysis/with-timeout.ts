import { toAnalysisError } from './analysis-error.js'

/**
 * Runs `run` with a signal that aborts after `timeoutMs` or when `signal`
 * aborts. Rejections are mapped to AnalysisError tagged with `label`.
 */
export const withTimeout = async <T>(params: {
  label: string
  timeoutMs: number
  signal?: AbortSignal
  run: (signal: AbortSignal) => Promise<T>
}): Promise<T> => {
  const controller = new AbortController()
  const state = { timedOut: false, aborted: false, timeoutMs: params.timeoutMs }
  const onAbort = () => {
    state.aborted = true
    controller.abort()
  }
  const timer =
    params.timeoutMs > 0
      ? setTimeout(() => {
          state.timedOut = true
          controller.abort()
        }, params.timeoutMs)
      : undefined
  if (params.signal?.aborted) onAbort()
  else params.signal?.addEventListener('abort', onAbort, { once: true })
  try {
    return await params.run(controller.signal)
  } catch (error) {
    throw toAnalysisError(params.label, error, state)
  } finally {
    clearTimeout(timer)
    params.signal?.removeEventListener('abort', onAbort)
  }
}
