const MAX_WAIT_MS = 24 * 60 * 60 * 1_000

export const abortController = (controller: AbortController): void => {
  if (!controller.signal.aborted) controller.abort()
}

/**
 * Resolves after `timeoutMs`, or as soon as any of `signals` aborts.
 * Never rejects.
 */
export const waitForSignal = async (params: {
  signals: Array<AbortSignal | undefined>
  timeoutMs: number
}): Promise<void> => {
  const signals = params.signals.filter(
    (signal): signal is AbortSignal => signal !== undefined,
  )
  if (signals.some((signal) => signal.aborted)) return
  const waitMs = Number.isFinite(params.timeoutMs)
    ? Math.min(MAX_WAIT_MS, Math.max(0, params.timeoutMs))
    : MAX_WAIT_MS
  if (waitMs <= 0) return
  await new Promise<void>((resolve) => {
    let done = false
    const finish = () => {
      if (done) return
      done = true
      clearTimeout(timer)
      for (const signal of signals) signal.removeEventListener('abort', finish)
      resolve()
    }
    const timer = setTimeout(finish, waitMs)
    for (const signal of signals)
      signal.addEventListener('abort', finish, { once: true })
  })
}
