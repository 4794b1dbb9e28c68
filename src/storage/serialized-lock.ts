import { logSafeError } from '../log/safe.js'

const updateQueue = new Map<string, Promise<void>>()

/**
 * Chains calls that share `key` so they run one at a time inside this
 * process. Pair with `withStoreLock` for exclusion across processes.
 */
export const runSerialized = async <T>(
  key: string,
  fn: () => Promise<T>,
): Promise<T> => {
  const previous = updateQueue.get(key) ?? Promise.resolve()
  const safePrevious = previous.catch((error: unknown) =>
    logSafeError('runSerialized:previous_failed', error, { meta: { key } }),
  )
  let releaseQueue: () => void = () => undefined
  const next = new Promise<void>((resolve) => {
    releaseQueue = resolve
  })
  updateQueue.set(key, next)
  await safePrevious
  try {
    return await fn()
  } finally {
    releaseQueue()
    if (updateQueue.get(key) === next) updateQueue.delete(key)
  }
}
