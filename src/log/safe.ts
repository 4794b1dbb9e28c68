import { readErrorCode } from '../shared/errors.js'

import { appendLog } from './append.js'

type SafeErrorInfo = {
  message: string
  name?: string
  stack?: string
}

export type SafeLogOptions = {
  logPath?: string
  meta?: Record<string, unknown>
  ignoreCodes?: string[]
}

export type SafeOptions<T> = SafeLogOptions & {
  fallback: T
}

let defaultLogPath: string | null = null

export const setDefaultLogPath = (path?: string | null): void => {
  if (typeof path !== 'string') {
    defaultLogPath = null
    return
  }
  const trimmed = path.trim()
  defaultLogPath = trimmed.length > 0 ? trimmed : null
}

const trimStack = (stack?: string, lines = 6): string | undefined => {
  if (!stack) return undefined
  return stack.split(/\r?\n/).slice(0, lines).join('\n')
}

const normalizeError = (error: unknown): SafeErrorInfo => {
  if (!(error instanceof Error)) return { message: String(error) }
  const stack = trimStack(error.stack)
  return {
    message: error.message,
    name: error.name,
    ...(stack ? { stack } : {}),
  }
}

export const logSafeError = async (
  context: string,
  error: unknown,
  options?: SafeLogOptions,
): Promise<void> => {
  const info = normalizeError(error)
  const code = readErrorCode(error)
  const payload = {
    event: 'error',
    context,
    error: info.message,
    ...(code ? { errorCode: code } : {}),
    ...(info.name ? { errorName: info.name } : {}),
    ...(info.stack ? { errorStack: info.stack } : {}),
    ...(options?.meta ? { meta: options.meta } : {}),
  }
  const logPath = options?.logPath ?? defaultLogPath
  if (logPath) {
    try {
      await appendLog(logPath, payload)
      return
    } catch (appendError) {
      console.error(`[safe] failed to append log for ${context}`, appendError)
    }
  }
  console.error(`[safe] ${context}`, payload)
}

/** Runs `fn`, logging a failure and resolving to `fallback` instead. */
export const safe = async <T>(
  context: string,
  fn: () => T | Promise<T>,
  options: SafeOptions<T>,
): Promise<T> => {
  try {
    return await fn()
  } catch (error) {
    const code = readErrorCode(error)
    const ignored = code !== undefined && options.ignoreCodes?.includes(code)
    if (!ignored) await logSafeError(context, error, options)
    return options.fallback
  }
}

export const bestEffort = async (
  context: string,
  fn: () => unknown,
  options: SafeLogOptions = {},
): Promise<void> => {
  await safe<unknown>(context, fn, { ...options, fallback: undefined })
}
