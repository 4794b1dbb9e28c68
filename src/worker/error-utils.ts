import { AnalysisError } from '../analysis/analysis-error.js'
import { OrchestrationError } from '../shared/errors.js'

import type { TaskErrorInfo } from '../types/index.js'

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error))

/**
 * Task logic errors are retried unless they say otherwise. Orchestration
 * errors come from the store or state machine and never heal by retrying.
 */
export const isRetryableTaskError = (error: unknown): boolean => {
  if (error instanceof AnalysisError) return error.retryable
  if (error instanceof OrchestrationError) return false
  return true
}

export const toTaskErrorInfo = (error: unknown): TaskErrorInfo => {
  if (error instanceof AnalysisError || error instanceof OrchestrationError) {
    return {
      code: error.code,
      message: error.message,
      name: error.name,
      retryable: isRetryableTaskError(error),
    }
  }
  const err = toError(error)
  return {
    code: 'analysis_failed',
    message: err.message || 'task failed',
    name: err.name,
  }
}
