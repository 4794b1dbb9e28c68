type AnalysisErrorCode =
  | 'analysis_timeout'
  | 'analysis_aborted'
  | 'analysis_http_error'
  | 'analysis_transient_network'
  | 'analysis_invalid_output'
  | 'analysis_invalid_input'
  | 'analysis_page_unavailable'
  | 'analysis_misconfigured'

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode
  readonly retryable: boolean
  readonly status?: number

  constructor(params: {
    code: AnalysisErrorCode
    message: string
    retryable: boolean
    status?: number
    cause?: unknown
  }) {
    super(
      params.message,
      params.cause === undefined ? undefined : { cause: params.cause },
    )
    this.name = 'AnalysisError'
    this.code = params.code
    this.retryable = params.retryable
    if (params.status !== undefined) this.status = params.status
  }
}

const RETRYABLE_STATUS = new Set([408, 409, 425, 429])

export const isRetryableStatus = (status: number): boolean =>
  status >= 500 || RETRYABLE_STATUS.has(status)

export const buildHttpStatusError = (params: {
  label: string
  status: number
  body: string
}): AnalysisError => {
  const snippet =
    params.body.length > 500 ? `${params.body.slice(0, 500)}...` : params.body
  return new AnalysisError({
    code:
      params.label === 'page' ? 'analysis_page_unavailable' : 'analysis_http_error',
    message: `[${params.label}] HTTP ${params.status}: ${snippet}`.trim(),
    retryable: isRetryableStatus(params.status),
    status: params.status,
  })
}

export const buildTimeoutError = (
  label: string,
  timeoutMs: number,
): AnalysisError =>
  new AnalysisError({
    code: 'analysis_timeout',
    message: `[${label}] timed out after ${timeoutMs}ms`,
    retryable: true,
  })

export const buildAbortedError = (label: string): AnalysisError =>
  new AnalysisError({
    code: 'analysis_aborted',
    message: `[${label}] aborted`,
    retryable: false,
  })

export const buildInvalidOutputError = (
  label: string,
  detail: string,
): AnalysisError =>
  new AnalysisError({
    code: 'analysis_invalid_output',
    message: `[${label}] invalid model output: ${detail}`,
    retryable: true,
  })

export const buildInvalidInputError = (detail: string): AnalysisError =>
  new AnalysisError({
    code: 'analysis_invalid_input',
    message: `invalid task input: ${detail}`,
    retryable: false,
  })

const TRANSIENT_MESSAGE_PATTERNS = [
  /fetch failed/i,
  /socket hang up/i,
  /ECONNRESET/i,
  /ECONNREFUSED/i,
  /EAI_AGAIN/i,
  /ETIMEDOUT/i,
  /network/i,
]

export const isTransientMessage = (message: string): boolean =>
  TRANSIENT_MESSAGE_PATTERNS.some((pattern) => pattern.test(message))

/** Maps a rejected fetch into an AnalysisError. */
export const toAnalysisError = (
  label: string,
  error: unknown,
  state: { timedOut: boolean; timeoutMs: number; aborted: boolean },
): AnalysisError => {
  if (error instanceof AnalysisError) return error
  if (state.timedOut) return buildTimeoutError(label, state.timeoutMs)
  if (state.aborted) return buildAbortedError(label)
  const message = error instanceof Error ? error.message : String(error)
  const transient = isTransientMessage(message)
  return new AnalysisError({
    code: transient ? 'analysis_transient_network' : 'analysis_http_error',
    message: `[${label}] request failed: ${message}`,
    retryable: transient,
    cause: error,
  })
}
