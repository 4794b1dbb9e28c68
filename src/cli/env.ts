import type { AppConfig, StorageDriver } from '../config.js'

const parseEnvPositiveInteger = (
  name: string,
  value: string | undefined,
): number | undefined => {
  if (!value) return undefined
  const parsed = Number(value)
  if (Number.isInteger(parsed) && parsed > 0) return parsed
  console.warn(`[cli] invalid ${name}:`, value)
  return undefined
}

const parseEnvNonNegativeInteger = (
  name: string,
  value: string | undefined,
): number | undefined => {
  if (!value) return undefined
  const parsed = Number(value)
  if (Number.isInteger(parsed) && parsed >= 0) return parsed
  console.warn(`[cli] invalid ${name}:`, value)
  return undefined
}

const parseStorageDriver = (
  value: string | undefined,
): StorageDriver | undefined => {
  if (!value) return undefined
  if (value === 'file' || value === 'memory') return value
  console.warn('[cli] invalid ADLENS_STORAGE_DRIVER:', value)
  return undefined
}

type Env = Record<string, string | undefined>

const readEnv = (env: Env, name: string): string | undefined => {
  const value = env[name]?.trim()
  return value ? value : undefined
}

const applyAnalysisEnv = (config: AppConfig, env: Env): void => {
  const apiKey = readEnv(env, 'OPENAI_API_KEY')
  if (apiKey) config.analysis.apiKey = apiKey
  const baseUrl = readEnv(env, 'OPENAI_BASE_URL')
  if (baseUrl) config.analysis.baseUrl = baseUrl
  const model = readEnv(env, 'ADLENS_MODEL')
  if (model) config.analysis.model = model
  const timeoutMs = parseEnvPositiveInteger(
    'ADLENS_ANALYSIS_TIMEOUT_MS',
    readEnv(env, 'ADLENS_ANALYSIS_TIMEOUT_MS'),
  )
  if (timeoutMs !== undefined) config.analysis.timeoutMs = timeoutMs
}

const applyWorkerEnv = (config: AppConfig, env: Env): void => {
  const concurrency = parseEnvPositiveInteger(
    'ADLENS_WORKER_CONCURRENCY',
    readEnv(env, 'ADLENS_WORKER_CONCURRENCY'),
  )
  if (concurrency !== undefined) config.worker.concurrency = concurrency

  const maxAttempts = parseEnvPositiveInteger(
    'ADLENS_WORKER_MAX_ATTEMPTS',
    readEnv(env, 'ADLENS_WORKER_MAX_ATTEMPTS'),
  )
  if (maxAttempts !== undefined) config.worker.retry.maxAttempts = maxAttempts

  const backoffMs = parseEnvNonNegativeInteger(
    'ADLENS_WORKER_BACKOFF_MS',
    readEnv(env, 'ADLENS_WORKER_BACKOFF_MS'),
  )
  if (backoffMs !== undefined) {
    config.worker.retry.backoffMs = backoffMs
    config.worker.retry.maxBackoffMs = Math.max(
      backoffMs,
      config.worker.retry.maxBackoffMs,
    )
  }

  const visibilityTimeoutMs = parseEnvPositiveInteger(
    'ADLENS_QUEUE_VISIBILITY_TIMEOUT_MS',
    readEnv(env, 'ADLENS_QUEUE_VISIBILITY_TIMEOUT_MS'),
  )
  if (visibilityTimeoutMs !== undefined)
    config.queue.visibilityTimeoutMs = visibilityTimeoutMs
}

const applyStreamEnv = (config: AppConfig, env: Env): void => {
  const maxDurationMs = parseEnvPositiveInteger(
    'ADLENS_STREAM_MAX_DURATION_MS',
    readEnv(env, 'ADLENS_STREAM_MAX_DURATION_MS'),
  )
  if (maxDurationMs !== undefined) config.stream.maxDurationMs = maxDurationMs

  const ttlMs = parseEnvPositiveInteger(
    'ADLENS_RETENTION_TTL_MS',
    readEnv(env, 'ADLENS_RETENTION_TTL_MS'),
  )
  if (ttlMs !== undefined) config.retention.ttlMs = ttlMs
}

export const applyCliEnvOverrides = (
  config: AppConfig,
  env: Env = process.env,
): void => {
  const driver = parseStorageDriver(readEnv(env, 'ADLENS_STORAGE_DRIVER'))
  if (driver) config.storage.driver = driver
  applyAnalysisEnv(config, env)
  applyWorkerEnv(config, env)
  applyStreamEnv(config, env)
}
