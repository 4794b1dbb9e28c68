import { readFileSync } from 'node:fs'
import { join } from 'node:path'

import { parse as parseYaml } from 'yaml'
import { z } from 'zod'

import { resolveProjectRoot } from './fs/paths.js'

const positiveInt = z.number().int().positive()
const nonNegativeInt = z.number().int().nonnegative()

const defaultConfigSchema = z
  .object({
    server: z
      .object({
        port: positiveInt.max(65535),
        host: z.string().min(1),
        bodyLimitBytes: positiveInt,
      })
      .strict(),
    storage: z
      .object({
        driver: z.enum(['file', 'memory']),
      })
      .strict(),
    queue: z
      .object({
        visibilityTimeoutMs: positiveInt,
        pollMs: positiveInt,
      })
      .strict(),
    worker: z
      .object({
        concurrency: positiveInt,
        retry: z
          .object({
            maxAttempts: positiveInt,
            backoffMs: nonNegativeInt,
            maxBackoffMs: nonNegativeInt,
          })
          .strict(),
      })
      .strict(),
    stream: z
      .object({
        pollMs: positiveInt,
        maxDurationMs: positiveInt,
        heartbeatMs: positiveInt,
      })
      .strict(),
    retention: z
      .object({
        ttlMs: positiveInt,
        sweepIntervalMs: positiveInt,
      })
      .strict(),
    analysis: z
      .object({
        model: z.string().min(1),
        baseUrl: z.string().url(),
        timeoutMs: positiveInt,
      })
      .strict(),
  })
  .strict()

export type AppDefaults = z.infer<typeof defaultConfigSchema>

export const resolveDefaultConfigPath = (): string =>
  join(resolveProjectRoot(), 'config', 'default.yaml')

export const parseDefaultConfigYaml = (source: string): AppDefaults => {
  const parsed: unknown = parseYaml(source)
  const validated = defaultConfigSchema.safeParse(parsed)
  if (validated.success) {
    const { retry } = validated.data.worker
    if (retry.maxBackoffMs < retry.backoffMs) {
      throw new Error(
        '[config] invalid yaml defaults: worker.retry.maxBackoffMs must be >= worker.retry.backoffMs',
      )
    }
    return validated.data
  }

  const issues = validated.error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ')
  throw new Error(`[config] invalid yaml defaults: ${issues}`)
}

export const loadDefaultConfigFromYaml = (
  path = resolveDefaultConfigPath(),
): AppDefaults => {
  const source = readFileSync(path, 'utf8')
  return parseDefaultConfigYaml(source)
}
