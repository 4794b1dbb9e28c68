import { resolve } from 'node:path'

import { loadDefaultConfigFromYaml } from './config-default-loader.js'

import type { AppDefaults } from './config-default-loader.js'

export type StorageDriver = AppDefaults['storage']['driver']

export type AppConfig = AppDefaults & {
  workDir: string
  analysis: AppDefaults['analysis'] & {
    apiKey?: string
  }
}

let cachedDefaults: AppDefaults | null = null

const getDefaults = (): AppDefaults => {
  cachedDefaults ??= loadDefaultConfigFromYaml()
  return cachedDefaults
}

/** Fresh, mutable config built from `config/default.yaml`. */
export const defaultConfig = (params: { workDir: string }): AppConfig => {
  const defaults = structuredClone(getDefaults())
  return {
    ...defaults,
    workDir: resolve(params.workDir),
  }
}
