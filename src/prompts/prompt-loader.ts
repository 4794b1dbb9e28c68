import { readFile } from 'node:fs/promises'
import { join } from 'node:path'

import { resolveProjectRoot } from '../fs/paths.js'
import { readErrorCode } from '../shared/errors.js'

const PROMPT_NAME_RE = /^[a-z0-9][a-z0-9-]*$/

const cache = new Map<string, Promise<string>>()

const readPrompt = async (path: string): Promise<string> => {
  try {
    return await readFile(path, 'utf8')
  } catch (error) {
    if (readErrorCode(error) === 'ENOENT')
      throw new Error(`prompt_not_found:${path}`, { cause: error })
    throw error
  }
}

/** Loads `prompts/<group>/<name>.md`, cached per process. */
export const loadPromptFile = (group: string, name: string): Promise<string> => {
  if (!PROMPT_NAME_RE.test(group) || !PROMPT_NAME_RE.test(name))
    return Promise.reject(new Error(`prompt_invalid_name:${group}/${name}`))
  const path = join(resolveProjectRoot(), 'prompts', group, `${name}.md`)
  const cached = cache.get(path)
  if (cached) return cached
  const loading = readPrompt(path)
  cache.set(path, loading)
  loading.catch(() => cache.delete(path))
  return loading
}
