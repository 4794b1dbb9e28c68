import { readFile } from 'node:fs/promises'
import { dirname } from 'node:path'

import writeFileAtomicLib from 'write-file-atomic'

import { readErrorCode } from '../shared/errors.js'

import { ensureDir } from './paths.js'

export const writeFileAtomic = async (
  path: string,
  content: string,
): Promise<void> => {
  await ensureDir(dirname(path))
  await writeFileAtomicLib(path, content, { encoding: 'utf8' })
}

const toJsonText = (value: unknown): string =>
  `${JSON.stringify(value, null, 2)}\n`

export const writeJson = (path: string, value: unknown): Promise<void> =>
  writeFileAtomic(path, toJsonText(value))

/**
 * Reads and parses a JSON file. Resolves to `undefined` when the file does
 * not exist; other read errors and malformed JSON reject.
 */
export const readJson = async (path: string): Promise<unknown> => {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    if (readErrorCode(error) === 'ENOENT') return undefined
    throw error
  }
  if (!text.trim()) return undefined
  const parsed: unknown = JSON.parse(text)
  return parsed
}
