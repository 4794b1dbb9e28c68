import { Parser } from 'htmlparser2'

import { buildHttpStatusError } from './analysis-error.js'
import { withTimeout } from './with-timeout.js'

const DEFAULT_MAX_CHARS = 20_000

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'svg', 'template'])

const BLOCK_TAGS = new Set([
  'p',
  'div',
  'li',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'section',
  'article',
  'header',
  'footer',
  'tr',
  'blockquote',
])

/** Reduces an HTML document to its visible text. */
export const htmlToText = (html: string, maxChars = DEFAULT_MAX_CHARS): string => {
  const parts: string[] = []
  let skipDepth = 0
  const parser = new Parser({
    onopentag: (name) => {
      if (SKIPPED_TAGS.has(name)) skipDepth += 1
      parts.push(name === 'br' ? '\n' : ' ')
    },
    ontext: (text) => {
      if (skipDepth === 0) parts.push(text)
    },
    onclosetag: (name) => {
      if (SKIPPED_TAGS.has(name)) skipDepth = Math.max(0, skipDepth - 1)
      if (BLOCK_TAGS.has(name)) parts.push('\n')
    },
  })
  parser.write(html)
  parser.end()
  return parts
    .join('')
    .replace(/[ \t\f\v\r\u00a0]+/g, ' ')
    .replace(/ *\n\s*/g, '\n')
    .trim()
    .slice(0, maxChars)
}

export type FetchPageText = (params: {
  url: string
  timeoutMs: number
  signal?: AbortSignal
}) => Promise<string>

export const fetchPageText: FetchPageText = (params) =>
  withTimeout({
    label: 'page',
    timeoutMs: params.timeoutMs,
    ...(params.signal ? { signal: params.signal } : {}),
    run: async (signal) => {
      const response = await fetch(params.url, {
        headers: { Accept: 'text/html,application/xhtml+xml' },
        redirect: 'follow',
        signal,
      })
      const body = await response.text()
      if (!response.ok)
        throw buildHttpStatusError({
          label: 'page',
          status: response.status,
          body,
        })
      return htmlToText(body)
    },
  })
