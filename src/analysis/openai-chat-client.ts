import { buildHttpStatusError } from './analysis-error.js'
import { withTimeout } from './with-timeout.js'

export type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } }

export type ChatMessage = {
  role: 'system' | 'user'
  content: string | ChatContentPart[]
}

export type ChatUsage = {
  input?: number
  output?: number
  total?: number
}

export type ChatRunResult = {
  output: string
  usage?: ChatUsage
  elapsedMs: number
}

export type RunChatCompletionParams = {
  messages: ChatMessage[]
  model: string
  baseUrl: string
  timeoutMs: number
  apiKey?: string
  jsonOutput?: boolean
  temperature?: number
  signal?: AbortSignal
  onTextDelta?: (delta: string) => void
}

const LABEL = 'openai'

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const readNumber = (value: unknown): number | undefined =>
  typeof value === 'number' && Number.isFinite(value) ? value : undefined

const normalizeBaseUrl = (value: string): string => {
  const trimmed = value.replace(/\/+$/, '')
  return trimmed.endsWith('/v1') ? trimmed : `${trimmed}/v1`
}

const normalizeUsage = (value: unknown): ChatUsage | undefined => {
  if (!isRecord(value)) return undefined
  const input = readNumber(value['prompt_tokens'])
  const output = readNumber(value['completion_tokens'])
  if (input === undefined && output === undefined) return undefined
  const total =
    readNumber(value['total_tokens']) ??
    (input !== undefined && output !== undefined ? input + output : undefined)
  return {
    ...(input !== undefined ? { input } : {}),
    ...(output !== undefined ? { output } : {}),
    ...(total !== undefined ? { total } : {}),
  }
}

const readDeltaTexts = (chunk: Record<string, unknown>): string[] => {
  const { choices } = chunk
  if (!Array.isArray(choices)) return []
  const texts: string[] = []
  for (const choice of choices) {
    if (!isRecord(choice)) continue
    const { delta } = choice
    if (!isRecord(delta)) continue
    const { content } = delta
    if (typeof content === 'string') {
      texts.push(content)
      continue
    }
    if (!Array.isArray(content)) continue
    for (const part of content) {
      if (!isRecord(part)) continue
      const { text } = part
      if (typeof text === 'string' && text.length > 0) texts.push(text)
    }
  }
  return texts
}

const requestSse = async (
  url: string,
  payload: unknown,
  headers: Record<string, string>,
  onChunk: (chunk: Record<string, unknown>) => void,
  signal: AbortSignal,
): Promise<void> => {
  const response = await fetch(url, {
    method: 'POST',
    headers,
    body: JSON.stringify(payload),
    signal,
  })
  if (!response.ok) {
    throw buildHttpStatusError({
      label: LABEL,
      status: response.status,
      body: await response.text(),
    })
  }
  if (!response.body) throw new Error('missing_response_body')

  const reader = response.body.getReader()
  const decoder = new TextDecoder('utf-8')
  let buffer = ''
  let dataLines: string[] = []

  const flushEvent = (): boolean => {
    if (dataLines.length === 0) return false
    const payloadText = dataLines.join('\n').trim()
    dataLines = []
    if (!payloadText) return false
    if (payloadText === '[DONE]') return true
    let parsed: unknown
    try {
      parsed = JSON.parse(payloadText)
    } catch (error) {
      throw new Error(`invalid_json: ${payloadText.slice(0, 200)}`, {
        cause: error,
      })
    }
    if (isRecord(parsed)) onChunk(parsed)
    return false
  }

  for (;;) {
    const { done, value } = await reader.read()
    if (done) break
    buffer += decoder.decode(value, { stream: true })
    for (;;) {
      const lineBreakIndex = buffer.indexOf('\n')
      if (lineBreakIndex < 0) break
      let line = buffer.slice(0, lineBreakIndex)
      buffer = buffer.slice(lineBreakIndex + 1)
      if (line.endsWith('\r')) line = line.slice(0, -1)
      if (!line) {
        if (flushEvent()) return
        continue
      }
      if (line.startsWith(':')) continue
      if (line.startsWith('data:')) dataLines.push(line.slice(5).trimStart())
    }
  }
  buffer += decoder.decode()

  const tail = buffer.trim()
  if (tail.startsWith('data:')) dataLines.push(tail.slice(5).trimStart())

  flushEvent()
}

/** Streams one chat completion and returns the concatenated text. */
export const runChatCompletion = async (
  params: RunChatCompletionParams,
): Promise<ChatRunResult> => {
  const startedAt = Date.now()
  const headers: Record<string, string> = { 'Content-Type': 'application/json' }
  if (params.apiKey) headers['Authorization'] = `Bearer ${params.apiKey}`
  let output = ''
  let usage: ChatUsage | undefined
  await withTimeout({
    label: LABEL,
    timeoutMs: params.timeoutMs,
    ...(params.signal ? { signal: params.signal } : {}),
    run: (signal) =>
      requestSse(
        `${normalizeBaseUrl(params.baseUrl)}/chat/completions`,
        {
          model: params.model,
          stream: true,
          stream_options: { include_usage: true },
          ...(params.jsonOutput
            ? { response_format: { type: 'json_object' } }
            : {}),
          ...(params.temperature !== undefined
            ? { temperature: params.temperature }
            : {}),
          messages: params.messages,
        },
        headers,
        (chunk) => {
          for (const text of readDeltaTexts(chunk)) {
            output += text
            params.onTextDelta?.(text)
          }
          usage = normalizeUsage(chunk['usage']) ?? usage
        },
        signal,
      ),
  })
  return {
    output: output.trim(),
    elapsedMs: Math.max(0, Date.now() - startedAt),
    ...(usage ? { usage } : {}),
  }
}
