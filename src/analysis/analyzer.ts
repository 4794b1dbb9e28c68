import { appendLog } from '../log/append.js'
import { bestEffort } from '../log/safe.js'
import { renderPromptTemplate } from '../prompts/format.js'
import { loadPromptFile } from '../prompts/prompt-loader.js'

import {
  AnalysisError,
  buildInvalidOutputError,
} from './analysis-error.js'
import { runChatCompletion } from './openai-chat-client.js'
import { adConceptSchema, salesPageSchema } from './schemas.js'

import type { ChatMessage, RunChatCompletionParams } from './openai-chat-client.js'
import type { AdConcept, SalesPage } from './schemas.js'
import type { z } from 'zod'

export type AnalysisSettings = {
  model: string
  baseUrl: string
  timeoutMs: number
  apiKey?: string
}

export type Analyzer = {
  extractAdConcept: (params: {
    imageUrl: string
    signal?: AbortSignal
  }) => Promise<AdConcept>
  extractSalesPage: (params: {
    pageUrl: string
    pageText: string
    signal?: AbortSignal
  }) => Promise<SalesPage>
}

const SYSTEM_PROMPT =
  'You analyze marketing material and answer with one JSON object only.'

const FENCE_RE = /^```(?:json)?\s*([\s\S]*?)\s*```$/

/** Parses model output as JSON, tolerating a surrounding code fence. */
export const parseModelJson = (label: string, output: string): unknown => {
  const trimmed = output.trim()
  const unfenced = FENCE_RE.exec(trimmed)?.[1] ?? trimmed
  try {
    return JSON.parse(unfenced)
  } catch {
    throw buildInvalidOutputError(label, `not JSON: ${trimmed.slice(0, 120)}`)
  }
}

const validateOutput = <T extends z.ZodTypeAny>(
  label: string,
  schema: T,
  value: unknown,
): z.output<T> => {
  const parsed = schema.safeParse(value)
  if (parsed.success) return parsed.data
  const detail = parsed.error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ')
  throw buildInvalidOutputError(label, detail)
}

export const createOpenAiAnalyzer = (
  settings: AnalysisSettings,
  options: { logPath?: string } = {},
): Analyzer => {
  const complete = async (params: {
    label: string
    messages: ChatMessage[]
    signal?: AbortSignal
  }): Promise<unknown> => {
    if (!settings.apiKey) {
      throw new AnalysisError({
        code: 'analysis_misconfigured',
        message: 'OPENAI_API_KEY is not set',
        retryable: false,
      })
    }
    const request: RunChatCompletionParams = {
      model: settings.model,
      baseUrl: settings.baseUrl,
      timeoutMs: settings.timeoutMs,
      apiKey: settings.apiKey,
      jsonOutput: true,
      messages: params.messages,
      ...(params.signal ? { signal: params.signal } : {}),
    }
    const result = await runChatCompletion(request)
    const { logPath } = options
    if (logPath) {
      await bestEffort('analyzer: appendLog', () =>
        appendLog(logPath, {
          event: 'analysis_completion',
          label: params.label,
          model: settings.model,
          elapsedMs: result.elapsedMs,
          outputChars: result.output.length,
          ...(result.usage ? { usage: result.usage } : {}),
        }),
      )
    }
    return parseModelJson(params.label, result.output)
  }

  return {
    extractAdConcept: async ({ imageUrl, signal }) => {
      const template = await loadPromptFile('analysis', 'ad-concept')
      const prompt = renderPromptTemplate(template, { image_url: imageUrl })
      const output = await complete({
        label: 'ad-concept',
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          {
            role: 'user',
            content: [
              { type: 'text', text: prompt },
              { type: 'image_url', image_url: { url: imageUrl } },
            ],
          },
        ],
        ...(signal ? { signal } : {}),
      })
      return validateOutput('ad-concept', adConceptSchema, output)
    },

    extractSalesPage: async ({ pageUrl, pageText, signal }) => {
      const template = await loadPromptFile('analysis', 'sales-page')
      const prompt = renderPromptTemplate(template, {
        page_url: pageUrl,
        page_text: pageText || '(the page returned no readable text)',
      })
      const output = await complete({
        label: 'sales-page',
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        ...(signal ? { signal } : {}),
      })
      return validateOutput('sales-page', salesPageSchema, output)
    },
  }
}
