import { buildInvalidInputError } from '../analysis/analysis-error.js'
import { fetchPageText as defaultFetchPageText } from '../analysis/page-text.js'
import { formatJsonBlock, renderPromptTemplate } from '../prompts/format.js'
import { loadPromptFile } from '../prompts/prompt-loader.js'

import {
  adConceptPayloadSchema,
  adRecipePayloadSchema,
  salesPagePayloadSchema,
} from './task-types.js'

import type { Analyzer } from '../analysis/analyzer.js'
import type { FetchPageText } from '../analysis/page-text.js'
import type { Id, TaskPayload, TaskResult, TaskType } from '../types/index.js'
import type { z } from 'zod'

export type TaskContext = {
  taskId: Id
  taskType: TaskType
  attempt: number
  maxAttempts: number
  /** Aborted when the worker pool shuts down hard. */
  signal: AbortSignal
  /** Records a human-readable stage on the task record. */
  reportProgress: (stage: string) => Promise<void>
}

/**
 * Task logic for one task type. Delivery is at-least-once: a handler may run
 * again for a task id whose earlier run was interrupted, so it must not
 * depend on side effects of a previous invocation.
 */
export type TaskHandler = (
  payload: TaskPayload,
  context: TaskContext,
) => Promise<TaskResult>

export type TaskHandlers = Record<TaskType, TaskHandler>

const parsePayload = <S extends z.ZodTypeAny>(
  schema: S,
  payload: TaskPayload,
): z.output<S> => {
  const parsed = schema.safeParse(payload)
  if (!parsed.success)
    throw buildInvalidInputError(
      parsed.error.issues.map((issue) => issue.message).join('; '),
    )
  return parsed.data
}

export const createAnalysisHandlers = (deps: {
  analyzer: Analyzer
  pageTimeoutMs: number
  fetchPageText?: FetchPageText
}): TaskHandlers => {
  const fetchPageText = deps.fetchPageText ?? defaultFetchPageText

  const extractConcept = async (imageUrl: string, context: TaskContext) => {
    await context.reportProgress('fetching image')
    return deps.analyzer.extractAdConcept({
      imageUrl,
      signal: context.signal,
    })
  }

  const extractSalesPage = async (pageUrl: string, context: TaskContext) => {
    await context.reportProgress('fetching page')
    const pageText = await fetchPageText({
      url: pageUrl,
      timeoutMs: deps.pageTimeoutMs,
      signal: context.signal,
    })
    await context.reportProgress('extracting sales copy')
    return deps.analyzer.extractSalesPage({
      pageUrl,
      pageText,
      signal: context.signal,
    })
  }

  return {
    'extract-ad-concept': async (payload, context) => {
      const { image_url } = parsePayload(adConceptPayloadSchema, payload)
      const concept = await extractConcept(image_url, context)
      return { ...concept }
    },

    'extract-sales-page': async (payload, context) => {
      const { page_url } = parsePayload(salesPagePayloadSchema, payload)
      const salesPage = await extractSalesPage(page_url, context)
      return { ...salesPage }
    },

    'generate-ad-recipe': async (payload, context) => {
      const input = parsePayload(adRecipePayloadSchema, payload)
      await context.reportProgress('analyzing ad concept')
      const concept = await deps.analyzer.extractAdConcept({
        imageUrl: input.image_url,
        signal: context.signal,
      })
      await context.reportProgress('analyzing sales page')
      const salesPage = await extractSalesPage(input.sales_url, context)
      await context.reportProgress('composing recipe')
      const template = await loadPromptFile('analysis', 'ad-recipe')
      const recipePrompt = renderPromptTemplate(template, {
        ad_concept_json: formatJsonBlock(concept),
        sales_page_json: formatJsonBlock(salesPage),
      })
      return {
        ad_archive_id: input.ad_archive_id,
        image_url: input.image_url,
        sales_url: input.sales_url,
        ...(input.user_id !== undefined ? { user_id: input.user_id } : {}),
        ad_concept_json: concept,
        sales_page_json: salesPage,
        recipe_prompt: recipePrompt,
      }
    },
  }
}
