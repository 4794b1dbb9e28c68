import { expect, test, vi } from 'vitest'

import { AnalysisError } from '../src/analysis/analysis-error.js'
import { createAnalysisHandlers } from '../src/tasks/handlers.js'

import type { Analyzer } from '../src/analysis/analyzer.js'
import type { AdConcept, SalesPage } from '../src/analysis/schemas.js'
import type { TaskContext } from '../src/tasks/handlers.js'
import type { TaskType } from '../src/types/index.js'

const concept: AdConcept = {
  title: 'Before and after',
  summary: 'Shows the change.',
  details: { hook: 'Split screen' },
}

const salesPage: SalesPage = {
  product_name: 'Widget',
  tagline: 'Lighter than air',
  key_benefits: ['Fast'],
  features: [],
  problem_addressed: '',
  target_audience: 'Commuters',
  social_proof: {},
  offer: {},
  call_to_action: 'Buy now',
  visual_elements_to_include: [],
  brand_voice: 'Playful',
  compliance_notes: '',
  additional_info: {},
}

const createFakes = () => {
  const analyzer: Analyzer = {
    extractAdConcept: vi.fn(async () => concept),
    extractSalesPage: vi.fn(async () => salesPage),
  }
  const fetchPageText = vi.fn(async () => 'Widget. Lighter than air.')
  const handlers = createAnalysisHandlers({
    analyzer,
    pageTimeoutMs: 1_000,
    fetchPageText,
  })
  return { analyzer, fetchPageText, handlers }
}

const createContext = (taskType: TaskType) => {
  const stages: string[] = []
  const context: TaskContext = {
    taskId: 'task-1',
    taskType,
    attempt: 1,
    maxAttempts: 3,
    signal: new AbortController().signal,
    reportProgress: async (stage) => {
      stages.push(stage)
    },
  }
  return { context, stages }
}

test('extract-ad-concept returns the analyzer concept', async () => {
  const { analyzer, handlers } = createFakes()
  const { context, stages } = createContext('extract-ad-concept')

  const result = await handlers['extract-ad-concept'](
    { image_url: 'https://example.com/ad.png' },
    context,
  )

  expect(result).toEqual(concept)
  expect(stages).toEqual(['fetching image'])
  expect(analyzer.extractAdConcept).toHaveBeenCalledWith({
    imageUrl: 'https://example.com/ad.png',
    signal: context.signal,
  })
})

test('extract-sales-page reads the page before asking the model', async () => {
  const { analyzer, fetchPageText, handlers } = createFakes()
  const { context, stages } = createContext('extract-sales-page')

  const result = await handlers['extract-sales-page'](
    { page_url: 'https://example.com/product' },
    context,
  )

  expect(result).toEqual(salesPage)
  expect(stages).toEqual(['fetching page', 'extracting sales copy'])
  expect(fetchPageText).toHaveBeenCalledWith({
    url: 'https://example.com/product',
    timeoutMs: 1_000,
    signal: context.signal,
  })
  expect(analyzer.extractSalesPage).toHaveBeenCalledWith({
    pageUrl: 'https://example.com/product',
    pageText: 'Widget. Lighter than air.',
    signal: context.signal,
  })
})

test('generate-ad-recipe combines both analyses into a prompt', async () => {
  const { handlers } = createFakes()
  const { context, stages } = createContext('generate-ad-recipe')

  const result = await handlers['generate-ad-recipe'](
    {
      ad_archive_id: '1234567890',
      image_url: 'https://example.com/ad.png',
      sales_url: 'https://example.com/product',
      user_id: 'user-7',
    },
    context,
  )

  expect(stages).toEqual([
    'analyzing ad concept',
    'analyzing sales page',
    'fetching page',
    'extracting sales copy',
    'composing recipe',
  ])
  expect(result).toMatchObject({
    ad_archive_id: '1234567890',
    image_url: 'https://example.com/ad.png',
    sales_url: 'https://example.com/product',
    user_id: 'user-7',
    ad_concept_json: concept,
    sales_page_json: salesPage,
  })
  const prompt = result['recipe_prompt']
  expect(typeof prompt).toBe('string')
  expect(prompt).toContain('"title": "Before and after"')
  expect(prompt).toContain('"product_name": "Widget"')
  expect(prompt).not.toContain('{ad_concept_json}')
})

test('a payload that no longer validates fails without retry', async () => {
  const { handlers } = createFakes()
  const { context } = createContext('extract-ad-concept')

  const error = await handlers['extract-ad-concept']({}, context).catch(
    (reason: unknown) => reason,
  )
  expect(error).toBeInstanceOf(AnalysisError)
  expect(error).toMatchObject({
    code: 'analysis_invalid_input',
    retryable: false,
  })
})
