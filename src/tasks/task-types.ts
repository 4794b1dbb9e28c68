import { z } from 'zod'

import type { PayloadIssue } from '../shared/errors.js'
import type { TaskType } from '../types/index.js'

const httpUrlSchema = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), {
    message: 'must be an http(s) URL',
  })

export const adConceptPayloadSchema = z.object({
  image_url: httpUrlSchema,
})

export const salesPagePayloadSchema = z.object({
  page_url: httpUrlSchema,
})

export const adRecipePayloadSchema = z.object({
  ad_archive_id: z.string().trim().min(1),
  image_url: httpUrlSchema,
  sales_url: httpUrlSchema,
  user_id: z.string().trim().min(1).optional(),
})

export type AdConceptPayload = z.infer<typeof adConceptPayloadSchema>
export type SalesPagePayload = z.infer<typeof salesPagePayloadSchema>
export type AdRecipePayload = z.infer<typeof adRecipePayloadSchema>

export const TASK_PAYLOAD_SCHEMAS = {
  'extract-ad-concept': adConceptPayloadSchema,
  'extract-sales-page': salesPagePayloadSchema,
  'generate-ad-recipe': adRecipePayloadSchema,
} as const satisfies Record<TaskType, z.ZodTypeAny>

export type PayloadParseResult =
  | { ok: true; payload: Record<string, unknown> }
  | { ok: false; issues: PayloadIssue[] }

export const parseTaskPayload = (
  taskType: TaskType,
  payload: unknown,
): PayloadParseResult => {
  const parsed = TASK_PAYLOAD_SCHEMAS[taskType].safeParse(payload)
  if (parsed.success) return { ok: true, payload: { ...parsed.data } }
  return {
    ok: false,
    issues: parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  }
}
