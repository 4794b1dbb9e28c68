import { z } from 'zod'

const looseText = z
  .union([z.string(), z.null()])
  .transform((value) => value ?? '')
  .default('')

export const adConceptSchema = z.object({
  title: z.string().min(1),
  summary: z.string(),
  details: z.record(z.unknown()).default({}),
})

export const salesPageSchema = z.object({
  product_name: z.string().min(1),
  tagline: looseText,
  key_benefits: z.array(z.string()).default([]),
  features: z.array(z.string()).default([]),
  problem_addressed: looseText,
  target_audience: looseText,
  social_proof: z.record(z.unknown()).default({}),
  offer: z.record(z.unknown()).default({}),
  call_to_action: looseText,
  visual_elements_to_include: z.array(z.string()).default([]),
  brand_voice: looseText,
  compliance_notes: looseText,
  additional_info: z.record(z.unknown()).default({}),
})

export type AdConcept = z.infer<typeof adConceptSchema>
export type SalesPage = z.infer<typeof salesPageSchema>
