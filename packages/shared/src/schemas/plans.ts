import { z } from 'zod'
import { bakeConfigSchema } from './bake-config'
import { hostSelectionSchema } from './host'

export const planRequestSchema = z.object({
  config: bakeConfigSchema,
  selection: hostSelectionSchema,
})

export type PlanRequest = z.infer<typeof planRequestSchema>
