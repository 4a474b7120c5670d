import { z } from 'zod'
import type { HostSelection } from '@texbake/types'

export const materialSlotSchema = z.object({
  slotIndex: z.number().int().min(0),
  materialId: z.string().min(1),
  materialName: z.string().min(1).max(256),
  shaderGraph: z.string().min(1),
  uvSet: z.string().min(1),
  classification: z.enum(['principled-only', 'custom-only', 'mixed']),
  principledInputs: z.array(z.string()).optional(),
  customOutput: z.string().min(1).optional(),
})

export const hostObjectSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1).max(256),
  slots: z.array(materialSlotSchema),
  udimTiles: z.array(z.number().int()).optional(),
  uvs: z.array(z.object({ u: z.number().finite(), v: z.number().finite() })).optional(),
})

export const hostSelectionSchema: z.ZodType<HostSelection> = z.object({
  objects: z.array(hostObjectSchema),
})
