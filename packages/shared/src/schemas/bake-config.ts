import { z } from 'zod'
import {
  CHANNEL_KINDS,
  COLOR_SPACES,
  STANDARD_RESOLUTIONS,
  MIN_RESOLUTION,
  MAX_RESOLUTION,
  MAX_ATLAS_GRID,
  type BakeConfig,
} from '@texbake/types'

export const channelKindSchema = z.enum(CHANNEL_KINDS)

export const colorSpaceSchema = z.enum(COLOR_SPACES)

const standardResolutionSchema = z.union([
  z.literal(STANDARD_RESOLUTIONS[0]),
  z.literal(STANDARD_RESOLUTIONS[1]),
  z.literal(STANDARD_RESOLUTIONS[2]),
  z.literal(STANDARD_RESOLUTIONS[3]),
  z.literal(STANDARD_RESOLUTIONS[4]),
])

// Slot sizes are range-checked by the engine only while the slot is enabled.
const customSlotSchema = z.object({
  enabled: z.boolean(),
  width: z.number().int(),
  height: z.number().int(),
})

export const bakeConfigSchema: z.ZodType<BakeConfig> = z.object({
  outputDirectory: z.string().min(1, 'Output directory is required').max(1024),
  margin: z.number().int().min(0).max(64),
  resolutions: z.object({
    base: z.number().int().min(MIN_RESOLUTION).max(MAX_RESOLUTION),
    multiResolution: z.boolean(),
    standard: z.array(standardResolutionSchema),
    customEnabled: z.boolean(),
    custom: z.tuple([customSlotSchema, customSlotSchema, customSlotSchema]),
  }),
  channels: z.array(channelKindSchema),
  lighting: z.object({
    includeLighting: z.boolean(),
    shadowMode: z.enum(['with-shadows', 'no-shadows']),
  }),
  colorSpace: z.object({
    mode: z.enum(['auto', 'custom', 'manual']),
    overrides: z.record(channelKindSchema, colorSpaceSchema),
    manualOverride: colorSpaceSchema,
  }),
  naming: z.object({
    mode: z.enum(['standard', 'mari', 'mudbox']),
    folders: z.object({
      byObject: z.boolean(),
      byMaterial: z.boolean(),
      byResolution: z.boolean(),
    }),
  }),
  mixedShaderStrategy: z.enum(['full-surface', 'principled-only', 'custom-only']),
  atlas: z.object({
    enabled: z.boolean(),
    layoutMode: z.enum(['auto', 'manual']),
    rows: z.number().int().min(1).max(MAX_ATLAS_GRID),
    cols: z.number().int().min(1).max(MAX_ATLAS_GRID),
    padding: z.number().min(0).lt(0.5),
    updateUv: z.boolean(),
  }),
  udim: z.object({
    enabled: z.boolean(),
    autoDetect: z.boolean(),
    rangeStart: z.number().int(),
    rangeEnd: z.number().int(),
  }),
  replaceNodes: z.boolean(),
})
