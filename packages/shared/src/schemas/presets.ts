import { z } from 'zod'
import { CURRENT_PRESET_SCHEMA_VERSION, MAX_ATLAS_GRID } from '@texbake/types'
import { bakeConfigSchema, channelKindSchema, colorSpaceSchema } from './bake-config'
import { hostSelectionSchema } from './host'

/** Preset names: letters, digits, space, hyphen and underscore. */
export const presetNameParam = z.object({
  name: z.string().min(1).max(64).regex(/^[A-Za-z0-9 _-]+$/, 'Preset name may contain letters, digits, spaces, - and _'),
})

export const savePresetSchema = z.object({
  config: bakeConfigSchema,
})

export const presetPlanSchema = z.object({
  selection: hostSelectionSchema,
})

const recordSlotSchema = z.object({
  enabled: z.boolean(),
  width: z.number().int(),
  height: z.number().int(),
})

/**
 * Durable preset record at the current schema version.
 * Older records are migrated to this shape before parsing.
 */
export const presetRecordSchema = z.object({
  name: z.string().min(1),
  schema_version: z.literal(CURRENT_PRESET_SCHEMA_VERSION),
  output_directory: z.string().min(1),
  margin: z.number().int().min(0).max(64),
  resolution: z.number().int().min(16).max(16384),
  multi_resolution: z.boolean(),
  standard_resolutions: z.array(z.union([
    z.literal(512), z.literal(1024), z.literal(2048), z.literal(4096), z.literal(8192),
  ])),
  custom_resolutions_enabled: z.boolean(),
  custom_resolutions: z.tuple([recordSlotSchema, recordSlotSchema, recordSlotSchema]),
  channels: z.array(channelKindSchema),
  include_lighting: z.boolean(),
  lighting_shadow_mode: z.enum(['WITH_SHADOWS', 'NO_SHADOWS']),
  folder_by_object: z.boolean(),
  folder_by_material: z.boolean(),
  folder_by_resolution: z.boolean(),
  replace_nodes: z.boolean(),
  mixed_shader_strategy: z.enum(['SURFACE_OUTPUT', 'PRINCIPLED_ONLY', 'CUSTOM_ONLY']),
  colorspace_mode: z.enum(['AUTO', 'CUSTOM', 'MANUAL']),
  colorspace_overrides: z.record(channelKindSchema, colorSpaceSchema),
  colorspace_manual_override: colorSpaceSchema,
  naming_mode: z.enum(['STANDARD', 'MARI', 'MUDBOX']),
  atlas_enabled: z.boolean(),
  atlas_layout_mode: z.enum(['AUTO', 'MANUAL']),
  atlas_rows: z.number().int().min(1).max(MAX_ATLAS_GRID),
  atlas_cols: z.number().int().min(1).max(MAX_ATLAS_GRID),
  atlas_padding: z.number().min(0).lt(0.5),
  atlas_update_uv: z.boolean(),
  udim_enabled: z.boolean(),
  udim_auto_detect: z.boolean(),
  udim_range_start: z.number().int(),
  udim_range_end: z.number().int(),
})

export type PresetRecord = z.infer<typeof presetRecordSchema>
export type SavePresetInput = z.infer<typeof savePresetSchema>
