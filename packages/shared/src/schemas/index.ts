export {
  bakeConfigSchema,
  channelKindSchema,
  colorSpaceSchema,
} from './bake-config'

export {
  materialSlotSchema,
  hostObjectSchema,
  hostSelectionSchema,
} from './host'

export {
  presetNameParam,
  savePresetSchema,
  presetPlanSchema,
  presetRecordSchema,
  type PresetRecord,
  type SavePresetInput,
} from './presets'

export {
  planRequestSchema,
  type PlanRequest,
} from './plans'
