// Texture-bake planning engine: channel registry, layout, routing, planning,
// execution and preset encoding.

export const ENGINE_VERSION = '0.1.0'

export {
  ConfigError,
  LayoutError,
  DuplicateOutputError,
  PresetFormatError,
  PresetNotFoundError,
  RenderFailure,
  GraphRestoreError,
  type OutputCollision,
} from './errors'

export {
  createLogger,
  silentLogger,
  stdioSink,
  type Logger,
  type LogEntry,
  type LogFields,
  type LogSink,
  type LoggerOptions,
} from './logger'

export {
  getChannelInfo,
  listChannels,
  isChannelKind,
  channelOrder,
  type ChannelInfo,
} from './channel-registry'

export { resolveColorSpace, colorSpaceOverridesFromGroups } from './color-space'

export {
  sanitizeName,
  formatFileName,
  buildOutputPath,
  resolutionSegment,
  atlasGroupName,
  joinOutputPath,
  type OutputNameParts,
} from './naming'

export {
  atlasGrid,
  packAtlas,
  maxPadding,
  islandBounds,
  boundsOverlap,
  atlasEfficiency,
  uvRemapInstructions,
  type AtlasGrid,
  type AtlasGridSettings,
  type IslandBounds,
} from './atlas-packer'

export {
  udimTile,
  tileIdForUv,
  normalizeToTile,
  detectTiles,
  rangeTiles,
  planTiles,
  FIRST_UDIM_TILE,
  type TilePlan,
} from './udim'

export { planRoute, resolvePrincipledInput, DEFAULT_CUSTOM_OUTPUT } from './shader-routing'

export { withScopes, type Acquire, type Release } from './scope'

export {
  expandResolutions,
  compareResolutions,
  primaryResolution,
  type ResolutionExpansion,
} from './resolutions'

export { validateBakeConfig, assertValidConfig } from './config-validator'

export { planBake, type PlanOptions } from './planner'

export { planMaterialRebuilds } from './rebuild'

export type { RenderEngine, ShaderGraphHost, UvHost, MaterialRebuilder } from './collaborators'

export {
  executePlan,
  type ExecuteOptions,
  type BakeReport,
  type BakeProgress,
  type TargetStatus,
  type TargetFailure,
  type RebuildFailure,
} from './executor'

export { runBake } from './bake'

export {
  encodePreset,
  decodePreset,
  configToRecord,
  recordToConfig,
  migrateRecord,
  PRESET_MIGRATIONS,
  type PresetMigration,
} from './preset-codec'

export {
  PresetLibrary,
  sanitizePresetName,
  MAX_PRESET_NAME_LENGTH,
  type SaveStatus,
} from './preset-library'
