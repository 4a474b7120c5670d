// Shared domain types for the texture-baking planner.

export {
  CHANNEL_KINDS,
  COLOR_SPACES,
  type ChannelKind,
  type ColorSpaceName,
  type ColorGroup,
} from './channels'

export {
  STANDARD_RESOLUTIONS,
  MIN_RESOLUTION,
  MAX_RESOLUTION,
  MAX_ATLAS_GRID,
  type StandardResolution,
  type Resolution,
  type CustomResolutionSlot,
  type CustomResolutionSlots,
  type ResolutionSettings,
  type ColorSpaceMode,
  type ColorSpacePolicy,
  type NamingMode,
  type FolderOrganization,
  type NamingScheme,
  type MixedShaderStrategy,
  type ShadowMode,
  type LightingSettings,
  type AtlasLayoutMode,
  type AtlasSettings,
  type UdimSettings,
  type BakeConfig,
} from './config'

export type {
  ShaderClassification,
  MaterialSlot,
  UvCoordinate,
  HostObject,
  HostSelection,
} from './host'

export type {
  Vec2,
  UdimTile,
  AtlasPlacement,
  AtlasLayout,
  UvRemapInstruction,
  SocketReference,
  RoutingInstruction,
  BakePass,
  LightingMode,
  BakeTarget,
  SkippedTargetWarning,
  UdimFallbackWarning,
  ResolutionFallbackWarning,
  PlanWarning,
  RebuildConnection,
  RebuildLink,
  MaterialRebuild,
  ObjectAtlas,
  ObjectTiles,
  BakePlan,
} from './targets'

export type { Preset, PresetStorage } from './preset'

export { LOG_LEVELS, type ValidationError, type Result, type LogLevel } from './result'

export { CURRENT_PRESET_SCHEMA_VERSION, MIN_PRESET_SCHEMA_VERSION } from './schema-version'
