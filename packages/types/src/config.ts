import type { ChannelKind, ColorSpaceName } from './channels'

// ─── Resolutions ─────────────────────────────────────────────────────────────

export type StandardResolution = 512 | 1024 | 2048 | 4096 | 8192

export const STANDARD_RESOLUTIONS = [512, 1024, 2048, 4096, 8192] as const satisfies readonly StandardResolution[]

export const MIN_RESOLUTION = 16
export const MAX_RESOLUTION = 16384

export interface Resolution {
  width: number
  height: number
}

/** One of the three user-defined resolution slots. */
export interface CustomResolutionSlot {
  enabled: boolean
  width: number
  height: number
}

export type CustomResolutionSlots = readonly [CustomResolutionSlot, CustomResolutionSlot, CustomResolutionSlot]

export interface ResolutionSettings {
  /** Square size used when multi-resolution is off, or nothing is selected. */
  base: number
  multiResolution: boolean
  standard: readonly StandardResolution[]
  customEnabled: boolean
  custom: CustomResolutionSlots
}

// ─── Policies ────────────────────────────────────────────────────────────────

export type ColorSpaceMode = 'auto' | 'custom' | 'manual'

export interface ColorSpacePolicy {
  mode: ColorSpaceMode
  /** Consulted only in `custom` mode. */
  overrides: Partial<Record<ChannelKind, ColorSpaceName>>
  /** Applied to every channel in `manual` mode. */
  manualOverride: ColorSpaceName
}

export type NamingMode = 'standard' | 'mari' | 'mudbox'

export interface FolderOrganization {
  byObject: boolean
  byMaterial: boolean
  byResolution: boolean
}

export interface NamingScheme {
  mode: NamingMode
  folders: FolderOrganization
}

export type MixedShaderStrategy = 'full-surface' | 'principled-only' | 'custom-only'

export type ShadowMode = 'with-shadows' | 'no-shadows'

export interface LightingSettings {
  includeLighting: boolean
  /** Inert while `includeLighting` is false. */
  shadowMode: ShadowMode
}

export type AtlasLayoutMode = 'auto' | 'manual'

/** Largest manual atlas grid dimension. */
export const MAX_ATLAS_GRID = 8

export interface AtlasSettings {
  enabled: boolean
  layoutMode: AtlasLayoutMode
  rows: number
  cols: number
  /** UV-space gap around each island, 0 ≤ padding < 0.5. */
  padding: number
  updateUv: boolean
}

export interface UdimSettings {
  enabled: boolean
  autoDetect: boolean
  rangeStart: number
  rangeEnd: number
}

// ─── Configuration Snapshot ──────────────────────────────────────────────────

/** Immutable configuration handed to one planning run. */
export interface BakeConfig {
  outputDirectory: string
  /** Bake margin in pixels. */
  margin: number
  resolutions: ResolutionSettings
  channels: readonly ChannelKind[]
  lighting: LightingSettings
  colorSpace: ColorSpacePolicy
  naming: NamingScheme
  mixedShaderStrategy: MixedShaderStrategy
  atlas: AtlasSettings
  udim: UdimSettings
  /** Rebuild each material's node tree from the baked images afterwards. */
  replaceNodes: boolean
}
