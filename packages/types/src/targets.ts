import type { ChannelKind, ColorSpaceName } from './channels'
import type { MixedShaderStrategy, Resolution, ShadowMode } from './config'
import type { MaterialSlot, ShaderClassification } from './host'

// ─── Layout ──────────────────────────────────────────────────────────────────

export type Vec2 = [u: number, v: number]

export interface UdimTile {
  id: number
  row: number
  col: number
  u0: number
  u1: number
  v0: number
  v1: number
}

export interface AtlasPlacement {
  slot: MaterialSlot
  /** Row-major island index. */
  index: number
  row: number
  col: number
  uvOffset: Vec2
  uvScale: Vec2
}

export interface AtlasLayout {
  rows: number
  cols: number
  padding: number
  placements: readonly AtlasPlacement[]
}

/** Scale+offset the host applies to one material's UVs before an atlas bake. */
export interface UvRemapInstruction {
  materialId: string
  slotIndex: number
  uvSet: string
  uvOffset: Vec2
  uvScale: Vec2
}

// ─── Routing ─────────────────────────────────────────────────────────────────

export type SocketReference =
  | { kind: 'surface' }
  | { kind: 'principled-input'; input: string }
  | { kind: 'principled-output' }
  | { kind: 'custom-output'; output: string }

export interface RoutingInstruction {
  materialId: string
  materialName: string
  shaderGraph: string
  socket: SocketReference
  strategy: MixedShaderStrategy
}

export type BakePass = 'emit' | 'roughness' | 'normal' | 'ambient-occlusion' | 'combined'

export type LightingMode = { kind: 'off' } | { kind: 'on'; shadows: ShadowMode }

// ─── Targets ─────────────────────────────────────────────────────────────────

/** One fully resolved unit of work producing exactly one image. */
export interface BakeTarget {
  key: string
  objectId: string
  objectName: string
  /** More than one only for atlas targets. */
  slots: readonly MaterialSlot[]
  atlas: AtlasLayout | null
  /** Material name, or the atlas group name. */
  groupName: string
  channel: ChannelKind
  resolution: Resolution
  tile: UdimTile | null
  colorSpace: ColorSpaceName
  /** Relative to the plan's output directory. */
  outputPath: string
  routing: readonly RoutingInstruction[]
  uvRemap: readonly UvRemapInstruction[]
  lighting: LightingMode
  pass: BakePass
  margin: number
  alpha: boolean
}

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface SkippedTargetWarning {
  kind: 'skipped-target'
  objectId: string
  materialId: string
  materialName: string
  channel: ChannelKind
  strategy: MixedShaderStrategy
  classification: ShaderClassification
  message: string
}

export interface UdimFallbackWarning {
  kind: 'udim-fallback'
  objectId: string
  message: string
}

export interface ResolutionFallbackWarning {
  kind: 'resolution-fallback'
  resolution: Resolution
  message: string
}

export type PlanWarning = SkippedTargetWarning | UdimFallbackWarning | ResolutionFallbackWarning

// ─── Material Rebuild ────────────────────────────────────────────────────────

export type RebuildConnection = 'direct' | 'ao-multiply' | 'normal-map' | 'displacement' | 'none'

export interface RebuildLink {
  targetKey: string
  channel: ChannelKind
  imagePath: string
  colorSpace: ColorSpaceName
  connection: RebuildConnection
  /** Principled input the image feeds, null when it is not linked to one. */
  input: string | null
}

/** Node tree to build on a material from its baked images. */
export interface MaterialRebuild {
  objectId: string
  materialId: string
  materialName: string
  shaderGraph: string
  resolution: Resolution
  tile: number | null
  links: readonly RebuildLink[]
}

// ─── Plan ────────────────────────────────────────────────────────────────────

export interface ObjectAtlas {
  objectId: string
  layout: AtlasLayout
}

export interface ObjectTiles {
  objectId: string
  tiles: readonly number[]
}

export interface BakePlan {
  outputDirectory: string
  resolutions: readonly Resolution[]
  targets: readonly BakeTarget[]
  warnings: readonly PlanWarning[]
  atlasLayouts: readonly ObjectAtlas[]
  udimTiles: readonly ObjectTiles[]
  rebuilds: readonly MaterialRebuild[]
}
