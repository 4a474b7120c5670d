/**
 * Preset codec: configuration ⇄ durable JSON record.
 *
 * Records are flat snake_case objects tagged with `schema_version`. Older
 * records are brought forward by additive migrations that only fill in
 * fields the older version did not have; nothing is ever reinterpreted.
 */

import { DEFAULT_BAKE_CONFIG } from '@texbake/config'
import { presetRecordSchema, type PresetRecord } from '@texbake/shared'
import {
  CURRENT_PRESET_SCHEMA_VERSION,
  MIN_PRESET_SCHEMA_VERSION,
  type AtlasLayoutMode,
  type BakeConfig,
  type ChannelKind,
  type ColorSpaceMode,
  type ColorSpaceName,
  type CustomResolutionSlot,
  type MixedShaderStrategy,
  type NamingMode,
  type Preset,
  type ShadowMode,
} from '@texbake/types'
import { channelOrder, isChannelKind } from './channel-registry'
import { PresetFormatError } from './errors'

// ─── Enum Tables ─────────────────────────────────────────────────────────────

const COLORSPACE_MODES = { auto: 'AUTO', custom: 'CUSTOM', manual: 'MANUAL' } as const satisfies Record<ColorSpaceMode, string>
const SHADOW_MODES = { 'with-shadows': 'WITH_SHADOWS', 'no-shadows': 'NO_SHADOWS' } as const satisfies Record<ShadowMode, string>
const NAMING_MODES = { standard: 'STANDARD', mari: 'MARI', mudbox: 'MUDBOX' } as const satisfies Record<NamingMode, string>
const STRATEGIES = {
  'full-surface': 'SURFACE_OUTPUT',
  'principled-only': 'PRINCIPLED_ONLY',
  'custom-only': 'CUSTOM_ONLY',
} as const satisfies Record<MixedShaderStrategy, string>
const LAYOUT_MODES = { auto: 'AUTO', manual: 'MANUAL' } as const satisfies Record<AtlasLayoutMode, string>

// Reverse tables are total over the record enums, which zod has already checked.
const COLORSPACE_MODES_BY_RECORD = { AUTO: 'auto', CUSTOM: 'custom', MANUAL: 'manual' } as const satisfies
  Record<(typeof COLORSPACE_MODES)[ColorSpaceMode], ColorSpaceMode>
const SHADOW_MODES_BY_RECORD = { WITH_SHADOWS: 'with-shadows', NO_SHADOWS: 'no-shadows' } as const satisfies
  Record<(typeof SHADOW_MODES)[ShadowMode], ShadowMode>
const NAMING_MODES_BY_RECORD = { STANDARD: 'standard', MARI: 'mari', MUDBOX: 'mudbox' } as const satisfies
  Record<(typeof NAMING_MODES)[NamingMode], NamingMode>
const STRATEGIES_BY_RECORD = {
  SURFACE_OUTPUT: 'full-surface',
  PRINCIPLED_ONLY: 'principled-only',
  CUSTOM_ONLY: 'custom-only',
} as const satisfies Record<(typeof STRATEGIES)[MixedShaderStrategy], MixedShaderStrategy>
const LAYOUT_MODES_BY_RECORD = { AUTO: 'auto', MANUAL: 'manual' } as const satisfies
  Record<(typeof LAYOUT_MODES)[AtlasLayoutMode], AtlasLayoutMode>

// ─── Config ⇄ Record ─────────────────────────────────────────────────────────

function sortedOverrides(overrides: Partial<Record<ChannelKind, ColorSpaceName>>): Partial<Record<ChannelKind, ColorSpaceName>> {
  const sorted: Partial<Record<ChannelKind, ColorSpaceName>> = {}
  const kinds = Object.keys(overrides).filter(isChannelKind)
  for (const kind of kinds.sort((a, b) => channelOrder(a) - channelOrder(b))) {
    const space = overrides[kind]
    if (space !== undefined) sorted[kind] = space
  }
  return sorted
}

/** Slot keys in record order, whatever order the caller built them in. */
function slotRecord(slot: CustomResolutionSlot): CustomResolutionSlot {
  return { enabled: slot.enabled, width: slot.width, height: slot.height }
}

export function configToRecord(name: string, config: BakeConfig): PresetRecord {
  const [c1, c2, c3] = config.resolutions.custom
  return {
    name,
    schema_version: CURRENT_PRESET_SCHEMA_VERSION,
    output_directory: config.outputDirectory,
    margin: config.margin,
    resolution: config.resolutions.base,
    multi_resolution: config.resolutions.multiResolution,
    standard_resolutions: [...config.resolutions.standard],
    custom_resolutions_enabled: config.resolutions.customEnabled,
    custom_resolutions: [slotRecord(c1), slotRecord(c2), slotRecord(c3)],
    channels: [...config.channels],
    include_lighting: config.lighting.includeLighting,
    lighting_shadow_mode: SHADOW_MODES[config.lighting.shadowMode],
    folder_by_object: config.naming.folders.byObject,
    folder_by_material: config.naming.folders.byMaterial,
    folder_by_resolution: config.naming.folders.byResolution,
    replace_nodes: config.replaceNodes,
    mixed_shader_strategy: STRATEGIES[config.mixedShaderStrategy],
    colorspace_mode: COLORSPACE_MODES[config.colorSpace.mode],
    colorspace_overrides: sortedOverrides(config.colorSpace.overrides),
    colorspace_manual_override: config.colorSpace.manualOverride,
    naming_mode: NAMING_MODES[config.naming.mode],
    atlas_enabled: config.atlas.enabled,
    atlas_layout_mode: LAYOUT_MODES[config.atlas.layoutMode],
    atlas_rows: config.atlas.rows,
    atlas_cols: config.atlas.cols,
    atlas_padding: config.atlas.padding,
    atlas_update_uv: config.atlas.updateUv,
    udim_enabled: config.udim.enabled,
    udim_auto_detect: config.udim.autoDetect,
    udim_range_start: config.udim.rangeStart,
    udim_range_end: config.udim.rangeEnd,
  }
}

export function recordToConfig(record: PresetRecord): BakeConfig {
  const [c1, c2, c3] = record.custom_resolutions
  return {
    outputDirectory: record.output_directory,
    margin: record.margin,
    resolutions: {
      base: record.resolution,
      multiResolution: record.multi_resolution,
      standard: record.standard_resolutions,
      customEnabled: record.custom_resolutions_enabled,
      custom: [c1, c2, c3],
    },
    channels: record.channels,
    lighting: {
      includeLighting: record.include_lighting,
      shadowMode: SHADOW_MODES_BY_RECORD[record.lighting_shadow_mode],
    },
    colorSpace: {
      mode: COLORSPACE_MODES_BY_RECORD[record.colorspace_mode],
      overrides: record.colorspace_overrides,
      manualOverride: record.colorspace_manual_override,
    },
    naming: {
      mode: NAMING_MODES_BY_RECORD[record.naming_mode],
      folders: {
        byObject: record.folder_by_object,
        byMaterial: record.folder_by_material,
        byResolution: record.folder_by_resolution,
      },
    },
    mixedShaderStrategy: STRATEGIES_BY_RECORD[record.mixed_shader_strategy],
    atlas: {
      enabled: record.atlas_enabled,
      layoutMode: LAYOUT_MODES_BY_RECORD[record.atlas_layout_mode],
      rows: record.atlas_rows,
      cols: record.atlas_cols,
      padding: record.atlas_padding,
      updateUv: record.atlas_update_uv,
    },
    udim: {
      enabled: record.udim_enabled,
      autoDetect: record.udim_auto_detect,
      rangeStart: record.udim_range_start,
      rangeEnd: record.udim_range_end,
    },
    replaceNodes: record.replace_nodes,
  }
}

// ─── Migrations ──────────────────────────────────────────────────────────────

type RawRecord = Record<string, unknown>

export interface PresetMigration {
  fromVersion: number
  toVersion: number
  /** Fields introduced by `toVersion`; filled from defaults when absent. */
  addedFields: readonly (keyof PresetRecord)[]
}

export const PRESET_MIGRATIONS: readonly PresetMigration[] = [
  {
    fromVersion: 1,
    toVersion: 2,
    addedFields: ['mixed_shader_strategy', 'colorspace_mode', 'colorspace_overrides', 'colorspace_manual_override'],
  },
  {
    fromVersion: 2,
    toVersion: 3,
    addedFields: [
      'naming_mode',
      'atlas_enabled',
      'atlas_layout_mode',
      'atlas_rows',
      'atlas_cols',
      'atlas_padding',
      'atlas_update_uv',
      'udim_enabled',
      'udim_auto_detect',
      'udim_range_start',
      'udim_range_end',
    ],
  },
]

/** Bring a raw record from `version` to the current schema version. */
export function migrateRecord(raw: RawRecord, version: number, presetName?: string): RawRecord {
  const defaults: RawRecord = configToRecord('', DEFAULT_BAKE_CONFIG)
  let current: RawRecord = { ...raw }
  let v = version
  while (v < CURRENT_PRESET_SCHEMA_VERSION) {
    const migration = PRESET_MIGRATIONS.find((m) => m.fromVersion === v)
    if (migration === undefined) {
      throw new PresetFormatError(`No migration from schema version ${v}`, presetName)
    }
    const next: RawRecord = { ...current }
    for (const field of migration.addedFields) {
      if (!(field in next)) next[field] = defaults[field]
    }
    next['schema_version'] = migration.toVersion
    current = next
    v = migration.toVersion
  }
  return current
}

// ─── Encode / Decode ─────────────────────────────────────────────────────────

/** Serialize a named configuration at the current schema version. */
export function encodePreset(name: string, config: BakeConfig): string {
  return JSON.stringify(configToRecord(name, config), null, 2) + '\n'
}

function isRawRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse a stored record, migrating older schema versions.
 * Throws PresetFormatError for malformed JSON, unsupported versions,
 * wrong field types and unrecognised enum values (the last two via zod).
 */
export function decodePreset(text: string, presetName?: string): Preset {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch {
    throw new PresetFormatError('Record is not valid JSON', presetName)
  }
  if (!isRawRecord(parsed)) {
    throw new PresetFormatError('Record must be a JSON object', presetName)
  }

  const version = parsed['schema_version']
  if (typeof version !== 'number' || !Number.isInteger(version)) {
    throw new PresetFormatError('Missing or invalid schema_version', presetName)
  }
  if (version < MIN_PRESET_SCHEMA_VERSION || version > CURRENT_PRESET_SCHEMA_VERSION) {
    throw new PresetFormatError(`Unsupported schema version ${version}`, presetName)
  }

  const migrated = migrateRecord(parsed, version, presetName)
  const result = presetRecordSchema.safeParse(migrated)
  if (!result.success) {
    const issue = result.error.issues[0]
    const detail = issue === undefined ? 'invalid record' : `${issue.path.join('.') || 'record'}: ${issue.message}`
    throw new PresetFormatError(detail, presetName)
  }

  return {
    name: result.data.name,
    schemaVersion: version,
    config: recordToConfig(result.data),
  }
}
