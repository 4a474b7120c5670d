import { describe, it, expect } from 'vitest'
import { DEFAULT_BAKE_CONFIG } from '@texbake/config'
import type { BakeConfig } from '@texbake/types'
import { encodePreset, decodePreset, configToRecord, migrateRecord } from '../preset-codec'
import { PresetFormatError } from '../errors'

// ─── Helpers ────────────────────────────────────────────────────────────────

const CUSTOM: BakeConfig = {
  ...DEFAULT_BAKE_CONFIG,
  outputDirectory: '//textures/baked',
  channels: ['Normal', 'BaseColor', 'AmbientOcclusion'],
  lighting: { includeLighting: true, shadowMode: 'no-shadows' },
  colorSpace: { mode: 'custom', overrides: { Normal: 'Raw', BaseColor: 'ACEScg' }, manualOverride: 'Linear sRGB' },
  naming: { mode: 'mudbox', folders: { byObject: false, byMaterial: true, byResolution: true } },
  mixedShaderStrategy: 'principled-only',
  atlas: { enabled: true, layoutMode: 'manual', rows: 3, cols: 2, padding: 0.03, updateUv: false },
  udim: { enabled: true, autoDetect: false, rangeStart: 1001, rangeEnd: 1004 },
  replaceNodes: true,
}

function recordText(fields: Record<string, unknown>): string {
  return JSON.stringify(fields)
}

function v1Record(): Record<string, unknown> {
  const full: Record<string, unknown> = { ...configToRecord('Legacy', CUSTOM), schema_version: 1 }
  for (const key of Object.keys(full)) {
    if (key.startsWith('colorspace_') || key.startsWith('atlas_') || key.startsWith('udim_')) delete full[key]
  }
  delete full['mixed_shader_strategy']
  delete full['naming_mode']
  return full
}

function expectFormatError(text: string, message: string): void {
  try {
    decodePreset(text, 'Broken')
    expect.unreachable()
  } catch (e) {
    expect(e).toBeInstanceOf(PresetFormatError)
    expect(e instanceof Error && e.message).toBe(message)
  }
}

// ─── Encoding ───────────────────────────────────────────────────────────────

describe('encodePreset', () => {
  it('writes a flat snake_case record', () => {
    const record = JSON.parse(encodePreset('Game Ready', CUSTOM))
    expect(record).toMatchObject({
      name: 'Game Ready',
      schema_version: 3,
      output_directory: '//textures/baked',
      lighting_shadow_mode: 'NO_SHADOWS',
      colorspace_mode: 'CUSTOM',
      naming_mode: 'MUDBOX',
      mixed_shader_strategy: 'PRINCIPLED_ONLY',
      atlas_layout_mode: 'MANUAL',
      udim_range_end: 1004,
    })
  })

  it('sorts colour space overrides by channel order', () => {
    const text = encodePreset('Game Ready', CUSTOM)
    expect(text.indexOf('"BaseColor": "ACEScg"')).toBeLessThan(text.indexOf('"Normal": "Raw"'))
  })

  it('ends with a newline', () => {
    expect(encodePreset('x', DEFAULT_BAKE_CONFIG).endsWith('}\n')).toBe(true)
  })
})

// ─── Decoding ───────────────────────────────────────────────────────────────

describe('decodePreset', () => {
  it('round-trips to a byte-identical encoding', () => {
    const first = encodePreset('Game Ready', CUSTOM)
    const decoded = decodePreset(first)
    expect(encodePreset(decoded.name, decoded.config)).toBe(first)
  })

  it('round-trips custom slots whatever their key order', () => {
    const config: BakeConfig = {
      ...DEFAULT_BAKE_CONFIG,
      resolutions: {
        ...DEFAULT_BAKE_CONFIG.resolutions,
        custom: [
          { width: 100, height: 200, enabled: true },
          { height: 1080, enabled: false, width: 1920 },
          { width: 1280, enabled: true, height: 720 },
        ],
      },
    }
    const first = encodePreset('Slots', config)
    const decoded = decodePreset(first)
    expect(encodePreset(decoded.name, decoded.config)).toBe(first)
    expect(first).toContain('{\n      "enabled": true,\n      "width": 100,\n      "height": 200\n    }')
  })

  it('restores every configuration field', () => {
    const decoded = decodePreset(encodePreset('Game Ready', CUSTOM))
    expect(decoded.name).toBe('Game Ready')
    expect(decoded.schemaVersion).toBe(3)
    expect(decoded.config).toEqual({
      ...CUSTOM,
      colorSpace: { ...CUSTOM.colorSpace, overrides: { BaseColor: 'ACEScg', Normal: 'Raw' } },
    })
  })

  it('fills defaults for fields a v1 record lacks', () => {
    const decoded = decodePreset(recordText(v1Record()))
    expect(decoded.schemaVersion).toBe(1)
    expect(decoded.config.channels).toEqual(CUSTOM.channels)
    expect(decoded.config.lighting).toEqual(CUSTOM.lighting)
    expect(decoded.config.colorSpace).toEqual(DEFAULT_BAKE_CONFIG.colorSpace)
    expect(decoded.config.mixedShaderStrategy).toBe('full-surface')
    expect(decoded.config.atlas).toEqual(DEFAULT_BAKE_CONFIG.atlas)
    expect(decoded.config.udim).toEqual(DEFAULT_BAKE_CONFIG.udim)
    expect(decoded.config.naming.mode).toBe('standard')
  })

  it('keeps fields a v2 record already has', () => {
    const record = {
      ...v1Record(),
      schema_version: 2,
      mixed_shader_strategy: 'CUSTOM_ONLY',
      colorspace_mode: 'MANUAL',
      colorspace_overrides: {},
      colorspace_manual_override: 'Raw',
    }
    const decoded = decodePreset(recordText(record))
    expect(decoded.config.colorSpace).toEqual({ mode: 'manual', overrides: {}, manualOverride: 'Raw' })
    expect(decoded.config.mixedShaderStrategy).toBe('custom-only')
    expect(decoded.config.atlas).toEqual(DEFAULT_BAKE_CONFIG.atlas)
  })

  it('rejects malformed JSON', () => {
    expectFormatError('{"name": ', 'Preset "Broken": Record is not valid JSON')
  })

  it('rejects non-object JSON', () => {
    expectFormatError('[1, 2]', 'Preset "Broken": Record must be a JSON object')
  })

  it('rejects a missing schema version', () => {
    expectFormatError('{"name": "x"}', 'Preset "Broken": Missing or invalid schema_version')
  })

  it('rejects a newer schema version', () => {
    const record = { ...configToRecord('Future', CUSTOM), schema_version: 4 }
    expectFormatError(recordText(record), 'Preset "Broken": Unsupported schema version 4')
  })

  it('rejects an unrecognised colour space mode, naming the preset', () => {
    const record = { ...configToRecord('Odd', CUSTOM), colorspace_mode: 'FILMIC' }
    expectFormatError(
      recordText(record),
      'Preset "Broken": colorspace_mode: Invalid enum value. Expected \'AUTO\' | \'CUSTOM\' | \'MANUAL\', received \'FILMIC\'',
    )
  })

  it('rejects an atlas grid wider than the record allows', () => {
    const record = { ...configToRecord('Wide', CUSTOM), atlas_cols: 10 }
    expectFormatError(recordText(record), 'Preset "Broken": atlas_cols: Number must be less than or equal to 8')
  })

  it('names the offending field', () => {
    const record = { ...configToRecord('Odd', CUSTOM), margin: 'wide' }
    expect(() => decodePreset(recordText(record))).toThrow('margin: Expected number, received string')
  })
})

describe('migrateRecord', () => {
  it('does not overwrite fields that are present', () => {
    const migrated = migrateRecord({ name: 'x', schema_version: 2, naming_mode: 'MARI' }, 2)
    expect(migrated['naming_mode']).toBe('MARI')
    expect(migrated['schema_version']).toBe(3)
    expect(migrated['atlas_padding']).toBe(0.02)
  })
})
