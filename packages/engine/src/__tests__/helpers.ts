import type { BakeConfig, HostObject, MaterialSlot } from '@texbake/types'
import { DEFAULT_BAKE_CONFIG } from '@texbake/config'

// ─── Builders shared by engine tests ────────────────────────────────────────

export function slot(materialName: string, overrides: Partial<MaterialSlot> = {}): MaterialSlot {
  return {
    slotIndex: 0,
    materialId: `mat-${materialName}`,
    materialName,
    shaderGraph: `graph-${materialName}`,
    uvSet: 'UVMap',
    classification: 'principled-only',
    ...overrides,
  }
}

export function object(name: string, slots: MaterialSlot[], overrides: Partial<HostObject> = {}): HostObject {
  return { id: `obj-${name}`, name, slots, ...overrides }
}

/**
 * Default configuration with one resolution, one channel and no folders,
 * so each test opts into exactly the axes it exercises.
 */
export function config(overrides: Partial<BakeConfig> = {}): BakeConfig {
  return {
    ...DEFAULT_BAKE_CONFIG,
    channels: ['BaseColor'],
    naming: { mode: 'standard', folders: { byObject: false, byMaterial: false, byResolution: false } },
    ...overrides,
  }
}
