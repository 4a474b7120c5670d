/**
 * Atlas packing: merges N material islands into one UV grid.
 *
 * Islands are placed row-major. Each cell is 1/cols × 1/rows; the island
 * inside it is shrunk by `padding` and centred, so padded cells tile the
 * unit square without overlap.
 */

import type { AtlasLayout, AtlasPlacement, AtlasSettings, MaterialSlot, UvRemapInstruction } from '@texbake/types'
import { LayoutError } from './errors'

export type AtlasGridSettings = Pick<AtlasSettings, 'layoutMode' | 'rows' | 'cols' | 'padding'>

export interface AtlasGrid {
  rows: number
  cols: number
}

/** Grid dimensions for `count` islands. */
export function atlasGrid(count: number, settings: AtlasGridSettings): AtlasGrid {
  if (!Number.isInteger(count) || count < 1) {
    throw new LayoutError('Atlas needs at least one material')
  }
  if (settings.layoutMode === 'auto') {
    const cols = Math.ceil(Math.sqrt(count))
    return { rows: Math.ceil(count / cols), cols }
  }

  const { rows, cols } = settings
  if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 1 || cols < 1) {
    throw new LayoutError(`Invalid atlas grid ${rows}x${cols}`)
  }
  if (rows * cols < count) {
    throw new LayoutError(`Atlas grid ${rows}x${cols} cannot hold ${count} materials`)
  }
  return { rows, cols }
}

/** Largest padding accepted for a grid (exclusive). */
export function maxPadding(grid: AtlasGrid): number {
  return 0.5 / Math.max(grid.rows, grid.cols)
}

export function packAtlas(slots: readonly MaterialSlot[], settings: AtlasGridSettings): AtlasLayout {
  const grid = atlasGrid(slots.length, settings)
  const { padding } = settings
  if (!(padding >= 0)) {
    throw new LayoutError(`Atlas padding must be non-negative, got ${padding}`)
  }
  if (padding >= maxPadding(grid)) {
    throw new LayoutError(`Atlas padding ${padding} exceeds cell size`)
  }

  const cellU = 1 / grid.cols
  const cellV = 1 / grid.rows
  const placements: AtlasPlacement[] = slots.map((slot, index) => {
    const col = index % grid.cols
    const row = Math.floor(index / grid.cols)
    return {
      slot,
      index,
      row,
      col,
      uvOffset: [col * cellU + padding / 2, row * cellV + padding / 2],
      uvScale: [cellU - padding, cellV - padding],
    }
  })

  return { rows: grid.rows, cols: grid.cols, padding, placements }
}

// ─── Geometry ────────────────────────────────────────────────────────────────

export interface IslandBounds {
  uMin: number
  vMin: number
  uMax: number
  vMax: number
}

export function islandBounds(placement: AtlasPlacement): IslandBounds {
  const [u, v] = placement.uvOffset
  const [su, sv] = placement.uvScale
  return { uMin: u, vMin: v, uMax: u + su, vMax: v + sv }
}

/** True when the interiors of two boxes intersect; touching edges do not count. */
export function boundsOverlap(a: IslandBounds, b: IslandBounds): boolean {
  return a.uMin < b.uMax && b.uMin < a.uMax && a.vMin < b.vMax && b.vMin < a.vMax
}

/** Fraction of the unit square covered by islands. */
export function atlasEfficiency(layout: AtlasLayout): number {
  let area = 0
  for (const p of layout.placements) area += p.uvScale[0] * p.uvScale[1]
  return area
}

/** Per-material UV transforms the host applies before an atlas bake. */
export function uvRemapInstructions(layout: AtlasLayout): UvRemapInstruction[] {
  return layout.placements.map((p) => ({
    materialId: p.slot.materialId,
    slotIndex: p.slot.slotIndex,
    uvSet: p.slot.uvSet,
    uvOffset: [p.uvOffset[0], p.uvOffset[1]],
    uvScale: [p.uvScale[0], p.uvScale[1]],
  }))
}
