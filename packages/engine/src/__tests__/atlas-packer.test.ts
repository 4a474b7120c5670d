import { describe, it, expect } from 'vitest'
import type { AtlasGridSettings } from '../atlas-packer'
import {
  atlasGrid,
  packAtlas,
  islandBounds,
  boundsOverlap,
  atlasEfficiency,
  uvRemapInstructions,
} from '../atlas-packer'
import { LayoutError } from '../errors'
import { slot } from './helpers'

const AUTO: AtlasGridSettings = { layoutMode: 'auto', rows: 1, cols: 1, padding: 0 }

function slots(n: number) {
  return Array.from({ length: n }, (_, i) => slot(`M${i}`, { slotIndex: i }))
}

describe('atlasGrid', () => {
  it('picks ceil(sqrt(N)) columns in auto mode', () => {
    expect(atlasGrid(1, AUTO)).toEqual({ rows: 1, cols: 1 })
    expect(atlasGrid(2, AUTO)).toEqual({ rows: 1, cols: 2 })
    expect(atlasGrid(3, AUTO)).toEqual({ rows: 2, cols: 2 })
    expect(atlasGrid(5, AUTO)).toEqual({ rows: 2, cols: 3 })
    expect(atlasGrid(10, AUTO)).toEqual({ rows: 3, cols: 4 })
  })

  it('uses the manual grid when it fits', () => {
    expect(atlasGrid(3, { layoutMode: 'manual', rows: 1, cols: 4, padding: 0 })).toEqual({ rows: 1, cols: 4 })
  })

  it('rejects a manual grid that is too small', () => {
    expect(() => atlasGrid(5, { layoutMode: 'manual', rows: 2, cols: 2, padding: 0 })).toThrow(LayoutError)
  })

  it('rejects an empty material list', () => {
    expect(() => atlasGrid(0, AUTO)).toThrow(LayoutError)
  })
})

describe('packAtlas', () => {
  it('places four islands on a 2x2 grid with padding', () => {
    const layout = packAtlas(slots(4), { ...AUTO, padding: 0.1 })
    expect(layout.rows).toBe(2)
    expect(layout.cols).toBe(2)
    const p3 = layout.placements[3]
    expect(p3?.row).toBe(1)
    expect(p3?.col).toBe(1)
    expect(p3?.uvOffset[0]).toBeCloseTo(0.55)
    expect(p3?.uvOffset[1]).toBeCloseTo(0.55)
    expect(p3?.uvScale[0]).toBeCloseTo(0.4)
    expect(p3?.uvScale[1]).toBeCloseTo(0.4)
  })

  it('fills rows before columns', () => {
    const layout = packAtlas(slots(3), AUTO)
    expect(layout.placements.map((p) => [p.row, p.col])).toEqual([[0, 0], [0, 1], [1, 0]])
  })

  it('rejects padding at half a cell', () => {
    expect(() => packAtlas(slots(4), { ...AUTO, padding: 0.25 })).toThrow('padding 0.25 exceeds cell size')
  })

  it('accepts padding just under half a cell', () => {
    expect(() => packAtlas(slots(4), { ...AUTO, padding: 0.24 })).not.toThrow()
  })

  it('rejects negative padding', () => {
    expect(() => packAtlas(slots(2), { ...AUTO, padding: -0.01 })).toThrow(LayoutError)
  })

  it('keeps islands apart and inside the unit square', () => {
    const layout = packAtlas(slots(7), { ...AUTO, padding: 0.05 })
    const boxes = layout.placements.map(islandBounds)
    for (const [i, a] of boxes.entries()) {
      expect(a.uMin).toBeGreaterThan(0)
      expect(a.vMin).toBeGreaterThan(0)
      expect(a.uMax).toBeLessThan(1)
      expect(a.vMax).toBeLessThan(1)
      for (const b of boxes.slice(i + 1)) expect(boundsOverlap(a, b)).toBe(false)
    }
  })

  it('reports the covered area', () => {
    expect(atlasEfficiency(packAtlas(slots(4), AUTO))).toBeCloseTo(1)
    expect(atlasEfficiency(packAtlas(slots(3), AUTO))).toBeCloseTo(0.75)
  })
})

describe('uvRemapInstructions', () => {
  it('emits one transform per material', () => {
    const remap = uvRemapInstructions(packAtlas(slots(2), AUTO))
    expect(remap).toEqual([
      { materialId: 'mat-M0', slotIndex: 0, uvSet: 'UVMap', uvOffset: [0, 0], uvScale: [0.5, 1] },
      { materialId: 'mat-M1', slotIndex: 1, uvSet: 'UVMap', uvOffset: [0.5, 0], uvScale: [0.5, 1] },
    ])
  })
})
