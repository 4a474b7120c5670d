import type { HostObject, UdimSettings, UdimTile, UvCoordinate } from '@texbake/types'
import { ConfigError } from './errors'

export const FIRST_UDIM_TILE = 1001
/** Tiles per UDIM row. */
export const UDIM_ROW_WIDTH = 10

/** Tile id → grid position and UV sub-range. */
export function udimTile(id: number): UdimTile {
  if (!Number.isInteger(id) || id < FIRST_UDIM_TILE) {
    throw new ConfigError(`Invalid UDIM tile ${id}`, 'INVALID_UDIM_TILE', 'udim')
  }
  const offset = id - FIRST_UDIM_TILE
  const row = Math.floor(offset / UDIM_ROW_WIDTH)
  const col = offset % UDIM_ROW_WIDTH
  return { id, row, col, u0: col, u1: col + 1, v0: row, v1: row + 1 }
}

/** Tile containing a UV coordinate, or null outside the 10×10 tile grid. */
export function tileIdForUv(uv: UvCoordinate): number | null {
  if (!(uv.u >= 0 && uv.u < UDIM_ROW_WIDTH && uv.v >= 0 && uv.v < UDIM_ROW_WIDTH)) return null
  return FIRST_UDIM_TILE + Math.floor(uv.u) + UDIM_ROW_WIDTH * Math.floor(uv.v)
}

/** Map a coordinate into the [0,1) space of its tile texture. */
export function normalizeToTile(uv: UvCoordinate, tile: UdimTile): UvCoordinate {
  return { u: uv.u - tile.u0, v: uv.v - tile.v0 }
}

function sortedUnique(ids: Iterable<number>): number[] {
  return [...new Set(ids)].sort((a, b) => a - b)
}

/** Tiles in use by an object: host-reported ids when given, else derived from UVs. */
export function detectTiles(object: Pick<HostObject, 'udimTiles' | 'uvs'>): number[] {
  if (object.udimTiles !== undefined && object.udimTiles.length > 0) {
    for (const id of object.udimTiles) udimTile(id)
    return sortedUnique(object.udimTiles)
  }
  const ids: number[] = []
  for (const uv of object.uvs ?? []) {
    const id = tileIdForUv(uv)
    if (id !== null) ids.push(id)
  }
  return sortedUnique(ids)
}

/** Every tile in [start, end] inclusive. */
export function rangeTiles(start: number, end: number): number[] {
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    throw new ConfigError('UDIM range bounds must be integers', 'INVALID_UDIM_RANGE', 'udim')
  }
  if (start < FIRST_UDIM_TILE || end < FIRST_UDIM_TILE) {
    throw new ConfigError(`UDIM range bounds must be at least ${FIRST_UDIM_TILE}`, 'INVALID_UDIM_RANGE', 'udim')
  }
  if (start > end) {
    throw new ConfigError(`UDIM range start ${start} is after end ${end}`, 'INVALID_UDIM_RANGE', 'udim')
  }
  const ids: number[] = []
  for (let id = start; id <= end; id++) ids.push(id)
  return ids
}

export interface TilePlan {
  tiles: UdimTile[]
  /** Auto-detection found nothing and the first tile was used instead. */
  fallback: boolean
}

/**
 * Tiles to bake for one object. Auto-detection takes precedence over the
 * explicit range, which is then ignored.
 */
export function planTiles(settings: UdimSettings, object: Pick<HostObject, 'udimTiles' | 'uvs'>): TilePlan {
  if (settings.autoDetect) {
    const detected = detectTiles(object)
    if (detected.length === 0) return { tiles: [udimTile(FIRST_UDIM_TILE)], fallback: true }
    return { tiles: detected.map(udimTile), fallback: false }
  }
  return { tiles: rangeTiles(settings.rangeStart, settings.rangeEnd).map(udimTile), fallback: false }
}
