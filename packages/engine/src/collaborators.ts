/**
 * Host-side collaborators the executor drives. The engine never touches
 * graph internals or pixels; it hands these fully resolved instructions.
 */

import type { BakeTarget, MaterialRebuild, RoutingInstruction, UdimTile, UvRemapInstruction } from '@texbake/types'
import type { Release } from './scope'

/** The single shared render device. Called with one target at a time. */
export interface RenderEngine {
  /** Sample the target and write one image at `outputPath`; reject on failure. */
  bake(target: BakeTarget, outputPath: string): Promise<void>
}

export interface ShaderGraphHost {
  /** Temporarily wire the instruction's socket to the bake output. */
  reroute(instruction: RoutingInstruction): Promise<Release>
}

export interface UvHost {
  /** Apply atlas scale+offset to each material's UVs on an object. */
  applyAtlasRemap(objectId: string, remap: readonly UvRemapInstruction[]): Promise<Release>
  /** Shift a tile's UVs into [0,1) for a single-tile bake. */
  normalizeTile(objectId: string, tile: UdimTile): Promise<Release>
}

export interface MaterialRebuilder {
  /** Replace a material's node tree with one built from baked images. */
  applyRebuild(rebuild: MaterialRebuild): Promise<void>
}
