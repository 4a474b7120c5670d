/**
 * Material rebuild planning for node replacement: after baking, each
 * material's tree is rebuilt around its baked images at the largest
 * resolution and first tile. Atlas targets are never rebuilt.
 */

import type { BakeTarget, ChannelKind, MaterialRebuild, RebuildConnection, RebuildLink, Resolution } from '@texbake/types'
import { joinOutputPath } from './naming'
import { primaryResolution } from './resolutions'
import { resolvePrincipledInput } from './shader-routing'

function sameResolution(a: Resolution, b: Resolution): boolean {
  return a.width === b.width && a.height === b.height
}

function connectionFor(channel: ChannelKind, baked: ReadonlySet<ChannelKind>): RebuildConnection {
  switch (channel) {
    case 'BaseColor':
      return baked.has('AmbientOcclusion') ? 'ao-multiply' : 'direct'
    case 'AmbientOcclusion':
      return baked.has('BaseColor') ? 'ao-multiply' : 'none'
    case 'Normal':
      return 'normal-map'
    case 'Displacement':
      return 'displacement'
    case 'CustomShader':
      return 'none'
    default:
      return 'direct'
  }
}

export function planMaterialRebuilds(
  targets: readonly BakeTarget[],
  resolutions: readonly Resolution[],
  outputDirectory: string,
): MaterialRebuild[] {
  const primary = primaryResolution(resolutions)
  if (primary === undefined) return []

  // Candidates grouped per (object, material), insertion-ordered.
  const groups = new Map<string, BakeTarget[]>()
  for (const target of targets) {
    const slot = target.slots[0]
    if (target.atlas !== null || slot === undefined) continue
    if (!sameResolution(target.resolution, primary)) continue
    const id = `${target.objectId}|${slot.materialId}`
    const list = groups.get(id)
    if (list === undefined) {
      groups.set(id, [target])
    } else {
      list.push(target)
    }
  }

  const rebuilds: MaterialRebuild[] = []
  for (const group of groups.values()) {
    const first = group[0]
    const slot = first?.slots[0]
    if (first === undefined || slot === undefined) continue

    let tile: number | null = null
    for (const t of group) {
      if (t.tile !== null && (tile === null || t.tile.id < tile)) tile = t.tile.id
    }
    const chosen = group.filter((t) => (t.tile === null ? null : t.tile.id) === tile)
    const baked = new Set(chosen.map((t) => t.channel))

    const links: RebuildLink[] = chosen.map((t) => {
      const connection = connectionFor(t.channel, baked)
      const linksPrincipled = t.channel === 'BaseColor' || connection === 'direct' || connection === 'normal-map'
      return {
        targetKey: t.key,
        channel: t.channel,
        imagePath: joinOutputPath(outputDirectory, t.outputPath),
        colorSpace: t.colorSpace,
        connection,
        input: linksPrincipled ? resolvePrincipledInput(t.channel, slot.principledInputs) : null,
      }
    })

    rebuilds.push({
      objectId: first.objectId,
      materialId: slot.materialId,
      materialName: slot.materialName,
      shaderGraph: slot.shaderGraph,
      resolution: primary,
      tile,
      links,
    })
  }
  return rebuilds
}
