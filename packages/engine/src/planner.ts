/**
 * Bake job planner.
 *
 * Expands a configuration and a host selection into the ordered list of
 * bake targets: object → material (or atlas group) → channel → resolution
 * → tile. Planning is pure and synchronous; any ConfigError, LayoutError or
 * DuplicateOutputError is thrown before a single target is returned.
 */

import type {
  AtlasLayout,
  BakeConfig,
  BakePlan,
  BakeTarget,
  ChannelKind,
  HostObject,
  HostSelection,
  LightingMode,
  MaterialSlot,
  ObjectAtlas,
  ObjectTiles,
  PlanWarning,
  Resolution,
  RoutingInstruction,
  UdimTile,
  UvRemapInstruction,
} from '@texbake/types'
import { packAtlas, uvRemapInstructions } from './atlas-packer'
import { channelOrder, getChannelInfo } from './channel-registry'
import { resolveColorSpace } from './color-space'
import { assertValidConfig } from './config-validator'
import { ConfigError, DuplicateOutputError, type OutputCollision } from './errors'
import { silentLogger, type Logger } from './logger'
import { atlasGroupName, buildOutputPath, resolutionSegment } from './naming'
import { planMaterialRebuilds } from './rebuild'
import { expandResolutions } from './resolutions'
import { planRoute } from './shader-routing'
import { planTiles } from './udim'

export interface PlanOptions {
  logger?: Logger
}

// ─── Ordering ────────────────────────────────────────────────────────────────

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

function sortObjects(objects: readonly HostObject[]): HostObject[] {
  return [...objects].sort((a, b) => compareText(a.name, b.name) || compareText(a.id, b.id))
}

/** Slots by index, one per material; later slots reusing a material are dropped. */
function uniqueSlots(slots: readonly MaterialSlot[]): MaterialSlot[] {
  const seen = new Set<string>()
  const result: MaterialSlot[] = []
  for (const slot of [...slots].sort((a, b) => a.slotIndex - b.slotIndex)) {
    if (seen.has(slot.materialId)) continue
    seen.add(slot.materialId)
    result.push(slot)
  }
  return result
}

function sortChannels(channels: readonly ChannelKind[]): ChannelKind[] {
  return [...channels].sort((a, b) => channelOrder(a) - channelOrder(b))
}

// ─── Groups ──────────────────────────────────────────────────────────────────

/** One output texture set on one object: a single material or an atlas. */
interface TextureGroup {
  id: string
  name: string
  slots: MaterialSlot[]
  atlas: AtlasLayout | null
  uvRemap: UvRemapInstruction[]
}

function textureGroups(object: HostObject, slots: MaterialSlot[], config: BakeConfig): TextureGroup[] {
  if (!config.atlas.enabled) {
    return slots.map((slot) => ({ id: slot.materialId, name: slot.materialName, slots: [slot], atlas: null, uvRemap: [] }))
  }
  const layout = packAtlas(slots, config.atlas)
  return [{
    id: 'atlas',
    name: atlasGroupName(object.name),
    slots,
    atlas: layout,
    uvRemap: config.atlas.updateUv ? uvRemapInstructions(layout) : [],
  }]
}

function lightingFor(channel: ChannelKind, config: BakeConfig): LightingMode {
  if (getChannelInfo(channel).requiresLighting && config.lighting.includeLighting) {
    return { kind: 'on', shadows: config.lighting.shadowMode }
  }
  return { kind: 'off' }
}

function targetKey(objectId: string, groupId: string, channel: ChannelKind, resolution: Resolution, tile: UdimTile | null): string {
  return [objectId, groupId, channel, resolutionSegment(resolution), tile === null ? 'none' : String(tile.id)].join('|')
}

function findCollisions(targets: readonly BakeTarget[]): OutputCollision[] {
  const byPath = new Map<string, string[]>()
  for (const t of targets) {
    const keys = byPath.get(t.outputPath)
    if (keys === undefined) {
      byPath.set(t.outputPath, [t.key])
    } else {
      keys.push(t.key)
    }
  }
  const collisions: OutputCollision[] = []
  for (const [path, targetKeys] of byPath) {
    if (targetKeys.length > 1) collisions.push({ path, targetKeys })
  }
  return collisions
}

// ─── Planner ─────────────────────────────────────────────────────────────────

export function planBake(config: BakeConfig, selection: HostSelection, options: PlanOptions = {}): BakePlan {
  const logger = options.logger ?? silentLogger
  assertValidConfig(config)

  const objects = sortObjects(selection.objects)
  if (objects.length === 0) {
    throw new ConfigError('No objects selected', 'EMPTY_SELECTION', 'selection')
  }
  logger.info('plan_started', { objects: objects.length, channels: config.channels.length })

  const warnings: PlanWarning[] = []
  const expansion = expandResolutions(config.resolutions)
  const resolutions = expansion.resolutions
  if (expansion.fallback) {
    const [base] = resolutions
    if (base !== undefined) {
      const message = `No resolution selected; using base resolution ${resolutionSegment(base)}`
      warnings.push({ kind: 'resolution-fallback', resolution: base, message })
      logger.warn('resolution_fallback', { resolution: resolutionSegment(base) })
    }
  }

  const channels = sortChannels(config.channels)
  const targets: BakeTarget[] = []
  const atlasLayouts: ObjectAtlas[] = []
  const udimTiles: ObjectTiles[] = []

  for (const object of objects) {
    const slots = uniqueSlots(object.slots)
    if (slots.length === 0) {
      logger.debug('object_without_materials', { objectId: object.id })
      continue
    }

    let tiles: (UdimTile | null)[] = [null]
    if (config.udim.enabled) {
      const tilePlan = planTiles(config.udim, object)
      tiles = tilePlan.tiles
      udimTiles.push({ objectId: object.id, tiles: tilePlan.tiles.map((t) => t.id) })
      if (tilePlan.fallback) {
        warnings.push({
          kind: 'udim-fallback',
          objectId: object.id,
          message: `No UDIM tiles detected on "${object.name}"; baking tile 1001`,
        })
        logger.warn('udim_autodetect_empty', { objectId: object.id })
      }
    }

    for (const group of textureGroups(object, slots, config)) {
      if (group.atlas !== null) atlasLayouts.push({ objectId: object.id, layout: group.atlas })

      for (const channel of channels) {
        const routing: RoutingInstruction[] = []
        for (const slot of group.slots) {
          const route = planRoute(object.id, slot, channel, config.mixedShaderStrategy)
          if (route.ok) {
            routing.push(route.value)
          } else {
            warnings.push(route.error)
            logger.warn('target_skipped', {
              objectId: object.id,
              materialId: slot.materialId,
              channel,
              strategy: config.mixedShaderStrategy,
            })
          }
        }
        if (routing.length === 0) continue

        const info = getChannelInfo(channel)
        const colorSpace = resolveColorSpace(channel, config.colorSpace)
        const lighting = lightingFor(channel, config)
        const routedSlots = group.slots.filter((s) => routing.some((r) => r.materialId === s.materialId))

        for (const resolution of resolutions) {
          for (const tile of tiles) {
            targets.push({
              key: targetKey(object.id, group.id, channel, resolution, tile),
              objectId: object.id,
              objectName: object.name,
              slots: routedSlots,
              atlas: group.atlas,
              groupName: group.name,
              channel,
              resolution,
              tile,
              colorSpace,
              outputPath: buildOutputPath({
                objectName: object.name,
                materialName: group.name,
                channel,
                resolution,
                tile: tile === null ? null : tile.id,
              }, config.naming),
              routing,
              uvRemap: group.uvRemap,
              lighting,
              pass: lighting.kind === 'on' ? 'combined' : info.pass,
              margin: config.margin,
              alpha: info.alpha,
            })
          }
        }
      }
    }
  }

  const collisions = findCollisions(targets)
  if (collisions.length > 0) {
    logger.error('duplicate_output_paths', { collisions: collisions.length, first: collisions[0]?.path })
    throw new DuplicateOutputError(collisions)
  }

  const rebuilds = config.replaceNodes ? planMaterialRebuilds(targets, resolutions, config.outputDirectory) : []

  logger.info('plan_completed', {
    targets: targets.length,
    warnings: warnings.length,
    resolutions: resolutions.length,
    rebuilds: rebuilds.length,
  })

  return {
    outputDirectory: config.outputDirectory,
    resolutions,
    targets,
    warnings,
    atlasLayouts,
    udimTiles,
    rebuilds,
  }
}
