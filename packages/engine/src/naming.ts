import type { ChannelKind, NamingMode, NamingScheme, Resolution } from '@texbake/types'
import { getChannelInfo } from './channel-registry'

// ─── Sanitizing ──────────────────────────────────────────────────────────────

const UNSAFE_CHARS = /[^A-Za-z0-9_.-]/g

/**
 * Make a host name safe for one path segment.
 * Names made only of dots would escape the folder, so they become underscores.
 */
export function sanitizeName(name: string): string {
  const safe = name.replace(UNSAFE_CHARS, '_')
  if (safe.length === 0) return '_'
  if (/^\.+$/.test(safe)) return '_'.repeat(safe.length)
  return safe
}

// ─── Templates ───────────────────────────────────────────────────────────────

export interface OutputNameParts {
  objectName: string
  /** Material name, or the atlas group name. */
  materialName: string
  channel: ChannelKind
  resolution: Resolution
  tile: number | null
}

/** File name for a material/channel/tile under a naming mode. */
export function formatFileName(mode: NamingMode, material: string, channelToken: string, tile: number | null): string {
  if (tile === null) {
    return mode === 'mari' ? `${material}_${channelToken}.png` : `${material}.${channelToken}.png`
  }
  switch (mode) {
    case 'standard':
      return `${material}.${tile}.${channelToken}.png`
    case 'mari':
      return `${material}_${tile}_${channelToken}.png`
    case 'mudbox':
      return `${material}.${channelToken}.${tile}.png`
  }
}

export function resolutionSegment(resolution: Resolution): string {
  return `${resolution.width}x${resolution.height}`
}

/**
 * Relative output path: optional object/material/resolution folders,
 * outermost first, then the file name.
 */
export function buildOutputPath(parts: OutputNameParts, scheme: NamingScheme): string {
  const object = sanitizeName(parts.objectName)
  const material = sanitizeName(parts.materialName)
  const token = getChannelInfo(parts.channel).token

  const segments: string[] = []
  if (scheme.folders.byObject) segments.push(object)
  if (scheme.folders.byMaterial) segments.push(material)
  if (scheme.folders.byResolution) segments.push(resolutionSegment(parts.resolution))
  segments.push(formatFileName(scheme.mode, material, token, parts.tile))
  return segments.join('/')
}

/** Name of the merged texture set for an object's atlas. */
export function atlasGroupName(objectName: string): string {
  return `${objectName}_Atlas`
}

/** Join the plan's output directory and a relative target path. */
export function joinOutputPath(outputDirectory: string, relativePath: string): string {
  const dir = outputDirectory.replace(/\/+$/, '')
  return dir.length === 0 ? relativePath : `${dir}/${relativePath}`
}
