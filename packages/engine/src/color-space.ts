import type { ChannelKind, ColorGroup, ColorSpaceName, ColorSpacePolicy } from '@texbake/types'
import { getChannelInfo, listChannels } from './channel-registry'

/**
 * Final colour space for a channel.
 * Precedence: manual override > custom per-channel override > registry default.
 * Unregistered kinds throw ConfigError in every mode.
 */
export function resolveColorSpace(channel: ChannelKind | string, policy: ColorSpacePolicy): ColorSpaceName {
  const info = getChannelInfo(channel)
  if (policy.mode === 'manual') return policy.manualOverride
  if (policy.mode === 'custom') {
    const override = policy.overrides[info.kind]
    if (override !== undefined) return override
  }
  return info.defaultColorSpace
}

/**
 * Expand group-level settings (colour, normal, data, emission) into
 * per-channel overrides for a `custom` policy.
 */
export function colorSpaceOverridesFromGroups(
  groups: Partial<Record<ColorGroup, ColorSpaceName>>,
): Partial<Record<ChannelKind, ColorSpaceName>> {
  const overrides: Partial<Record<ChannelKind, ColorSpaceName>> = {}
  for (const info of listChannels()) {
    const space = groups[info.colorGroup]
    if (space !== undefined) overrides[info.kind] = space
  }
  return overrides
}
