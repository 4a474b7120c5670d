import {
  CHANNEL_KINDS,
  STANDARD_RESOLUTIONS,
  type BakeConfig,
  type ChannelKind,
  type CustomResolutionSlot,
  type CustomResolutionSlots,
  type StandardResolution,
} from '@texbake/types'

// ─── Channel Sets ────────────────────────────────────────────────────────────

export type ChannelSet = 'basic' | 'full' | 'none' | 'custom-shader'

const CHANNEL_SETS: Record<ChannelSet, readonly ChannelKind[]> = {
  basic: ['BaseColor', 'Roughness', 'Metallic', 'Normal'],
  full: CHANNEL_KINDS,
  none: [],
  'custom-shader': ['CustomShader'],
}

/** Replace the channel selection with a named set. */
export function selectChannelSet(config: BakeConfig, set: ChannelSet): BakeConfig {
  return { ...config, channels: [...CHANNEL_SETS[set]] }
}

// ─── Resolution Groups ───────────────────────────────────────────────────────

export type ResolutionGroup = 'game' | 'film' | 'all' | 'none'

const RESOLUTION_GROUPS: Record<ResolutionGroup, readonly StandardResolution[]> = {
  game: [512, 1024, 2048],
  film: [2048, 4096, 8192],
  all: STANDARD_RESOLUTIONS,
  none: [],
}

/** Replace the standard resolution selection with a named group. */
export function selectResolutionGroup(config: BakeConfig, group: ResolutionGroup): BakeConfig {
  return {
    ...config,
    resolutions: { ...config.resolutions, standard: [...RESOLUTION_GROUPS[group]] },
  }
}

// ─── Custom Resolution Shortcuts ─────────────────────────────────────────────

/** Square shortcut sizes and the slot each one always occupies. */
const SQUARE_SHORTCUT_SLOTS: Record<number, 0 | 1 | 2> = {
  1536: 0,
  3072: 1,
  6144: 2,
}

export const RECTANGULAR_SHORTCUTS = [
  [1920, 1080],
  [1280, 720],
  [2560, 1440],
  [3840, 2160],
] as const

function withSlot(slots: CustomResolutionSlots, index: 0 | 1 | 2, slot: CustomResolutionSlot): CustomResolutionSlots {
  return [
    index === 0 ? slot : slots[0],
    index === 1 ? slot : slots[1],
    index === 2 ? slot : slots[2],
  ]
}

/**
 * Fill a custom slot from a shortcut and enable custom resolutions.
 * Square sizes go to their fixed slot; rectangular sizes take the first
 * disabled slot, or overwrite the last one when all three are in use.
 */
export function applyCustomResolutionShortcut(config: BakeConfig, width: number, height: number): BakeConfig {
  const { custom } = config.resolutions
  let index: 0 | 1 | 2
  const square = width === height ? SQUARE_SHORTCUT_SLOTS[width] : undefined
  if (square !== undefined) {
    index = square
  } else if (!custom[0].enabled) {
    index = 0
  } else if (!custom[1].enabled) {
    index = 1
  } else {
    index = 2
  }

  return {
    ...config,
    resolutions: {
      ...config.resolutions,
      customEnabled: true,
      custom: withSlot(custom, index, { enabled: true, width, height }),
    },
  }
}

/** Disable every custom slot, keeping their sizes. */
export function clearCustomResolutions(config: BakeConfig): BakeConfig {
  const [a, b, c] = config.resolutions.custom
  return {
    ...config,
    resolutions: {
      ...config.resolutions,
      custom: [
        { ...a, enabled: false },
        { ...b, enabled: false },
        { ...c, enabled: false },
      ],
    },
  }
}
