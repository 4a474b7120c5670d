/**
 * Pure configuration validation.
 * Returns the first problem found as Result<BakeConfig, ValidationError>;
 * the planner turns a failure into a thrown ConfigError.
 */

import {
  COLOR_SPACES,
  MAX_ATLAS_GRID,
  MAX_RESOLUTION,
  MIN_RESOLUTION,
  type BakeConfig,
  type Result,
  type ValidationError,
} from '@texbake/types'
import { isChannelKind } from './channel-registry'
import { ConfigError } from './errors'
import { FIRST_UDIM_TILE } from './udim'

// ─── Helpers ─────────────────────────────────────────────────────────────────

function err(code: string, message: string, field?: string): Result<never, ValidationError> {
  return { ok: false, error: { code, message, field } }
}

function ok<T>(value: T): Result<T, ValidationError> {
  return { ok: true, value }
}

function isResolutionSize(n: number): boolean {
  return Number.isInteger(n) && n >= MIN_RESOLUTION && n <= MAX_RESOLUTION
}

function isGridSize(n: number): boolean {
  return Number.isInteger(n) && n >= 1 && n <= MAX_ATLAS_GRID
}

function isColorSpace(value: string): boolean {
  return COLOR_SPACES.some((space) => space === value)
}

// ─── Validation ──────────────────────────────────────────────────────────────

export function validateBakeConfig(config: BakeConfig): Result<BakeConfig, ValidationError> {
  if (config.outputDirectory.trim().length === 0) {
    return err('EMPTY_OUTPUT_DIRECTORY', 'Output directory is required', 'outputDirectory')
  }
  if (!Number.isInteger(config.margin) || config.margin < 0 || config.margin > 64) {
    return err('INVALID_MARGIN', `Margin must be an integer in 0–64, got ${config.margin}`, 'margin')
  }

  // Resolutions
  const { resolutions } = config
  if (!isResolutionSize(resolutions.base)) {
    return err('INVALID_RESOLUTION', `Resolution ${resolutions.base} is outside ${MIN_RESOLUTION}–${MAX_RESOLUTION}`, 'resolutions.base')
  }
  for (const size of resolutions.standard) {
    if (!isResolutionSize(size)) {
      return err('INVALID_RESOLUTION', `Resolution ${size} is outside ${MIN_RESOLUTION}–${MAX_RESOLUTION}`, 'resolutions.standard')
    }
  }
  if (resolutions.customEnabled) {
    for (const [i, slot] of resolutions.custom.entries()) {
      if (!slot.enabled) continue
      if (!isResolutionSize(slot.width) || !isResolutionSize(slot.height)) {
        return err(
          'INVALID_RESOLUTION',
          `Custom resolution ${slot.width}x${slot.height} is outside ${MIN_RESOLUTION}–${MAX_RESOLUTION}`,
          `resolutions.custom.${i}`,
        )
      }
    }
  }

  // Channels
  if (config.channels.length === 0) {
    return err('NO_CHANNELS', 'Select at least one channel to bake', 'channels')
  }
  const seen = new Set<string>()
  for (const channel of config.channels) {
    if (!isChannelKind(channel)) {
      return err('UNKNOWN_CHANNEL', `Unknown channel kind: ${channel}`, 'channels')
    }
    if (seen.has(channel)) {
      return err('DUPLICATE_CHANNEL', `Channel ${channel} is selected twice`, 'channels')
    }
    seen.add(channel)
  }

  // Colour space policy
  if (!isColorSpace(config.colorSpace.manualOverride)) {
    return err('UNKNOWN_COLOR_SPACE', `Unknown colour space: ${config.colorSpace.manualOverride}`, 'colorSpace.manualOverride')
  }
  for (const [channel, space] of Object.entries(config.colorSpace.overrides)) {
    if (!isChannelKind(channel)) {
      return err('UNKNOWN_CHANNEL', `Unknown channel kind in overrides: ${channel}`, 'colorSpace.overrides')
    }
    if (space === undefined || !isColorSpace(space)) {
      return err('UNKNOWN_COLOR_SPACE', `Unknown colour space for ${channel}: ${String(space)}`, 'colorSpace.overrides')
    }
  }

  // Atlas settings are stored with every preset, so they are checked even while off
  const { atlas } = config
  if (!(atlas.padding >= 0 && atlas.padding < 0.5)) {
    return err('INVALID_PADDING', `Atlas padding must be in [0, 0.5), got ${atlas.padding}`, 'atlas.padding')
  }
  if (!isGridSize(atlas.rows) || !isGridSize(atlas.cols)) {
    return err('INVALID_ATLAS_GRID', `Atlas grid ${atlas.rows}x${atlas.cols} must be 1–${MAX_ATLAS_GRID} in each direction`, 'atlas')
  }

  // UDIM (range is ignored while auto-detect is on)
  const { udim } = config
  if (udim.enabled && !udim.autoDetect) {
    if (!Number.isInteger(udim.rangeStart) || !Number.isInteger(udim.rangeEnd)) {
      return err('INVALID_UDIM_RANGE', 'UDIM range bounds must be integers', 'udim')
    }
    if (udim.rangeStart < FIRST_UDIM_TILE || udim.rangeEnd < FIRST_UDIM_TILE) {
      return err('INVALID_UDIM_RANGE', `UDIM range bounds must be at least ${FIRST_UDIM_TILE}`, 'udim')
    }
    if (udim.rangeStart > udim.rangeEnd) {
      return err('INVALID_UDIM_RANGE', `UDIM range start ${udim.rangeStart} is after end ${udim.rangeEnd}`, 'udim')
    }
  }

  return ok(config)
}

/** validateBakeConfig, throwing ConfigError on failure. */
export function assertValidConfig(config: BakeConfig): BakeConfig {
  const result = validateBakeConfig(config)
  if (!result.ok) {
    throw new ConfigError(result.error.message, result.error.code, result.error.field)
  }
  return result.value
}
