/**
 * Shader routing: which socket of a material's graph each channel samples,
 * under the mixed-shader strategy. Classification comes from the host.
 */

import type {
  ChannelKind,
  MaterialSlot,
  MixedShaderStrategy,
  Result,
  RoutingInstruction,
  SkippedTargetWarning,
  SocketReference,
} from '@texbake/types'
import { getChannelInfo } from './channel-registry'

export const DEFAULT_CUSTOM_OUTPUT = 'Shader'

/** First candidate input present on the material, else the first candidate. */
export function resolvePrincipledInput(channel: ChannelKind, available?: readonly string[]): string | null {
  const candidates = getChannelInfo(channel).principledInputs
  if (candidates.length === 0) return null
  const present = available === undefined ? undefined : candidates.find((name) => available.includes(name))
  return present ?? candidates[0] ?? null
}

function principledSocket(slot: MaterialSlot, channel: ChannelKind): SocketReference {
  const input = resolvePrincipledInput(channel, slot.principledInputs)
  return input === null ? { kind: 'principled-output' } : { kind: 'principled-input', input }
}

function skipped(objectId: string, slot: MaterialSlot, channel: ChannelKind, strategy: MixedShaderStrategy): Result<never, SkippedTargetWarning> {
  const missing = strategy === 'principled-only' ? 'Principled' : 'custom'
  return {
    ok: false,
    error: {
      kind: 'skipped-target',
      objectId,
      materialId: slot.materialId,
      materialName: slot.materialName,
      channel,
      strategy,
      classification: slot.classification,
      message: `Material "${slot.materialName}" has no ${missing} network; ${channel} skipped`,
    },
  }
}

/** Route for one (material, channel), or a skip warning when the strategy has nothing to sample. */
export function planRoute(
  objectId: string,
  slot: MaterialSlot,
  channel: ChannelKind,
  strategy: MixedShaderStrategy,
): Result<RoutingInstruction, SkippedTargetWarning> {
  let socket: SocketReference
  switch (strategy) {
    case 'full-surface':
      socket = { kind: 'surface' }
      break
    case 'principled-only':
      if (slot.classification === 'custom-only') return skipped(objectId, slot, channel, strategy)
      socket = principledSocket(slot, channel)
      break
    case 'custom-only':
      if (slot.classification === 'principled-only') return skipped(objectId, slot, channel, strategy)
      socket = { kind: 'custom-output', output: slot.customOutput ?? DEFAULT_CUSTOM_OUTPUT }
      break
  }

  return {
    ok: true,
    value: {
      materialId: slot.materialId,
      materialName: slot.materialName,
      shaderGraph: slot.shaderGraph,
      socket,
      strategy,
    },
  }
}
