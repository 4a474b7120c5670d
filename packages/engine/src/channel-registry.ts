import { CHANNEL_KINDS, type BakePass, type ChannelKind, type ColorGroup, type ColorSpaceName } from '@texbake/types'
import { ConfigError } from './errors'

export interface ChannelInfo {
  kind: ChannelKind
  /** Lower-case file name token. */
  token: string
  defaultColorSpace: ColorSpaceName
  /** Only channels whose value changes with scene lighting. */
  requiresLighting: boolean
  isAdvanced: boolean
  /** Native pass used when the target is baked without lighting. */
  pass: BakePass
  /** Image is allocated with an alpha channel. */
  alpha: boolean
  /** Candidate Principled input names, oldest host naming last. */
  principledInputs: readonly string[]
  colorGroup: ColorGroup
}

type ChannelRow = Omit<ChannelInfo, 'kind'>

const REGISTRY: Record<ChannelKind, ChannelRow> = {
  BaseColor: {
    token: 'basecolor', defaultColorSpace: 'sRGB', requiresLighting: true, isAdvanced: false,
    pass: 'emit', alpha: true, principledInputs: ['Base Color', 'BaseColor'], colorGroup: 'color',
  },
  Roughness: {
    token: 'roughness', defaultColorSpace: 'Non-Color', requiresLighting: false, isAdvanced: false,
    pass: 'roughness', alpha: false, principledInputs: ['Roughness'], colorGroup: 'data',
  },
  Metallic: {
    token: 'metallic', defaultColorSpace: 'Non-Color', requiresLighting: false, isAdvanced: false,
    pass: 'emit', alpha: false, principledInputs: ['Metallic'], colorGroup: 'data',
  },
  Normal: {
    token: 'normal', defaultColorSpace: 'Non-Color', requiresLighting: false, isAdvanced: false,
    pass: 'normal', alpha: false, principledInputs: ['Normal'], colorGroup: 'normal',
  },
  Subsurface: {
    token: 'subsurface', defaultColorSpace: 'Non-Color', requiresLighting: false, isAdvanced: true,
    pass: 'emit', alpha: false, principledInputs: ['Subsurface', 'Subsurface Weight', 'Subsurface Radius'], colorGroup: 'data',
  },
  Transmission: {
    token: 'transmission', defaultColorSpace: 'Non-Color', requiresLighting: false, isAdvanced: true,
    pass: 'emit', alpha: false, principledInputs: ['Transmission', 'Transmission Weight'], colorGroup: 'data',
  },
  Emission: {
    token: 'emission', defaultColorSpace: 'sRGB', requiresLighting: false, isAdvanced: true,
    pass: 'emit', alpha: false, principledInputs: ['Emission', 'Emission Color'], colorGroup: 'emission',
  },
  Alpha: {
    token: 'alpha', defaultColorSpace: 'Non-Color', requiresLighting: false, isAdvanced: true,
    pass: 'emit', alpha: false, principledInputs: ['Alpha'], colorGroup: 'data',
  },
  Specular: {
    token: 'specular', defaultColorSpace: 'Non-Color', requiresLighting: false, isAdvanced: true,
    pass: 'emit', alpha: false, principledInputs: ['Specular', 'Specular IOR', 'IOR'], colorGroup: 'data',
  },
  Clearcoat: {
    token: 'clearcoat', defaultColorSpace: 'Non-Color', requiresLighting: false, isAdvanced: true,
    pass: 'emit', alpha: false, principledInputs: ['Clearcoat', 'Clearcoat Weight'], colorGroup: 'data',
  },
  ClearcoatRoughness: {
    token: 'clearcoatroughness', defaultColorSpace: 'Non-Color', requiresLighting: false, isAdvanced: true,
    pass: 'emit', alpha: false, principledInputs: ['Clearcoat Roughness'], colorGroup: 'data',
  },
  Sheen: {
    token: 'sheen', defaultColorSpace: 'Non-Color', requiresLighting: false, isAdvanced: true,
    pass: 'emit', alpha: false, principledInputs: ['Sheen', 'Sheen Weight'], colorGroup: 'data',
  },
  Displacement: {
    token: 'displacement', defaultColorSpace: 'Non-Color', requiresLighting: false, isAdvanced: true,
    pass: 'emit', alpha: false, principledInputs: [], colorGroup: 'data',
  },
  AmbientOcclusion: {
    token: 'ao', defaultColorSpace: 'Non-Color', requiresLighting: false, isAdvanced: true,
    pass: 'ambient-occlusion', alpha: false, principledInputs: [], colorGroup: 'data',
  },
  CustomShader: {
    token: 'customshader', defaultColorSpace: 'sRGB', requiresLighting: false, isAdvanced: false,
    pass: 'emit', alpha: true, principledInputs: [], colorGroup: 'color',
  },
}

export function isChannelKind(value: string): value is ChannelKind {
  return CHANNEL_KINDS.some((kind) => kind === value)
}

/** Registry row for a channel. Throws ConfigError for unregistered kinds. */
export function getChannelInfo(kind: string): ChannelInfo {
  if (!isChannelKind(kind)) {
    throw new ConfigError(`Unknown channel kind: ${kind}`, 'UNKNOWN_CHANNEL', 'channels')
  }
  return { kind, ...REGISTRY[kind] }
}

/** Every registered channel in planning order. */
export function listChannels(): ChannelInfo[] {
  return CHANNEL_KINDS.map((kind) => ({ kind, ...REGISTRY[kind] }))
}

/** Position in planning order. */
export function channelOrder(kind: ChannelKind): number {
  return CHANNEL_KINDS.indexOf(kind)
}
