// ─── Channels ────────────────────────────────────────────────────────────────

/** A bakeable shading channel. */
export type ChannelKind =
  | 'BaseColor'
  | 'Roughness'
  | 'Metallic'
  | 'Normal'
  | 'Subsurface'
  | 'Transmission'
  | 'Emission'
  | 'Alpha'
  | 'Specular'
  | 'Clearcoat'
  | 'ClearcoatRoughness'
  | 'Sheen'
  | 'Displacement'
  | 'AmbientOcclusion'
  | 'CustomShader'

/** Every channel kind, in registry (and therefore planning) order. */
export const CHANNEL_KINDS = [
  'BaseColor',
  'Roughness',
  'Metallic',
  'Normal',
  'Subsurface',
  'Transmission',
  'Emission',
  'Alpha',
  'Specular',
  'Clearcoat',
  'ClearcoatRoughness',
  'Sheen',
  'Displacement',
  'AmbientOcclusion',
  'CustomShader',
] as const satisfies readonly ChannelKind[]

// ─── Color Spaces ────────────────────────────────────────────────────────────

export type ColorSpaceName =
  | 'sRGB'
  | 'Linear Rec.709'
  | 'Linear sRGB'
  | 'Non-Color'
  | 'ACEScg'
  | 'Rec.2020'
  | 'Raw'
  | 'XYZ'

export const COLOR_SPACES = [
  'sRGB',
  'Linear Rec.709',
  'Linear sRGB',
  'Non-Color',
  'ACEScg',
  'Rec.2020',
  'Raw',
  'XYZ',
] as const satisfies readonly ColorSpaceName[]

/** Group used to apply one colour space to several related channels at once. */
export type ColorGroup = 'color' | 'normal' | 'data' | 'emission'
