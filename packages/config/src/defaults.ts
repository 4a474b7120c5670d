import type { BakeConfig } from '@texbake/types'

/** Configuration a fresh scene starts from; also the migration source for old presets. */
export const DEFAULT_BAKE_CONFIG: BakeConfig = {
  outputDirectory: 'textures',
  margin: 4,
  resolutions: {
    base: 2048,
    multiResolution: false,
    standard: [1024, 2048],
    customEnabled: false,
    custom: [
      { enabled: false, width: 1536, height: 1536 },
      { enabled: false, width: 1920, height: 1080 },
      { enabled: false, width: 1280, height: 720 },
    ],
  },
  channels: ['BaseColor', 'Roughness', 'Metallic', 'Normal'],
  lighting: {
    includeLighting: false,
    shadowMode: 'with-shadows',
  },
  colorSpace: {
    mode: 'auto',
    overrides: {},
    manualOverride: 'sRGB',
  },
  naming: {
    mode: 'standard',
    folders: {
      byObject: true,
      byMaterial: true,
      byResolution: true,
    },
  },
  mixedShaderStrategy: 'full-surface',
  atlas: {
    enabled: false,
    layoutMode: 'auto',
    rows: 2,
    cols: 2,
    padding: 0.02,
    updateUv: true,
  },
  udim: {
    enabled: false,
    autoDetect: true,
    rangeStart: 1001,
    rangeEnd: 1010,
  },
  replaceNodes: false,
}
