// Shared configuration: bake defaults, quick selections, runtime settings.

export { DEFAULT_BAKE_CONFIG } from './defaults'

export {
  selectChannelSet,
  selectResolutionGroup,
  applyCustomResolutionShortcut,
  clearCustomResolutions,
  RECTANGULAR_SHORTCUTS,
  type ChannelSet,
  type ResolutionGroup,
} from './selections'

export {
  resolveRuntimeSettings,
  DEFAULT_RUNTIME_SETTINGS,
  PRESET_BACKENDS,
  type PresetBackend,
  type RuntimeSettings,
} from './runtime'
