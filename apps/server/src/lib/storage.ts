import type { PresetStorage } from '@texbake/types'
import type { RuntimeSettings } from '@texbake/config'
import {
  FilePresetStorage,
  InMemoryPresetStorage,
  RedisPresetStorage,
  createRedisClient,
} from '@texbake/preset-store'

/** Preset storage for the configured backend. */
export function createPresetStorage(settings: RuntimeSettings): PresetStorage {
  switch (settings.presetBackend) {
    case 'memory':
      return new InMemoryPresetStorage()
    case 'file':
      return new FilePresetStorage(settings.presetDirectory)
    case 'redis':
      return new RedisPresetStorage(createRedisClient(settings.redisUrl), settings.redisPrefix)
  }
}
