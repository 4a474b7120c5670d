import type { BakeConfig, Preset, PresetStorage } from '@texbake/types'
import { assertValidConfig } from './config-validator'
import { ConfigError, PresetNotFoundError } from './errors'
import { silentLogger, type Logger } from './logger'
import { decodePreset, encodePreset } from './preset-codec'

export const MAX_PRESET_NAME_LENGTH = 64

/** Trim and keep only letters, digits, space, `-` and `_`. */
export function sanitizePresetName(name: string): string {
  const clean = name.replace(/[^A-Za-z0-9 _-]/g, '').trim().slice(0, MAX_PRESET_NAME_LENGTH).trim()
  if (clean.length === 0) {
    throw new ConfigError(`Invalid preset name: "${name}"`, 'INVALID_PRESET_NAME', 'name')
  }
  return clean
}

export type SaveStatus = 'created' | 'updated'

/** Named preset CRUD over a storage backend. */
export class PresetLibrary {
  constructor(
    private readonly storage: PresetStorage,
    private readonly logger: Logger = silentLogger,
  ) {}

  /** Stored preset names, sorted. */
  async list(): Promise<string[]> {
    const names = await this.storage.list()
    return [...names].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
  }

  async save(name: string, config: BakeConfig): Promise<{ name: string; status: SaveStatus }> {
    const clean = sanitizePresetName(name)
    assertValidConfig(config)
    const record = encodePreset(clean, config)
    // Nothing is stored that load() would reject.
    decodePreset(record, clean)

    const existing = await this.storage.read(clean)
    await this.storage.write(clean, record)
    const status: SaveStatus = existing === null ? 'created' : 'updated'
    this.logger.info('preset_saved', { name: clean, status })
    return { name: clean, status }
  }

  async load(name: string): Promise<Preset> {
    const clean = sanitizePresetName(name)
    const record = await this.storage.read(clean)
    if (record === null) throw new PresetNotFoundError(clean)
    return decodePreset(record, clean)
  }

  async delete(name: string): Promise<boolean> {
    const clean = sanitizePresetName(name)
    const removed = await this.storage.remove(clean)
    if (removed) this.logger.info('preset_deleted', { name: clean })
    return removed
  }

  healthCheck(): Promise<boolean> {
    return this.storage.healthCheck()
  }
}
