import type { BakeConfig } from './config'

/** A named, versioned snapshot of a whole configuration. */
export interface Preset {
  name: string
  schemaVersion: number
  config: BakeConfig
}

/**
 * Durable preset records, one textual record per name.
 * The planner never touches storage; the preset library does.
 */
export interface PresetStorage {
  /** Names of all stored records, in any order. */
  list(): Promise<string[]>
  /** The raw record, or null when absent. */
  read(name: string): Promise<string | null>
  write(name: string, record: string): Promise<void>
  /** Returns false when no record existed. */
  remove(name: string): Promise<boolean>
  healthCheck(): Promise<boolean>
}
