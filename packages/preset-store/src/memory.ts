import type { PresetStorage } from '@texbake/types'

/** Process-local preset storage. Records vanish with the process. */
export class InMemoryPresetStorage implements PresetStorage {
  private readonly records = new Map<string, string>()

  constructor(initial: Record<string, string> = {}) {
    for (const [name, record] of Object.entries(initial)) this.records.set(name, record)
  }

  async list(): Promise<string[]> {
    return [...this.records.keys()]
  }

  async read(name: string): Promise<string | null> {
    return this.records.get(name) ?? null
  }

  async write(name: string, record: string): Promise<void> {
    this.records.set(name, record)
  }

  async remove(name: string): Promise<boolean> {
    return this.records.delete(name)
  }

  async healthCheck(): Promise<boolean> {
    return true
  }
}
