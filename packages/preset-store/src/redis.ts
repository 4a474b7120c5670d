import type { PresetStorage } from '@texbake/types'

/** The ioredis commands preset storage needs. */
export interface PresetRedisClient {
  get(key: string): Promise<string | null>
  set(key: string, value: string): Promise<unknown>
  del(key: string): Promise<number>
  sadd(key: string, member: string): Promise<number>
  srem(key: string, member: string): Promise<number>
  smembers(key: string): Promise<string[]>
  ping(): Promise<string>
}

/**
 * Presets as Redis strings under `<prefix>:preset:<name>`, with the set
 * `<prefix>:presets` indexing the stored names.
 */
export class RedisPresetStorage implements PresetStorage {
  constructor(
    private readonly client: PresetRedisClient,
    private readonly prefix = 'texbake',
  ) {}

  private recordKey(name: string): string {
    return `${this.prefix}:preset:${name}`
  }

  private get indexKey(): string {
    return `${this.prefix}:presets`
  }

  async list(): Promise<string[]> {
    return this.client.smembers(this.indexKey)
  }

  async read(name: string): Promise<string | null> {
    return this.client.get(this.recordKey(name))
  }

  async write(name: string, record: string): Promise<void> {
    await this.client.set(this.recordKey(name), record)
    await this.client.sadd(this.indexKey, name)
  }

  async remove(name: string): Promise<boolean> {
    const removed = await this.client.del(this.recordKey(name))
    await this.client.srem(this.indexKey, name)
    return removed === 1
  }

  async healthCheck(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG'
    } catch {
      return false
    }
  }
}
