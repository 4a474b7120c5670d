import { describe, it, expect } from 'vitest'
import { InMemoryPresetStorage } from '../memory'

describe('InMemoryPresetStorage', () => {
  it('starts from the initial records', async () => {
    const storage = new InMemoryPresetStorage({ Game: '{"name":"Game"}' })
    expect(await storage.list()).toEqual(['Game'])
    expect(await storage.read('Game')).toBe('{"name":"Game"}')
  })

  it('returns null for a missing record', async () => {
    expect(await new InMemoryPresetStorage().read('Nope')).toBeNull()
  })

  it('overwrites on write and reports removal', async () => {
    const storage = new InMemoryPresetStorage()
    await storage.write('Film', 'a')
    await storage.write('Film', 'b')
    expect(await storage.read('Film')).toBe('b')
    expect(await storage.remove('Film')).toBe(true)
    expect(await storage.remove('Film')).toBe(false)
    expect(await storage.list()).toEqual([])
  })

  it('is always healthy', async () => {
    expect(await new InMemoryPresetStorage().healthCheck()).toBe(true)
  })
})
