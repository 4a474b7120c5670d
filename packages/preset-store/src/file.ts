import { mkdir, readdir, readFile, rm, writeFile, access, rename } from 'node:fs/promises'
import { join } from 'node:path'
import type { PresetStorage } from '@texbake/types'

const EXTENSION = '.json'

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * One `<name>.json` file per preset in a directory.
 * The directory is created on first write.
 */
export class FilePresetStorage implements PresetStorage {
  constructor(private readonly directory: string) {}

  private pathFor(name: string): string {
    return join(this.directory, `${name}${EXTENSION}`)
  }

  async list(): Promise<string[]> {
    let entries: string[]
    try {
      entries = await readdir(this.directory)
    } catch (error) {
      if (isNotFound(error)) return []
      throw error
    }
    return entries
      .filter((entry) => entry.endsWith(EXTENSION))
      .map((entry) => entry.slice(0, -EXTENSION.length))
  }

  async read(name: string): Promise<string | null> {
    try {
      return await readFile(this.pathFor(name), 'utf8')
    } catch (error) {
      if (isNotFound(error)) return null
      throw error
    }
  }

  /** Writes to a temp file first so readers never see a half-written record. */
  async write(name: string, record: string): Promise<void> {
    await mkdir(this.directory, { recursive: true })
    const target = this.pathFor(name)
    const temp = `${target}.tmp`
    await writeFile(temp, record, 'utf8')
    await rename(temp, target)
  }

  async remove(name: string): Promise<boolean> {
    try {
      await rm(this.pathFor(name))
      return true
    } catch (error) {
      if (isNotFound(error)) return false
      throw error
    }
  }

  /** Healthy when the directory exists or can be created. */
  async healthCheck(): Promise<boolean> {
    try {
      await mkdir(this.directory, { recursive: true })
      await access(this.directory)
      return true
    } catch {
      return false
    }
  }
}
