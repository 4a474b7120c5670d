/**
 * Error taxonomy for planning and execution.
 * Planning errors abort the whole run before any image is written;
 * RenderFailure is recorded per target and never thrown out of the executor.
 */

/** Invalid or contradictory configuration. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly field?: string,
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}

/** Atlas grid constraints cannot be satisfied. */
export class LayoutError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'LayoutError'
  }
}

export interface OutputCollision {
  path: string
  targetKeys: string[]
}

/** Two or more targets resolved to the same output path. */
export class DuplicateOutputError extends Error {
  constructor(public readonly collisions: readonly OutputCollision[]) {
    const first = collisions[0]
    super(
      first === undefined
        ? 'Duplicate output paths'
        : `Duplicate output path "${first.path}" (${collisions.length} collision${collisions.length === 1 ? '' : 's'})`,
    )
    this.name = 'DuplicateOutputError'
  }
}

/** A preset record is corrupt or uses values this version does not know. */
export class PresetFormatError extends Error {
  constructor(
    message: string,
    public readonly presetName?: string,
  ) {
    super(presetName === undefined ? message : `Preset "${presetName}": ${message}`)
    this.name = 'PresetFormatError'
  }
}

export class PresetNotFoundError extends Error {
  constructor(public readonly presetName: string) {
    super(`Preset "${presetName}" not found`)
    this.name = 'PresetNotFoundError'
  }
}

/** The render engine failed one target. */
export class RenderFailure extends Error {
  constructor(
    public readonly targetKey: string,
    public readonly outputPath: string,
    public readonly reason: unknown,
  ) {
    super(`Bake failed for ${outputPath}: ${reason instanceof Error ? reason.message : String(reason)}`)
    this.name = 'RenderFailure'
  }
}

/**
 * Restoring host state after a target failed. Shared material state may be
 * left rewired, so the batch stops.
 */
export class GraphRestoreError extends Error {
  constructor(
    public readonly targetKey: string,
    public readonly failures: readonly unknown[],
  ) {
    super(`Failed to restore ${failures.length} scope(s) after target ${targetKey}`)
    this.name = 'GraphRestoreError'
  }
}
