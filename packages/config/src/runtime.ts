import { LOG_LEVELS, type LogLevel } from '@texbake/types'

/** Where preset records are kept. */
export type PresetBackend = 'memory' | 'file' | 'redis'

export const PRESET_BACKENDS: readonly PresetBackend[] = ['memory', 'file', 'redis']

/** Process-level settings read from the environment. */
export interface RuntimeSettings {
  logLevel: LogLevel
  presetBackend: PresetBackend
  presetDirectory: string
  redisUrl: string
  redisPrefix: string
}

export const DEFAULT_RUNTIME_SETTINGS: RuntimeSettings = {
  logLevel: 'info',
  presetBackend: 'file',
  presetDirectory: './presets',
  redisUrl: 'redis://localhost:6379',
  redisPrefix: 'texbake',
}

type Env = Record<string, string | undefined>

function readChoice<T extends string>(env: Env, key: string, choices: readonly T[], fallback: T): T {
  const raw = env[key]
  if (raw === undefined || raw === '') return fallback
  const match = choices.find((c) => c === raw.toLowerCase())
  if (match === undefined) {
    throw new Error(`Invalid value for ${key}: "${raw}". Expected one of: ${choices.join(', ')}.`)
  }
  return match
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key]
  return raw === undefined || raw === '' ? fallback : raw
}

/**
 * Resolve runtime settings: environment value > default.
 * Throws on unrecognised enum values rather than falling back.
 */
export function resolveRuntimeSettings(env: Env = process.env): RuntimeSettings {
  return {
    logLevel: readChoice(env, 'TEXBAKE_LOG_LEVEL', LOG_LEVELS, DEFAULT_RUNTIME_SETTINGS.logLevel),
    presetBackend: readChoice(env, 'TEXBAKE_PRESET_BACKEND', PRESET_BACKENDS, DEFAULT_RUNTIME_SETTINGS.presetBackend),
    presetDirectory: readString(env, 'TEXBAKE_PRESET_DIR', DEFAULT_RUNTIME_SETTINGS.presetDirectory),
    redisUrl: readString(env, 'REDIS_URL', DEFAULT_RUNTIME_SETTINGS.redisUrl),
    redisPrefix: readString(env, 'TEXBAKE_REDIS_PREFIX', DEFAULT_RUNTIME_SETTINGS.redisPrefix),
  }
}
