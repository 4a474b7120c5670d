/**
 * Environment variable validation, fail-fast on startup.
 *
 * Import this module early in the server entry point. Invalid runtime
 * settings throw here rather than at the first request.
 */

import { resolveRuntimeSettings } from '@texbake/config'

function optional(key: string, fallback: string): string {
  const val = process.env[key]
  return val === undefined || val === '' ? fallback : val
}

function port(key: string, fallback: string): number {
  const raw = optional(key, fallback)
  const value = Number(raw)
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    throw new Error(`Invalid value for ${key}: "${raw}". Expected a port number.`)
  }
  return value
}

export const env = {
  PORT: port('PORT', '4000'),
  NODE_ENV: optional('NODE_ENV', 'development'),
  CORS_ORIGINS: optional('CORS_ORIGINS', 'http://localhost:3000').split(',').map((o) => o.trim()),
  runtime: resolveRuntimeSettings(process.env),
} as const
