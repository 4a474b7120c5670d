/**
 * Structured JSON-line logging.
 *
 * debug/info/warn go to stdout, error to stderr, one object per line with
 * `ts`, `level` and `event`. The sink is swappable so tests can capture entries.
 */

import type { LogLevel } from '@texbake/types'

export type LogFields = Record<string, unknown>

export interface LogEntry extends LogFields {
  ts: string
  level: LogLevel
  event: string
}

export type LogSink = (entry: LogEntry) => void

export interface Logger {
  debug(event: string, fields?: LogFields): void
  info(event: string, fields?: LogFields): void
  warn(event: string, fields?: LogFields): void
  error(event: string, fields?: LogFields): void
  /** A logger that adds `bindings` to every entry. */
  child(bindings: LogFields): Logger
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export const stdioSink: LogSink = (entry) => {
  const line = JSON.stringify(entry) + '\n'
  if (entry.level === 'error') {
    process.stderr.write(line)
  } else {
    process.stdout.write(line)
  }
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
  bindings?: LogFields
  /** Clock override for deterministic output. */
  now?: () => Date
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info'
  const sink = options.sink ?? stdioSink
  const bindings = options.bindings ?? {}
  const now = options.now ?? (() => new Date())
  const threshold = LEVEL_RANK[level]

  const emit = (entryLevel: LogLevel, event: string, fields?: LogFields): void => {
    if (LEVEL_RANK[entryLevel] < threshold) return
    sink({ ...bindings, ...fields, ts: now().toISOString(), level: entryLevel, event })
  }

  return {
    debug: (event, fields) => emit('debug', event, fields),
    info: (event, fields) => emit('info', event, fields),
    warn: (event, fields) => emit('warn', event, fields),
    error: (event, fields) => emit('error', event, fields),
    child: (extra) => createLogger({ level, sink, now, bindings: { ...bindings, ...extra } }),
  }
}

/** Discards everything. */
export const silentLogger: Logger = createLogger({ sink: () => undefined })
