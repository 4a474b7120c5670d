/** Validation failure detail. */
export interface ValidationError {
  code: string
  message: string
  field?: string
}

/** Result type for fallible pure functions. */
export type Result<T, E = ValidationError> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const satisfies readonly LogLevel[]
