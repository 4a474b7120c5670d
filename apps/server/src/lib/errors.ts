import type { ContentfulStatusCode } from 'hono/utils/http-status'
import {
  ConfigError,
  DuplicateOutputError,
  LayoutError,
  PresetFormatError,
  PresetNotFoundError,
} from '@texbake/engine'

export interface HttpError {
  status: ContentfulStatusCode
  body: Record<string, unknown>
}

/** Map a thrown domain error to a response. Unknown errors are 500s. */
export function toHttpError(err: Error): HttpError {
  if (err instanceof ConfigError) {
    return { status: 422, body: { error: err.message, code: err.code, field: err.field ?? null } }
  }
  if (err instanceof LayoutError) {
    return { status: 422, body: { error: err.message, code: 'LAYOUT' } }
  }
  if (err instanceof PresetFormatError) {
    return { status: 422, body: { error: err.message, code: 'PRESET_FORMAT' } }
  }
  if (err instanceof DuplicateOutputError) {
    return { status: 409, body: { error: err.message, collisions: err.collisions } }
  }
  if (err instanceof PresetNotFoundError) {
    return { status: 404, body: { error: err.message } }
  }
  return { status: 500, body: { error: 'Internal server error.' } }
}
