import type { Context } from 'hono'
import { z } from 'zod'

function validationFailed(c: Context, error: z.ZodError): Response {
  return c.json({ error: 'Validation failed.', fields: error.flatten().fieldErrors }, 400)
}

/** Parse and validate request body with a Zod schema. Returns 400 on failure. */
export async function parseBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T,
): Promise<z.infer<T> | Response> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    return c.json({ error: 'Invalid JSON body.' }, 400)
  }

  const result = schema.safeParse(body)
  if (!result.success) return validationFailed(c, result.error)

  return result.data as z.infer<T>
}

/** Validate decoded path parameters. Returns 400 on failure. */
export function parseParams<T extends z.ZodTypeAny>(c: Context, schema: T): z.infer<T> | Response {
  const result = schema.safeParse(c.req.param())
  if (!result.success) return validationFailed(c, result.error)
  return result.data as z.infer<T>
}

/** Check if a parse result is a Response (validation error). */
export function isResponse(value: unknown): value is Response {
  return value instanceof Response
}
