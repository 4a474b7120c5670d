import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { ENGINE_VERSION, type Logger, type PresetLibrary } from '@texbake/engine'
import { requestLogger } from './lib/request-logger'
import { toHttpError } from './lib/errors'
import { planRoutes } from './routes/plans'
import { presetRoutes } from './routes/presets'

export interface AppOptions {
  library: PresetLibrary
  logger: Logger
  corsOrigins: string[]
  /** Include stack traces in `request_error` entries. */
  exposeStacks?: boolean
}

export function createApp({ library, logger, corsOrigins, exposeStacks = false }: AppOptions) {
  const app = new Hono()

  // ---------------------------------------------------------------------------
  // Global error handling
  // ---------------------------------------------------------------------------

  app.onError((err, c) => {
    const { status, body } = toHttpError(err)
    if (status >= 500) {
      logger.error('request_error', {
        method: c.req.method,
        path: c.req.path,
        error: err.message,
        stack: exposeStacks ? err.stack : undefined,
      })
    }
    return c.json(body, status)
  })

  app.notFound((c) => c.json({ error: 'Not found.' }, 404))

  // ---------------------------------------------------------------------------
  // Middleware stack (order matters)
  // ---------------------------------------------------------------------------

  // 1. Request logging (first so it captures total duration)
  app.use('*', requestLogger(logger))

  // 2. CORS
  app.use(
    '*',
    cors({
      origin: corsOrigins,
      allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
      maxAge: 86400,
    }),
  )

  // ---------------------------------------------------------------------------
  // Health check
  // ---------------------------------------------------------------------------

  app.get('/health', async (c) => {
    const checks: Record<string, string> = {}

    try {
      checks['presets'] = (await library.healthCheck()) ? 'ok' : 'error'
    } catch (err) {
      logger.warn('health_check_failed', { check: 'presets', error: err instanceof Error ? err.message : String(err) })
      checks['presets'] = 'error'
    }

    const healthy = Object.values(checks).every((v) => v === 'ok')
    return c.json({ status: healthy ? 'healthy' : 'degraded', checks }, healthy ? 200 : 503)
  })

  // ---------------------------------------------------------------------------
  // Routes
  // ---------------------------------------------------------------------------

  app.route('/plans', planRoutes(logger))
  app.route('/presets', presetRoutes(library, logger))

  app.get('/', (c) => c.json({ name: 'texbake', version: ENGINE_VERSION }))

  return app
}
