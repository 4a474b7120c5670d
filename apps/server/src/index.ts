import { serve } from '@hono/node-server'
import { PresetLibrary, createLogger } from '@texbake/engine'
import { env } from './lib/env'
import { createPresetStorage } from './lib/storage'
import { createApp } from './app'

const logger = createLogger({ level: env.runtime.logLevel, bindings: { service: 'texbake-server' } })
const library = new PresetLibrary(createPresetStorage(env.runtime), logger)

const app = createApp({
  library,
  logger,
  corsOrigins: env.CORS_ORIGINS,
  exposeStacks: env.NODE_ENV !== 'production',
})

// ---------------------------------------------------------------------------
// Server start + graceful shutdown
// ---------------------------------------------------------------------------

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  logger.info('server_started', {
    port: info.port,
    env: env.NODE_ENV,
    presetBackend: env.runtime.presetBackend,
  })
})

function shutdown(signal: string) {
  logger.info('shutdown', { signal })

  server.close(() => process.exit(0))
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
