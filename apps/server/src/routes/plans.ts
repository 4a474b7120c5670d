import { Hono } from 'hono'
import { planRequestSchema } from '@texbake/shared'
import { planBake, type Logger } from '@texbake/engine'
import { parseBody, isResponse } from '../lib/validate'

export function planRoutes(logger: Logger) {
  const routes = new Hono()

  /** POST /plans: plan a bake for a configuration and host snapshot */
  routes.post('/', async (c) => {
    const data = await parseBody(c, planRequestSchema)
    if (isResponse(data)) return data

    const plan = planBake(data.config, data.selection, { logger })
    return c.json({ plan })
  })

  return routes
}
