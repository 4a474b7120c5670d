import { Hono } from 'hono'
import { presetNameParam, presetPlanSchema, savePresetSchema } from '@texbake/shared'
import { planBake, type Logger, type PresetLibrary } from '@texbake/engine'
import { parseBody, parseParams, isResponse } from '../lib/validate'

export function presetRoutes(library: PresetLibrary, logger: Logger) {
  const routes = new Hono()

  /** GET /presets: stored preset names, sorted */
  routes.get('/', async (c) => {
    const presets = await library.list()
    return c.json({ presets })
  })

  /** GET /presets/:name: decoded preset */
  routes.get('/:name', async (c) => {
    const params = parseParams(c, presetNameParam)
    if (isResponse(params)) return params
    const { name } = params

    const preset = await library.load(name)
    return c.json({ preset })
  })

  /** PUT /presets/:name: create or replace a preset */
  routes.put('/:name', async (c) => {
    const params = parseParams(c, presetNameParam)
    if (isResponse(params)) return params
    const { name } = params
    const data = await parseBody(c, savePresetSchema)
    if (isResponse(data)) return data

    const saved = await library.save(name, data.config)
    return c.json(saved, saved.status === 'created' ? 201 : 200)
  })

  /** DELETE /presets/:name */
  routes.delete('/:name', async (c) => {
    const params = parseParams(c, presetNameParam)
    if (isResponse(params)) return params
    const { name } = params

    const deleted = await library.delete(name)
    if (!deleted) return c.json({ error: `Preset "${name}" not found` }, 404)
    return c.json({ deleted: name })
  })

  /** POST /presets/:name/plan: plan a bake with a stored configuration */
  routes.post('/:name/plan', async (c) => {
    const params = parseParams(c, presetNameParam)
    if (isResponse(params)) return params
    const { name } = params
    const data = await parseBody(c, presetPlanSchema)
    if (isResponse(data)) return data

    const preset = await library.load(name)
    const plan = planBake(preset.config, data.selection, { logger: logger.child({ preset: preset.name }) })
    return c.json({ preset: preset.name, plan })
  })

  return routes
}
