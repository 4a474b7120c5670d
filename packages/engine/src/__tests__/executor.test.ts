import { describe, it, expect } from 'vitest'
import type { BakeConfig, HostSelection, MaterialRebuild } from '@texbake/types'
import type { MaterialRebuilder, RenderEngine, ShaderGraphHost, UvHost } from '../collaborators'
import { executePlan, type BakeProgress } from '../executor'
import { runBake } from '../bake'
import { planBake } from '../planner'
import { ConfigError, GraphRestoreError, RenderFailure } from '../errors'
import { createLogger, type LogEntry } from '../logger'
import { config, object, slot } from './helpers'

// ─── Fakes ──────────────────────────────────────────────────────────────────

interface FakeOptions {
  failPaths?: string[]
  failRestoreFor?: string
}

function fakeHost(options: FakeOptions = {}) {
  const calls: string[] = []
  const failPaths = new Set(options.failPaths ?? [])

  const renderEngine: RenderEngine = {
    async bake(_target, outputPath) {
      calls.push(`bake ${outputPath}`)
      if (failPaths.has(outputPath)) throw new Error('GPU lost')
    },
  }
  const graph: ShaderGraphHost = {
    async reroute(instruction) {
      calls.push(`reroute ${instruction.materialId}`)
      return () => {
        calls.push(`restore ${instruction.materialId}`)
        if (instruction.materialId === options.failRestoreFor) throw new Error('node tree locked')
      }
    },
  }
  const uv: UvHost = {
    async applyAtlasRemap(objectId) {
      calls.push(`remap ${objectId}`)
      return () => { calls.push(`unremap ${objectId}`) }
    },
    async normalizeTile(_objectId, tile) {
      calls.push(`tile ${tile.id}`)
      return () => { calls.push(`untile ${tile.id}`) }
    },
  }
  return { calls, renderEngine, graph, uv }
}

const chair: HostSelection = { objects: [object('Chair', [slot('Wood')])] }
const twoChannels: BakeConfig = config({ channels: ['BaseColor', 'Normal'] })

// ─── Sequencing ─────────────────────────────────────────────────────────────

describe('executePlan: sequencing', () => {
  it('reroutes, bakes and restores one target at a time', async () => {
    const host = fakeHost()
    const report = await executePlan(planBake(twoChannels, chair), host)
    expect(host.calls).toEqual([
      'reroute mat-Wood',
      'bake textures/Wood.basecolor.png',
      'restore mat-Wood',
      'reroute mat-Wood',
      'bake textures/Wood.normal.png',
      'restore mat-Wood',
    ])
    expect(report.succeeded.map((t) => t.channel)).toEqual(['BaseColor', 'Normal'])
    expect(report.cancelled).toBe(false)
  })

  it('acquires UV scopes before routing and releases them last', async () => {
    const host = fakeHost()
    const plan = planBake(config({
      atlas: { enabled: true, layoutMode: 'auto', rows: 2, cols: 2, padding: 0, updateUv: true },
      udim: { enabled: true, autoDetect: false, rangeStart: 1001, rangeEnd: 1001 },
    }), { objects: [object('Sofa', [slot('A'), slot('B', { slotIndex: 1 })])] })
    await executePlan(plan, host)
    expect(host.calls).toEqual([
      'remap obj-Sofa',
      'tile 1001',
      'reroute mat-A',
      'reroute mat-B',
      'bake textures/Sofa_Atlas.1001.basecolor.png',
      'restore mat-B',
      'restore mat-A',
      'untile 1001',
      'unremap obj-Sofa',
    ])
  })

  it('requires a UV host for atlas remaps', async () => {
    const { renderEngine, graph } = fakeHost()
    const plan = planBake(config({
      atlas: { enabled: true, layoutMode: 'auto', rows: 2, cols: 2, padding: 0, updateUv: true },
    }), chair)
    await expect(executePlan(plan, { renderEngine, graph })).rejects.toBeInstanceOf(ConfigError)
  })

  it('reports progress after every target', async () => {
    const host = fakeHost({ failPaths: ['textures/Wood.normal.png'] })
    const progress: BakeProgress[] = []
    await executePlan(planBake(twoChannels, chair), { ...host, onProgress: (p) => progress.push(p) })
    expect(progress.map((p) => [p.completed, p.total, p.status])).toEqual([
      [1, 2, 'succeeded'],
      [2, 2, 'failed'],
    ])
  })
})

// ─── Failures ───────────────────────────────────────────────────────────────

describe('executePlan: partial failure', () => {
  it('records a failed target and continues', async () => {
    const host = fakeHost({ failPaths: ['textures/Wood.basecolor.png'] })
    const report = await executePlan(planBake(twoChannels, chair), host)

    expect(report.succeeded.map((t) => t.channel)).toEqual(['Normal'])
    expect(report.failed).toHaveLength(1)
    const failure = report.failed[0]?.error
    expect(failure).toBeInstanceOf(RenderFailure)
    expect(failure?.message).toBe('Bake failed for textures/Wood.basecolor.png: GPU lost')
    expect(failure?.targetKey).toBe('obj-Chair|mat-Wood|BaseColor|2048x2048|none')
    expect(host.calls.filter((c) => c.startsWith('restore'))).toHaveLength(2)
  })

  it('stops the batch when host state cannot be restored', async () => {
    const host = fakeHost({ failRestoreFor: 'mat-Wood' })
    const report = await executePlan(planBake(twoChannels, chair), host)
    expect(report.restoreError).toBeInstanceOf(GraphRestoreError)
    expect(report.succeeded).toEqual([])
    expect(report.notRun.map((t) => t.channel)).toEqual(['Normal'])
    expect(host.calls.filter((c) => c.startsWith('bake'))).toHaveLength(1)
  })

  it('lists skipped combinations from the plan', async () => {
    const host = fakeHost()
    const plan = planBake(config({ mixedShaderStrategy: 'custom-only' }), {
      objects: [object('Lamp', [slot('Glow', { classification: 'custom-only' }), slot('Metal', { slotIndex: 1 })])],
    })
    const report = await executePlan(plan, host)
    expect(report.skipped.map((w) => w.materialName)).toEqual(['Metal'])
    expect(report.succeeded).toHaveLength(1)
  })
})

// ─── Cancellation ───────────────────────────────────────────────────────────

describe('executePlan: cancellation', () => {
  it('stops submitting after an abort between targets', async () => {
    const host = fakeHost()
    const controller = new AbortController()
    const report = await executePlan(planBake(twoChannels, chair), {
      ...host,
      signal: controller.signal,
      onProgress: () => controller.abort(),
    })
    expect(report.cancelled).toBe(true)
    expect(report.succeeded.map((t) => t.channel)).toEqual(['BaseColor'])
    expect(report.notRun.map((t) => t.channel)).toEqual(['Normal'])
    expect(host.calls.filter((c) => c.startsWith('bake'))).toHaveLength(1)
  })

  it('bakes nothing when aborted up front', async () => {
    const host = fakeHost()
    const controller = new AbortController()
    controller.abort()
    const report = await executePlan(planBake(twoChannels, chair), { ...host, signal: controller.signal })
    expect(host.calls).toEqual([])
    expect(report.notRun).toHaveLength(2)
  })

  it('logs the cancellation', async () => {
    const entries: LogEntry[] = []
    const controller = new AbortController()
    controller.abort()
    await executePlan(planBake(twoChannels, chair), {
      ...fakeHost(),
      signal: controller.signal,
      logger: createLogger({ sink: (e) => entries.push(e) }),
    })
    expect(entries.map((e) => e.event)).toEqual(['bake_cancelled', 'bake_completed'])
  })
})

// ─── Material rebuild ───────────────────────────────────────────────────────

describe('executePlan: material rebuild', () => {
  it('rebuilds from written images only', async () => {
    const host = fakeHost({ failPaths: ['textures/Wood.normal.png'] })
    const received: MaterialRebuild[] = []
    const rebuilder: MaterialRebuilder = {
      async applyRebuild(rebuild) {
        received.push(rebuild)
      },
    }
    const report = await executePlan(planBake({ ...twoChannels, replaceNodes: true }, chair), { ...host, rebuilder })
    expect(received).toHaveLength(1)
    expect(received[0]?.links.map((l) => l.channel)).toEqual(['BaseColor'])
    expect(report.rebuilt).toEqual(received)
  })

  it('records rebuild failures without failing targets', async () => {
    const rebuilder: MaterialRebuilder = {
      async applyRebuild() {
        throw new Error('material is linked from a library')
      },
    }
    const report = await executePlan(planBake({ ...twoChannels, replaceNodes: true }, chair), { ...fakeHost(), rebuilder })
    expect(report.succeeded).toHaveLength(2)
    expect(report.rebuildFailures).toHaveLength(1)
  })

  it('skips rebuilding after cancellation', async () => {
    const received: MaterialRebuild[] = []
    const controller = new AbortController()
    await executePlan(planBake({ ...twoChannels, replaceNodes: true }, chair), {
      ...fakeHost(),
      rebuilder: { applyRebuild: async (r) => { received.push(r) } },
      signal: controller.signal,
      onProgress: () => controller.abort(),
    })
    expect(received).toEqual([])
  })
})

// ─── runBake ────────────────────────────────────────────────────────────────

describe('runBake', () => {
  it('never reaches the render engine when planning fails', async () => {
    const host = fakeHost()
    await expect(runBake(config({ channels: [] }), chair, host)).rejects.toBeInstanceOf(ConfigError)
    expect(host.calls).toEqual([])
  })

  it('plans and executes', async () => {
    const report = await runBake(twoChannels, chair, fakeHost())
    expect(report.succeeded).toHaveLength(2)
  })
})
