/**
 * Sequential bake execution.
 *
 * Targets go to the render engine one at a time. Cancellation is checked
 * between targets and never rolls back written images. A failing target is
 * recorded and the batch moves on; a failed restore of host state stops it.
 */

import type { BakePlan, BakeTarget, MaterialRebuild, SkippedTargetWarning } from '@texbake/types'
import type { MaterialRebuilder, RenderEngine, ShaderGraphHost, UvHost } from './collaborators'
import { ConfigError, GraphRestoreError, RenderFailure } from './errors'
import { silentLogger, type Logger } from './logger'
import { joinOutputPath } from './naming'
import { withScopes, type Acquire } from './scope'

export type TargetStatus = 'succeeded' | 'failed'

export interface BakeProgress {
  /** Targets finished so far, including this one. */
  completed: number
  total: number
  target: BakeTarget
  status: TargetStatus
}

export interface ExecuteOptions {
  renderEngine: RenderEngine
  graph: ShaderGraphHost
  /** Required when any target carries an atlas remap or a UDIM tile. */
  uv?: UvHost
  rebuilder?: MaterialRebuilder
  signal?: AbortSignal
  onProgress?: (progress: BakeProgress) => void
  logger?: Logger
}

export interface TargetFailure {
  target: BakeTarget
  error: RenderFailure
}

export interface RebuildFailure {
  rebuild: MaterialRebuild
  error: unknown
}

export interface BakeReport {
  succeeded: BakeTarget[]
  failed: TargetFailure[]
  skipped: SkippedTargetWarning[]
  /** Targets never submitted because of cancellation or a restore failure. */
  notRun: BakeTarget[]
  cancelled: boolean
  restoreError: GraphRestoreError | null
  rebuilt: MaterialRebuild[]
  rebuildFailures: RebuildFailure[]
}

function needsUvHost(target: BakeTarget): boolean {
  return target.uvRemap.length > 0 || target.tile !== null
}

function acquirersFor(target: BakeTarget, graph: ShaderGraphHost, uv: UvHost | undefined): Acquire[] {
  const acquirers: Acquire[] = []
  if (uv !== undefined) {
    if (target.uvRemap.length > 0) acquirers.push(() => uv.applyAtlasRemap(target.objectId, target.uvRemap))
    const { tile } = target
    if (tile !== null) acquirers.push(() => uv.normalizeTile(target.objectId, tile))
  }
  for (const instruction of target.routing) {
    acquirers.push(() => graph.reroute(instruction))
  }
  return acquirers
}

/** Rebuilds limited to images that were written; rebuilds with nothing left are dropped. */
function succeededRebuilds(rebuilds: readonly MaterialRebuild[], succeeded: readonly BakeTarget[]): MaterialRebuild[] {
  const written = new Set(succeeded.map((t) => t.key))
  const result: MaterialRebuild[] = []
  for (const rebuild of rebuilds) {
    const links = rebuild.links.filter((l) => written.has(l.targetKey))
    if (links.length > 0) result.push({ ...rebuild, links })
  }
  return result
}

export async function executePlan(plan: BakePlan, options: ExecuteOptions): Promise<BakeReport> {
  const { renderEngine, graph, uv, rebuilder, signal, onProgress } = options
  const logger = options.logger ?? silentLogger

  if (uv === undefined && plan.targets.some(needsUvHost)) {
    throw new ConfigError('Plan remaps UVs but no UV host was provided', 'UV_HOST_REQUIRED')
  }

  const report: BakeReport = {
    succeeded: [],
    failed: [],
    skipped: plan.warnings.filter((w): w is SkippedTargetWarning => w.kind === 'skipped-target'),
    notRun: [],
    cancelled: false,
    restoreError: null,
    rebuilt: [],
    rebuildFailures: [],
  }
  const total = plan.targets.length

  for (const [index, target] of plan.targets.entries()) {
    if (signal?.aborted === true) {
      report.cancelled = true
      report.notRun = plan.targets.slice(index)
      logger.warn('bake_cancelled', { completed: index, remaining: total - index })
      break
    }

    const outputPath = joinOutputPath(plan.outputDirectory, target.outputPath)
    logger.debug('target_started', { key: target.key, path: outputPath })

    let status: TargetStatus
    try {
      await withScopes(target.key, acquirersFor(target, graph, uv), () => renderEngine.bake(target, outputPath))
      report.succeeded.push(target)
      status = 'succeeded'
      logger.info('target_succeeded', { key: target.key, path: outputPath })
    } catch (error) {
      if (error instanceof GraphRestoreError) {
        report.restoreError = error
        report.notRun = plan.targets.slice(index + 1)
        logger.error('restore_failed', { key: target.key, failures: error.failures.length })
        break
      }
      const failure = new RenderFailure(target.key, outputPath, error)
      report.failed.push({ target, error: failure })
      status = 'failed'
      logger.error('target_failed', { key: target.key, path: outputPath, error: failure.message })
    }

    onProgress?.({ completed: index + 1, total, target, status })
  }

  if (!report.cancelled && report.restoreError === null && plan.rebuilds.length > 0) {
    if (rebuilder === undefined) {
      logger.warn('rebuild_skipped', { reason: 'no rebuilder', rebuilds: plan.rebuilds.length })
    } else {
      for (const rebuild of succeededRebuilds(plan.rebuilds, report.succeeded)) {
        try {
          await rebuilder.applyRebuild(rebuild)
          report.rebuilt.push(rebuild)
        } catch (error) {
          report.rebuildFailures.push({ rebuild, error })
          logger.error('rebuild_failed', {
            materialId: rebuild.materialId,
            error: error instanceof Error ? error.message : String(error),
          })
        }
      }
    }
  }

  logger.info('bake_completed', {
    succeeded: report.succeeded.length,
    failed: report.failed.length,
    skipped: report.skipped.length,
    notRun: report.notRun.length,
    cancelled: report.cancelled,
  })
  return report
}
