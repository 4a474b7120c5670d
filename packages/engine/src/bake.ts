import type { BakeConfig, HostSelection } from '@texbake/types'
import { executePlan, type BakeReport, type ExecuteOptions } from './executor'
import { planBake } from './planner'

/**
 * Plan then execute. Planning errors propagate before the render engine
 * sees any target.
 */
export async function runBake(config: BakeConfig, selection: HostSelection, options: ExecuteOptions): Promise<BakeReport> {
  const plan = planBake(config, selection, { logger: options.logger })
  return executePlan(plan, options)
}
