/**
 * Plan Sweep Handler - what `sweep run` would execute, without executing it
 */

import { planSweep } from '@perfsweep/workflows';
import type { CommandContext } from '../../core/command-context.js';
import type { PlanSweepArgs } from '../../command-defs/sweep.js';
import { loadCompletedPointIds } from '../../core/resume-state.js';
import { resolveSweepConfig } from './resolve-config.js';

export interface PlanRow {
  point: string;
  artifact: string;
  build: string;
  measure: string;
  skip: boolean;
}

export async function planSweepHandler(
  args: PlanSweepArgs,
  ctx: CommandContext
): Promise<PlanRow[]> {
  const config = resolveSweepConfig(args, ctx.env);
  const skip = config.resume ? loadCompletedPointIds(config.output.dir) : new Set<string>();
  const plan = planSweep(
    { axisMax: config.axisMax, trials: config.trials, skip },
    ctx.services.sweepContext(config)
  );

  return plan.points.map((point) => ({
    point: point.pointId,
    artifact: point.artifact,
    build: point.buildCommands.join(' && '),
    measure: plan.measureCommand,
    skip: point.skipped,
  }));
}
