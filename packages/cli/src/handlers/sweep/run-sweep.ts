/**
 * Run Sweep Handler
 *
 * Resolves the config, opens the journal, runs the sweep and finalizes
 * run.meta.json on both the normal and the fail-fast path.
 */

import { logger, SweepAbortedError } from '@perfsweep/utils';
import {
  FAILURE_KINDS,
  assertValidNaming,
  countSweepPoints,
  type FailureKind,
} from '@perfsweep/core';
import { runSweep } from '@perfsweep/workflows';
import type { CommandContext } from '../../core/command-context.js';
import type { RunSweepArgs } from '../../command-defs/sweep.js';
import { loadCompletedPointIds } from '../../core/resume-state.js';
import { resolveSweepConfig } from './resolve-config.js';

export interface RunSweepResult {
  outDir: string;
  totalPoints: number;
  attempted: number;
  skipped: number;
  succeeded: number;
  failed: number;
  /** e.g. "build_failed=2 measure_timed_out=1" (empty when none) */
  failures: string;
  durationMs: number;
}

function describeFailures(byKind: Record<FailureKind, number>): string {
  return FAILURE_KINDS.filter((kind) => byKind[kind] > 0)
    .map((kind) => `${kind}=${byKind[kind]}`)
    .join(' ');
}

export async function runSweepHandler(
  args: RunSweepArgs,
  ctx: CommandContext
): Promise<RunSweepResult> {
  const config = resolveSweepConfig(args, ctx.env);
  // Reject bad naming before initialize() truncates an existing journal
  assertValidNaming({
    prefix: config.output.prefix,
    axisLabel: config.output.axisLabel,
    extension: config.output.extension,
  });
  const skip = config.resume ? loadCompletedPointIds(config.output.dir) : new Set<string>();
  if (config.resume) {
    logger.info('Resuming sweep', { outDir: config.output.dir, completed: skip.size });
  }

  const writer = ctx.services.resultsWriter();
  await writer.initialize(config.output.dir, config, {
    append: config.resume,
    completedPointIds: skip,
    gitCwd: config.build.cwd,
  });
  const sweepContext = ctx.services.sweepContext(config, writer);

  try {
    const summary = await runSweep(
      { axisMax: config.axisMax, trials: config.trials, onFailure: config.onFailure, skip },
      sweepContext
    );
    await writer.finalize({
      counts: {
        totalPoints: summary.totalPoints,
        attempted: summary.attempted,
        skipped: summary.skipped,
        succeeded: summary.succeeded,
        failed: summary.failed,
      },
      failuresByKind: summary.failuresByKind,
    });

    return {
      outDir: config.output.dir,
      totalPoints: summary.totalPoints,
      attempted: summary.attempted,
      skipped: summary.skipped,
      succeeded: summary.succeeded,
      failed: summary.failed,
      failures: describeFailures(summary.failuresByKind),
      durationMs: summary.durationMs,
    };
  } catch (error) {
    if (error instanceof SweepAbortedError) {
      const counts = writer.getCounts();
      await writer.finalize({
        counts: {
          totalPoints: countSweepPoints(config.axisMax, config.trials),
          attempted: counts.points,
          skipped: skip.size,
          succeeded: counts.points - counts.failedPoints,
          failed: counts.failedPoints,
        },
        aborted: { pointId: error.pointId, message: error.message },
      });
    }
    throw error;
  }
}
