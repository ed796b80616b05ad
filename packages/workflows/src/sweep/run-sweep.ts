/**
 * Run Sweep Workflow
 * ==================
 *
 * Walks the sweep space in order (level, then trial, then mode) and for every
 * point: clean+build with the configuration baked in, run the workload under
 * the sampler, persist the captured report. One point at a time; the next
 * point never starts before the previous artifact is written.
 *
 * Failures are recorded per point. Under 'continue' the sweep always reaches
 * the end and writes an artifact for every executed point; under 'fail-fast'
 * the first failure aborts with SweepAbortedError carrying the partial summary.
 */

import path from 'path';
import { errorMessage, SweepAbortedError } from '@perfsweep/utils';
import {
  classifyBuild,
  classifyMeasure,
  countSweepPoints,
  formatPointId,
  MODE_ORDER,
  rangeOf,
  valuesOf,
  type FailureKind,
  type MeasurementReport,
  type PersistReceipt,
  type PointRecord,
  type StepOutcome,
  type SweepPoint,
} from '@perfsweep/core';
import type { RunSweepSpec, SweepContext, SweepSummary } from './types.js';

interface SweepTally {
  startedAtMs: number;
  startedAtISO: string;
  totalPoints: number;
  skipped: number;
  records: PointRecord[];
}

function summarize(tally: SweepTally, ctx: SweepContext): SweepSummary {
  const failuresByKind: Record<FailureKind, number> = {
    build_failed: 0,
    build_timed_out: 0,
    measure_failed: 0,
    measure_timed_out: 0,
    persist_failed: 0,
  };
  let failed = 0;
  for (const record of tally.records) {
    if (record.failures.length > 0) failed++;
    for (const kind of record.failures) {
      failuresByKind[kind] += 1;
    }
  }
  return {
    totalPoints: tally.totalPoints,
    attempted: tally.records.length,
    skipped: tally.skipped,
    succeeded: tally.records.length - failed,
    failed,
    failuresByKind,
    records: tally.records,
    startedAtISO: tally.startedAtISO,
    completedAtISO: ctx.clock.nowISO(),
    durationMs: ctx.clock.nowMs() - tally.startedAtMs,
  };
}

/**
 * Run a step that is expected to resolve; a rejection is recorded as a failure
 */
async function guardStep<T>(
  ctx: SweepContext,
  step: string,
  point: SweepPoint,
  fn: () => Promise<T>,
  onThrow: (outcome: StepOutcome) => T
): Promise<T> {
  const startedAt = ctx.clock.nowMs();
  try {
    return await fn();
  } catch (error) {
    ctx.logger.error(`${step} step threw`, error, {
      axisLevel: point.level,
      trial: point.trial,
      mode: point.mode,
    });
    return onThrow({
      status: 'failed',
      durationMs: ctx.clock.nowMs() - startedAt,
      message: errorMessage(error),
    });
  }
}

export async function runSweep(spec: RunSweepSpec, ctx: SweepContext): Promise<SweepSummary> {
  const axis = rangeOf(spec.axisMax, 'axisMax');
  const trials = rangeOf(spec.trials, 'trials');
  const onFailure = spec.onFailure ?? 'continue';
  const skip = spec.skip ?? new Set<string>();

  const tally: SweepTally = {
    startedAtMs: ctx.clock.nowMs(),
    startedAtISO: ctx.clock.nowISO(),
    totalPoints: countSweepPoints(axis.end, trials.end),
    skipped: 0,
    records: [],
  };

  ctx.logger.info('Starting sweep', {
    axisMax: axis.end,
    trials: trials.end,
    totalPoints: tally.totalPoints,
    onFailure,
    resumeSkips: skip.size,
  });

  try {
    await ctx.sink.ensureReady();
  } catch (error) {
    if (onFailure === 'fail-fast') {
      throw new SweepAbortedError(
        `Result destination unusable: ${errorMessage(error)}`,
        formatPointId({ level: 1, trial: 1, mode: false }),
        summarize(tally, ctx)
      );
    }
    // Every persist will retry and record its own failure
    ctx.logger.warn('Result destination not ready', { error: errorMessage(error) });
  }

  for (const level of valuesOf(axis)) {
    ctx.logger.info(`Starting experiment with level=${level}`, { axisLevel: level });

    for (const trial of valuesOf(trials)) {
      const saved: string[] = [];

      for (const mode of MODE_ORDER) {
        const point: SweepPoint = { level, trial, mode };
        const pointId = formatPointId(point);

        if (skip.has(pointId)) {
          tally.skipped++;
          ctx.logger.debug('Skipping completed point', { pointId });
          continue;
        }

        const record = await executePoint(point, pointId, onFailure, ctx);
        tally.records.push(record);
        if (record.persisted) {
          saved.push(record.persisted.path);
        }

        if (onFailure === 'fail-fast' && record.failures.length > 0) {
          const summary = summarize(tally, ctx);
          ctx.logger.error('Sweep aborted', undefined, {
            pointId,
            failures: record.failures,
          });
          throw new SweepAbortedError(
            `Sweep aborted at ${pointId}: ${record.failures.join(', ')}`,
            pointId,
            summary,
            { failures: record.failures }
          );
        }
      }

      ctx.logger.info(`Done with level=${level}, trial=${trial}`, { axisLevel: level, trial, saved });
    }

    ctx.logger.info(`Done level=${level}`, { axisLevel: level });
  }

  const summary = summarize(tally, ctx);
  ctx.logger.info('All experiments complete', {
    attempted: summary.attempted,
    skipped: summary.skipped,
    succeeded: summary.succeeded,
    failed: summary.failed,
    durationMs: summary.durationMs,
  });
  return summary;
}

async function executePoint(
  point: SweepPoint,
  pointId: string,
  onFailure: 'continue' | 'fail-fast',
  ctx: SweepContext
): Promise<PointRecord> {
  const startedAtISO = ctx.clock.nowISO();
  const failures: FailureKind[] = [];
  const logContext = { pointId, axisLevel: point.level, trial: point.trial, mode: point.mode };

  const fail = async (kind: FailureKind, message?: string): Promise<void> => {
    failures.push(kind);
    ctx.logger.warn('Point step failed', { ...logContext, kind, reason: message });
    await ctx.journal?.recordFailure({ pointId, kind, message });
  };

  ctx.logger.info(`Building for level=${point.level}, trial=${point.trial}`, {
    ...logContext,
    commands: ctx.build.describe(point),
  });
  const build = await guardStep(
    ctx,
    'Build',
    point,
    () => ctx.build.run({ level: point.level, mode: point.mode }),
    (outcome) => outcome
  );
  const buildFailure = classifyBuild(build);
  if (buildFailure) {
    await fail(buildFailure, build.message);
  }

  const artifactName = path.basename(ctx.sink.locate(point));

  if (buildFailure && onFailure === 'fail-fast') {
    const record: PointRecord = {
      ...point,
      pointId,
      artifactName,
      build,
      failures,
      startedAtISO,
      completedAtISO: ctx.clock.nowISO(),
    };
    await ctx.journal?.recordPoint(record);
    return record;
  }

  ctx.logger.info('Running measurement', { ...logContext, command: ctx.measure.describe() });
  const report = await guardStep<MeasurementReport>(
    ctx,
    'Measurement',
    point,
    () => ctx.measure.run(point),
    (outcome) => ({ outcome, output: `${outcome.message ?? 'Measurement failed'}\n` })
  );
  const measureFailure = classifyMeasure(report.outcome);
  if (measureFailure) {
    await fail(measureFailure, report.outcome.message);
  }

  let persisted: PersistReceipt | undefined;
  let persistError: string | undefined;
  try {
    persisted = await ctx.sink.persist(point, report.output);
    ctx.logger.info('Logs saved', { ...logContext, path: persisted.path, bytes: persisted.bytes });
  } catch (error) {
    persistError = errorMessage(error);
    await fail('persist_failed', persistError);
  }

  const record: PointRecord = {
    ...point,
    pointId,
    artifactName,
    build,
    measure: report.outcome,
    persisted,
    persistError,
    failures,
    startedAtISO,
    completedAtISO: ctx.clock.nowISO(),
  };
  await ctx.journal?.recordPoint(record);
  return record;
}
