/**
 * Plan Sweep
 *
 * Lists what runSweep would do, point by point, without running anything.
 */

import path from 'path';
import {
  countSweepPoints,
  enumerateSweepPoints,
  formatPointId,
  type BuildStepPort,
  type MeasurementStepPort,
  type ResultSinkPort,
} from '@perfsweep/core';

export interface PlanSweepSpec {
  axisMax: number;
  trials: number;
  skip?: ReadonlySet<string>;
}

export interface PlanSweepContext {
  build: BuildStepPort;
  measure: MeasurementStepPort;
  sink: ResultSinkPort;
}

export interface PlannedPoint {
  pointId: string;
  level: number;
  trial: number;
  mode: boolean;
  artifact: string;
  buildCommands: string[];
  /** True when a resumed sweep would skip this point */
  skipped: boolean;
}

export interface SweepPlan {
  totalPoints: number;
  toRun: number;
  measureCommand: string;
  outputDir: string;
  points: PlannedPoint[];
}

export function planSweep(spec: PlanSweepSpec, ctx: PlanSweepContext): SweepPlan {
  const skip = spec.skip ?? new Set<string>();
  const points: PlannedPoint[] = [];

  for (const point of enumerateSweepPoints(spec.axisMax, spec.trials)) {
    const pointId = formatPointId(point);
    points.push({
      pointId,
      level: point.level,
      trial: point.trial,
      mode: point.mode,
      artifact: path.basename(ctx.sink.locate(point)),
      buildCommands: ctx.build.describe(point),
      skipped: skip.has(pointId),
    });
  }

  const first = points[0];
  return {
    totalPoints: countSweepPoints(spec.axisMax, spec.trials),
    toRun: points.filter((p) => !p.skipped).length,
    measureCommand: ctx.measure.describe(),
    outputDir: first ? path.dirname(ctx.sink.locate(first)) : '',
    points,
  };
}
