/**
 * Measurement Step Port
 *
 * Runs the fixed workload under the counter sampler and hands back the combined
 * report. The workload invocation does not depend on the sweep point; the point
 * is passed for logging only.
 */

import type { SweepPoint } from '../domain/sweep.js';
import type { StepOutcome } from '../domain/outcome.js';

export interface MeasurementReport {
  outcome: StepOutcome;
  /** Sampler summary and workload output, interleaved as emitted */
  output: string;
}

export interface MeasurementStepPort {
  run(point: SweepPoint): Promise<MeasurementReport>;

  /**
   * Command line this step would run, for plans and logs
   */
  describe(): string;
}
