/**
 * Build Step Port
 *
 * Produces a fresh workload artifact for one run configuration. Any output of
 * a previous build must be invalidated first so parameters never leak between
 * configurations.
 */

import type { RunConfiguration } from '../domain/sweep.js';
import type { StepOutcome } from '../domain/outcome.js';

export interface BuildStepPort {
  /**
   * Clean, then build with the configuration baked in.
   * Resolves with the outcome; a failed build does not reject.
   */
  run(config: RunConfiguration): Promise<StepOutcome>;

  /**
   * Command lines this step would run, for plans and logs
   */
  describe(config: RunConfiguration): string[];
}
