import { logger as utilsLogger } from '@perfsweep/utils';
import { createSystemClock, type ClockPort, type SweepConfig } from '@perfsweep/core';
import { MakeBuildStep } from '../adapters/make-build-step.js';
import { PerfMeasurementStep, type OutputWriter } from '../adapters/perf-measurement-step.js';
import { FileResultSink } from '../adapters/file-result-sink.js';
import type { ProcessRunner } from '../adapters/process-runner.js';
import type { SweepContext, SweepLogger } from '../sweep/types.js';

export interface ProductionSweepContextConfig {
  /**
   * Optional logger override (defaults to @perfsweep/utils logger)
   */
  logger?: SweepLogger;

  /**
   * Optional clock override (for testing)
   */
  clock?: ClockPort;

  /**
   * Optional process runner override, shared by build and measurement
   */
  runner?: ProcessRunner;

  /**
   * Where echoed workload output goes (defaults to process.stdout)
   */
  echoTo?: OutputWriter;

  journal?: SweepContext['journal'];
}

/**
 * Create a SweepContext wired to make, the sampler and the filesystem
 */
export function createProductionSweepContext(
  config: SweepConfig,
  overrides: ProductionSweepContextConfig = {}
): SweepContext {
  const logger = overrides.logger ?? utilsLogger;
  const measure = {
    ...config.measure,
    cwd: config.measure.cwd ?? config.build.cwd,
  };

  return {
    logger,
    clock: overrides.clock ?? createSystemClock(),
    build: new MakeBuildStep(config.build, { runner: overrides.runner, logger }),
    measure: new PerfMeasurementStep(measure, {
      runner: overrides.runner,
      logger,
      echoTo: overrides.echoTo,
    }),
    sink: new FileResultSink({
      dir: config.output.dir,
      naming: {
        prefix: config.output.prefix,
        axisLabel: config.output.axisLabel,
        extension: config.output.extension,
      },
      onExisting: config.output.onExisting,
    }),
    journal: overrides.journal,
  };
}
