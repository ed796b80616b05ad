/**
 * Perf Measurement Step
 *
 * Runs the workload under the counter sampler (perf stat by default), optionally
 * with elevated privileges, and captures everything both processes print.
 */

import { logger as defaultLogger } from '@perfsweep/utils';
import type {
  MeasureConfig,
  MeasurementReport,
  MeasurementStepPort,
  SweepPoint,
} from '@perfsweep/core';
import { formatCommandLine, runProcess, type ProcessRunner } from './process-runner.js';
import type { SweepLogger } from '../sweep/types.js';

export interface OutputWriter {
  write(chunk: string): unknown;
}

export interface PerfMeasurementStepDeps {
  runner?: ProcessRunner;
  logger?: SweepLogger;
  /** Where echoed output goes (default: process.stdout) */
  echoTo?: OutputWriter;
}

export class PerfMeasurementStep implements MeasurementStepPort {
  readonly name = 'perf-measurement-step';
  private readonly runner: ProcessRunner;
  private readonly logger: SweepLogger;
  private readonly echoTo: OutputWriter;

  constructor(
    private readonly config: MeasureConfig,
    deps: PerfMeasurementStepDeps = {}
  ) {
    this.runner = deps.runner ?? runProcess;
    this.logger = deps.logger ?? defaultLogger;
    this.echoTo = deps.echoTo ?? process.stdout;
  }

  /**
   * Full argv: [sudo] sampler samplerArgs -e events workload workloadArgs
   */
  argv(): string[] {
    const sampler = [
      this.config.sampler,
      ...this.config.samplerArgs,
      '-e',
      this.config.events.join(','),
      this.config.workload.path,
      ...this.config.workload.args,
    ];
    return this.config.sudo ? ['sudo', ...sampler] : sampler;
  }

  describe(): string {
    return formatCommandLine(this.argv());
  }

  async run(point: SweepPoint): Promise<MeasurementReport> {
    const [command = this.config.sampler, ...args] = this.argv();
    const echo = this.config.echo;

    this.logger.debug('Starting measurement', {
      axisLevel: point.level,
      trial: point.trial,
      mode: point.mode,
      command: this.describe(),
    });

    const run = await this.runner({
      command,
      args,
      cwd: this.config.cwd,
      timeoutMs: this.config.timeoutMs,
      stdin: 'inherit',
      onOutput: echo ? (chunk) => this.echoTo.write(chunk) : undefined,
    });

    if (run.outcome.status === 'spawn_error') {
      // Keep the reason in the artifact so the point is not silently empty
      const reason = `${run.outcome.message ?? 'Failed to start sampler'}\n`;
      return { outcome: run.outcome, output: run.output ? `${run.output}\n${reason}` : reason };
    }

    return { outcome: run.outcome, output: run.output };
  }
}
