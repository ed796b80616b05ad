/**
 * Make Build Step
 *
 * Runs the clean command, then the build command with the run configuration
 * baked in as parameters. The clean always runs first so nothing from the
 * previous configuration survives into this one.
 */

import { logger as defaultLogger } from '@perfsweep/utils';
import {
  modeDigit,
  type BuildConfig,
  type BuildStepPort,
  type RunConfiguration,
  type StepOutcome,
} from '@perfsweep/core';
import { formatCommandLine, runProcess, tailLines, type ProcessRunner } from './process-runner.js';
import type { SweepLogger } from '../sweep/types.js';

const FAILURE_TAIL_LINES = 20;

export interface MakeBuildStepDeps {
  runner?: ProcessRunner;
  logger?: SweepLogger;
}

export class MakeBuildStep implements BuildStepPort {
  readonly name = 'make-build-step';
  private readonly runner: ProcessRunner;
  private readonly logger: SweepLogger;

  constructor(
    private readonly config: BuildConfig,
    deps: MakeBuildStepDeps = {}
  ) {
    this.runner = deps.runner ?? runProcess;
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * Build parameters in the order they are passed
   */
  params(config: RunConfiguration): Array<[string, string]> {
    return [
      [this.config.concurrencyParam, String(config.level)],
      [this.config.modeParam, modeDigit(config.mode)],
    ];
  }

  describe(config: RunConfiguration): string[] {
    const [, ...buildArgs] = this.config.buildCommand;
    const params = this.params(config).map(([key, value]) => `${key}=${value}`);
    const build =
      this.config.paramStyle === 'args'
        ? formatCommandLine([this.buildProgram(), ...buildArgs, ...params])
        : `${params.join(' ')} ${formatCommandLine(this.config.buildCommand)}`;
    return [formatCommandLine(this.config.cleanCommand), build];
  }

  async run(config: RunConfiguration): Promise<StepOutcome> {
    const [cleanProgram = 'make', ...cleanArgs] = this.config.cleanCommand;
    const [, ...buildArgs] = this.config.buildCommand;
    const params = this.params(config);
    const context = { axisLevel: config.level, mode: config.mode };

    const clean = await this.runner({
      command: cleanProgram,
      args: cleanArgs,
      cwd: this.config.cwd,
      timeoutMs: this.config.timeoutMs,
    });
    if (clean.outcome.status !== 'ok') {
      this.logger.warn('Clean step failed, building anyway', {
        ...context,
        status: clean.outcome.status,
        reason: clean.outcome.message,
        tail: tailLines(clean.output, FAILURE_TAIL_LINES),
      });
    }

    const build = await this.runner({
      command: this.buildProgram(),
      args:
        this.config.paramStyle === 'args'
          ? [...buildArgs, ...params.map(([key, value]) => `${key}=${value}`)]
          : buildArgs,
      env: this.config.paramStyle === 'env' ? Object.fromEntries(params) : undefined,
      cwd: this.config.cwd,
      timeoutMs: this.config.timeoutMs,
    });

    if (build.outcome.status !== 'ok') {
      this.logger.warn('Build step failed', {
        ...context,
        status: build.outcome.status,
        reason: build.outcome.message,
        tail: tailLines(build.output, FAILURE_TAIL_LINES),
      });
    } else {
      this.logger.debug('Build step finished', { ...context, durationMs: build.outcome.durationMs });
    }

    const durationMs = clean.outcome.durationMs + build.outcome.durationMs;
    if (build.outcome.status !== 'ok') {
      return { ...build.outcome, durationMs };
    }
    if (clean.outcome.status !== 'ok') {
      // A failed clean may leave the previous configuration's objects in place
      return {
        ...clean.outcome,
        durationMs,
        message: `clean: ${clean.outcome.message ?? clean.outcome.status}`,
      };
    }
    return { ...build.outcome, durationMs };
  }

  private buildProgram(): string {
    return this.config.buildCommand[0] ?? 'make';
  }
}
