import { describe, it, expect, vi } from 'vitest';
import type { BuildConfig } from '@perfsweep/core';
import { MakeBuildStep } from '../../src/adapters/make-build-step.js';
import type { ProcessRun, ProcessSpec } from '../../src/adapters/process-runner.js';

const baseConfig: BuildConfig = {
  cwd: '/src/emu',
  cleanCommand: ['make', 'clean'],
  buildCommand: ['make', 'check'],
  concurrencyParam: 'SMP',
  modeParam: 'STOP_BOGOMIPS',
  paramStyle: 'args',
  timeoutMs: 0,
};

function fakeRunner(...runs: ProcessRun[]) {
  const calls: ProcessSpec[] = [];
  const runner = vi.fn(async (spec: ProcessSpec): Promise<ProcessRun> => {
    calls.push(spec);
    return runs[calls.length - 1] ?? { outcome: { status: 'ok', exitCode: 0, durationMs: 0 }, output: '' };
  });
  return { runner, calls };
}

function fakeLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

const ok = (durationMs: number): ProcessRun => ({
  outcome: { status: 'ok', exitCode: 0, durationMs },
  output: '',
});

describe('MakeBuildStep', () => {
  it('cleans, then builds with make-style parameters', async () => {
    const { runner, calls } = fakeRunner(ok(3), ok(5));
    const step = new MakeBuildStep(baseConfig, { runner, logger: fakeLogger() });

    const outcome = await step.run({ level: 4, mode: true });

    expect(calls).toEqual([
      { command: 'make', args: ['clean'], cwd: '/src/emu', timeoutMs: 0 },
      {
        command: 'make',
        args: ['check', 'SMP=4', 'STOP_BOGOMIPS=1'],
        env: undefined,
        cwd: '/src/emu',
        timeoutMs: 0,
      },
    ]);
    expect(outcome).toEqual({ status: 'ok', exitCode: 0, durationMs: 8 });
  });

  it('passes parameters through the environment in env style', async () => {
    const { runner, calls } = fakeRunner();
    const step = new MakeBuildStep({ ...baseConfig, paramStyle: 'env' }, { runner, logger: fakeLogger() });

    await step.run({ level: 2, mode: false });

    expect(calls[1]).toMatchObject({
      command: 'make',
      args: ['check'],
      env: { SMP: '2', STOP_BOGOMIPS: '0' },
    });
  });

  it('describes both commands', () => {
    const args = new MakeBuildStep(baseConfig);
    const env = new MakeBuildStep({ ...baseConfig, paramStyle: 'env' });

    expect(args.describe({ level: 4, mode: true })).toEqual([
      'make clean',
      'make check SMP=4 STOP_BOGOMIPS=1',
    ]);
    expect(env.describe({ level: 4, mode: false })).toEqual([
      'make clean',
      'SMP=4 STOP_BOGOMIPS=0 make check',
    ]);
  });

  it('returns the build failure with the combined duration', async () => {
    const { runner } = fakeRunner(ok(1), {
      outcome: { status: 'failed', exitCode: 2, durationMs: 4, message: 'Exited with code 2' },
      output: 'cc: error\n',
    });
    const logger = fakeLogger();
    const step = new MakeBuildStep(baseConfig, { runner, logger });

    const outcome = await step.run({ level: 1, mode: false });

    expect(outcome).toEqual({
      status: 'failed',
      exitCode: 2,
      durationMs: 5,
      message: 'Exited with code 2',
    });
    expect(logger.warn).toHaveBeenCalledWith(
      'Build step failed',
      expect.objectContaining({ axisLevel: 1, mode: false, tail: 'cc: error' })
    );
  });

  it('still builds after a failed clean but reports the point as failed', async () => {
    const { runner, calls } = fakeRunner(
      { outcome: { status: 'failed', exitCode: 1, durationMs: 1, message: 'Exited with code 1' }, output: '' },
      ok(2)
    );
    const logger = fakeLogger();
    const step = new MakeBuildStep(baseConfig, { runner, logger });

    const outcome = await step.run({ level: 3, mode: true });

    expect(calls).toHaveLength(2);
    expect(outcome).toEqual({
      status: 'failed',
      exitCode: 1,
      durationMs: 3,
      message: 'clean: Exited with code 1',
    });
    expect(logger.warn).toHaveBeenCalledWith(
      'Clean step failed, building anyway',
      expect.objectContaining({ axisLevel: 3, status: 'failed' })
    );
  });
});
