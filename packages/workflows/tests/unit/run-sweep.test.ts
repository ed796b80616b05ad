import { describe, it, expect } from 'vitest';
import { SweepAbortedError, ValidationError } from '@perfsweep/utils';
import type { StepOutcome } from '@perfsweep/core';
import { runSweep } from '../../src/sweep/run-sweep.js';
import { createFakeSweep, FIXED_ISO, okOutcome } from '../helpers/fakeSweepContext.js';

const buildFailed: StepOutcome = {
  status: 'failed',
  exitCode: 2,
  durationMs: 1,
  message: 'Exited with code 2',
};

describe('workflows.runSweep', () => {
  it('builds, measures and persists each point before starting the next', async () => {
    const fake = createFakeSweep();

    await runSweep({ axisMax: 1, trials: 2 }, fake.ctx);

    expect(fake.events).toEqual([
      'build:1:0',
      'measure:level=1_trial=1_mode=0',
      'persist:level=1_trial=1_mode=0',
      'build:1:1',
      'measure:level=1_trial=1_mode=1',
      'persist:level=1_trial=1_mode=1',
      'build:1:0',
      'measure:level=1_trial=2_mode=0',
      'persist:level=1_trial=2_mode=0',
      'build:1:1',
      'measure:level=1_trial=2_mode=1',
      'persist:level=1_trial=2_mode=1',
    ]);
  });

  it('writes one artifact per point and reports a clean summary', async () => {
    const fake = createFakeSweep();

    const summary = await runSweep({ axisMax: 3, trials: 2 }, fake.ctx);

    expect(fake.files.size).toBe(12);
    expect(fake.files.get('emulator_SMP_3_2_1.log')).toBe('counters for level=3_trial=2_mode=1\n');
    expect(summary.totalPoints).toBe(12);
    expect(summary.attempted).toBe(12);
    expect(summary.skipped).toBe(0);
    expect(summary.succeeded).toBe(12);
    expect(summary.failed).toBe(0);
    expect(summary.failuresByKind).toEqual({
      build_failed: 0,
      build_timed_out: 0,
      measure_failed: 0,
      measure_timed_out: 0,
      persist_failed: 0,
    });
    expect(summary.startedAtISO).toBe(FIXED_ISO);
    expect(summary.durationMs).toBe(0);
    expect(fake.journal.points).toHaveLength(12);
    expect(fake.journal.points[0]).toMatchObject({
      pointId: 'level=1_trial=1_mode=0',
      artifactName: 'emulator_SMP_1_1_0.log',
      level: 1,
      trial: 1,
      mode: false,
      failures: [],
      persisted: { path: '/out/emulator_SMP_1_1_0.log', bytes: 36 },
    });
  });

  it('keeps going after build failures and still stores every artifact', async () => {
    const fake = createFakeSweep({ build: () => buildFailed });

    const summary = await runSweep({ axisMax: 2, trials: 1 }, fake.ctx);

    expect(fake.files.size).toBe(4);
    expect(summary.failed).toBe(4);
    expect(summary.succeeded).toBe(0);
    expect(summary.failuresByKind.build_failed).toBe(4);
    expect(fake.journal.failures[0]).toEqual({
      pointId: 'level=1_trial=1_mode=0',
      kind: 'build_failed',
      message: 'Exited with code 2',
    });
    expect(fake.journal.points.every((p) => p.measure?.status === 'ok')).toBe(true);
  });

  it('classifies build timeouts separately', async () => {
    const fake = createFakeSweep({
      build: () => ({ status: 'timed_out', durationMs: 50, message: 'Timed out after 50ms' }),
    });

    const summary = await runSweep({ axisMax: 1, trials: 1 }, fake.ctx);

    expect(summary.failuresByKind.build_timed_out).toBe(2);
    expect(summary.failuresByKind.build_failed).toBe(0);
  });

  it('aborts on the first failure under fail-fast', async () => {
    const fake = createFakeSweep({
      build: (config) => (config.level === 1 && config.mode ? buildFailed : okOutcome()),
    });

    const error = await runSweep({ axisMax: 2, trials: 2, onFailure: 'fail-fast' }, fake.ctx).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(SweepAbortedError);
    if (!(error instanceof SweepAbortedError)) return;
    expect(error.message).toBe('Sweep aborted at level=1_trial=1_mode=1: build_failed');
    expect(error.pointId).toBe('level=1_trial=1_mode=1');
    expect(error.partial).toMatchObject({ attempted: 2, succeeded: 1, failed: 1 });

    expect(fake.events).toEqual([
      'build:1:0',
      'measure:level=1_trial=1_mode=0',
      'persist:level=1_trial=1_mode=0',
      'build:1:1',
    ]);
    expect(fake.journal.points).toHaveLength(2);
    expect(fake.journal.points[1]?.measure).toBeUndefined();
    expect(fake.journal.points[1]?.failures).toEqual(['build_failed']);
  });

  it('persists the captured output of a timed-out measurement', async () => {
    const fake = createFakeSweep({
      measure: () => ({
        outcome: { status: 'timed_out', signal: 'SIGTERM', durationMs: 10, message: 'Timed out after 10ms' },
        output: 'partial boot log\n',
      }),
    });

    const summary = await runSweep({ axisMax: 1, trials: 1 }, fake.ctx);

    expect(summary.failuresByKind.measure_timed_out).toBe(2);
    expect(fake.files.get('emulator_SMP_1_1_0.log')).toBe('partial boot log\n');
  });

  it('records a throwing measurement as failed and keeps its reason in the artifact', async () => {
    const fake = createFakeSweep({
      measure: () => {
        throw new Error('sampler crashed');
      },
    });

    const summary = await runSweep({ axisMax: 1, trials: 1 }, fake.ctx);

    expect(summary.failuresByKind.measure_failed).toBe(2);
    expect(fake.files.get('emulator_SMP_1_1_1.log')).toBe('sampler crashed\n');
    expect(fake.journal.points[0]?.measure).toMatchObject({
      status: 'failed',
      message: 'sampler crashed',
    });
    expect(fake.logger.error).toHaveBeenCalledWith(
      'Measurement step threw',
      expect.any(Error),
      { axisLevel: 1, trial: 1, mode: false }
    );
  });

  it('records persist failures and moves on', async () => {
    const fake = createFakeSweep({ persistFails: new Set(['level=1_trial=1_mode=0']) });

    const summary = await runSweep({ axisMax: 1, trials: 1 }, fake.ctx);

    expect(summary.attempted).toBe(2);
    expect(summary.failuresByKind.persist_failed).toBe(1);
    expect(fake.files.has('emulator_SMP_1_1_1.log')).toBe(true);
    expect(fake.journal.points[0]).toMatchObject({
      persistError: 'no space left on device',
      failures: ['persist_failed'],
    });
    expect(fake.journal.points[0]?.persisted).toBeUndefined();
  });

  it('skips completed points', async () => {
    const fake = createFakeSweep();

    const summary = await runSweep(
      { axisMax: 1, trials: 1, skip: new Set(['level=1_trial=1_mode=0']) },
      fake.ctx
    );

    expect(summary.totalPoints).toBe(2);
    expect(summary.attempted).toBe(1);
    expect(summary.skipped).toBe(1);
    expect(fake.events).toEqual([
      'build:1:1',
      'measure:level=1_trial=1_mode=1',
      'persist:level=1_trial=1_mode=1',
    ]);
  });

  it('logs progress per level and trial', async () => {
    const fake = createFakeSweep();

    await runSweep({ axisMax: 1, trials: 1 }, fake.ctx);

    expect(fake.logger.info).toHaveBeenCalledWith('Starting experiment with level=1', {
      axisLevel: 1,
    });
    expect(fake.logger.info).toHaveBeenCalledWith('Done with level=1, trial=1', {
      axisLevel: 1,
      trial: 1,
      saved: ['/out/emulator_SMP_1_1_0.log', '/out/emulator_SMP_1_1_1.log'],
    });
    expect(fake.logger.info).toHaveBeenCalledWith('Done level=1', { axisLevel: 1 });
  });

  it('warns and continues when the destination is not ready', async () => {
    const fake = createFakeSweep({ ensureReadyFails: true });

    const summary = await runSweep({ axisMax: 1, trials: 1 }, fake.ctx);

    expect(summary.attempted).toBe(2);
    expect(fake.logger.warn).toHaveBeenCalledWith('Result destination not ready', {
      error: 'read-only file system',
    });
  });

  it('aborts before any point when the destination is not ready under fail-fast', async () => {
    const fake = createFakeSweep({ ensureReadyFails: true });

    await expect(
      runSweep({ axisMax: 1, trials: 1, onFailure: 'fail-fast' }, fake.ctx)
    ).rejects.toThrow('Result destination unusable: read-only file system');
    expect(fake.events).toEqual([]);
  });

  it('rejects invalid bounds', async () => {
    const fake = createFakeSweep();
    await expect(runSweep({ axisMax: 0, trials: 1 }, fake.ctx)).rejects.toThrow(ValidationError);
  });
});
