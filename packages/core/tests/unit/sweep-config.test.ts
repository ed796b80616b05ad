import { describe, it, expect } from 'vitest';
import { SweepConfigSchema } from '../../src/schemas/sweep-config.js';
import { DEFAULT_COUNTER_EVENTS } from '../../src/domain/counters.js';
import { classifyBuild, classifyMeasure } from '../../src/domain/outcome.js';

describe('SweepConfigSchema', () => {
  it('fills the documented defaults', () => {
    const config = SweepConfigSchema.parse({
      axisMax: 32,
      trials: 5,
      measure: { workload: { path: './semu' } },
    });

    expect(config.build).toEqual({
      cwd: '.',
      cleanCommand: ['make', 'clean'],
      buildCommand: ['make', 'check'],
      concurrencyParam: 'SMP',
      modeParam: 'STOP_BOGOMIPS',
      paramStyle: 'args',
      timeoutMs: 0,
    });
    expect(config.measure).toEqual({
      sampler: 'perf',
      samplerArgs: ['stat', '-B'],
      events: [...DEFAULT_COUNTER_EVENTS],
      sudo: true,
      echo: true,
      timeoutMs: 0,
      workload: { path: './semu', args: [] },
    });
    expect(config.output).toEqual({
      dir: 'logs',
      prefix: 'emulator',
      axisLabel: 'SMP',
      extension: '.log',
      onExisting: 'overwrite',
    });
    expect(config.onFailure).toBe('continue');
    expect(config.resume).toBe(false);
  });

  it('samples sixteen counter channels by default', () => {
    expect(DEFAULT_COUNTER_EVENTS).toHaveLength(16);
    expect(DEFAULT_COUNTER_EVENTS[0]).toBe('cache-references');
    expect(DEFAULT_COUNTER_EVENTS[15]).toBe('LLC-prefetches');
  });

  it('requires a workload', () => {
    const result = SweepConfigSchema.safeParse({ axisMax: 1, trials: 1, measure: {} });
    expect(result.success).toBe(false);
  });

  it.each([
    { axisMax: 0, trials: 1 },
    { axisMax: 1, trials: 0 },
    { axisMax: 1.5, trials: 1 },
  ])('rejects bounds %o', (bounds) => {
    const result = SweepConfigSchema.safeParse({
      ...bounds,
      measure: { workload: { path: './semu' } },
    });
    expect(result.success).toBe(false);
  });

  it('rejects parameter names make cannot take', () => {
    const result = SweepConfigSchema.safeParse({
      axisMax: 1,
      trials: 1,
      build: { concurrencyParam: 'SMP COUNT' },
      measure: { workload: { path: './semu' } },
    });
    expect(result.success).toBe(false);
  });
});

describe('outcome classification', () => {
  it('maps statuses onto failure kinds', () => {
    expect(classifyBuild({ status: 'ok', durationMs: 1 })).toBeNull();
    expect(classifyBuild({ status: 'failed', exitCode: 2, durationMs: 1 })).toBe('build_failed');
    expect(classifyBuild({ status: 'spawn_error', durationMs: 1 })).toBe('build_failed');
    expect(classifyBuild({ status: 'timed_out', durationMs: 1 })).toBe('build_timed_out');
    expect(classifyMeasure({ status: 'ok', durationMs: 1 })).toBeNull();
    expect(classifyMeasure({ status: 'failed', durationMs: 1 })).toBe('measure_failed');
    expect(classifyMeasure({ status: 'timed_out', durationMs: 1 })).toBe('measure_timed_out');
  });
});
