/**
 * Sweep Space
 * ===========
 *
 * The configuration grid the driver walks: concurrency level (the axis) ×
 * trial index × mode flag. Everything here is pure and allocation-light so
 * a full sweep can be planned, counted and resumed without side effects.
 */

import { ValidationError } from '@perfsweep/utils';

/**
 * Inclusive integer range starting at 1
 */
export interface IntRange {
  readonly start: 1;
  readonly end: number;
}

/**
 * One Build+Measure invocation is fully determined by this pair.
 */
export interface RunConfiguration {
  /** Concurrency level baked into the build (e.g. SMP) */
  level: number;
  /** Run-mode flag baked into the build (e.g. STOP_BOGOMIPS) */
  mode: boolean;
}

/**
 * A single position in the sweep
 */
export interface SweepPoint extends RunConfiguration {
  trial: number;
}

/**
 * Mode values in the order the driver visits them
 */
export const MODE_ORDER: readonly boolean[] = [false, true];

/**
 * Build an inclusive 1..end range
 *
 * @throws ValidationError if end is not a positive integer
 */
export function rangeOf(end: number, name = 'range'): IntRange {
  if (!Number.isInteger(end) || end < 1) {
    throw new ValidationError(`${name} upper bound must be an integer >= 1, got ${end}`, {
      name,
      end,
    });
  }
  return { start: 1, end };
}

/**
 * Values of a range in ascending order
 */
export function valuesOf(range: IntRange): number[] {
  return Array.from({ length: range.end - range.start + 1 }, (_, i) => range.start + i);
}

/**
 * Number of points in a sweep: 2 · axisEnd · trialEnd
 */
export function countSweepPoints(axisEnd: number, trialEnd: number): number {
  const axis = rangeOf(axisEnd, 'axis');
  const trials = rangeOf(trialEnd, 'trials');
  return axis.end * trials.end * MODE_ORDER.length;
}

/**
 * Enumerate the full cross product in driver order:
 * level ascending, then trial ascending, then mode false before true.
 */
export function* enumerateSweepPoints(axisEnd: number, trialEnd: number): Generator<SweepPoint> {
  const axis = rangeOf(axisEnd, 'axis');
  const trials = rangeOf(trialEnd, 'trials');

  for (const level of valuesOf(axis)) {
    for (const trial of valuesOf(trials)) {
      for (const mode of MODE_ORDER) {
        yield { level, trial, mode };
      }
    }
  }
}

/**
 * Lexicographic order over (level, trial, mode)
 */
export function comparePoints(a: SweepPoint, b: SweepPoint): number {
  if (a.level !== b.level) return a.level - b.level;
  if (a.trial !== b.trial) return a.trial - b.trial;
  return Number(a.mode) - Number(b.mode);
}

/**
 * Mode flag as it appears in build parameters and file names
 */
export function modeDigit(mode: boolean): '0' | '1' {
  return mode ? '1' : '0';
}
