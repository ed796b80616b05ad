import { describe, it, expect } from 'vitest';
import { ValidationError } from '@perfsweep/utils';
import {
  comparePoints,
  countSweepPoints,
  enumerateSweepPoints,
  modeDigit,
  rangeOf,
  valuesOf,
} from '../../src/domain/sweep.js';

describe('sweep space', () => {
  describe('rangeOf', () => {
    it('builds an inclusive range from 1', () => {
      expect(rangeOf(4)).toEqual({ start: 1, end: 4 });
      expect(valuesOf(rangeOf(4))).toEqual([1, 2, 3, 4]);
    });

    it.each([0, -1, 2.5, Number.NaN])('rejects upper bound %s', (end) => {
      expect(() => rangeOf(end, 'axisMax')).toThrow(ValidationError);
    });

    it('names the bound in the error', () => {
      expect(() => rangeOf(0, 'trials')).toThrow('trials upper bound must be an integer >= 1, got 0');
    });
  });

  describe('enumerateSweepPoints', () => {
    it('yields level, then trial, then mode false before true', () => {
      expect([...enumerateSweepPoints(2, 2)]).toEqual([
        { level: 1, trial: 1, mode: false },
        { level: 1, trial: 1, mode: true },
        { level: 1, trial: 2, mode: false },
        { level: 1, trial: 2, mode: true },
        { level: 2, trial: 1, mode: false },
        { level: 2, trial: 1, mode: true },
        { level: 2, trial: 2, mode: false },
        { level: 2, trial: 2, mode: true },
      ]);
    });

    it('yields exactly two points for a 1x1 sweep', () => {
      expect([...enumerateSweepPoints(1, 1)]).toEqual([
        { level: 1, trial: 1, mode: false },
        { level: 1, trial: 1, mode: true },
      ]);
    });

    it('matches countSweepPoints for the default sweep', () => {
      const points = [...enumerateSweepPoints(32, 5)];
      expect(points).toHaveLength(320);
      expect(countSweepPoints(32, 5)).toBe(320);
      expect(points[points.length - 1]).toEqual({ level: 32, trial: 5, mode: true });
    });

    it('throws before yielding when a bound is invalid', () => {
      expect(() => [...enumerateSweepPoints(3, 0)]).toThrow(ValidationError);
    });
  });

  describe('comparePoints', () => {
    it('orders by level, trial, then mode', () => {
      const a = { level: 1, trial: 2, mode: true };
      const b = { level: 2, trial: 1, mode: false };
      const c = { level: 2, trial: 1, mode: true };
      expect([c, b, a].sort(comparePoints)).toEqual([a, b, c]);
      expect(comparePoints(b, b)).toBe(0);
    });
  });

  it('renders mode as a single digit', () => {
    expect(modeDigit(false)).toBe('0');
    expect(modeDigit(true)).toBe('1');
  });
});
