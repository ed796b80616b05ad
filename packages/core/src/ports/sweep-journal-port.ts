/**
 * Sweep Journal Port
 *
 * Receives each point's record as soon as the point completes, so a sweep that
 * is killed part-way still leaves a usable trail.
 */

import type { FailureKind, PointRecord } from '../domain/outcome.js';

export interface SweepJournalPort {
  recordPoint(record: PointRecord): Promise<void>;
  recordFailure(failure: {
    pointId: string;
    kind: FailureKind;
    message?: string;
  }): Promise<void>;
}
