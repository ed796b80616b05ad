/**
 * Step Outcomes
 *
 * Build and measurement failures are data, not exceptions: every step
 * returns one of these and the driver decides what to do with it.
 */

import type { SweepPoint } from './sweep.js';

export type StepStatus = 'ok' | 'failed' | 'timed_out' | 'spawn_error';

export interface StepOutcome {
  status: StepStatus;
  /** Exit code, when the process exited on its own */
  exitCode?: number;
  /** Terminating signal, when the process was killed */
  signal?: string;
  durationMs: number;
  /** Short human-readable reason for a non-ok status */
  message?: string;
}

/**
 * Failure taxonomy recorded per point
 */
export type FailureKind =
  | 'build_failed'
  | 'build_timed_out'
  | 'measure_failed'
  | 'measure_timed_out'
  | 'persist_failed';

export const FAILURE_KINDS: readonly FailureKind[] = [
  'build_failed',
  'build_timed_out',
  'measure_failed',
  'measure_timed_out',
  'persist_failed',
];

/**
 * Map a build outcome onto the taxonomy (null when ok)
 */
export function classifyBuild(outcome: StepOutcome): FailureKind | null {
  switch (outcome.status) {
    case 'ok':
      return null;
    case 'timed_out':
      return 'build_timed_out';
    default:
      return 'build_failed';
  }
}

/**
 * Map a measurement outcome onto the taxonomy (null when ok)
 */
export function classifyMeasure(outcome: StepOutcome): FailureKind | null {
  switch (outcome.status) {
    case 'ok':
      return null;
    case 'timed_out':
      return 'measure_timed_out';
    default:
      return 'measure_failed';
  }
}

export interface PersistReceipt {
  /** Absolute or sink-relative path of the written artifact */
  path: string;
  bytes: number;
}

/**
 * Everything known about one executed point
 */
export interface PointRecord extends SweepPoint {
  pointId: string;
  artifactName: string;
  build: StepOutcome;
  /** Absent only when fail-fast aborted before measuring */
  measure?: StepOutcome;
  persisted?: PersistReceipt;
  persistError?: string;
  failures: FailureKind[];
  startedAtISO: string;
  completedAtISO: string;
}
