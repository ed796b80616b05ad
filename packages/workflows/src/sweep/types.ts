import type { LogContext } from '@perfsweep/utils';
import type {
  BuildStepPort,
  ClockPort,
  FailureKind,
  FailurePolicy,
  MeasurementStepPort,
  PointRecord,
  ResultSinkPort,
  SweepJournalPort,
} from '@perfsweep/core';

export interface SweepLogger {
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
}

/**
 * Everything the sweep driver touches outside its own loop
 */
export interface SweepContext {
  logger: SweepLogger;
  clock: ClockPort;
  build: BuildStepPort;
  measure: MeasurementStepPort;
  sink: ResultSinkPort;
  /** Optional run journal (points.jsonl / errors.jsonl) */
  journal?: SweepJournalPort;
}

export interface RunSweepSpec {
  axisMax: number;
  trials: number;
  onFailure?: FailurePolicy;
  /** Point ids to skip (already completed by an earlier run) */
  skip?: ReadonlySet<string>;
}

export interface SweepSummary {
  totalPoints: number;
  /** Points actually executed (not skipped) */
  attempted: number;
  skipped: number;
  /** Executed points with no failures */
  succeeded: number;
  /** Executed points with at least one failure */
  failed: number;
  failuresByKind: Record<FailureKind, number>;
  records: PointRecord[];
  startedAtISO: string;
  completedAtISO: string;
  durationMs: number;
}
