/**
 * Results Writer - sweep journal
 *
 * Journal files live next to the artifacts:
 * - points.jsonl: one PointRecord per executed point, appended as it completes
 * - errors.jsonl: one row per recorded failure
 * - config.json: the resolved configuration (provenance)
 * - run.meta.json: git sha, config hash, timings, counts, completed point ids
 *
 * Rows are appended per point so a sweep killed part-way still leaves a
 * trail that resume can pick up.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { DateTime } from 'luxon';
import { ConfigurationError } from '@perfsweep/utils';
import type { FailureKind, PointRecord, SweepJournalPort } from '@perfsweep/core';
import type { RunMetadata } from './run-meta.js';
import { getGitSha, generateConfigHash, generateSweepId } from './run-meta.js';

export const JOURNAL_FILES = {
  points: 'points.jsonl',
  errors: 'errors.jsonl',
  meta: 'run.meta.json',
  config: 'config.json',
} as const;

/**
 * Artifact paths for a run
 */
export interface JournalPaths {
  outDir: string;
  points: string;
  errors: string;
  meta: string;
  config: string;
}

export interface JournalCounts {
  points: number;
  /** Points recorded with at least one failure */
  failedPoints: number;
  errors: number;
}

export interface InitializeOptions {
  /** Keep existing rows (resume) instead of truncating */
  append?: boolean;
  /** Point ids already completed by earlier runs */
  completedPointIds?: Iterable<string>;
  /** Directory git is asked for the commit sha */
  gitCwd?: string;
}

export interface FinalizeInput {
  counts: RunMetadata['counts'];
  failuresByKind?: Partial<Record<FailureKind, number>>;
  aborted?: { pointId: string; message: string };
}

export function journalPaths(outDir: string): JournalPaths {
  return {
    outDir,
    points: path.join(outDir, JOURNAL_FILES.points),
    errors: path.join(outDir, JOURNAL_FILES.errors),
    meta: path.join(outDir, JOURNAL_FILES.meta),
    config: path.join(outDir, JOURNAL_FILES.config),
  };
}

/**
 * Usage:
 * ```typescript
 * const writer = new ResultsWriter();
 * await writer.initialize(outDir, config);
 * // pass as SweepContext.journal
 * const result = await writer.finalize({ counts });
 * ```
 */
export class ResultsWriter implements SweepJournalPort {
  private paths?: JournalPaths;
  private counts: JournalCounts = { points: 0, failedPoints: 0, errors: 0 };
  private startedAt?: DateTime;
  private sweepId?: string;
  private gitSha?: string;
  private configHash?: string;
  private config?: Record<string, unknown>;
  private completedPointIds = new Set<string>();

  constructor(private readonly now: () => DateTime = () => DateTime.utc()) {}

  async initialize(
    outDir: string,
    config: Record<string, unknown>,
    options: InitializeOptions = {}
  ): Promise<void> {
    await fs.mkdir(outDir, { recursive: true });

    this.startedAt = this.now();
    this.sweepId = generateSweepId(this.startedAt);
    this.gitSha = getGitSha(options.gitCwd);
    this.configHash = generateConfigHash(config);
    this.config = config;
    this.completedPointIds = new Set(options.completedPointIds ?? []);
    this.paths = journalPaths(outDir);

    // Pre-create JSONL files so readers never hit ENOENT
    const flag = options.append ? 'a' : 'w';
    await fs.writeFile(this.paths.points, '', { encoding: 'utf8', flag });
    await fs.writeFile(this.paths.errors, '', { encoding: 'utf8', flag });

    await fs.writeFile(this.paths.config, JSON.stringify(this.config, null, 2), 'utf8');
    await this.writeMeta({
      completedAtISO: '',
      durationMs: 0,
      counts: { totalPoints: 0, attempted: 0, skipped: 0, succeeded: 0, failed: 0 },
    });
  }

  async recordPoint(record: PointRecord): Promise<void> {
    const paths = this.requirePaths('recordPoint');
    await fs.appendFile(paths.points, JSON.stringify(record) + '\n', 'utf8');
    this.counts.points++;
    if (record.failures.length > 0) {
      this.counts.failedPoints++;
    }
    if (record.persisted) {
      this.completedPointIds.add(record.pointId);
    }
  }

  async recordFailure(failure: {
    pointId: string;
    kind: FailureKind;
    message?: string;
  }): Promise<void> {
    const paths = this.requirePaths('recordFailure');
    const row = {
      kind: failure.kind,
      pointId: failure.pointId,
      message: failure.message ?? null,
      ts: this.now().toISO(),
    };
    await fs.appendFile(paths.errors, JSON.stringify(row) + '\n', 'utf8');
    this.counts.errors++;
  }

  /**
   * Write the final run.meta.json
   */
  async finalize(input: FinalizeInput): Promise<{ paths: JournalPaths; counts: JournalCounts }> {
    const paths = this.requirePaths('finalize');
    const startedAt = this.startedAt ?? this.now();
    const completedAt = this.now();

    await this.writeMeta({
      completedAtISO: completedAt.toISO() ?? '',
      durationMs: completedAt.diff(startedAt).as('milliseconds'),
      counts: input.counts,
      failuresByKind: input.failuresByKind,
      aborted: input.aborted,
    });

    return { paths, counts: { ...this.counts } };
  }

  getCounts(): JournalCounts {
    return { ...this.counts };
  }

  private async writeMeta(
    partial: Pick<RunMetadata, 'completedAtISO' | 'durationMs' | 'counts'> &
      Pick<Partial<RunMetadata>, 'failuresByKind' | 'aborted'>
  ): Promise<void> {
    const paths = this.requirePaths('writeMeta');
    const meta: RunMetadata = {
      sweepId: this.sweepId ?? generateSweepId(),
      startedAtISO: this.startedAt?.toISO() ?? '',
      gitSha: this.gitSha ?? 'unknown',
      configHash: this.configHash ?? '',
      config: this.config ?? {},
      ...partial,
      completedPointIds: [...this.completedPointIds].sort(),
    };
    await fs.writeFile(paths.meta, JSON.stringify(meta, null, 2), 'utf8');
  }

  private requirePaths(operation: string): JournalPaths {
    if (!this.paths) {
      throw new ConfigurationError(
        'ResultsWriter not initialized. Call initialize() first.',
        'ResultsWriter.paths',
        { operation }
      );
    }
    return this.paths;
  }
}
