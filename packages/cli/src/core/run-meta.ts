/**
 * Run Metadata Utilities
 *
 * Utilities for generating run metadata:
 * - Git SHA (for reproducibility)
 * - Config hash (for deduplication)
 * - Sweep ID generation
 */

import { execSync } from 'child_process';
import { createHash } from 'crypto';
import { DateTime } from 'luxon';
import type { FailureKind } from '@perfsweep/core';

/**
 * Get git SHA (or "unknown" if not in git repo)
 */
export function getGitSha(cwd?: string): string {
  try {
    return execSync('git rev-parse HEAD', {
      encoding: 'utf-8',
      cwd,
      stdio: ['ignore', 'pipe', 'ignore'],
    }).trim();
  } catch {
    return 'unknown';
  }
}

function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeysDeep(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

/**
 * Generate config hash for reproducibility
 *
 * Same config (regardless of key order) = same hash.
 *
 * @returns First 16 characters of SHA256 hash
 */
export function generateConfigHash(config: Record<string, unknown>): string {
  const json = JSON.stringify(sortKeysDeep(config));
  return createHash('sha256').update(json).digest('hex').substring(0, 16);
}

/**
 * Generate sweep ID from timestamp
 *
 * Format: sweep-YYYYMMDD-HHmmss
 */
export function generateSweepId(now: DateTime = DateTime.utc()): string {
  return `sweep-${now.toUTC().toFormat('yyyyMMdd-HHmmss')}`;
}

/**
 * Run metadata structure (run.meta.json)
 */
export interface RunMetadata {
  sweepId: string;
  startedAtISO: string;
  completedAtISO: string;
  durationMs: number;
  gitSha: string;
  configHash: string;
  config: Record<string, unknown>;
  counts: {
    totalPoints: number;
    attempted: number;
    skipped: number;
    succeeded: number;
    failed: number;
  };
  failuresByKind?: Partial<Record<FailureKind, number>>;
  /** Set when the sweep stopped early */
  aborted?: { pointId: string; message: string };
  completedPointIds: string[];
}
