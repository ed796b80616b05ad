/**
 * Resume support
 *
 * A point counts as completed once its artifact was persisted. Completed ids
 * come from run.meta.json (finished runs) and points.jsonl (runs killed
 * part-way), so either file alone is enough to resume.
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import { logger } from '@perfsweep/utils';
import { journalPaths } from './results-writer.js';

const MetaSchema = z.object({
  completedPointIds: z.array(z.string()).default([]),
});

const PointLineSchema = z.object({
  pointId: z.string(),
  persisted: z.object({ path: z.string() }).optional(),
});

function readJson(filePath: string): unknown {
  return JSON.parse(readFileSync(filePath, 'utf-8'));
}

/**
 * Load completed point ids from a previous run's journal
 */
export function loadCompletedPointIds(outDir: string): Set<string> {
  const paths = journalPaths(outDir);
  const completed = new Set<string>();

  if (existsSync(paths.meta)) {
    try {
      const meta = MetaSchema.safeParse(readJson(paths.meta));
      if (meta.success) {
        for (const id of meta.data.completedPointIds) completed.add(id);
      } else {
        logger.warn('Ignoring malformed run metadata', { path: paths.meta });
      }
    } catch (error) {
      logger.warn('Could not read run metadata', {
        path: paths.meta,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  if (existsSync(paths.points)) {
    const lines = readFileSync(paths.points, 'utf-8').split('\n');
    let skipped = 0;
    for (const line of lines) {
      if (!line.trim()) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        // A run killed mid-write leaves a truncated last line
        skipped++;
        continue;
      }
      const row = PointLineSchema.safeParse(parsed);
      if (!row.success) {
        skipped++;
        continue;
      }
      if (row.data.persisted) completed.add(row.data.pointId);
    }
    if (skipped > 0) {
      logger.warn('Skipped unreadable journal lines', { path: paths.points, skipped });
    }
  }

  return completed;
}

