/**
 * Inventory Sweep
 *
 * Compares an output directory against the sweep space: which artifacts are
 * present, empty or missing, and which files look like artifacts but do not
 * belong to this sweep.
 */

import { promises as fs } from 'fs';
import path from 'path';
import {
  DEFAULT_NAMING,
  assertValidNaming,
  comparePoints,
  enumerateSweepPoints,
  formatArtifactName,
  formatPointId,
  parseArtifactName,
  type ArtifactNaming,
} from '@perfsweep/core';

export type ArtifactStatus = 'present' | 'empty' | 'missing';

export interface InventoryEntry {
  pointId: string;
  level: number;
  trial: number;
  mode: boolean;
  artifact: string;
  status: ArtifactStatus;
  bytes: number;
}

export interface SweepInventory {
  dir: string;
  entries: InventoryEntry[];
  counts: Record<ArtifactStatus, number>;
  /**
   * Files carrying the artifact prefix that no point in range produces:
   * out-of-range artifacts in sweep order, then names that do not parse
   */
  unrecognized: string[];
}

export interface InventorySweepSpec {
  dir: string;
  axisMax: number;
  trials: number;
  naming?: ArtifactNaming;
}

async function listDir(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

export async function inventorySweep(spec: InventorySweepSpec): Promise<SweepInventory> {
  const naming = spec.naming ?? DEFAULT_NAMING;
  assertValidNaming(naming);
  const dir = path.resolve(spec.dir);
  const files = new Set(await listDir(dir));
  const expected = new Set<string>();
  const entries: InventoryEntry[] = [];
  const counts: Record<ArtifactStatus, number> = { present: 0, empty: 0, missing: 0 };

  for (const point of enumerateSweepPoints(spec.axisMax, spec.trials)) {
    const artifact = formatArtifactName(point, naming);
    expected.add(artifact);

    let status: ArtifactStatus = 'missing';
    let bytes = 0;
    if (files.has(artifact)) {
      const stat = await fs.stat(path.join(dir, artifact));
      bytes = stat.size;
      status = bytes > 0 ? 'present' : 'empty';
    }
    counts[status]++;
    entries.push({
      pointId: formatPointId(point),
      level: point.level,
      trial: point.trial,
      mode: point.mode,
      artifact,
      status,
      bytes,
    });
  }

  const stray = [...files].filter((name) => name.startsWith(`${naming.prefix}_`) && !expected.has(name));
  const outOfRange = stray
    .flatMap((name) => {
      const point = parseArtifactName(name, naming);
      return point ? [{ name, point }] : [];
    })
    .sort((a, b) => comparePoints(a.point, b.point))
    .map(({ name }) => name);
  const unparsed = stray.filter((name) => parseArtifactName(name, naming) === null).sort();

  return { dir, entries, counts, unrecognized: [...outOfRange, ...unparsed] };
}

