import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { inventorySweep } from '../../src/sweep/inventory-sweep.js';

describe('workflows.inventorySweep', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'perfsweep-inventory-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('sorts artifacts into present, empty and missing', async () => {
    await fs.writeFile(path.join(root, 'emulator_SMP_1_1_0.log'), 'data');
    await fs.writeFile(path.join(root, 'emulator_SMP_1_1_1.log'), '');
    await fs.writeFile(path.join(root, 'emulator_SMP_9_9_0.log'), 'stale');
    await fs.writeFile(path.join(root, 'emulator_SMP_10_1_0.log'), 'stale');
    await fs.writeFile(path.join(root, 'emulator_SMP_1_1_0.log.bak'), 'copy');
    await fs.writeFile(path.join(root, 'points.jsonl'), '');

    const inventory = await inventorySweep({ dir: root, axisMax: 1, trials: 2 });

    expect(inventory.counts).toEqual({ present: 1, empty: 1, missing: 2 });
    expect(inventory.entries.map((e) => [e.artifact, e.status, e.bytes])).toEqual([
      ['emulator_SMP_1_1_0.log', 'present', 4],
      ['emulator_SMP_1_1_1.log', 'empty', 0],
      ['emulator_SMP_1_2_0.log', 'missing', 0],
      ['emulator_SMP_1_2_1.log', 'missing', 0],
    ]);
    expect(inventory.unrecognized).toEqual([
      'emulator_SMP_9_9_0.log',
      'emulator_SMP_10_1_0.log',
      'emulator_SMP_1_1_0.log.bak',
    ]);
  });

  it('reports everything missing when the directory does not exist', async () => {
    const inventory = await inventorySweep({ dir: path.join(root, 'absent'), axisMax: 2, trials: 1 });

    expect(inventory.counts).toEqual({ present: 0, empty: 0, missing: 4 });
    expect(inventory.entries[3]?.pointId).toBe('level=2_trial=1_mode=1');
    expect(inventory.unrecognized).toEqual([]);
  });

  it('rejects a prefix that would reach outside the directory', async () => {
    await expect(
      inventorySweep({
        dir: root,
        axisMax: 1,
        trials: 1,
        naming: { prefix: '../x', axisLabel: 'SMP', extension: '.log' },
      })
    ).rejects.toThrow("Invalid artifact prefix: '../x'");
  });
});
