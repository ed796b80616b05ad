import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { SweepConfigSchema } from '@perfsweep/core';
import {
  deepMerge,
  detectConfigFormat,
  loadConfig,
  readConfigFile,
} from '../../../src/core/config-loader.js';

describe('config-loader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'perfsweep-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('detects the format from the extension', () => {
    expect(detectConfigFormat('sweep.yml')).toBe('yaml');
    expect(detectConfigFormat('SWEEP.YAML')).toBe('yaml');
    expect(detectConfigFormat('sweep.json')).toBe('json');
    expect(detectConfigFormat('sweep.conf')).toBe('json');
  });

  it('merges objects, replaces arrays and ignores undefined', () => {
    expect(
      deepMerge({ a: { b: 1, c: 2 }, list: [1, 2], keep: 'x' }, { a: { c: 3 }, list: [9], keep: undefined })
    ).toEqual({ a: { b: 1, c: 3 }, list: [9], keep: 'x' });
  });

  it('layers defaults, file and overrides', async () => {
    const file = path.join(dir, 'sweep.yaml');
    await fs.writeFile(
      file,
      ['axisMax: 4', 'trials: 2', 'measure:', '  workload:', '    path: ./semu', ''].join('\n')
    );

    const config = loadConfig(file, SweepConfigSchema, { trials: 3 }, { output: { dir: 'results' } });

    expect(config.axisMax).toBe(4);
    expect(config.trials).toBe(3);
    expect(config.output.dir).toBe('results');
    expect(config.measure.workload).toEqual({ path: './semu', args: [] });
  });

  it('reads JSON files', async () => {
    const file = path.join(dir, 'sweep.json');
    await fs.writeFile(file, JSON.stringify({ axisMax: 2 }));
    expect(readConfigFile(file)).toEqual({ axisMax: 2 });
  });

  it('rejects a YAML file that is not a mapping', async () => {
    const file = path.join(dir, 'sweep.yaml');
    await fs.writeFile(file, 'just text\n');
    expect(() => readConfigFile(file)).toThrow('YAML config must be an object');
  });

  it('reports unreadable files', () => {
    expect(() => readConfigFile(path.join(dir, 'absent.yaml'))).toThrow(
      `Failed to load config from ${path.join(dir, 'absent.yaml')}`
    );
  });

  it('lists validation issues by path', () => {
    expect(() =>
      loadConfig(undefined, SweepConfigSchema, {
        axisMax: 0,
        trials: 1,
        measure: { workload: { path: './semu' } },
      })
    ).toThrow('Config validation failed: axisMax: Number must be greater than or equal to 1');
  });
});
