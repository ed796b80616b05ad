/**
 * Sweep Commands
 */

import type { Command } from 'commander';
import { defineCommand } from '../core/defineCommand.js';
import { die } from '../core/cliErrors.js';
import { commandRegistry } from '../core/command-registry.js';
import { coerceBoolean, coerceNumber, coerceStringArray } from '../core/coerce.js';
import {
  decodeArtifactsSchema,
  inventorySweepSchema,
  planSweepSchema,
  runSweepSchema,
} from '../command-defs/sweep.js';
import { runSweepHandler } from '../handlers/sweep/run-sweep.js';
import { planSweepHandler } from '../handlers/sweep/plan-sweep.js';
import { decodeArtifactsHandler } from '../handlers/sweep/decode-artifacts.js';
import { inventorySweepHandler } from '../handlers/sweep/inventory-sweep.js';
import type { PackageCommandModule } from '../types/index.js';

const LIST_FLAGS = [
  'workloadArgs',
  'cleanCommand',
  'buildCommand',
  'samplerArgs',
  'events',
  'names',
] as const;
const NUMBER_FLAGS = ['axisMax', 'trials', 'buildTimeoutMs', 'measureTimeoutMs'] as const;
const BOOLEAN_FLAGS = ['sudo', 'echo', 'resume'] as const;

/**
 * Value coercion shared by every sweep command
 */
export function coerceSweepOptions(raw: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...raw };
  for (const key of LIST_FLAGS) {
    if (key in out) out[key] = coerceStringArray(out[key], key);
  }
  for (const key of NUMBER_FLAGS) {
    if (key in out) out[key] = coerceNumber(out[key], key);
  }
  for (const key of BOOLEAN_FLAGS) {
    if (key in out) out[key] = coerceBoolean(out[key], key);
  }
  return out;
}

function addBoundsOptions(cmd: Command): Command {
  return cmd
    .option('--config <path>', 'Sweep config file (YAML or JSON)')
    .option('--axis-max <n>', 'Highest concurrency level (sweeps 1..n)')
    .option('--trials <n>', 'Trials per level and mode (1..n)')
    .option('--out <dir>', 'Directory for artifacts and journal (default: logs)')
    .option('--prefix <name>', 'Artifact name prefix (default: emulator)')
    .option('--axis-label <label>', 'Axis label in artifact names (default: SMP)')
    .option('--extension <ext>', 'Artifact extension (default: .log)');
}

function addRunOptions(cmd: Command): Command {
  return addBoundsOptions(cmd)
    .option('--workload <path>', 'Workload binary, relative to the build directory')
    .option('--workload-args <list>', 'Workload arguments (JSON array or comma-separated)')
    .option('--build-dir <dir>', 'Directory the build and workload run in')
    .option('--clean-command <list>', 'Clean command (default: make,clean)')
    .option('--build-command <list>', 'Build command (default: make,check)')
    .option('--concurrency-param <name>', 'Build parameter for the level (default: SMP)')
    .option('--mode-param <name>', 'Build parameter for the mode (default: STOP_BOGOMIPS)')
    .option('--param-style <style>', 'Pass build parameters as make args or env (args|env)')
    .option('--sampler <cmd>', 'Counter sampler (default: perf)')
    .option('--sampler-args <list>', 'Sampler arguments before -e (default: stat,-B)')
    .option('--events <list>', 'Counter events to sample')
    .option('--sudo', 'Run the sampler through sudo (default)')
    .option('--no-sudo', 'Run the sampler directly')
    .option('--echo', 'Echo workload output while capturing (default)')
    .option('--no-echo', 'Capture workload output silently')
    .option('--on-failure <policy>', 'continue | fail-fast (default: continue)')
    .option('--on-existing <policy>', 'overwrite | error (default: overwrite)')
    .option('--build-timeout-ms <ms>', 'Timeout per build command (0 = none)')
    .option('--measure-timeout-ms <ms>', 'Timeout per measurement (0 = none)')
    .option('--resume', 'Skip points completed by an earlier run in the same directory')
    .option('--format <format>', 'Output format (json|table|csv)', 'table');
}

/**
 * Register sweep commands
 */
export function registerSweepCommands(program: Command): void {
  const sweepCmd = program
    .command('sweep')
    .description('Build, measure and record a performance sweep');

  const runCmd = addRunOptions(
    sweepCmd.command('run').description('Run every point of the sweep and store one artifact each')
  );
  defineCommand(runCmd, {
    name: 'run',
    packageName: 'sweep',
    coerce: coerceSweepOptions,
    onError: die,
  });

  const planCmd = addRunOptions(
    sweepCmd.command('plan').description('Print every point with its artifact and commands')
  );
  defineCommand(planCmd, {
    name: 'plan',
    packageName: 'sweep',
    coerce: coerceSweepOptions,
    onError: die,
  });

  const decodeCmd = sweepCmd
    .command('decode <names...>')
    .description('Recover level, trial and mode from artifact file names')
    .option('--prefix <name>', 'Artifact name prefix (default: emulator)')
    .option('--axis-label <label>', 'Axis label in artifact names (default: SMP)')
    .option('--extension <ext>', 'Artifact extension (default: .log)')
    .option('--format <format>', 'Output format (json|table|csv)', 'table');
  defineCommand(decodeCmd, {
    name: 'decode',
    packageName: 'sweep',
    argsToOpts: (args, rawOpts) => ({ ...rawOpts, names: args[0] }),
    coerce: coerceSweepOptions,
    onError: die,
  });

  const inventoryCmd = addBoundsOptions(
    sweepCmd.command('inventory').description('Report present, empty and missing artifacts')
  ).option('--format <format>', 'Output format (json|table|csv)', 'table');
  defineCommand(inventoryCmd, {
    name: 'inventory',
    packageName: 'sweep',
    coerce: coerceSweepOptions,
    onError: die,
  });
}

/**
 * Register as package command module
 */
export const sweepModule: PackageCommandModule = {
  packageName: 'sweep',
  description: 'Build, measure and record a performance sweep',
  commands: [
    {
      name: 'run',
      description: 'Run every point of the sweep and store one artifact each',
      schema: runSweepSchema,
      handler: runSweepHandler,
      examples: [
        'perfsweep sweep run --config sweep.yaml',
        'perfsweep sweep run --axis-max 32 --trials 5 --workload ./semu --workload-args "-k,Image"',
        'perfsweep sweep run --config sweep.yaml --resume --on-failure fail-fast',
      ],
    },
    {
      name: 'plan',
      description: 'Print every point with its artifact and commands',
      schema: planSweepSchema,
      handler: planSweepHandler,
      examples: ['perfsweep sweep plan --config sweep.yaml --format csv'],
    },
    {
      name: 'decode',
      description: 'Recover level, trial and mode from artifact file names',
      schema: decodeArtifactsSchema,
      handler: decodeArtifactsHandler,
      examples: ['perfsweep sweep decode logs/emulator_SMP_4_2_1.log'],
    },
    {
      name: 'inventory',
      description: 'Report present, empty and missing artifacts',
      schema: inventorySweepSchema,
      handler: inventorySweepHandler,
      examples: ['perfsweep sweep inventory --axis-max 32 --trials 5 --out logs'],
    },
  ],
};

commandRegistry.registerPackage(sweepModule);
