/**
 * Map flat sweep flags onto the nested config shape and resolve
 * env defaults → config file → flags.
 */

import { getSweepEnvDefaults } from '@perfsweep/utils';
import { SweepConfigSchema, type SweepConfig } from '@perfsweep/core';
import { loadConfig, type ConfigObject } from '../../core/config-loader.js';
import type { SweepConfigFlags } from '../../command-defs/sweep.js';

/**
 * Drop undefined entries so they never shadow lower-precedence values
 */
function defined(values: ConfigObject): ConfigObject {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

export function flagsToOverrides(flags: Partial<SweepConfigFlags>): ConfigObject {
  const workload = defined({ path: flags.workload, args: flags.workloadArgs });

  return defined({
    axisMax: flags.axisMax,
    trials: flags.trials,
    onFailure: flags.onFailure,
    resume: flags.resume,
    build: defined({
      cwd: flags.buildDir,
      cleanCommand: flags.cleanCommand,
      buildCommand: flags.buildCommand,
      concurrencyParam: flags.concurrencyParam,
      modeParam: flags.modeParam,
      paramStyle: flags.paramStyle,
      timeoutMs: flags.buildTimeoutMs,
    }),
    measure: defined({
      sampler: flags.sampler,
      samplerArgs: flags.samplerArgs,
      events: flags.events,
      sudo: flags.sudo,
      echo: flags.echo,
      timeoutMs: flags.measureTimeoutMs,
      workload: Object.keys(workload).length > 0 ? workload : undefined,
    }),
    output: defined({
      dir: flags.out,
      prefix: flags.prefix,
      axisLabel: flags.axisLabel,
      extension: flags.extension,
      onExisting: flags.onExisting,
    }),
  });
}

export function envDefaults(env: NodeJS.ProcessEnv): ConfigObject {
  const defaults = getSweepEnvDefaults(env);
  return {
    build: { cwd: defaults.buildDir },
    measure: { sampler: defaults.sampler, sudo: defaults.sudo },
    output: { dir: defaults.outDir },
  };
}

/**
 * Resolve and validate the full sweep configuration
 */
export function resolveSweepConfig(
  flags: Partial<SweepConfigFlags>,
  env: NodeJS.ProcessEnv = process.env
): SweepConfig {
  return loadConfig(flags.config, SweepConfigSchema, flagsToOverrides(flags), envDefaults(env));
}
