/**
 * Configuration loading from environment variables
 *
 * Provides typed defaults for the sweep harness. Values here sit under
 * config files and CLI flags: they only fill what neither of those sets.
 */

import { ConfigurationError } from '../errors.js';

export interface SweepEnvDefaults {
  /** Directory for result artifacts (PERFSWEEP_OUT_DIR, default: logs) */
  outDir: string;
  /** Working directory for the build step (PERFSWEEP_BUILD_DIR, default: cwd) */
  buildDir: string;
  /** Sampler binary (PERFSWEEP_SAMPLER, default: perf) */
  sampler: string;
  /** Whether the sampler is wrapped in sudo (PERFSWEEP_SUDO, default: true) */
  sudo: boolean;
}

/**
 * Parse a boolean-ish environment value
 */
function parseEnvBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const lower = value.trim().toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') return true;
  if (lower === 'false' || lower === '0' || lower === 'no') return false;
  throw new ConfigurationError(`${name} must be a boolean (true/false), got '${value}'`, name, {
    value,
  });
}

/**
 * Load sweep defaults from environment variables
 */
export function getSweepEnvDefaults(env: NodeJS.ProcessEnv = process.env): SweepEnvDefaults {
  const { PERFSWEEP_OUT_DIR, PERFSWEEP_BUILD_DIR, PERFSWEEP_SAMPLER, PERFSWEEP_SUDO } = env;

  return {
    outDir: PERFSWEEP_OUT_DIR || 'logs',
    buildDir: PERFSWEEP_BUILD_DIR || '.',
    sampler: PERFSWEEP_SAMPLER || 'perf',
    sudo: parseEnvBoolean('PERFSWEEP_SUDO', PERFSWEEP_SUDO, true),
  };
}
