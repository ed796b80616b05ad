/**
 * Artifact Naming
 *
 * Maps a sweep point to the file name its measurement output is stored under,
 * and back. The mapping is a bijection between valid points and names that
 * parse: integers carry no leading zeros and the mode is a single 0/1 digit.
 */

import { ValidationError } from '@perfsweep/utils';
import { modeDigit, type SweepPoint } from './sweep.js';

export interface ArtifactNaming {
  /** Leading name component (e.g. 'emulator') */
  prefix: string;
  /** Label of the swept axis (e.g. 'SMP') */
  axisLabel: string;
  /** File extension including the dot (e.g. '.log') */
  extension: string;
}

export const DEFAULT_NAMING: ArtifactNaming = {
  prefix: 'emulator',
  axisLabel: 'SMP',
  extension: '.log',
};

const SAFE_COMPONENT = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const SAFE_EXTENSION = /^(\.[A-Za-z0-9]+)*$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Reject naming components that could escape the output directory
 */
export function assertValidNaming(naming: ArtifactNaming): void {
  for (const key of ['prefix', 'axisLabel'] as const) {
    if (!SAFE_COMPONENT.test(naming[key])) {
      throw new ValidationError(`Invalid artifact ${key}: '${naming[key]}'`, {
        [key]: naming[key],
        allowed: SAFE_COMPONENT.source,
      });
    }
  }
  if (!SAFE_EXTENSION.test(naming.extension)) {
    throw new ValidationError(`Invalid artifact extension: '${naming.extension}'`, {
      extension: naming.extension,
    });
  }
}

/**
 * Format the artifact file name for a point
 *
 * Default: emulator_SMP_<level>_<trial>_<0|1>.log
 */
export function formatArtifactName(point: SweepPoint, naming: ArtifactNaming = DEFAULT_NAMING): string {
  if (!Number.isInteger(point.level) || point.level < 1) {
    throw new ValidationError(`Invalid level: ${point.level}`, { point });
  }
  if (!Number.isInteger(point.trial) || point.trial < 1) {
    throw new ValidationError(`Invalid trial: ${point.trial}`, { point });
  }
  return `${naming.prefix}_${naming.axisLabel}_${point.level}_${point.trial}_${modeDigit(point.mode)}${naming.extension}`;
}

/**
 * Build the matcher for a naming scheme
 */
export function artifactNamePattern(naming: ArtifactNaming = DEFAULT_NAMING): RegExp {
  return new RegExp(
    `^${escapeRegExp(naming.prefix)}_${escapeRegExp(naming.axisLabel)}_([1-9]\\d*)_([1-9]\\d*)_([01])${escapeRegExp(naming.extension)}$`
  );
}

/**
 * Recover the point from an artifact file name (base name, no directory)
 *
 * @returns the point, or null when the name was not produced by formatArtifactName
 */
export function parseArtifactName(
  name: string,
  naming: ArtifactNaming = DEFAULT_NAMING
): SweepPoint | null {
  const match = artifactNamePattern(naming).exec(name);
  if (!match) {
    return null;
  }
  const [, level, trial, mode] = match;
  if (level === undefined || trial === undefined || mode === undefined) {
    return null;
  }
  const point = { level: Number(level), trial: Number(trial), mode: mode === '1' };
  if (!Number.isSafeInteger(point.level) || !Number.isSafeInteger(point.trial)) {
    return null;
  }
  return point;
}

/**
 * Stable point id used by the journal and resume
 */
export function formatPointId(point: SweepPoint): string {
  return `level=${point.level}_trial=${point.trial}_mode=${modeDigit(point.mode)}`;
}
