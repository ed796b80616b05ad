/**
 * Decode Artifacts Handler - recover (level, trial, mode) from file names
 */

import path from 'path';
import {
  assertValidNaming,
  DEFAULT_NAMING,
  formatPointId,
  parseArtifactName,
  type ArtifactNaming,
} from '@perfsweep/core';
import type { DecodeArtifactsArgs } from '../../command-defs/sweep.js';

export interface DecodedArtifact {
  name: string;
  valid: boolean;
  level?: number;
  trial?: number;
  mode?: 0 | 1;
  pointId?: string;
}

export function decodeArtifactsHandler(args: DecodeArtifactsArgs): DecodedArtifact[] {
  const naming: ArtifactNaming = {
    prefix: args.prefix ?? DEFAULT_NAMING.prefix,
    axisLabel: args.axisLabel ?? DEFAULT_NAMING.axisLabel,
    extension: args.extension ?? DEFAULT_NAMING.extension,
  };
  assertValidNaming(naming);

  return args.names.map((name) => {
    const point = parseArtifactName(path.basename(name), naming);
    if (!point) {
      return { name, valid: false };
    }
    return {
      name,
      valid: true,
      level: point.level,
      trial: point.trial,
      mode: point.mode ? 1 : 0,
      pointId: formatPointId(point),
    };
  });
}
