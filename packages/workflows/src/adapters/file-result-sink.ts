/**
 * File Result Sink
 *
 * One plain-text file per sweep point, named by the artifact naming scheme,
 * inside a single output directory.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { AppError } from '@perfsweep/utils';
import {
  assertValidNaming,
  formatArtifactName,
  type ArtifactNaming,
  type PersistReceipt,
  type ResultSinkPort,
  type SweepPoint,
} from '@perfsweep/core';

export type ExistingArtifactPolicy = 'overwrite' | 'error';

export interface FileResultSinkOptions {
  dir: string;
  naming: ArtifactNaming;
  onExisting?: ExistingArtifactPolicy;
}

export class ArtifactExistsError extends AppError {
  constructor(
    public readonly artifactPath: string,
    context?: Record<string, unknown>
  ) {
    super(`Artifact already exists: ${artifactPath}`, 'ARTIFACT_EXISTS', {
      ...context,
      path: artifactPath,
    });
    this.name = 'ArtifactExistsError';
  }
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export class FileResultSink implements ResultSinkPort {
  readonly name = 'file-result-sink';
  private readonly dir: string;
  private readonly naming: ArtifactNaming;
  private readonly onExisting: ExistingArtifactPolicy;
  private ready: Promise<void> | null = null;

  constructor(options: FileResultSinkOptions) {
    assertValidNaming(options.naming);
    this.dir = path.resolve(options.dir);
    this.naming = options.naming;
    this.onExisting = options.onExisting ?? 'overwrite';
  }

  ensureReady(): Promise<void> {
    if (!this.ready) {
      this.ready = fs.mkdir(this.dir, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          // Allow a retry on the next call
          this.ready = null;
          throw error;
        }
      );
    }
    return this.ready;
  }

  locate(point: SweepPoint): string {
    return path.join(this.dir, formatArtifactName(point, this.naming));
  }

  async persist(point: SweepPoint, text: string): Promise<PersistReceipt> {
    await this.ensureReady();
    const target = this.locate(point);
    try {
      await fs.writeFile(target, text, {
        encoding: 'utf8',
        flag: this.onExisting === 'error' ? 'wx' : 'w',
      });
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        throw new ArtifactExistsError(target, { level: point.level, trial: point.trial });
      }
      throw error;
    }
    return { path: target, bytes: Buffer.byteLength(text, 'utf8') };
  }
}
