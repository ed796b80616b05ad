/**
 * Result Sink Port
 *
 * Owns every result artifact from the moment it is written.
 */

import type { SweepPoint } from '../domain/sweep.js';
import type { PersistReceipt } from '../domain/outcome.js';

export interface ResultSinkPort {
  /**
   * Make the destination usable. Idempotent; an existing directory is fine.
   */
  ensureReady(): Promise<void>;

  /**
   * Write one artifact under the point's unique name
   */
  persist(point: SweepPoint, text: string): Promise<PersistReceipt>;

  /**
   * Where the point's artifact lives (whether or not it exists yet)
   */
  locate(point: SweepPoint): string;
}
