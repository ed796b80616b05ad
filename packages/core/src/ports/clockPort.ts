import { DateTime } from 'luxon';

export interface ClockPort {
  nowMs(): number;
  nowISO(): string;
}

/**
 * Create a system clock adapter
 *
 * This is ONLY allowed in composition roots (e.g., createProductionSweepContext).
 * Workflow code must use the injected clock so tests stay deterministic.
 */
export function createSystemClock(): ClockPort {
  return {
    nowMs: () => Date.now(),
    nowISO: () => DateTime.utc().toISO() ?? new Date().toISOString(),
  };
}
