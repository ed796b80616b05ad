/**
 * @perfsweep/core
 *
 * Domain types, sweep-space enumeration, artifact naming, config schema and
 * the ports the sweep driver depends on. No process or filesystem access here.
 */

export * from './domain/sweep.js';
export * from './domain/naming.js';
export * from './domain/outcome.js';
export * from './domain/counters.js';
export * from './schemas/sweep-config.js';
export * from './ports/index.js';
