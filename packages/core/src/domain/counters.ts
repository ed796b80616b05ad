/**
 * Counter channels sampled on every measurement unless overridden.
 */
export const DEFAULT_COUNTER_EVENTS: readonly string[] = [
  'cache-references',
  'cache-misses',
  'cycles',
  'instructions',
  'branches',
  'faults',
  'migrations',
  'L1-dcache-load-misses',
  'L1-dcache-loads',
  'L1-dcache-stores',
  'L1-icache-load-misses',
  'LLC-loads',
  'LLC-load-misses',
  'LLC-stores',
  'LLC-store-misses',
  'LLC-prefetches',
];
