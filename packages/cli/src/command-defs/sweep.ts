/**
 * Sweep command argument schemas
 *
 * Flags are flat; resolve-config.ts maps them onto the nested SweepConfig.
 */

import { z } from 'zod';

const formatSchema = z.enum(['json', 'table', 'csv']).default('table');

const namingFlags = {
  prefix: z.string().min(1).optional(),
  axisLabel: z.string().min(1).optional(),
  extension: z.string().optional(),
};

const boundsFlags = {
  config: z.string().min(1).optional(),
  axisMax: z.number().int().min(1).optional(),
  trials: z.number().int().min(1).optional(),
  out: z.string().min(1).optional(),
};

export const sweepConfigFlagsSchema = z.object({
  ...boundsFlags,
  ...namingFlags,
  workload: z.string().min(1).optional(),
  workloadArgs: z.array(z.string()).optional(),
  buildDir: z.string().min(1).optional(),
  cleanCommand: z.array(z.string().min(1)).min(1).optional(),
  buildCommand: z.array(z.string().min(1)).min(1).optional(),
  concurrencyParam: z.string().min(1).optional(),
  modeParam: z.string().min(1).optional(),
  paramStyle: z.enum(['args', 'env']).optional(),
  sampler: z.string().min(1).optional(),
  samplerArgs: z.array(z.string()).optional(),
  events: z.array(z.string().min(1)).min(1).optional(),
  sudo: z.boolean().optional(),
  echo: z.boolean().optional(),
  onFailure: z.enum(['continue', 'fail-fast']).optional(),
  onExisting: z.enum(['overwrite', 'error']).optional(),
  buildTimeoutMs: z.number().int().min(0).optional(),
  measureTimeoutMs: z.number().int().min(0).optional(),
  resume: z.boolean().optional(),
});

export const runSweepSchema = sweepConfigFlagsSchema.extend({
  format: formatSchema,
});

export const planSweepSchema = sweepConfigFlagsSchema.extend({
  format: formatSchema,
});

export const decodeArtifactsSchema = z.object({
  names: z.array(z.string().min(1)).min(1, 'At least one file name is required'),
  ...namingFlags,
  format: formatSchema,
});

export const inventorySweepSchema = z.object({
  ...boundsFlags,
  ...namingFlags,
  format: formatSchema,
});

export type SweepConfigFlags = z.infer<typeof sweepConfigFlagsSchema>;
export type RunSweepArgs = z.infer<typeof runSweepSchema>;
export type PlanSweepArgs = z.infer<typeof planSweepSchema>;
export type DecodeArtifactsArgs = z.infer<typeof decodeArtifactsSchema>;
export type InventorySweepArgs = z.infer<typeof inventorySweepSchema>;
