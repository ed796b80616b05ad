/**
 * Sweep configuration schema
 *
 * Single source of truth for a resolved sweep: config files, environment
 * defaults and CLI flags are merged into this shape and validated once.
 */

import { z } from 'zod';
import { DEFAULT_COUNTER_EVENTS } from '../domain/counters.js';
import { DEFAULT_NAMING } from '../domain/naming.js';

const CommandLineSchema = z.array(z.string().min(1)).min(1, 'Command must not be empty');

const ParamNameSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Parameter name must be a valid make/env variable name');

const TimeoutSchema = z.number().int().min(0); // 0 = no timeout

export const BuildConfigSchema = z.object({
  /** Directory the build commands run in */
  cwd: z.string().min(1).default('.'),
  cleanCommand: CommandLineSchema.default(['make', 'clean']),
  buildCommand: CommandLineSchema.default(['make', 'check']),
  concurrencyParam: ParamNameSchema.default('SMP'),
  modeParam: ParamNameSchema.default('STOP_BOGOMIPS'),
  /** 'args': make-style NAME=value arguments; 'env': environment variables */
  paramStyle: z.enum(['args', 'env']).default('args'),
  timeoutMs: TimeoutSchema.default(0),
});

export const WorkloadSchema = z.object({
  path: z.string().min(1),
  args: z.array(z.string()).default([]),
});

export const MeasureConfigSchema = z.object({
  sampler: z.string().min(1).default('perf'),
  samplerArgs: z.array(z.string()).default(['stat', '-B']),
  events: z.array(z.string().min(1)).min(1).default([...DEFAULT_COUNTER_EVENTS]),
  sudo: z.boolean().default(true),
  /** Mirror the combined output to the console while capturing it */
  echo: z.boolean().default(true),
  /** Directory the workload runs in (defaults to build.cwd) */
  cwd: z.string().min(1).optional(),
  timeoutMs: TimeoutSchema.default(0),
  workload: WorkloadSchema,
});

export const OutputConfigSchema = z.object({
  dir: z.string().min(1).default('logs'),
  prefix: z.string().min(1).default(DEFAULT_NAMING.prefix),
  axisLabel: z.string().min(1).default(DEFAULT_NAMING.axisLabel),
  extension: z.string().default(DEFAULT_NAMING.extension),
  /** What to do when an artifact with the same name already exists */
  onExisting: z.enum(['overwrite', 'error']).default('overwrite'),
});

export const FailurePolicySchema = z.enum(['continue', 'fail-fast']);

export const SweepConfigSchema = z.object({
  /** Inclusive upper bound of the concurrency axis (1..axisMax) */
  axisMax: z.number().int().min(1),
  /** Trials per (level, mode) pair (1..trials) */
  trials: z.number().int().min(1),
  build: BuildConfigSchema.default({}),
  measure: MeasureConfigSchema,
  output: OutputConfigSchema.default({}),
  onFailure: FailurePolicySchema.default('continue'),
  /** Skip points already recorded as completed in the output directory */
  resume: z.boolean().default(false),
});

export type BuildConfig = z.infer<typeof BuildConfigSchema>;
export type MeasureConfig = z.infer<typeof MeasureConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type FailurePolicy = z.infer<typeof FailurePolicySchema>;
export type SweepConfig = z.infer<typeof SweepConfigSchema>;
export type SweepConfigInput = z.input<typeof SweepConfigSchema>;
