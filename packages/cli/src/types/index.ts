/**
 * CLI-specific type definitions
 */

import type { z } from 'zod';
import type { CommandContext } from '../core/command-context.js';

/**
 * Command definition structure
 */
export interface CommandDefinition<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  /**
   * Command name (e.g., 'run', 'plan')
   */
  name: string;

  description: string;

  /**
   * Zod schema for argument validation
   */
  schema: TSchema;

  /**
   * Receives the arguments as validated by `schema`
   */
  handler: (args: z.infer<TSchema>, ctx: CommandContext) => Promise<unknown> | unknown;

  /**
   * Optional examples for help text
   */
  examples?: string[];
}

/**
 * Package command module structure
 */
export interface PackageCommandModule {
  /**
   * Package name (e.g., 'sweep')
   */
  packageName: string;

  description: string;

  commands: CommandDefinition[];
}

/**
 * Output format options
 */
export type OutputFormat = 'json' | 'table' | 'csv';
