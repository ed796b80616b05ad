/**
 * Universal Command Executor
 *
 * Handles the universal parts of every command once its arguments are
 * validated: create the command context, call the handler, format output.
 *
 * Errors propagate to the caller (defineCommand routes them to die()).
 */

import { z } from 'zod';
import { logger } from '@perfsweep/utils';
import { formatOutput } from './output-formatter.js';
import { CommandContext } from './command-context.js';
import type { CommandDefinition } from '../types/index.js';

const FormatArgSchema = z.object({
  format: z.enum(['json', 'table', 'csv']).optional(),
});

export interface ExecuteOptions {
  ctx?: CommandContext;
  /** Where formatted output goes (default: stdout) */
  write?: (text: string) => void;
}

/**
 * Execute a command definition with pre-validated arguments
 *
 * @returns the handler's result
 */
export async function executeValidated(
  commandDef: CommandDefinition,
  validatedArgs: Record<string, unknown>,
  options: ExecuteOptions = {}
): Promise<unknown> {
  const ctx = options.ctx ?? new CommandContext();
  const write = options.write ?? ((text: string) => console.log(text));
  const formatArg = FormatArgSchema.safeParse(validatedArgs);
  const format = (formatArg.success ? formatArg.data.format : undefined) ?? 'table';

  const startedAt = Date.now();
  const result = await commandDef.handler(validatedArgs, ctx);
  logger.debug('Command finished', { command: commandDef.name, durationMs: Date.now() - startedAt });

  write(formatOutput(result, format));
  return result;
}
