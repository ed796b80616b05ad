/**
 * Standard Command Wrapper
 *
 * - Commander owns flags & parsing
 * - Wrapper owns: value coercion, schema validation, handler invocation,
 *   error routing
 *
 * Validation uses the schema registered for the command, so the registry is
 * the single source of truth.
 *
 * Invariant: Normalization never renames keys. Ever.
 */

import type { Command } from 'commander';
import { executeValidated, type ExecuteOptions } from './execute.js';
import { commandRegistry } from './command-registry.js';
import { validateAndCoerceArgs } from './validation-pipeline.js';

type CoerceFn<TIn, TOut> = (raw: TIn) => TOut;

export type DefineCommandArgs<TRawOpts> = {
  name: string;
  packageName: string;
  // Merge Commander positional arguments into options before coercion
  argsToOpts?: (args: unknown[], rawOpts: TRawOpts) => TRawOpts;
  // Value coercion only (JSON/numbers/arrays), NOT key renaming
  coerce?: CoerceFn<TRawOpts, Record<string, unknown>>;
  onError?: (e: unknown) => never;
  execute?: ExecuteOptions;
};

export function defineCommand<TRawOpts extends Record<string, unknown>>(
  cmd: Command,
  args: DefineCommandArgs<TRawOpts>
): Command {
  cmd.action(async (...commanderArgs: unknown[]) => {
    try {
      const commandDef = commandRegistry.requireCommand(args.packageName, args.name);

      // Commander gives camelCase keys already
      const rawOpts = cmd.opts<TRawOpts>();
      const merged = args.argsToOpts ? args.argsToOpts(commanderArgs, rawOpts) : rawOpts;
      const coerced = args.coerce ? args.coerce(merged) : merged;

      const validated = validateAndCoerceArgs(commandDef.schema, coerced);
      await executeValidated(commandDef, validated, args.execute);
    } catch (e) {
      if (args.onError) {
        args.onError(e);
      }
      throw e;
    }
  });

  return cmd;
}
