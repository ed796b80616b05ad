/**
 * Inventory Handler - present/empty/missing artifacts in a sweep directory
 */

import { z } from 'zod';
import { logger } from '@perfsweep/utils';
import { OutputConfigSchema } from '@perfsweep/core';
import { inventorySweep, type InventoryEntry, type SweepInventory } from '@perfsweep/workflows';
import type { CommandContext } from '../../core/command-context.js';
import type { InventorySweepArgs } from '../../command-defs/sweep.js';
import { loadConfig } from '../../core/config-loader.js';
import { envDefaults, flagsToOverrides } from './resolve-config.js';

/**
 * Only the bounds and naming matter here; a full run config also validates
 */
const InventoryConfigSchema = z.object({
  axisMax: z.number().int().min(1),
  trials: z.number().int().min(1),
  output: OutputConfigSchema.default({}),
});

export async function inventorySweepHandler(
  args: InventorySweepArgs,
  ctx: CommandContext
): Promise<SweepInventory | InventoryEntry[]> {
  const config = loadConfig(
    args.config,
    InventoryConfigSchema,
    flagsToOverrides(args),
    envDefaults(ctx.env)
  );

  const inventory = await inventorySweep({
    dir: config.output.dir,
    axisMax: config.axisMax,
    trials: config.trials,
    naming: {
      prefix: config.output.prefix,
      axisLabel: config.output.axisLabel,
      extension: config.output.extension,
    },
  });

  logger.info('Sweep inventory', { dir: inventory.dir, ...inventory.counts });
  if (inventory.unrecognized.length > 0) {
    logger.warn('Unrecognized artifact files', { files: inventory.unrecognized });
  }

  return args.format === 'json' ? inventory : inventory.entries;
}
