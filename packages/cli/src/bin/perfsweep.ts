#!/usr/bin/env node

/**
 * perfsweep CLI entry point
 */

import 'dotenv/config';
import { logger } from '@perfsweep/utils';
import { handleError } from '../core/error-handler.js';
import { createProgram } from '../program.js';

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    const message = handleError(error);
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in CLI', error);
  process.exit(1);
});
