import { handleError } from './error-handler.js';

/**
 * Print a sanitised error and exit 1
 */
export function die(error: unknown): never {
  const message = handleError(error);
  console.error(`Error: ${message}`);
  process.exit(1);
}
