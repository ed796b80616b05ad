/**
 * Unified Validation and Coercion Pipeline
 *
 * Flow:
 * 1. Normalize options (Commander.js → flat object, typed by the schema)
 * 2. Validate with the command's Zod schema
 * 3. Return typed, validated arguments
 */

import type { z } from 'zod';
import { normalizeOptions, parseArguments } from './argument-parser.js';

/**
 * This is the ONLY path for CLI argument validation.
 *
 * @throws ValidationError if validation fails
 */
export function validateAndCoerceArgs<T extends z.ZodTypeAny>(
  schema: T,
  rawOptions: Record<string, unknown>
): z.infer<T> {
  return parseArguments(schema, normalizeOptions(rawOptions, schema));
}
