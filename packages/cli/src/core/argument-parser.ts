/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { ValidationError } from '@perfsweep/utils';

/**
 * Parse and validate arguments using Zod schema
 *
 * @throws ValidationError listing every failing path
 */
export function parseArguments<T extends z.ZodTypeAny>(
  schema: T,
  rawArgs: Record<string, unknown>
): z.infer<T> {
  const result = schema.safeParse(rawArgs);
  if (result.success) {
    return result.data;
  }

  const messages = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `  ${path || '(root)'}: ${issue.message}`;
  });
  throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
    issues: result.error.issues,
    formattedMessages: messages,
  });
}

type ScalarKind = 'number' | 'boolean';

function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return unwrap(schema.unwrap());
  }
  if (schema instanceof z.ZodDefault) {
    return unwrap(schema.removeDefault());
  }
  return schema;
}

/**
 * Scalar type a schema field expects, if it is a number or boolean
 */
function expectedKind(schema: z.ZodTypeAny | undefined, key: string): ScalarKind | undefined {
  if (!(schema instanceof z.ZodObject)) {
    return undefined;
  }
  const shape: Record<string, z.ZodTypeAny> = schema.shape;
  const field = shape[key];
  if (field === undefined) {
    return undefined;
  }
  const inner = unwrap(field);
  if (inner instanceof z.ZodNumber) return 'number';
  if (inner instanceof z.ZodBoolean) return 'boolean';
  return undefined;
}

/**
 * Normalize Commander.js options to a flat object
 *
 * Never renames keys; Commander already turns --axis-max into axisMax.
 * Only values change:
 * - undefined/null → dropped
 * - "true"/"false" → boolean, where the schema field is a boolean
 * - pure numeric strings → number, where the schema field is a number
 *
 * Strings bound for string fields (paths, names) are left alone.
 */
export function normalizeOptions(
  options: Record<string, unknown>,
  schema?: z.ZodTypeAny
): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(options)) {
    if (value === undefined || value === null) {
      continue;
    }

    const kind = typeof value === 'string' ? expectedKind(schema, key) : undefined;
    if (typeof value !== 'string' || kind === undefined) {
      normalized[key] = value;
    } else if (kind === 'boolean' && (value === 'true' || value === 'false')) {
      normalized[key] = value === 'true';
    } else if (kind === 'number' && value.trim() !== '' && String(Number(value)) === value.trim()) {
      normalized[key] = Number(value);
    } else {
      normalized[key] = value;
    }
  }

  return normalized;
}
