/**
 * Value Coercion Helpers
 *
 * These functions coerce values (JSON/numbers/arrays) but NEVER rename keys.
 * Use these in defineCommand's coerce() function.
 */

import { ValidationError } from '@perfsweep/utils';

function isString(x: unknown): x is string {
  return typeof x === 'string';
}

/**
 * Parse a JSON string; anything that is not a string is returned unchanged
 */
export function coerceJson(v: unknown, name: string): unknown {
  if (v === null || v === undefined) return undefined;
  if (!isString(v)) return v;
  try {
    return JSON.parse(v);
  } catch (e) {
    const preview = v.length > 80 ? `${v.substring(0, 80)}...` : v;
    throw new ValidationError(
      `Invalid JSON for ${name}: ${e instanceof Error ? e.message : String(e)}`,
      { name, input: preview }
    );
  }
}

/**
 * Coerce a value to a number
 * Accepts a number or a numeric string; undefined/null returns undefined
 */
export function coerceNumber(v: unknown, name: string): number | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'number') return v;
  if (isString(v) && v.trim() !== '') {
    const n = Number(v);
    if (Number.isFinite(n)) return n;
  }
  throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
}

/**
 * Coerce a value to a string array
 * Accepts:
 * - JSON string: '["make","check"]'
 * - Comma-separated string: "make,check"
 * - Already array
 * - undefined/null returns undefined
 */
export function coerceStringArray(v: unknown, name: string): string[] | undefined {
  if (v === null || v === undefined) return undefined;
  if (Array.isArray(v)) {
    return v.map((x) => String(x));
  }
  if (isString(v)) {
    const trimmed = v.trim();
    if (trimmed.startsWith('[')) {
      const parsed = coerceJson(trimmed, name);
      if (!Array.isArray(parsed)) {
        throw new ValidationError(`Invalid JSON array for ${name}`, { name, value: v });
      }
      return parsed.map((x) => String(x));
    }
    return trimmed
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
  throw new ValidationError(`Invalid array for ${name}`, { name, value: v });
}

/**
 * Coerce a value to a boolean
 * Accepts booleans, 1/0 and 'true'/'false'/'1'/'0'/'yes'/'no'/'on'/'off' (case-insensitive)
 */
export function coerceBoolean(v: unknown, name: string): boolean | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'boolean') return v;
  if (typeof v === 'number') return v !== 0;
  if (isString(v)) {
    const lower = v.trim().toLowerCase();
    if (lower === 'true' || lower === '1' || lower === 'yes' || lower === 'on') return true;
    if (lower === 'false' || lower === '0' || lower === 'no' || lower === 'off') return false;
  }
  throw new ValidationError(`Invalid boolean for ${name}`, { name, value: v });
}
