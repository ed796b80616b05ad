/**
 * Config Loader - Load YAML/JSON configuration files with CLI override merging
 *
 * Precedence, lowest first: defaults (environment) → config file → CLI flags.
 * The merged object is validated once against the Zod schema.
 */

import { readFileSync } from 'fs';
import { extname } from 'path';
import * as yaml from 'js-yaml';
import type { z } from 'zod';
import { ValidationError } from '@perfsweep/utils';

export type ConfigObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Detect config format by file extension
 */
export function detectConfigFormat(path: string): 'yaml' | 'json' {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') {
    return 'yaml';
  }
  // Default to JSON for unknown extensions
  return 'json';
}

/**
 * Deep merge two objects (override wins)
 *
 * Rules:
 * - Primitives: override value wins
 * - Arrays: override value replaces base value
 * - Objects: recursively merge
 * - undefined in override: ignored
 */
export function deepMerge(base: ConfigObject, override: ConfigObject): ConfigObject {
  const result: ConfigObject = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }
    const baseValue = result[key];
    result[key] =
      isPlainObject(value) && isPlainObject(baseValue) ? deepMerge(baseValue, value) : value;
  }

  return result;
}

/**
 * Read and parse a config file
 *
 * @throws ValidationError if the file cannot be read or is not an object
 */
export function readConfigFile(configPath: string): ConfigObject {
  const format = detectConfigFormat(configPath);
  let parsed: unknown;
  try {
    const fileContent = readFileSync(configPath, 'utf-8');
    parsed = format === 'yaml' ? yaml.load(fileContent) : JSON.parse(fileContent);
  } catch (error) {
    throw new ValidationError(
      `Failed to load config from ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      { configPath, format }
    );
  }

  if (!isPlainObject(parsed)) {
    throw new ValidationError(`${format.toUpperCase()} config must be an object`, {
      configPath,
      format,
    });
  }
  return parsed;
}

/**
 * Validate a merged config object
 */
export function validateConfig<T extends z.ZodTypeAny>(
  data: ConfigObject,
  schema: T,
  source: string
): z.infer<T> {
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Config validation failed: ${issues}`, {
      source,
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/**
 * Load config from YAML or JSON file, merge overrides, validate
 *
 * @param configPath - Path to config file (optional: defaults + overrides only)
 * @param overrides - CLI overrides (win over the file)
 * @param defaults - Values the file overrides
 */
export function loadConfig<T extends z.ZodTypeAny>(
  configPath: string | undefined,
  schema: T,
  overrides: ConfigObject = {},
  defaults: ConfigObject = {}
): z.infer<T> {
  const fileData = configPath ? readConfigFile(configPath) : {};
  const merged = deepMerge(deepMerge(defaults, fileData), overrides);
  return validateConfig(merged, schema, configPath ?? 'command line');
}
