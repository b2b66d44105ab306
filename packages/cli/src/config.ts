/**
 * Configuration Loader for bozon-parse
 * Loads and validates .bozon.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.bozon.yaml';

export type OutputFormat = 'sexp' | 'json';

export interface CliConfig {
  readonly maxDepth?: number | undefined;
  readonly format?: OutputFormat | undefined;
}

// ============================================================
// VALIDATION
// ============================================================

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'sexp' || value === 'json';
}

/**
 * Validate parsed YAML content.
 * An empty document is an empty configuration.
 *
 * @throws Error with "Invalid configuration: {reason}"
 */
function validateConfig(data: unknown): CliConfig {
  if (data === null || data === undefined) {
    return {};
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  const config = new Map<string, unknown>(Object.entries(data));
  for (const key of config.keys()) {
    if (key !== 'maxDepth' && key !== 'format') {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  let maxDepth: number | undefined;
  const rawDepth = config.get('maxDepth');
  if (rawDepth !== undefined) {
    if (
      typeof rawDepth !== 'number' ||
      !Number.isSafeInteger(rawDepth) ||
      rawDepth < 1
    ) {
      throw new Error(
        'Invalid configuration: maxDepth must be a positive integer'
      );
    }
    maxDepth = rawDepth;
  }

  let format: OutputFormat | undefined;
  const rawFormat = config.get('format');
  if (rawFormat !== undefined) {
    if (!isOutputFormat(rawFormat)) {
      throw new Error(
        `Invalid configuration: format must be 'sexp' or 'json', got ${String(rawFormat)}`
      );
    }
    format = rawFormat;
  }

  return { maxDepth, format };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Parse configuration file content.
 *
 * @throws Error with "Invalid configuration: {reason}" on bad YAML or values
 */
export function parseConfig(content: string): CliConfig {
  let parsedData: unknown;
  try {
    parsedData = parseYaml(content);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }
  return validateConfig(parsedData);
}

/**
 * Load configuration from .bozon.yaml in the specified directory.
 *
 * @returns CliConfig object, or null if file not found
 */
export function loadConfig(cwd: string): CliConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return null;
  }

  return parseConfig(readFileSync(configPath, 'utf-8'));
}
