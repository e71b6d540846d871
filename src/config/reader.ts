/**
 * Config file reader with Zod validation.
 *
 * Reads `.intent-router.json`, parses it through the schema and returns
 * a fully populated config. Missing file = all defaults. Invalid input =
 * an error naming the field path.
 *
 * @module config/reader
 */

import { readFile } from 'fs/promises';
import { AppConfigSchema, DEFAULT_APP_CONFIG } from './schema.js';
import type { AppConfig } from './schema.js';

// ============================================================================
// Constants
// ============================================================================

/** Default path for the config file, relative to the working directory. */
export const DEFAULT_CONFIG_PATH = '.intent-router.json';

// ============================================================================
// Error type
// ============================================================================

/**
 * Error thrown when the config file cannot be read or fails validation.
 */
export class AppConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'AppConfigError';
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Read and validate the config from disk.
 *
 * - ENOENT: returns the defaults.
 * - Invalid JSON: throws "Invalid JSON in config file".
 * - Schema failure: throws with one `path: message` line per issue.
 *
 * @throws {AppConfigError} On invalid JSON or validation failure
 */
export async function readAppConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
): Promise<AppConfig> {
  let content: string;

  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return DEFAULT_APP_CONFIG;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new AppConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  const result = validateAppConfig(raw);
  if (!result.valid) {
    throw new AppConfigError(
      `Config validation failed:\n${result.errors.join('\n')}`,
      result.firstField,
    );
  }

  return result.config;
}

/**
 * Validate raw input against the config schema (no I/O).
 */
export function validateAppConfig(
  raw: unknown,
): { valid: true; config: AppConfig } | { valid: false; errors: string[]; firstField?: string } {
  const result = AppConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data };
  }

  const errors = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path}: ${issue.message}`;
  });

  return { valid: false, errors, firstField: result.error.issues[0]?.path.join('.') };
}
