/**
 * Shared argument parsing and setup for CLI commands.
 *
 * @module cli/options
 */

import * as p from '@clack/prompts';
import { readAppConfig, DEFAULT_CONFIG_PATH } from '../config/reader.js';
import type { AppConfig } from '../config/schema.js';
import { loadCatalog, BUNDLED_CATALOG_PATH } from '../catalog/catalog-loader.js';
import type { IntentCatalog } from '../intent/intent-catalog.js';

/**
 * Value of a `--name=value` flag, or undefined when absent.
 */
export function getFlag(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg === undefined ? undefined : arg.slice(prefix.length);
}

/** Arguments that are not flags. */
export function positionals(args: string[]): string[] {
  return args.filter((a) => !a.startsWith('-'));
}

/**
 * Parse `--threshold=N`. Non-numeric values come back as NaN so that
 * catalog validation reports them.
 */
export function parseThresholdFlag(args: string[]): number | undefined {
  const raw = getFlag(args, 'threshold');
  if (raw === undefined) return undefined;
  return raw.trim() === '' ? Number.NaN : Number(raw);
}

export interface CatalogRuntime {
  config: AppConfig;
  catalog: IntentCatalog;
  catalogPath: string;
  threshold: number;
}

/**
 * Read the config, then load the catalog. Flags override config values.
 *
 * Recognizes `--config=PATH`, `--catalog=PATH` and `--threshold=N`.
 */
export async function loadCatalogRuntime(args: string[]): Promise<CatalogRuntime> {
  const config = await readAppConfig(getFlag(args, 'config') ?? DEFAULT_CONFIG_PATH);
  const catalogPath = getFlag(args, 'catalog') ?? config.catalog_path ?? BUNDLED_CATALOG_PATH;
  const threshold = parseThresholdFlag(args) ?? config.keyword_threshold;
  const catalog = await loadCatalog(catalogPath, threshold);
  return { config, catalog, catalogPath, threshold };
}

/**
 * Print an error as JSON `{ "error": ... }` or as a log line.
 */
export function reportError(err: unknown, jsonMode: boolean): void {
  const message = err instanceof Error ? err.message : String(err);
  if (jsonMode) {
    console.log(JSON.stringify({ error: message }, null, 2));
  } else {
    p.log.error(message);
  }
}
