/**
 * Catalog file loading.
 *
 * Reads a JSON array of intent definition records from disk and checks
 * each record's shape. The result feeds IntentCatalog.build(), which
 * still owns semantic validation (threshold, duplicate names, pattern
 * compilation).
 *
 * @module catalog/catalog-loader
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { IntentDefinitionRecordSchema } from '../intent/types.js';
import type { IntentDefinitionRecord } from '../intent/types.js';
import { IntentCatalog } from '../intent/intent-catalog.js';

/** Catalog shipped with the package, resolved from this module's location. */
export const BUNDLED_CATALOG_PATH = fileURLToPath(new URL('../../data/intents.json', import.meta.url));

const CatalogFileSchema = z.array(IntentDefinitionRecordSchema);

// ============================================================================
// Error type
// ============================================================================

/**
 * Error thrown when a catalog file cannot be read or parsed.
 */
export class CatalogLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
  ) {
    super(message);
    this.name = 'CatalogLoadError';
  }
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Check already-parsed JSON against the catalog file shape.
 *
 * @param raw - Parsed JSON document
 * @param source - File path (or other label) used in error messages
 * @throws {CatalogLoadError} When the document is not a list of records
 */
export function parseCatalogRecords(raw: unknown, source: string): IntentDefinitionRecord[] {
  if (!Array.isArray(raw)) {
    throw new CatalogLoadError(
      `Intent definitions file '${source}' does not contain a JSON list.`,
      source,
    );
  }

  const result = CatalogFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const [index, ...field] = issue.path;
      const where = field.length > 0 ? `record ${index}, ${field.join('.')}` : `record ${index}`;
      return `${where}: ${issue.message}`;
    });
    throw new CatalogLoadError(
      `Invalid intent definitions in '${source}':\n${issues.join('\n')}`,
      source,
    );
  }

  return result.data;
}

/**
 * Read and parse a catalog file.
 *
 * @throws {CatalogLoadError} On a missing file, unreadable file,
 *   invalid JSON or malformed records
 */
export async function loadCatalogFile(filePath: string): Promise<IntentDefinitionRecord[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      throw new CatalogLoadError(`Intent definitions file '${filePath}' not found.`, filePath);
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new CatalogLoadError(`Could not read intent definitions file '${filePath}': ${message}`, filePath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CatalogLoadError(`Error decoding JSON from '${filePath}': ${message}`, filePath);
  }

  return parseCatalogRecords(raw, filePath);
}

/**
 * Load a catalog file and build the catalog in one step.
 *
 * @throws {CatalogLoadError} When the file cannot be loaded
 * @throws {ConfigurationError} When the records do not form a valid catalog
 */
export async function loadCatalog(filePath: string, threshold: number): Promise<IntentCatalog> {
  const records = await loadCatalogFile(filePath);
  return IntentCatalog.build(records, threshold);
}
