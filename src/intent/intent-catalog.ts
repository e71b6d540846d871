/**
 * Intent catalog construction and validation.
 *
 * Turns raw intent definition records into compiled, frozen
 * IntentDefinition objects. All validation happens here, once: a built
 * catalog is never re-checked or mutated, so a single instance can be
 * shared by every caller of classify().
 */

import { IntentDefinitionRecordSchema } from './types.js';
import type { IntentDefinition } from './types.js';
import { ConfigurationError } from './errors.js';

// ============================================================================
// Constants
// ============================================================================

export const MIN_KEYWORD_THRESHOLD = 0;
export const MAX_KEYWORD_THRESHOLD = 100;

/** Threshold used when callers do not pass one */
export const DEFAULT_KEYWORD_THRESHOLD = 75;

// ============================================================================
// Pattern Compilation
// ============================================================================

/**
 * Compile a pattern source anchored at the start of the text.
 *
 * The source is compiled on its own first so that syntax errors are
 * reported against what the catalog author wrote. The anchored form
 * wraps it in a non-capturing group, which leaves group numbering
 * untouched.
 */
function compilePattern(intentName: string, source: string): RegExp {
  try {
    new RegExp(source, 'i');
    return new RegExp(`^(?:${source})`, 'i');
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(
      `Invalid regex pattern for intent '${intentName}': ${message}`,
      intentName,
    );
  }
}

/**
 * Validate one raw record and compile it.
 */
function compileDefinition(record: unknown, index: number): IntentDefinition {
  const parsed = IntentDefinitionRecordSchema.safeParse(record);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path[0];
    const intentName = extractName(record);

    if (field === 'keywords' && intentName) {
      throw new ConfigurationError(`Keywords for intent '${intentName}' must be a list of strings.`, intentName);
    }
    if (field === 'entity_keys' && intentName) {
      throw new ConfigurationError(`Entity keys for intent '${intentName}' must be a list of strings.`, intentName);
    }
    throw new ConfigurationError(
      `Intent definition at index ${index} missing 'intent_name' or 'regex_pattern': ${describeRecord(record)}`,
      intentName ?? undefined,
    );
  }

  const { intent_name: name, regex_pattern: source } = parsed.data;

  return Object.freeze({
    name,
    source,
    pattern: compilePattern(name, source),
    entityKeys: Object.freeze([...(parsed.data.entity_keys ?? [])]),
    keywords: Object.freeze([...(parsed.data.keywords ?? [])]),
  });
}

function extractName(record: unknown): string | null {
  if (typeof record === 'object' && record !== null && 'intent_name' in record) {
    const name = record.intent_name;
    if (typeof name === 'string' && name.length > 0) {
      return name;
    }
  }
  return null;
}

function describeRecord(record: unknown): string {
  try {
    return JSON.stringify(record) ?? String(record);
  } catch {
    return String(record);
  }
}

// ============================================================================
// IntentCatalog
// ============================================================================

/**
 * Ordered, immutable collection of compiled intent definitions plus the
 * keyword confirmation threshold.
 *
 * Declaration order is precedence: classify() accepts the first
 * definition that matches and passes confirmation.
 *
 * @example
 * ```ts
 * const catalog = IntentCatalog.build([
 *   { intent_name: 'openApp', regex_pattern: '(?:open|launch)\\s+(.+)', entity_keys: ['appName'] },
 * ], 75);
 * catalog.names(); // => ['openApp']
 * ```
 */
export class IntentCatalog {
  readonly definitions: readonly IntentDefinition[];
  readonly keywordThreshold: number;

  private constructor(definitions: readonly IntentDefinition[], keywordThreshold: number) {
    this.definitions = definitions;
    this.keywordThreshold = keywordThreshold;
    Object.freeze(this);
  }

  /**
   * Validate and compile a list of raw definition records.
   *
   * @param definitions - Raw records, in precedence order
   * @param threshold - Keyword confirmation threshold, integer 0-100
   * @throws {ConfigurationError} On an empty list, an out-of-range
   *   threshold, a malformed record, a duplicate name or a pattern that
   *   does not compile
   */
  static build(
    definitions: readonly unknown[],
    threshold: number = DEFAULT_KEYWORD_THRESHOLD,
  ): IntentCatalog {
    if (!Array.isArray(definitions) || definitions.length === 0) {
      throw new ConfigurationError('Intent definitions list cannot be empty.');
    }

    if (
      !Number.isInteger(threshold) ||
      threshold < MIN_KEYWORD_THRESHOLD ||
      threshold > MAX_KEYWORD_THRESHOLD
    ) {
      throw new ConfigurationError(
        `Keyword threshold must be between ${MIN_KEYWORD_THRESHOLD} and ${MAX_KEYWORD_THRESHOLD}, got ${threshold}.`,
      );
    }

    const compiled: IntentDefinition[] = [];
    const seen = new Set<string>();

    definitions.forEach((record, index) => {
      const definition = compileDefinition(record, index);
      if (seen.has(definition.name)) {
        throw new ConfigurationError(`Duplicate intent name '${definition.name}'.`, definition.name);
      }
      seen.add(definition.name);
      compiled.push(definition);
    });

    return new IntentCatalog(Object.freeze(compiled), threshold);
  }

  /** Number of definitions. */
  get size(): number {
    return this.definitions.length;
  }

  /** Intent names in precedence order. */
  names(): string[] {
    return this.definitions.map((definition) => definition.name);
  }

  /** Look up a definition by intent name. */
  get(name: string): IntentDefinition | undefined {
    return this.definitions.find((definition) => definition.name === name);
  }
}
