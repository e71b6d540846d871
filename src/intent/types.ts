/**
 * Type definitions for the intent classification core.
 *
 * Defines the Zod schema for raw catalog records (the shape intent
 * definitions take on disk) and the TypeScript types for compiled
 * definitions, classification results and the no-match sentinel.
 */

import { z } from 'zod';

// ============================================================================
// Intent Definition Records
// ============================================================================

/**
 * Zod schema for one raw intent definition record.
 *
 * Field names follow the catalog file format. Optional list fields
 * default to empty lists when the catalog is built.
 */
export const IntentDefinitionRecordSchema = z.object({
  /** Unique intent name (e.g., "openApp") */
  intent_name: z.string().min(1),
  /** Pattern source, matched against the start of the normalized text */
  regex_pattern: z.string(),
  /** Parameter names assigned to captured groups, left to right */
  entity_keys: z.array(z.string()).optional(),
  /** Confirmation phrases scored against the input */
  keywords: z.array(z.string()).optional(),
}).passthrough();

export type IntentDefinitionRecord = z.infer<typeof IntentDefinitionRecordSchema>;

/**
 * A definition after validation and pattern compilation.
 *
 * `pattern` is anchored at the start of the text and case-insensitive.
 */
export interface IntentDefinition {
  readonly name: string;
  readonly source: string;
  readonly pattern: RegExp;
  readonly entityKeys: readonly string[];
  readonly keywords: readonly string[];
}

// ============================================================================
// Classification Output
// ============================================================================

/** Extracted parameters; keys appear in entity-key order. */
export type IntentParams = Record<string, string | null>;

/** An accepted classification. */
export interface ClassificationResult {
  type: 'match';
  intentName: string;
  params: IntentParams;
}

/** The "nothing matched" sentinel. Not an error. */
export interface NoMatch {
  readonly type: 'no-match';
}

export const NO_MATCH: NoMatch = Object.freeze({ type: 'no-match' as const });

export type Classification = ClassificationResult | NoMatch;

/**
 * Type guard separating an accepted result from the sentinel.
 */
export function isMatch(classification: Classification): classification is ClassificationResult {
  return classification.type === 'match';
}
