/**
 * Intent classification over a compiled catalog.
 *
 * Pipeline per definition, in catalog order:
 * 1. Anchored pattern match against the normalized text
 * 2. Keyword confirmation (only when the definition declares keywords)
 * 3. Parameter extraction
 *
 * The first definition that survives all three wins. A definition whose
 * pattern matched but whose keywords scored below the threshold is
 * skipped, and evaluation carries on down the catalog.
 *
 * classify() never throws: empty input, non-string input, unmatched
 * input and rejected matches all resolve to NO_MATCH.
 */

import type { IntentCatalog } from './intent-catalog.js';
import type { Classification, IntentDefinition } from './types.js';
import { NO_MATCH } from './types.js';
import { normalize } from './normalizer.js';
import { tokenSetRatio } from './similarity.js';
import { extractParams } from './param-extractor.js';

/**
 * Best keyword score for an already-normalized input.
 *
 * Returns 0 for a definition without keywords.
 */
export function keywordScore(definition: IntentDefinition, normalizedText: string): number {
  let best = 0;
  for (const keyword of definition.keywords) {
    const score = tokenSetRatio(normalizedText, normalize(keyword));
    if (score > best) {
      best = score;
    }
  }
  return best;
}

/**
 * Classify one line of text against a catalog.
 *
 * @param catalog - Built catalog; read, never written
 * @param text - Raw user input
 * @returns The first accepted ClassificationResult, or NO_MATCH
 *
 * @example
 * ```ts
 * classify(catalog, 'jarvis open Notepad.exe');
 * // => { type: 'match', intentName: 'openApp', params: { appName: 'notepad.exe' } }
 *
 * classify(catalog, 'tell me a joke');
 * // => NO_MATCH
 * ```
 */
export function classify(catalog: IntentCatalog, text: unknown): Classification {
  const normalized = normalize(text);
  if (!normalized) {
    return NO_MATCH;
  }

  for (const definition of catalog.definitions) {
    const match = definition.pattern.exec(normalized);
    if (!match) {
      continue;
    }

    if (
      definition.keywords.length > 0 &&
      keywordScore(definition, normalized) < catalog.keywordThreshold
    ) {
      continue;
    }

    return {
      type: 'match',
      intentName: definition.name,
      params: extractParams(match, definition.entityKeys),
    };
  }

  return NO_MATCH;
}
