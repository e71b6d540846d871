/**
 * Intent Classification Module
 *
 * Pattern-plus-keyword intent classification over an ordered catalog.
 */

// Types and sentinel
export { IntentDefinitionRecordSchema, NO_MATCH, isMatch } from './types.js';
export type {
  IntentDefinitionRecord,
  IntentDefinition,
  IntentParams,
  ClassificationResult,
  NoMatch,
  Classification,
} from './types.js';

// Errors
export { ConfigurationError } from './errors.js';

// Normalization and scoring
export { normalize } from './normalizer.js';
export { tokenSetRatio, simpleRatio, countMatchingCharacters } from './similarity.js';

// Catalog
export {
  IntentCatalog,
  DEFAULT_KEYWORD_THRESHOLD,
  MIN_KEYWORD_THRESHOLD,
  MAX_KEYWORD_THRESHOLD,
} from './intent-catalog.js';

// Extraction and classification
export { extractParams } from './param-extractor.js';
export { classify, keywordScore } from './intent-classifier.js';

// Audit logging
export { ClassificationLogger, CLASSIFICATION_LOG_FILENAME } from './classification-logger.js';
export type { ClassificationLogEntry } from './classification-logger.js';
