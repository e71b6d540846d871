// Intent classification core
export {
  IntentCatalog,
  DEFAULT_KEYWORD_THRESHOLD,
  MIN_KEYWORD_THRESHOLD,
  MAX_KEYWORD_THRESHOLD,
  IntentDefinitionRecordSchema,
  ConfigurationError,
  NO_MATCH,
  isMatch,
  normalize,
  tokenSetRatio,
  simpleRatio,
  countMatchingCharacters,
  extractParams,
  classify,
  keywordScore,
  ClassificationLogger,
  CLASSIFICATION_LOG_FILENAME,
} from './intent/index.js';

export type {
  IntentDefinitionRecord,
  IntentDefinition,
  IntentParams,
  ClassificationResult,
  NoMatch,
  Classification,
  ClassificationLogEntry,
} from './intent/index.js';

// Catalog files
export {
  BUNDLED_CATALOG_PATH,
  CatalogLoadError,
  parseCatalogRecords,
  loadCatalogFile,
  loadCatalog,
} from './catalog/index.js';

// Configuration
export {
  AppConfigSchema,
  DEFAULT_APP_CONFIG,
  readAppConfig,
  validateAppConfig,
  AppConfigError,
  DEFAULT_CONFIG_PATH,
} from './config/index.js';
export type { AppConfig } from './config/index.js';

// Skills
export {
  SkillDispatcher,
  NOT_UNDERSTOOD_REPLY,
  SKILL_FAILED_REPLY,
  EMPTY_REPLY_FALLBACK,
  CompletionError,
  createDefaultSkillRegistry,
  createAnthropicCompletionClient,
  createTimeSkill,
  createOpenAppSkill,
  createSearchWebSkill,
  checkWeatherSkill,
  createPlayMediaSkill,
  createQueryFileSkill,
} from './skills/index.js';

export type {
  Skill,
  SkillRegistry,
  SkillDeps,
  UrlOpener,
  CompletionClient,
  CompletionRequest,
  DispatchOutcome,
  LlmSettings,
  QueryFileOptions,
} from './skills/index.js';

// Platform, speech and session
export { openUrl } from './platform/index.js';
export { SystemSpeaker } from './speech/index.js';
export type { Speaker } from './speech/index.js';
export { runSession } from './session/index.js';
export type { SessionDeps, SessionSummary } from './session/index.js';
