/**
 * Skills Module
 *
 * Skill types, the dispatcher and the default skills.
 */

export { CompletionError } from './types.js';
export type {
  Skill,
  SkillRegistry,
  SkillDeps,
  UrlOpener,
  CompletionClient,
  CompletionRequest,
  CompletionErrorKind,
  QueryFileOptions,
} from './types.js';

export {
  SkillDispatcher,
  NOT_UNDERSTOOD_REPLY,
  SKILL_FAILED_REPLY,
  EMPTY_REPLY_FALLBACK,
} from './dispatcher.js';
export type { DispatchOutcome } from './dispatcher.js';

export {
  formatClockTime,
  createTimeSkill,
  createOpenAppSkill,
  createSearchWebSkill,
  checkWeatherSkill,
  createPlayMediaSkill,
} from './basic-skills.js';
export { createQueryFileSkill, buildFilePrompt, QUERY_FILE_SYSTEM_PROMPT } from './query-file.js';
export { createAnthropicCompletionClient } from './anthropic-client.js';
export type { LlmSettings } from './anthropic-client.js';
export { createDefaultSkillRegistry } from './registry.js';
