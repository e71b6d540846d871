/**
 * Zod schema for the intent-router configuration file.
 *
 * Every field has a `.default()` so that `AppConfigSchema.parse({})`
 * returns a complete config. A partial file (or no file at all) gives
 * sensible behavior.
 *
 * @module config/schema
 */

import { z } from 'zod';

// ============================================================================
// Section Schemas
// ============================================================================

/**
 * Classification audit log. Off by default.
 */
const ClassificationLogSchema = z.object({
  enabled: z.boolean().default(false),
  dir: z.string().min(1).default('.intent-router/logs'),
});

/**
 * Spoken replies through the platform speech command.
 */
const SpeechSchema = z.object({
  enabled: z.boolean().default(false),
  voice: z.string().min(1).optional(),
});

/**
 * Limits for the file question-answering skill.
 */
const QueryFileSchema = z.object({
  allowed_extensions: z.array(z.string().regex(/^\.[a-z0-9]+$/i)).min(1).default(['.txt', '.md', '.py', '.json', '.csv']),
  max_prompt_chars: z.number().int().min(100).max(1_000_000).default(15000),
});

/**
 * Language model settings used by the file skill.
 */
const LlmSchema = z.object({
  model: z.string().min(1).default('claude-sonnet-4-20250514'),
  max_tokens: z.number().int().min(1).max(8192).default(700),
  temperature: z.number().min(0).max(1).default(0.7),
});

// ============================================================================
// Composite Config Schema
// ============================================================================

/**
 * Complete config schema with defaults on every field.
 *
 * ```typescript
 * const config = AppConfigSchema.parse({ keyword_threshold: 60 });
 * config.keyword_threshold; // => 60
 * config.llm.max_tokens;     // => 700
 * ```
 */
export const AppConfigSchema = z.object({
  /** Catalog file; the bundled catalog is used when unset */
  catalog_path: z.string().min(1).optional(),
  keyword_threshold: z.number().int().min(0).max(100).default(75),
  classification_log: ClassificationLogSchema.default(() => ({
    enabled: false,
    dir: '.intent-router/logs',
  })),
  speech: SpeechSchema.default(() => ({ enabled: false })),
  query_file: QueryFileSchema.default(() => ({
    allowed_extensions: ['.txt', '.md', '.py', '.json', '.csv'],
    max_prompt_chars: 15000,
  })),
  llm: LlmSchema.default(() => ({
    model: 'claude-sonnet-4-20250514',
    max_tokens: 700,
    temperature: 0.7,
  })),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/** Config produced by parsing an empty object. */
export const DEFAULT_APP_CONFIG: AppConfig = AppConfigSchema.parse({});
