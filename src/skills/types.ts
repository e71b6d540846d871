/**
 * Type definitions for skills and their dependencies.
 */

import type { IntentParams } from '../intent/types.js';

/**
 * A skill turns extracted parameters into a reply.
 *
 * Skills report expected failures (missing parameters, unreadable files)
 * as reply text. Anything they throw is treated as a skill failure by
 * the dispatcher.
 */
export type Skill = (params: IntentParams) => Promise<string>;

/** Intent name -> skill. */
export type SkillRegistry = ReadonlyMap<string, Skill>;

/** Opens a URL in the user's browser. */
export type UrlOpener = (url: string) => Promise<void>;

// ============================================================================
// Language model client
// ============================================================================

export interface CompletionRequest {
  system: string;
  prompt: string;
}

/**
 * Minimal text completion client used by the file skill.
 *
 * Implementations throw CompletionError for service failures.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

export type CompletionErrorKind =
  | 'authentication'
  | 'rate-limit'
  | 'connection'
  | 'status'
  | 'api';

/**
 * A language model service failure, classified for user-facing replies.
 */
export class CompletionError extends Error {
  constructor(
    message: string,
    public readonly kind: CompletionErrorKind,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'CompletionError';
  }
}

// ============================================================================
// Registry dependencies
// ============================================================================

export interface QueryFileOptions {
  /** Lowercase extensions including the dot, e.g. ".txt" */
  allowedExtensions: readonly string[];
  /** Upper bound on prompt length, in characters */
  maxPromptChars: number;
}

/**
 * Everything the default skills need from the outside world.
 */
export interface SkillDeps {
  openUrl: UrlOpener;
  now: () => Date;
  queryFile: QueryFileOptions;
  /** null when no language model is configured */
  completion: CompletionClient | null;
}
