/**
 * Skill dispatch.
 *
 * Routes a classification to the skill registered for its intent and
 * turns every outcome (no match, missing skill, skill failure, empty
 * reply) into a sentence for the user.
 *
 * @module skills/dispatcher
 */

import type { Classification } from '../intent/types.js';
import type { SkillRegistry } from './types.js';

export const NOT_UNDERSTOOD_REPLY = "Sorry, I didn't understand that.";
export const SKILL_FAILED_REPLY = 'I had trouble performing that action.';
export const EMPTY_REPLY_FALLBACK = 'I encountered an unexpected issue.';

/**
 * Result of dispatching one classification.
 */
export interface DispatchOutcome {
  reply: string;
  /** Matched intent, or null for no match */
  intentName: string | null;
  /** True only when a skill ran and produced a reply */
  handled: boolean;
}

/**
 * Dispatches classifications to an explicit skill registry.
 *
 * @example
 * ```typescript
 * const dispatcher = new SkillDispatcher(new Map([['getTime', getTime]]));
 * const { reply } = await dispatcher.dispatch(classify(catalog, 'what time is it'));
 * ```
 */
export class SkillDispatcher {
  constructor(private readonly registry: SkillRegistry) {}

  /** Intents that have a skill registered. */
  skillNames(): string[] {
    return [...this.registry.keys()];
  }

  async dispatch(classification: Classification): Promise<DispatchOutcome> {
    if (classification.type === 'no-match') {
      return { reply: NOT_UNDERSTOOD_REPLY, intentName: null, handled: false };
    }

    const { intentName, params } = classification;
    const skill = this.registry.get(intentName);
    if (!skill) {
      return {
        reply: `I understood your intent is '${intentName}' with parameters ${JSON.stringify(params)}, but I don't have a specific skill for that yet.`,
        intentName,
        handled: false,
      };
    }

    let reply: string;
    try {
      reply = await skill(params);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      process.stderr.write(`[skill-dispatcher] Skill '${intentName}' failed: ${message}\n`);
      return { reply: SKILL_FAILED_REPLY, intentName, handled: false };
    }

    if (!reply) {
      return { reply: EMPTY_REPLY_FALLBACK, intentName, handled: false };
    }
    return { reply, intentName, handled: true };
  }
}
