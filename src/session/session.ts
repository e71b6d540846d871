/**
 * Interactive read-classify-respond loop.
 *
 * Each line is classified against the catalog, optionally written to the
 * classification log, and dispatched to a skill. Replies are printed and,
 * when a speaker is configured, spoken.
 *
 * @module session/session
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { classify } from '../intent/intent-classifier.js';
import type { IntentCatalog } from '../intent/intent-catalog.js';
import type { ClassificationLogger } from '../intent/classification-logger.js';
import type { SkillDispatcher } from '../skills/dispatcher.js';
import type { Speaker } from '../speech/speaker.js';

const QUIT_WORDS = new Set(['quit', 'exit']);

export const GOODBYE_REPLY = 'Goodbye!';
export const CANCEL_REPLY = 'Exiting now.';

export interface SessionDeps {
  catalog: IntentCatalog;
  dispatcher: SkillDispatcher;
  speaker?: Speaker | null;
  logger?: ClassificationLogger | null;
}

export interface SessionSummary {
  /** Lines that were classified and answered */
  turns: number;
  endedBy: 'quit' | 'cancel';
}

/**
 * Run the session until the user quits or cancels.
 */
export async function runSession(deps: SessionDeps): Promise<SessionSummary> {
  const { catalog, dispatcher, speaker, logger } = deps;
  let turns = 0;

  const respond = async (reply: string): Promise<void> => {
    p.log.message(`${pc.cyan('Assistant:')} ${reply}`);
    if (speaker) {
      await speaker.speak(reply);
    }
  };

  p.intro(pc.bgCyan(pc.black(' Intent Router ')));
  p.log.info(`${catalog.size} intents loaded. Type ${pc.bold('quit')} or ${pc.bold('exit')} to leave.`);

  for (;;) {
    const value = await p.text({
      message: 'You',
      placeholder: 'e.g., what time is it',
    });

    if (p.isCancel(value)) {
      await respond(CANCEL_REPLY);
      p.outro(pc.dim(`${turns} request(s) handled`));
      return { turns, endedBy: 'cancel' };
    }

    // An empty submission can come back as undefined
    const line = typeof value === 'string' ? value.trim() : '';

    if (QUIT_WORDS.has(line.toLowerCase())) {
      await respond(GOODBYE_REPLY);
      p.outro(pc.dim(`${turns} request(s) handled`));
      return { turns, endedBy: 'quit' };
    }

    if (!line) {
      continue;
    }

    try {
      const classification = classify(catalog, line);
      if (logger) {
        await logger.log(classification, line);
      }
      const outcome = await dispatcher.dispatch(classification);
      await respond(outcome.reply);
      turns++;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      p.log.error(`An error occurred while handling that request: ${message}`);
    }
  }
}
