/**
 * CLI command: `intent-router chat`
 *
 * Interactive session with the default skills. `--speak` and `--log`
 * switch on speech and the classification log for this run, on top of
 * what the config file enables.
 *
 * @module cli/commands/chat
 */

import * as p from '@clack/prompts';
import { runSession } from '../../session/session.js';
import { SkillDispatcher } from '../../skills/dispatcher.js';
import { createDefaultSkillRegistry } from '../../skills/registry.js';
import { createAnthropicCompletionClient } from '../../skills/anthropic-client.js';
import { SystemSpeaker } from '../../speech/speaker.js';
import { ClassificationLogger } from '../../intent/classification-logger.js';
import { openUrl } from '../../platform/browser.js';
import { loadCatalogRuntime, reportError } from '../options.js';
import type { CatalogRuntime } from '../options.js';

export async function chatCommand(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    showHelp();
    return 0;
  }

  let runtime: CatalogRuntime;
  try {
    runtime = await loadCatalogRuntime(args);
  } catch (err) {
    reportError(err, false);
    return 1;
  }

  const { config, catalog } = runtime;

  const completion = createAnthropicCompletionClient({
    model: config.llm.model,
    maxTokens: config.llm.max_tokens,
    temperature: config.llm.temperature,
  });
  if (!completion) {
    p.log.warn('ANTHROPIC_API_KEY is not set; questions about files are disabled.');
  }

  const dispatcher = new SkillDispatcher(createDefaultSkillRegistry({
    openUrl: (url) => openUrl(url),
    now: () => new Date(),
    queryFile: {
      allowedExtensions: config.query_file.allowed_extensions,
      maxPromptChars: config.query_file.max_prompt_chars,
    },
    completion,
  }));

  const speaker = args.includes('--speak') || config.speech.enabled
    ? new SystemSpeaker({ voice: config.speech.voice })
    : null;

  const logger = args.includes('--log') || config.classification_log.enabled
    ? new ClassificationLogger(config.classification_log.dir)
    : null;

  await runSession({ catalog, dispatcher, speaker, logger });
  return 0;
}

function showHelp(): void {
  console.log(`
intent-router chat - Talk to the assistant

Usage:
  intent-router chat [options]

Options:
  --speak           Speak replies through the system speech command
  --log             Append each classification to the classification log
  --catalog=PATH    Intent definitions file (default: bundled catalog)
  --threshold=N     Keyword confirmation threshold, 0-100
  --config=PATH     Config file (default: .intent-router.json)
  --help, -h        Show this help

Type 'quit' or 'exit' to leave.
`);
}
