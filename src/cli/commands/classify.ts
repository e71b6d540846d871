/**
 * CLI command: `intent-router classify "<text>"`
 *
 * Classifies one utterance against the catalog and prints the intent
 * and parameters.
 *
 * Exit codes:
 * - 0: An intent matched
 * - 1: No intent matched
 * - 2: Usage, config or catalog error
 *
 * @module cli/commands/classify
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { classify } from '../../intent/intent-classifier.js';
import { loadCatalogRuntime, positionals, reportError } from '../options.js';
import type { CatalogRuntime } from '../options.js';

/**
 * Execute the classify command.
 *
 * @param args - CLI arguments after `classify`
 * @returns Exit code
 */
export async function classifyCommand(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    showHelp();
    return 0;
  }

  const jsonMode = args.includes('--json');
  const text = positionals(args).join(' ');

  if (!text.trim()) {
    reportError(new Error('Missing text. Usage: intent-router classify "<text>"'), jsonMode);
    return 2;
  }

  let runtime: CatalogRuntime;
  try {
    runtime = await loadCatalogRuntime(args);
  } catch (err) {
    reportError(err, jsonMode);
    return 2;
  }

  const result = classify(runtime.catalog, text);

  if (jsonMode) {
    console.log(JSON.stringify(
      result.type === 'match'
        ? { matched: true, intent: result.intentName, params: result.params }
        : { matched: false, intent: null, params: null },
      null,
      2,
    ));
  } else if (result.type === 'match') {
    p.log.success(pc.bold(result.intentName));
    for (const [key, value] of Object.entries(result.params)) {
      p.log.message(`  ${key}: ${value === null ? pc.dim('(none)') : value}`);
    }
  } else {
    p.log.warn('No intent matched.');
  }

  return result.type === 'match' ? 0 : 1;
}

function showHelp(): void {
  console.log(`
intent-router classify - Classify one utterance

Usage:
  intent-router classify "<text>" [options]

Options:
  --threshold=N     Keyword confirmation threshold, 0-100
  --catalog=PATH    Intent definitions file (default: bundled catalog)
  --config=PATH     Config file (default: .intent-router.json)
  --json            Output as JSON
  --help, -h        Show this help

Exit codes:
  0  An intent matched
  1  No intent matched
  2  Usage, config or catalog error
`);
}
