/**
 * CLI command: `intent-router score "<a>" "<b>"`
 *
 * Prints the token-set similarity of two phrases after normalization,
 * which is the score keywords are compared with.
 *
 * @module cli/commands/score
 */

import { normalize } from '../../intent/normalizer.js';
import { tokenSetRatio } from '../../intent/similarity.js';
import { positionals, reportError } from '../options.js';

export async function scoreCommand(args: string[]): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(`
intent-router score - Token-set similarity of two phrases

Usage:
  intent-router score "<a>" "<b>" [--json]
`);
    return 0;
  }

  const jsonMode = args.includes('--json');
  const phrases = positionals(args);
  if (phrases.length !== 2) {
    reportError(new Error('Expected exactly two phrases. Usage: intent-router score "<a>" "<b>"'), jsonMode);
    return 1;
  }

  const [a, b] = phrases;
  const score = tokenSetRatio(normalize(a), normalize(b));

  if (jsonMode) {
    console.log(JSON.stringify({ a, b, score }, null, 2));
  } else {
    console.log(String(score));
  }
  return 0;
}
