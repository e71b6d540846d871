/**
 * Positional mapping of pattern captures to entity keys.
 *
 * Groups that did not take part in the match are dropped first, so an
 * alternation like `(a) x|(b) y` yields the same parameter name for
 * whichever branch matched. The surviving captures are then paired with
 * the entity keys left to right.
 */

import type { IntentParams } from './types.js';

/**
 * Build the parameter mapping for one accepted match.
 *
 * - Trailing keys with no capture map to `null`.
 * - Captures beyond the last key are discarded.
 * - Values are trimmed.
 *
 * @example
 * ```ts
 * const match = /^play (.+?)(?: on (.+))?$/.exec('play jazz')!;
 * extractParams(match, ['mediaTitle', 'mediaService']);
 * // => { mediaTitle: 'jazz', mediaService: null }
 * ```
 */
export function extractParams(
  match: RegExpExecArray,
  entityKeys: readonly string[],
): IntentParams {
  const captures = match
    .slice(1)
    .filter((group): group is string => group !== undefined);

  // Own data properties: `__proto__` is an ordinary key here
  return Object.fromEntries(
    entityKeys.map((key, index): [string, string | null] => [
      key,
      index < captures.length ? captures[index].trim() : null,
    ]),
  );
}
