/**
 * Input normalization shared by the classifier and the keyword scorer.
 */

/**
 * Lower-case and trim a text value.
 *
 * Anything that is not a string normalizes to the empty string, so
 * callers never have to guard the input type.
 *
 * @example
 * ```ts
 * normalize('  Open Notepad  ') // => 'open notepad'
 * normalize(42)                 // => ''
 * ```
 */
export function normalize(text: unknown): string {
  if (typeof text !== 'string') {
    return '';
  }
  return text.toLowerCase().trim();
}
