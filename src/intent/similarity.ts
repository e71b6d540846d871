/**
 * Token-set similarity scoring.
 *
 * Scores two phrases 0-100 by comparing their word sets: the shared
 * words are compared against each side's shared-plus-unique words, so
 * extra words on one side cost less than a plain character ratio would.
 * Character comparison uses the greedy longest-matching-block alignment
 * of the classic sequence matcher.
 *
 * Every function here is pure. Keyword thresholds are compared against
 * these integers exactly, so the arithmetic stays in integers until the
 * final rounding.
 */

// ============================================================================
// Matching Blocks
// ============================================================================

/**
 * Find the longest common block of `a[alo:ahi]` and `b[blo:bhi]`.
 *
 * Ties go to the block starting earliest in `a`, then earliest in `b`.
 * Returns `[i, j, size]`; `size` is 0 when nothing matches.
 */
function findLongestMatch(
  a: readonly string[],
  bIndex: ReadonlyMap<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
): [number, number, number] {
  let bestI = alo;
  let bestJ = blo;
  let bestSize = 0;
  // j2len[j] = length of the block ending at a[i - 1] and b[j]
  let j2len = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of bIndex.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (j2len.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > bestSize) {
        bestI = i - k + 1;
        bestJ = j - k + 1;
        bestSize = k;
      }
    }
    j2len = next;
  }

  return [bestI, bestJ, bestSize];
}

/**
 * Total number of characters covered by the matching blocks of `a` and `b`.
 *
 * Takes the longest block, then recurses into the unmatched regions to
 * its left and right.
 */
export function countMatchingCharacters(a: readonly string[], b: readonly string[]): number {
  const bIndex = new Map<string, number[]>();
  b.forEach((ch, j) => {
    const positions = bIndex.get(ch);
    if (positions) {
      positions.push(j);
    } else {
      bIndex.set(ch, [j]);
    }
  });

  let matched = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const region = queue.pop();
    if (!region) break;
    const [alo, ahi, blo, bhi] = region;
    const [i, j, k] = findLongestMatch(a, bIndex, alo, ahi, blo, bhi);
    if (k === 0) continue;

    matched += k;
    if (alo < i && blo < j) {
      queue.push([alo, i, blo, j]);
    }
    if (i + k < ahi && j + k < bhi) {
      queue.push([i + k, ahi, j + k, bhi]);
    }
  }

  return matched;
}

// ============================================================================
// Ratios
// ============================================================================

/**
 * Divide and round half to even, in integers.
 */
function roundHalfEven(numerator: number, denominator: number): number {
  const quotient = Math.floor(numerator / denominator);
  const twiceRemainder = 2 * (numerator - quotient * denominator);
  if (twiceRemainder > denominator) return quotient + 1;
  if (twiceRemainder < denominator) return quotient;
  return quotient % 2 === 0 ? quotient : quotient + 1;
}

/**
 * Character similarity of two strings, 0-100.
 *
 * `round(200 * M / (len(x) + len(y)))` where M is the matched character
 * count. Lengths count code points. The pair is put in a fixed order
 * first because block tie-breaking depends on which side is scanned.
 */
export function simpleRatio(x: string, y: string): number {
  const [first, second] = x <= y ? [x, y] : [y, x];
  const a = Array.from(first);
  const b = Array.from(second);
  const total = a.length + b.length;
  if (total === 0) {
    return 0;
  }
  return roundHalfEven(200 * countMatchingCharacters(a, b), total);
}

/** Lower-cased whitespace tokens of `text` as a set. */
function tokenSet(text: string): Set<string> {
  return new Set(text.toLowerCase().split(/\s+/).filter((token) => token.length > 0));
}

function sortedJoin(tokens: Iterable<string>): string {
  return [...tokens].sort().join(' ');
}

/**
 * Token-set ratio of two phrases, 0-100.
 *
 * @example
 * ```ts
 * tokenSetRatio('jarvis weather', 'how is the weather') // => 67
 * tokenSetRatio('search for', 'search')                 // => 100
 * ```
 */
export function tokenSetRatio(a: string, b: string): number {
  const tokensA = tokenSet(a);
  const tokensB = tokenSet(b);

  const intersection = sortedJoin([...tokensA].filter((token) => tokensB.has(token)));
  const diffA = sortedJoin([...tokensA].filter((token) => !tokensB.has(token)));
  const diffB = sortedJoin([...tokensB].filter((token) => !tokensA.has(token)));

  const t0 = intersection;
  const t1 = `${intersection} ${diffA}`.trim();
  const t2 = `${intersection} ${diffB}`.trim();

  return Math.max(simpleRatio(t0, t1), simpleRatio(t0, t2), simpleRatio(t1, t2));
}
