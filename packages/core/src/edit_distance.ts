// ============================================================================
// @argloom/core — Edit Distance
// ============================================================================

/**
 * Levenshtein distance between two strings, by Unicode code point.
 *
 * @example
 * ```ts
 * editDistance('--nme', '--name') // → 1
 * ```
 */
export function editDistance(a: string, b: string): number {
  const source = Array.from(a);
  const target = Array.from(b);
  if (source.length === 0) return target.length;
  if (target.length === 0) return source.length;

  // Two rolling rows of the DP table.
  let previous = Array.from({ length: target.length + 1 }, (_, i) => i);
  let current = new Array<number>(target.length + 1).fill(0);

  for (let i = 1; i <= source.length; i++) {
    current[0] = i;
    for (let j = 1; j <= target.length; j++) {
      const cost = source[i - 1] === target[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    [previous, current] = [current, previous];
  }
  return previous[target.length];
}
