/**
 * Character-level output similarity used for partial credit.
 */

/**
 * Fraction of positions where both trimmed strings hold the same character,
 * relative to the longer string. Identical strings score 1, an empty
 * expected output scores 0.
 */
export function positionalSimilarity(output: string, expected: string): number {
  const a = output.trim();
  const b = expected.trim();

  if (b.length === 0) return 0;
  if (a === b) return 1;

  const maxLen = Math.max(a.length, b.length);
  let matches = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    if (a[i] === b[i]) matches++;
  }
  return matches / maxLen;
}
