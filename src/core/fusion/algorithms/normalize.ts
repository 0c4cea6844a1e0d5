/**
 * Score normalization.
 * Makes scores from different systems comparable.
 */

/**
 * Normalize scores to [0, 1] range using min-max scaling.
 *
 * When every score is identical (including a single score) there is no
 * discriminating signal, so every score maps to 1.
 *
 * @example
 * normalizeToUnitRange([10, 5]) // → [1, 0]
 * normalizeToUnitRange([3.2])   // → [1]
 */
export function normalizeToUnitRange(scores: readonly number[]): number[] {
  if (scores.length === 0) return [];

  let minScore = Infinity;
  let maxScore = -Infinity;
  for (const score of scores) {
    if (score < minScore) minScore = score;
    if (score > maxScore) maxScore = score;
  }

  if (maxScore === minScore) {
    return scores.map(() => 1);
  }

  const range = maxScore - minScore;
  return scores.map((score) => (score - minScore) / range);
}
