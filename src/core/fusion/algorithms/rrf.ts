/**
 * Reciprocal Rank Fusion.
 * Rank-only fusion, so incomparable score scales across systems do not matter.
 */

import type { CandidateSet } from '../types';
import { sumContributions } from './candidates';

/** Standard RRF constant */
export const DEFAULT_RRF_K = 60;

/**
 * Compute RRF scores: Σ 1 / (k + rank) over the systems that retrieved each document.
 * Systems that did not retrieve a document contribute nothing.
 *
 * @example
 * // A ranks x=1, y=2; B ranks y=1, x=3; k=60
 * // y → 1/62 + 1/61 ≈ 0.03252, x → 1/61 + 1/63 ≈ 0.03227
 */
export function reciprocalRankScores(
  candidateSet: CandidateSet,
  k: number = DEFAULT_RRF_K
): Map<string, number> {
  const scores = new Map<string, number>();

  for (const candidate of candidateSet.candidates) {
    scores.set(
      candidate.documentId,
      sumContributions(candidate, (hit) => 1 / (k + hit.rank))
    );
  }

  return scores;
}
