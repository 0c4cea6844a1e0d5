/**
 * Score combination algorithms.
 * Combine min-max normalized scores from several systems.
 */

import type { CandidateSet } from '../types';
import { presenceCount, sumContributions } from './candidates';

/** Tolerance when checking that weights sum to 1 */
export const WEIGHT_SUM_TOLERANCE = 1e-6;

/**
 * Equal weights for `systemCount` systems.
 */
export function equalWeights(systemCount: number): number[] {
  return Array.from({ length: systemCount }, () => 1 / systemCount);
}

/**
 * Whether a weight vector sums to 1 within tolerance.
 */
export function weightsSumToOne(weights: readonly number[]): boolean {
  const total = weights.reduce((sum, w) => sum + w, 0);
  return Math.abs(total - 1) < WEIGHT_SUM_TOLERANCE;
}

/**
 * Weighted sum of normalized scores: Σ weight_s × norm_s(d).
 * A system that did not retrieve the document contributes 0.
 *
 * @param weights - One weight per system, in system order
 */
export function linearCombinationScores(
  candidateSet: CandidateSet,
  weights: readonly number[]
): Map<string, number> {
  const scores = new Map<string, number>();

  for (const candidate of candidateSet.candidates) {
    const score = sumContributions(candidate, (hit, i) => (weights[i] ?? 0) * hit.normalizedScore);
    scores.set(candidate.documentId, score);
  }

  return scores;
}

/**
 * CombSUM: unweighted sum of normalized scores.
 */
export function combSumScores(candidateSet: CandidateSet): Map<string, number> {
  const scores = new Map<string, number>();

  for (const candidate of candidateSet.candidates) {
    scores.set(
      candidate.documentId,
      sumContributions(candidate, (hit) => hit.normalizedScore)
    );
  }

  return scores;
}

/**
 * CombMNZ: CombSUM multiplied by the number of systems that retrieved the document.
 * Presence is the criterion, not a non-zero normalized score.
 */
export function combMnzScores(candidateSet: CandidateSet): Map<string, number> {
  const sums = combSumScores(candidateSet);
  const scores = new Map<string, number>();

  for (const candidate of candidateSet.candidates) {
    const sum = sums.get(candidate.documentId) ?? 0;
    scores.set(candidate.documentId, sum * presenceCount(candidate));
  }

  return scores;
}
