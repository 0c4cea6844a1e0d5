/**
 * Merger
 *
 * Fuses one query: candidate union → strategy scores → sort → rank → truncate.
 * Stateless; either the whole query merges or it throws.
 */

import { buildCandidateSet } from './algorithms';
import type { FusedEntry, FusionResult, FusionStrategy, RankedList } from './types';

/** Ascending code-unit order */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order by score descending, then document id ascending (code-unit order).
 * The id tie-break keeps output independent of input order.
 */
export function compareFused(
  a: { documentId: string; score: number },
  b: { documentId: string; score: number }
): number {
  if (a.score !== b.score) return b.score - a.score;
  return compareIds(a.documentId, b.documentId);
}

/**
 * Merge every system's list for one query into a single ranking.
 *
 * @param queryId - Query being fused
 * @param lists - One slot per system, `undefined` where the system has no list for the query
 * @param strategy - Scoring strategy
 * @param topK - Maximum entries kept, applied after the full sort
 */
export function mergeQuery(
  queryId: string,
  lists: readonly (RankedList | undefined)[],
  strategy: FusionStrategy,
  topK: number
): FusionResult {
  const candidateSet = buildCandidateSet(queryId, lists);
  const scores = strategy.compute(candidateSet);

  const scored = candidateSet.candidates.map((candidate) => ({
    documentId: candidate.documentId,
    score: scores.get(candidate.documentId) ?? 0
  }));
  scored.sort(compareFused);

  const entries: FusedEntry[] = scored
    .slice(0, topK)
    .map((item, i) => ({ documentId: item.documentId, score: item.score, rank: i + 1 }));

  return { queryId, entries };
}
