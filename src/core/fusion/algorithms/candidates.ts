/**
 * Candidate set construction.
 * Unions the documents of every system's list for a query and records,
 * per system, whether the document was retrieved.
 */

import type { Candidate, CandidateSet, RankedList, SystemHit } from '../types';
import { normalizeToUnitRange } from './normalize';

/**
 * Build the candidate set for one query.
 *
 * @param queryId - Query being fused
 * @param lists - One slot per system; `undefined` when the system has no list for the query
 */
export function buildCandidateSet(
  queryId: string,
  lists: readonly (RankedList | undefined)[]
): CandidateSet {
  const systemCount = lists.length;
  const hitsById = new Map<string, (SystemHit | undefined)[]>();

  lists.forEach((list, systemIndex) => {
    if (!list || list.entries.length === 0) return;

    const normalized = normalizeToUnitRange(list.entries.map((e) => e.score));

    list.entries.forEach((entry, i) => {
      let hits = hitsById.get(entry.documentId);
      if (!hits) {
        hits = new Array<SystemHit | undefined>(systemCount).fill(undefined);
        hitsById.set(entry.documentId, hits);
      }
      // First occurrence wins if a list was built without deduplication
      if (hits[systemIndex] !== undefined) return;

      hits[systemIndex] = {
        rank: entry.rank,
        normalizedScore: normalized[i] ?? 0
      };
    });
  });

  const candidates: Candidate[] = [];
  for (const [documentId, hits] of hitsById) {
    candidates.push({ documentId, hits });
  }

  return { queryId, systemCount, candidates };
}

/**
 * Number of systems that retrieved the candidate.
 */
export function presenceCount(candidate: Candidate): number {
  let count = 0;
  for (const hit of candidate.hits) {
    if (hit !== undefined) count++;
  }
  return count;
}

/**
 * Sum one contribution per system that retrieved the candidate.
 * Values are added in ascending order, so the same contributions give a
 * bit-identical total whichever systems they came from.
 */
export function sumContributions(
  candidate: Candidate,
  contribution: (hit: SystemHit, systemIndex: number) => number
): number {
  const values: number[] = [];
  candidate.hits.forEach((hit, i) => {
    if (hit) values.push(contribution(hit, i));
  });
  values.sort((a, b) => a - b);

  let total = 0;
  for (const value of values) total += value;
  return total;
}
