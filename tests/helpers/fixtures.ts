/**
 * Test Fixtures
 *
 * Shared test data and builders for fusion tests.
 * Keep these minimal and focused on what each test category needs.
 */

import type { RankedList, Run } from '@/core/fusion/types';

// ═══════════════════════════════════════════════════════════════════════════════
// Score Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

/** Typical dense retrieval scores (tight distribution) */
export const VECTOR_SCORES = [0.89, 0.85, 0.82, 0.78, 0.75];

/** All identical scores (edge case) */
export const IDENTICAL_SCORES = [0.5, 0.5, 0.5, 0.5];

/** Single score (edge case) */
export const SINGLE_SCORE = [0.75];

// ═══════════════════════════════════════════════════════════════════════════════
// Run Builders
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Ranked list with explicit ranks: `[documentId, rank, score]`.
 */
export function makeList(queryId: string, entries: [string, number, number][]): RankedList {
  return {
    queryId,
    entries: entries.map(([documentId, rank, score]) => ({ documentId, rank, score }))
  };
}

/**
 * Run whose ranks follow list order: `{ q1: [[documentId, score], ...] }`.
 */
export function makeRun(name: string, queries: Record<string, [string, number][]>): Run {
  const map = new Map<string, RankedList>();
  for (const [queryId, docs] of Object.entries(queries)) {
    map.set(
      queryId,
      makeList(
        queryId,
        docs.map(([documentId, score], i): [string, number, number] => [documentId, i + 1, score])
      )
    );
  }
  return { name, queries: map, droppedDuplicates: 0 };
}

/** Two-system example: A ranks x then y, B ranks y first and x third */
export const RRF_EXAMPLE_LISTS = [
  makeList('q1', [
    ['x', 1, 10],
    ['y', 2, 5]
  ]),
  makeList('q1', [
    ['y', 1, 8],
    ['x', 3, 2]
  ])
];

/**
 * Three systems scored on [0, 1] so normalization keeps every score as is.
 * a gets 0.3, 0.2, 0.1 and b gets 0.1, 0.2, 0.3: equal sums, added in different orders.
 */
export const PERMUTED_CONTRIBUTION_LISTS = [
  makeList('q', [
    ['top', 1, 1],
    ['a', 2, 0.3],
    ['b', 3, 0.1],
    ['bottom', 4, 0]
  ]),
  makeList('q', [
    ['top', 1, 1],
    ['a', 2, 0.2],
    ['b', 3, 0.2],
    ['bottom', 4, 0]
  ]),
  makeList('q', [
    ['top', 1, 1],
    ['b', 2, 0.3],
    ['a', 3, 0.1],
    ['bottom', 4, 0]
  ])
];

// ═══════════════════════════════════════════════════════════════════════════════
// Config Fixtures
// ═══════════════════════════════════════════════════════════════════════════════

/** Valid minimal config for testing */
export const VALID_MINIMAL_CONFIG = {
  fusion: {
    strategy: 'rrf' as const
  },
  runs: {
    inputs: ['runs/bm25.run', 'runs/dense.run'],
    output: 'runs/hybrid.run'
  }
};
