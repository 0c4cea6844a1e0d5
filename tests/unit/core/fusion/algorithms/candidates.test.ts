/**
 * Candidate Set Tests
 *
 * Tests for the per-query union of documents with per-system presence.
 */

import { describe, expect, test } from 'vitest';
import {
  buildCandidateSet,
  presenceCount,
  sumContributions
} from '@/core/fusion/algorithms/candidates';
import type { Candidate } from '@/core/fusion/types';
import { makeList } from '@tests/helpers/fixtures';

describe('buildCandidateSet', () => {
  const listA = makeList('q1', [
    ['x', 1, 10],
    ['y', 2, 5]
  ]);
  const listB = makeList('q1', [
    ['y', 1, 8],
    ['z', 2, 2]
  ]);

  test('unions documents across systems', () => {
    const set = buildCandidateSet('q1', [listA, listB]);
    const ids = set.candidates.map((c) => c.documentId).sort();
    expect(ids).toEqual(['x', 'y', 'z']);
    expect(set.systemCount).toBe(2);
  });

  test('marks absent systems as undefined, not score 0', () => {
    const set = buildCandidateSet('q1', [listA, listB]);
    const x = set.candidates.find((c) => c.documentId === 'x');

    expect(x?.hits[0]).toEqual({ rank: 1, normalizedScore: 1 });
    expect(x?.hits[1]).toBeUndefined();
  });

  test('normalizes each system separately', () => {
    const set = buildCandidateSet('q1', [listA, listB]);
    const y = set.candidates.find((c) => c.documentId === 'y');

    expect(y?.hits[0]?.normalizedScore).toBe(0);
    expect(y?.hits[1]?.normalizedScore).toBe(1);
  });

  test('keeps a slot for a system without a list for the query', () => {
    const set = buildCandidateSet('q1', [listA, undefined]);
    expect(set.systemCount).toBe(2);
    for (const candidate of set.candidates) {
      expect(candidate.hits).toHaveLength(2);
      expect(candidate.hits[1]).toBeUndefined();
    }
  });

  test('returns no candidates when every list is empty or missing', () => {
    const set = buildCandidateSet('q1', [makeList('q1', []), undefined]);
    expect(set.candidates).toEqual([]);
  });
});

describe('presenceCount', () => {
  test('counts systems that retrieved the document', () => {
    const set = buildCandidateSet('q1', [
      makeList('q1', [['d', 1, 1]]),
      makeList('q1', [['d', 1, 9]]),
      makeList('q1', [['e', 1, 3]])
    ]);
    const d = set.candidates.find((c) => c.documentId === 'd');
    const e = set.candidates.find((c) => c.documentId === 'e');

    expect(d && presenceCount(d)).toBe(2);
    expect(e && presenceCount(e)).toBe(1);
  });
});

describe('sumContributions', () => {
  const candidateWith = (normalized: number[]): Candidate => ({
    documentId: 'd',
    hits: normalized.map((normalizedScore) => ({ rank: 1, normalizedScore }))
  });
  const total = (candidate: Candidate) => sumContributions(candidate, (hit) => hit.normalizedScore);

  test('gives the same total whichever system contributed which value', () => {
    expect(total(candidateWith([0.3, 0.2, 0.1]))).toBe(total(candidateWith([0.1, 0.2, 0.3])));
    expect(total(candidateWith([0.2, 0.3, 0.1]))).toBe(0.1 + 0.2 + 0.3);
  });

  test('skips absent systems and passes the system index', () => {
    const candidate: Candidate = {
      documentId: 'd',
      hits: [{ rank: 2, normalizedScore: 0.5 }, undefined, { rank: 4, normalizedScore: 0.25 }]
    };

    expect(sumContributions(candidate, (hit) => hit.rank)).toBe(6);
    expect(sumContributions(candidate, (_hit, i) => i)).toBe(2);
  });
});
