/**
 * Fusion Types
 *
 * Type definitions for the CANDIDATES → SCORE → MERGE → EMIT flow.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Input Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One retrieved document in a system's result list.
 */
export interface RankedEntry {
  /** Document identifier (opaque) */
  documentId: string;
  /** 1-based rank within the list */
  rank: number;
  /** Raw retrieval score, not comparable across systems */
  score: number;
}

/**
 * One system's ordered result list for one query.
 */
export interface RankedList {
  queryId: string;
  entries: readonly RankedEntry[];
}

/**
 * A complete run from one retrieval system, keyed by query id.
 */
export interface Run {
  /** Run name, usually the file name without extension */
  name: string;
  queries: ReadonlyMap<string, RankedList>;
  /** Entries dropped at load time because the document was already listed for the query */
  droppedDuplicates: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Candidate Types
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * What one system says about one candidate document.
 * `undefined` in a presence slot means the system did not retrieve the document,
 * which is not the same as retrieving it with score 0.
 */
export interface SystemHit {
  rank: number;
  /** Min-max normalized score within this system's list for the query */
  normalizedScore: number;
}

/**
 * A document in the candidate set with one presence slot per input system.
 */
export interface Candidate {
  documentId: string;
  hits: readonly (SystemHit | undefined)[];
}

/**
 * The candidate set for one query: the union of every system's documents.
 */
export interface CandidateSet {
  queryId: string;
  /** Number of systems taking part in the fusion (length of every `hits` array) */
  systemCount: number;
  candidates: readonly Candidate[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// Strategy Types
// ═══════════════════════════════════════════════════════════════════════════════

export const fusionStrategies = ['rrf', 'linear', 'weighted', 'combsum', 'combmnz'] as const;
export type FusionStrategyName = (typeof fusionStrategies)[number];

/**
 * Strategy selection with its parameters.
 */
export type StrategySettings =
  | { readonly strategy: 'rrf'; readonly k: number }
  | { readonly strategy: 'linear'; readonly weights?: readonly number[] }
  | { readonly strategy: 'weighted'; readonly alpha: number }
  | { readonly strategy: 'combsum' }
  | { readonly strategy: 'combmnz' };

/**
 * Immutable settings handed to the merger.
 */
export type FusionSettings = StrategySettings & {
  /** Maximum number of results kept per query */
  readonly topK: number;
};

/**
 * A fusion algorithm: one combined score per candidate document.
 */
export interface FusionStrategy {
  readonly name: FusionStrategyName;
  compute(candidates: CandidateSet): Map<string, number>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Output Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface FusedEntry {
  documentId: string;
  /** Combined score; magnitudes differ between strategies and queries */
  score: number;
  /** Final rank (1-based, contiguous) */
  rank: number;
}

/**
 * Fused ranking for one query.
 */
export interface FusionResult {
  readonly queryId: string;
  readonly entries: readonly FusedEntry[];
}

/**
 * A query that was missing from some of the input runs.
 */
export interface ConsistencyWarning {
  queryId: string;
  /** Names of the runs with no results for the query */
  missingFrom: string[];
}

/**
 * Output of fusing a set of runs.
 */
export interface FusionOutput {
  /** Fused results in canonical (ascending query id) order */
  results: FusionResult[];
  warnings: ConsistencyWarning[];
  /** True when the fusion was aborted; `results` then holds only completed queries */
  aborted: boolean;
  meta: {
    totalQueries: number;
    durationMs: number;
  };
}
