/**
 * Fusion Pipeline Orchestrator
 *
 * Fuses every query of a set of runs:
 * 1. **VALIDATE**: Check strategy settings against the runs (fail fast)
 * 2. **COLLECT**: Canonical query order and per-query consistency warnings
 * 3. **MERGE**: One query at a time, yielding to the event loop between merges
 * 4. **ORDER**: Results returned in canonical query order
 */

import { compareIds, mergeQuery } from './merger';
import { createFusionStrategy } from './strategies';
import type {
  ConsistencyWarning,
  FusionOutput,
  FusionResult,
  FusionSettings,
  RankedList,
  Run
} from './types';

/**
 * Options for the fusion pipeline.
 */
export interface FuseOptions {
  /** Checked between queries; a query already being merged still completes */
  signal?: AbortSignal;
}

/** Let pending events (abort signals) run between merges */
function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Union of query ids across runs, in canonical order.
 */
export function collectQueryIds(runs: readonly Run[]): string[] {
  const ids = new Set<string>();
  for (const run of runs) {
    for (const queryId of run.queries.keys()) ids.add(queryId);
  }
  return [...ids].sort(compareIds);
}

/**
 * Queries that some runs have no results for.
 * Those queries are still fused from the runs that do have them.
 */
export function findConsistencyWarnings(
  runs: readonly Run[],
  queryIds: readonly string[]
): ConsistencyWarning[] {
  const warnings: ConsistencyWarning[] = [];

  for (const queryId of queryIds) {
    const missingFrom = runs.filter((run) => !run.queries.has(queryId)).map((run) => run.name);
    if (missingFrom.length > 0) {
      warnings.push({ queryId, missingFrom });
    }
  }

  return warnings;
}

/**
 * Fuse a set of runs into one.
 *
 * @param runs - Input runs, one per retrieval system (order matters for weights)
 * @param settings - Strategy, parameters and topK
 * @param options - Cancellation
 * @returns Fused results in canonical query order, warnings, and whether the run was aborted
 *
 * @example
 * ```typescript
 * const output = await fuseRuns([bm25Run, denseRun], { strategy: 'rrf', k: 60, topK: 1000 });
 * await writeRun(output.results, stream, 'bm25_dense_hybrid_rrf_k60');
 * ```
 */
export async function fuseRuns(
  runs: readonly Run[],
  settings: FusionSettings,
  options: FuseOptions = {}
): Promise<FusionOutput> {
  const startTime = Date.now();

  // Step 1: VALIDATE - configuration errors abort before any query is fused
  const strategy = createFusionStrategy(settings, runs.length);

  // Step 2: COLLECT
  const queryIds = collectQueryIds(runs);
  const warnings = findConsistencyWarnings(runs, queryIds);

  // Step 3: MERGE - merges are synchronous; yielding lets an abort land between queries
  const results: FusionResult[] = [];
  for (const queryId of queryIds) {
    if (options.signal?.aborted) break;

    const lists: (RankedList | undefined)[] = runs.map((run) => run.queries.get(queryId));
    results.push(mergeQuery(queryId, lists, strategy, settings.topK));

    await yieldToEventLoop();
  }

  // Step 4: ORDER - queryIds is canonical, so results already are
  return {
    results,
    warnings,
    aborted: results.length < queryIds.length,
    meta: {
      totalQueries: queryIds.length,
      durationMs: Date.now() - startTime
    }
  };
}
