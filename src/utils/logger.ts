/**
 * Logger
 *
 * Semantic logging for fusion runs:
 * - LOAD: Input runs read from disk
 * - FUSE: Strategy and settings of a fusion
 * - WRITE: Fused run written
 *
 * Warnings are printed after the run so they are not lost between query logs.
 */

import type { ConsistencyWarning, FusionOutput, FusionSettings, Run } from '@/core/fusion/types';
import { c } from './colors';

// ═══════════════════════════════════════════════════════════════════════════════
// Formatting Utilities
// ═══════════════════════════════════════════════════════════════════════════════

/** Format current time as [HH:MM:SS] */
function formatTime(): string {
  const now = new Date();
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  return `[${hours}:${minutes}:${seconds}]`;
}

/** Indent string for continuation lines (matches timestamp width) */
const INDENT = '           ';

/** Query ids listed before collapsing the rest into a count */
const MAX_LISTED_QUERIES = 5;

/**
 * Join ids, collapsing the tail: `q1, q2, q3 (+4 more)`.
 */
export function formatIdList(ids: readonly string[], max: number = MAX_LISTED_QUERIES): string {
  if (ids.length <= max) return ids.join(', ');
  return `${ids.slice(0, max).join(', ')} (+${ids.length - max} more)`;
}

/**
 * One-line description of the strategy and its parameters.
 */
export function describeSettings(settings: FusionSettings): string {
  switch (settings.strategy) {
    case 'rrf':
      return `rrf k=${settings.k} topK=${settings.topK}`;
    case 'linear':
      return settings.weights
        ? `linear weights=[${settings.weights.join(', ')}] topK=${settings.topK}`
        : `linear weights=equal topK=${settings.topK}`;
    case 'weighted':
      return `weighted alpha=${settings.alpha} topK=${settings.topK}`;
    case 'combsum':
    case 'combmnz':
      return `${settings.strategy} topK=${settings.topK}`;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run Logging (LOAD / FUSE / WRITE)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Log a loaded input run.
 */
export function logRunLoaded(run: Run, path: string): void {
  const time = c.dim(formatTime());
  console.log(
    `${time} ${c.cyan('LOAD')} ${c.white(run.name)} ${c.dim(`(${run.queries.size} queries, ${path})`)}`
  );
  if (run.droppedDuplicates > 0) {
    console.log(
      `${INDENT}${c.warning('! Dropped')} ${run.droppedDuplicates} duplicate document entries`
    );
  }
}

/**
 * Log the start of a fusion.
 */
export function logFusionStart(settings: FusionSettings, runs: readonly Run[]): void {
  const time = c.dim(formatTime());
  const names = runs.map((r) => r.name).join(' + ');
  console.log(`${time} ${c.magenta('FUSE')} ${c.white(names)}`);
  console.log(`${INDENT}${c.dim('→')} ${describeSettings(settings)}`);
}

/**
 * Log queries missing from some runs.
 */
export function logConsistencyWarnings(warnings: readonly ConsistencyWarning[]): void {
  if (warnings.length === 0) return;

  // Group by the set of runs missing the query
  const byMissing = new Map<string, string[]>();
  for (const warning of warnings) {
    const key = warning.missingFrom.join(', ');
    const ids = byMissing.get(key) ?? [];
    ids.push(warning.queryId);
    byMissing.set(key, ids);
  }

  for (const [missingFrom, queryIds] of byMissing) {
    console.warn(
      `${INDENT}${c.warning('! Missing')} from ${missingFrom}: ${formatIdList(queryIds)} ${c.dim(`(${queryIds.length} queries)`)}`
    );
  }
}

/**
 * Log the result of a fusion and where it went.
 */
export function logFusionResult(output: FusionOutput, path: string, runId: string): void {
  const time = c.dim(formatTime());
  const entries = output.results.reduce((sum, r) => sum + r.entries.length, 0);
  console.log(
    `${time} ${c.success('WRITE')} ${c.white(runId)} ${c.dim(`(${output.results.length} queries, ${entries} results, ${output.meta.durationMs}ms)`)}`
  );
  console.log(`${INDENT}${c.dim('→')} ${path}`);
}

/**
 * Log an aborted fusion. Nothing is written for it.
 */
export function logFusionAborted(output: FusionOutput): void {
  console.warn(
    `${INDENT}${c.warning('⊘ Aborted')} ${c.dim(`(${output.results.length} of ${output.meta.totalQueries} queries fused, nothing written)`)}`
  );
}

/**
 * Log a fatal error.
 */
export function logError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`${c.error('✗')} ${message}`);
}
