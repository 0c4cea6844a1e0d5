/**
 * Run Emitter
 *
 * Serializes fused results into the six-column result format, one line per
 * entry, queries in canonical order. Single writer: the whole run is formatted
 * first, then written in one call.
 */

import { createWriteStream } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Writable } from 'node:stream';
import { finished } from 'node:stream/promises';
import { configError } from './errors';
import { compareIds } from './merger';
import type { FusionResult } from './types';

/** Fixed second column of the result format */
export const PLACEHOLDER = 'Q0';

/** Decimal places written for scores */
export const SCORE_PRECISION = 6;

/**
 * Format results as run text. Does not mutate `results`.
 */
export function formatRun(results: readonly FusionResult[], runId: string): string {
  if (runId === '' || /\s/.test(runId)) {
    throw configError(`Run id must be a non-empty string without whitespace, got "${runId}"`);
  }

  const ordered = [...results].sort((a, b) => compareIds(a.queryId, b.queryId));
  const lines: string[] = [];

  for (const result of ordered) {
    for (const entry of result.entries) {
      lines.push(
        `${result.queryId} ${PLACEHOLDER} ${entry.documentId} ${entry.rank} ${entry.score.toFixed(SCORE_PRECISION)} ${runId}`
      );
    }
  }

  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

/**
 * Write results to a stream. Write errors reject unchanged; nothing is retried.
 */
export function writeRun(
  results: readonly FusionResult[],
  sink: Writable,
  runId: string
): Promise<void> {
  const text = formatRun(results, runId);

  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    sink.once('error', onError);
    sink.write(text, (err) => {
      if (err) {
        reject(err);
        return;
      }
      sink.off('error', onError);
      resolve();
    });
  });
}

/**
 * Write results to a file, creating its directory when missing.
 */
export async function writeRunFile(
  results: readonly FusionResult[],
  path: string,
  runId: string
): Promise<void> {
  // Reject a bad run id before creating the file
  formatRun([], runId);

  await mkdir(dirname(path), { recursive: true });
  const stream = createWriteStream(path, { encoding: 'utf-8' });
  try {
    await writeRun(results, stream, runId);
  } catch (error) {
    stream.destroy();
    throw error;
  }
  stream.end();
  await finished(stream);
}
