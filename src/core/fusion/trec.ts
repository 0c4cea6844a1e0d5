/**
 * Run File Loader
 *
 * Reads runs in the standard six-column result format:
 *   query_id Q0 document_id rank score run_id
 */

import { readFileSync } from 'node:fs';
import { parse as parsePath } from 'node:path';
import { FormatError } from './errors';
import type { RankedEntry, RankedList, Run } from './types';

const FIELD_COUNT = 6;

/** Plain decimal digits; `Number` alone would take hex, binary and exponent forms */
const RANK_PATTERN = /^\d+$/;
/** Decimal number with optional sign, fraction and exponent */
const SCORE_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse one non-empty line. Throws FormatError naming the source and line.
 */
function parseLine(
  fields: string[],
  source: string,
  lineNumber: number
): { queryId: string; entry: RankedEntry } {
  if (fields.length !== FIELD_COUNT) {
    throw new FormatError(
      source,
      lineNumber,
      `expected ${FIELD_COUNT} fields, got ${fields.length}`
    );
  }

  const [queryId = '', , documentId = '', rankField = '', scoreField = ''] = fields;

  const rank = Number(rankField);
  if (!Number.isFinite(rank)) {
    throw new FormatError(source, lineNumber, `non-numeric rank "${rankField}"`);
  }
  if (!RANK_PATTERN.test(rankField) || rank < 1) {
    throw new FormatError(
      source,
      lineNumber,
      `rank must be a positive integer, got "${rankField}"`
    );
  }

  const score = Number(scoreField);
  if (!SCORE_PATTERN.test(scoreField) || !Number.isFinite(score)) {
    throw new FormatError(source, lineNumber, `non-numeric score "${scoreField}"`);
  }

  return { queryId, entry: { documentId, rank, score } };
}

/**
 * Order entries by rank and keep the best-ranked entry per document.
 */
function toRankedList(
  queryId: string,
  entries: RankedEntry[]
): { list: RankedList; dropped: number } {
  const sorted = [...entries].sort((a, b) => a.rank - b.rank);
  const seen = new Set<string>();
  const kept: RankedEntry[] = [];

  for (const entry of sorted) {
    if (seen.has(entry.documentId)) continue;
    seen.add(entry.documentId);
    kept.push(entry);
  }

  return { list: { queryId, entries: kept }, dropped: sorted.length - kept.length };
}

/**
 * Parse run text.
 *
 * @param text - File contents
 * @param source - File name used in error messages
 * @param name - Run name (default: `source` without directory or extension)
 */
export function parseRun(text: string, source: string, name = parsePath(source).name): Run {
  const byQuery = new Map<string, RankedEntry[]>();
  const lines = text.split(/\r?\n/);

  lines.forEach((line, i) => {
    const trimmed = line.trim();
    if (trimmed === '') return;

    const { queryId, entry } = parseLine(trimmed.split(/\s+/), source, i + 1);
    let entries = byQuery.get(queryId);
    if (!entries) {
      entries = [];
      byQuery.set(queryId, entries);
    }
    entries.push(entry);
  });

  const queries = new Map<string, RankedList>();
  let droppedDuplicates = 0;
  for (const [queryId, entries] of byQuery) {
    const { list, dropped } = toRankedList(queryId, entries);
    queries.set(queryId, list);
    droppedDuplicates += dropped;
  }

  return { name, queries, droppedDuplicates };
}

/**
 * Read and parse a run file. File system errors propagate unchanged.
 */
export function readRun(path: string): Run {
  const text = readFileSync(path, 'utf-8');
  return parseRun(text, path);
}
