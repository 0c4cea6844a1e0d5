/**
 * Fusion Integration Tests
 *
 * Reads run files, fuses them with every strategy and writes the fused run.
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import {
  defaultRunId,
  type FusionSettings,
  fuseRuns,
  readRun,
  writeRunFile
} from '@/core/fusion';

const BM25_RUN = ['q1 Q0 x 1 10.0 bm25', 'q1 Q0 y 2 5.0 bm25', 'q2 Q0 z 1 3.0 bm25', ''].join(
  '\n'
);

const DENSE_RUN = ['q1 Q0 y 1 8.0 dense', 'q1 Q0 x 3 2.0 dense', ''].join('\n');

describe('run fusion end to end', () => {
  let dir: string;
  let bm25Path: string;
  let densePath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'run-fusion-e2e-'));
    bm25Path = join(dir, 'bm25_fas.run');
    densePath = join(dir, 'mdpr_fas.run');
    writeFileSync(bm25Path, BM25_RUN);
    writeFileSync(densePath, DENSE_RUN);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  async function fuseToText(settings: FusionSettings): Promise<{ text: string; runId: string }> {
    const runs = [readRun(bm25Path), readRun(densePath)];
    const output = await fuseRuns(runs, settings);
    const runId = defaultRunId(
      runs.map((r) => r.name),
      settings
    );
    const outPath = join(dir, 'hybrid', `${runId}.run`);
    await writeRunFile(output.results, outPath, runId);
    return { text: readFileSync(outPath, 'utf-8'), runId };
  }

  test('reciprocal rank fusion', async () => {
    const { text, runId } = await fuseToText({ strategy: 'rrf', k: 60, topK: 1000 });

    expect(runId).toBe('bm25_fas_mdpr_fas_hybrid_rrf_k60');
    expect(text).toBe(
      [
        `q1 Q0 y 1 0.032522 ${runId}`,
        `q1 Q0 x 2 0.032266 ${runId}`,
        `q2 Q0 z 1 0.016393 ${runId}`,
        ''
      ].join('\n')
    );
  });

  test('equal-weight linear combination breaks the tie by document id', async () => {
    const { text, runId } = await fuseToText({ strategy: 'linear', topK: 1000 });

    // q2 only exists in bm25: its single document normalizes to 1, weighted by 0.5
    expect(text).toBe(
      [
        `q1 Q0 x 1 0.500000 ${runId}`,
        `q1 Q0 y 2 0.500000 ${runId}`,
        `q2 Q0 z 1 0.500000 ${runId}`,
        ''
      ].join('\n')
    );
  });

  test('CombMNZ rewards documents retrieved by both runs', async () => {
    const { text, runId } = await fuseToText({ strategy: 'combmnz', topK: 1000 });

    // x: (1 + 0) × 2, y: (0 + 1) × 2, z: 1 × 1
    expect(text).toBe(
      [
        `q1 Q0 x 1 2.000000 ${runId}`,
        `q1 Q0 y 2 2.000000 ${runId}`,
        `q2 Q0 z 1 1.000000 ${runId}`,
        ''
      ].join('\n')
    );
  });

  test('topK = 1 keeps the top document of each query', async () => {
    const { text, runId } = await fuseToText({ strategy: 'weighted', alpha: 0.8, topK: 1 });

    expect(runId).toBe('bm25_fas_mdpr_fas_hybrid_w0.80');
    expect(text).toBe([`q1 Q0 x 1 0.800000 ${runId}`, `q2 Q0 z 1 0.800000 ${runId}`, ''].join('\n'));
  });

  test('running twice gives byte-identical output', async () => {
    const first = await fuseToText({ strategy: 'combsum', topK: 1000 });
    const second = await fuseToText({ strategy: 'combsum', topK: 1000 });
    expect(second.text).toBe(first.text);
  });
});
