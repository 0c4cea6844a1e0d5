/**
 * Run Fusion Entry Point
 *
 * Loads config/fusion.json, reads the input runs, fuses them and writes the fused run.
 * Ctrl+C stops scheduling new queries; an aborted fusion writes nothing.
 */

import { getConfig } from '@/config/config';
import { defaultRunId, fuseRuns, readRun, writeRunFile } from '@/core';
import {
  logConsistencyWarnings,
  logError,
  logFusionAborted,
  logFusionResult,
  logFusionStart,
  logRunLoaded
} from '@/utils';

const controller = new AbortController();
process.once('SIGINT', () => controller.abort());

async function main(): Promise<void> {
  const config = getConfig();

  const runs = config.runs.inputs.map((path) => {
    const run = readRun(path);
    logRunLoaded(run, path);
    return run;
  });

  logFusionStart(config.fusion, runs);

  const output = await fuseRuns(runs, config.fusion, { signal: controller.signal });

  // Consistency issues are reported in aggregate once the run completes
  logConsistencyWarnings(output.warnings);

  if (output.aborted) {
    logFusionAborted(output);
    process.exitCode = 130;
    return;
  }

  const runId =
    config.runs.runId ??
    defaultRunId(
      runs.map((r) => r.name),
      config.fusion
    );
  await writeRunFile(output.results, config.runs.output, runId);
  logFusionResult(output, config.runs.output, runId);
}

try {
  await main();
} catch (error) {
  logError(error);
  process.exitCode = 1;
}
