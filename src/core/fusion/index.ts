/**
 * Fusion Module
 *
 * Merges ranked result lists from several retrieval systems into one run.
 */

export * from './algorithms';
export { writeRun, writeRunFile, formatRun, PLACEHOLDER, SCORE_PRECISION } from './emitter';
export { configError, FormatError, FusionError, type FusionErrorType } from './errors';
export { compareFused, compareIds, mergeQuery } from './merger';
export {
  collectQueryIds,
  type FuseOptions,
  findConsistencyWarnings,
  fuseRuns
} from './pipeline';
export {
  createFusionStrategy,
  defaultRunId,
  parseStrategyName,
  strategySuffix,
  validateFusionSettings
} from './strategies';
export { parseRun, readRun } from './trec';
export * from './types';
