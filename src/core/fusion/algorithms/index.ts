/**
 * Fusion Algorithms
 *
 * Pure scoring functions over a query's candidate set.
 */

// Candidate set
export { buildCandidateSet, presenceCount, sumContributions } from './candidates';
// Score combination algorithms
export {
  combMnzScores,
  combSumScores,
  equalWeights,
  linearCombinationScores,
  WEIGHT_SUM_TOLERANCE,
  weightsSumToOne
} from './combination';
// Normalization
export { normalizeToUnitRange } from './normalize';
// Reciprocal rank fusion
export { DEFAULT_RRF_K, reciprocalRankScores } from './rrf';
