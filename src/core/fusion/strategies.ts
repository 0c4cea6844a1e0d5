/**
 * Fusion Strategy Factory
 *
 * Validates strategy settings against the runs being fused and builds the
 * strategy used by the merger. Validation runs once, before any query.
 */

import {
  combMnzScores,
  combSumScores,
  equalWeights,
  linearCombinationScores,
  reciprocalRankScores,
  weightsSumToOne
} from './algorithms';
import { configError } from './errors';
import {
  type FusionSettings,
  type FusionStrategy,
  type FusionStrategyName,
  fusionStrategies
} from './types';

/**
 * Resolve a strategy name, failing on anything unrecognized.
 */
export function parseStrategyName(name: string): FusionStrategyName {
  const match = fusionStrategies.find((s) => s === name);
  if (!match) {
    throw configError(
      `Unknown fusion strategy '${name}' (expected one of: ${fusionStrategies.join(', ')})`
    );
  }
  return match;
}

/**
 * Check settings for a fusion over `systemCount` runs.
 * Throws a CONFIG_ERROR FusionError on the first problem found.
 */
export function validateFusionSettings(settings: FusionSettings, systemCount: number): void {
  if (!Number.isInteger(settings.topK) || settings.topK < 1) {
    throw configError(`topK must be a positive integer, got ${settings.topK}`);
  }
  if (systemCount < 1) {
    throw configError('At least one run is required for fusion');
  }

  switch (settings.strategy) {
    case 'rrf':
      if (!Number.isFinite(settings.k) || settings.k <= 0) {
        throw configError(`RRF k must be positive, got ${settings.k}`);
      }
      break;

    case 'linear':
      if (settings.weights) {
        if (settings.weights.length !== systemCount) {
          throw configError(
            `Expected ${systemCount} weights (one per run), got ${settings.weights.length}`
          );
        }
        if (!weightsSumToOne(settings.weights)) {
          throw configError(`Weights must sum to 1, got [${settings.weights.join(', ')}]`);
        }
      }
      break;

    case 'weighted':
      if (systemCount !== 2) {
        throw configError(`Weighted combination fuses exactly 2 runs, got ${systemCount}`);
      }
      if (!(settings.alpha >= 0 && settings.alpha <= 1)) {
        throw configError(`alpha must be between 0 and 1, got ${settings.alpha}`);
      }
      break;

    case 'combsum':
    case 'combmnz':
      break;

    default: {
      const unknownSettings: never = settings;
      throw configError(`Unknown fusion strategy in ${JSON.stringify(unknownSettings)}`);
    }
  }
}

/**
 * Create the strategy described by `settings` for `systemCount` runs.
 *
 * @example
 * const strategy = createFusionStrategy({ strategy: 'rrf', k: 60, topK: 1000 }, 2);
 * const scores = strategy.compute(candidateSet);
 */
export function createFusionStrategy(
  settings: FusionSettings,
  systemCount: number
): FusionStrategy {
  validateFusionSettings(settings, systemCount);

  switch (settings.strategy) {
    case 'rrf': {
      const { k } = settings;
      return { name: 'rrf', compute: (set) => reciprocalRankScores(set, k) };
    }

    case 'linear': {
      const weights = settings.weights ?? equalWeights(systemCount);
      return { name: 'linear', compute: (set) => linearCombinationScores(set, weights) };
    }

    case 'weighted': {
      // Two-run special case of the linear combination
      const weights = [settings.alpha, 1 - settings.alpha];
      return { name: 'weighted', compute: (set) => linearCombinationScores(set, weights) };
    }

    case 'combsum':
      return { name: 'combsum', compute: combSumScores };

    case 'combmnz':
      return { name: 'combmnz', compute: combMnzScores };

    default: {
      const unknownSettings: never = settings;
      throw configError(`Unknown fusion strategy in ${JSON.stringify(unknownSettings)}`);
    }
  }
}

/**
 * Run id suffix describing the strategy, e.g. `hybrid_rrf_k60` or `hybrid_w0.70`.
 */
export function strategySuffix(settings: FusionSettings): string {
  switch (settings.strategy) {
    case 'rrf':
      return `hybrid_rrf_k${settings.k}`;
    case 'linear':
      return 'hybrid_linear';
    case 'weighted':
      return `hybrid_w${settings.alpha.toFixed(2)}`;
    case 'combsum':
      return 'hybrid_combsum';
    case 'combmnz':
      return 'hybrid_combmnz';
  }
}

/**
 * Run id built from the input run names and the strategy,
 * e.g. `bm25_fas_mdpr_fas_hybrid_rrf_k60`.
 */
export function defaultRunId(runNames: readonly string[], settings: FusionSettings): string {
  return [...runNames, strategySuffix(settings)].join('_');
}
