import { z } from 'zod';
import { weightsSumToOne } from '@/core/fusion/algorithms';
import { DEFAULT_RRF_K } from '@/core/fusion/algorithms/rrf';
import { type FusionSettings, fusionStrategies } from '@/core/fusion/types';

export const DEFAULT_TOP_K = 1000;
export const DEFAULT_ALPHA = 0.5;

// Fusion section: strategy plus strategy-specific parameters
const fusionSchema = z
  .object({
    strategy: z.enum(fusionStrategies),
    k: z.number().positive().optional(),
    weights: z.array(z.number().min(0)).min(1).optional(),
    alpha: z.number().min(0).max(1).optional(),
    topK: z.number().int().positive().default(DEFAULT_TOP_K)
  })
  .superRefine((data, ctx) => {
    if (data.k !== undefined && data.strategy !== 'rrf')
      ctx.addIssue({
        code: 'custom',
        path: ['k'],
        message: `k not allowed for strategy '${data.strategy}'`
      });
    if (data.weights !== undefined && data.strategy !== 'linear')
      ctx.addIssue({
        code: 'custom',
        path: ['weights'],
        message: `weights not allowed for strategy '${data.strategy}'`
      });
    if (data.alpha !== undefined && data.strategy !== 'weighted')
      ctx.addIssue({
        code: 'custom',
        path: ['alpha'],
        message: `alpha not allowed for strategy '${data.strategy}'`
      });
    if (data.weights !== undefined && !weightsSumToOne(data.weights))
      ctx.addIssue({
        code: 'custom',
        path: ['weights'],
        message: 'weights must sum to 1'
      });
  });

const runsSchema = z.object({
  inputs: z.array(z.string().min(1)).min(2),
  output: z.string().min(1),
  runId: z
    .string()
    .regex(/^\S+$/, 'runId must not be empty or contain whitespace')
    .optional()
});

// Config schema
export const configSchema = z
  .object({
    $schema: z.string().optional(),
    fusion: fusionSchema,
    runs: runsSchema
  })
  .superRefine((data, ctx) => {
    const runCount = data.runs.inputs.length;
    if (data.fusion.weights !== undefined && data.fusion.weights.length !== runCount)
      ctx.addIssue({
        code: 'custom',
        path: ['fusion', 'weights'],
        message: `expected ${runCount} weights (one per input run), got ${data.fusion.weights.length}`
      });
    if (data.fusion.strategy === 'weighted' && runCount !== 2)
      ctx.addIssue({
        code: 'custom',
        path: ['runs', 'inputs'],
        message: `strategy 'weighted' fuses exactly 2 runs, got ${runCount}`
      });
  })
  .transform((data) => ({
    fusion: toFusionSettings(data.fusion),
    runs: data.runs
  }));

/**
 * Build immutable settings from the parsed fusion section, applying defaults.
 */
function toFusionSettings(fusion: z.infer<typeof fusionSchema>): FusionSettings {
  const { topK } = fusion;
  switch (fusion.strategy) {
    case 'rrf':
      return { strategy: 'rrf', k: fusion.k ?? DEFAULT_RRF_K, topK };
    case 'linear':
      return fusion.weights
        ? { strategy: 'linear', weights: fusion.weights, topK }
        : { strategy: 'linear', topK };
    case 'weighted':
      return { strategy: 'weighted', alpha: fusion.alpha ?? DEFAULT_ALPHA, topK };
    case 'combsum':
      return { strategy: 'combsum', topK };
    case 'combmnz':
      return { strategy: 'combmnz', topK };
  }
}

export type ConfigInput = z.input<typeof configSchema>;
export type Config = z.output<typeof configSchema>;
