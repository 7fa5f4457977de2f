/**
 * Model profiles. Prices are USD per 1000 tokens.
 */
import type { ModelProfile } from './types.js';

export const MODEL_PROFILES: readonly ModelProfile[] = [
  {
    model: 'model-a',
    successBias: 0.03,
    readinessBias: 0.02,
    tokenMultiplier: 1.0,
    outputRatio: 0.28,
    inputCostPer1k: 0.003,
    outputCostPer1k: 0.015,
    utilizationBonus: 0.04,
  },
  {
    model: 'model-b',
    successBias: 0.02,
    readinessBias: 0.01,
    tokenMultiplier: 0.93,
    outputRatio: 0.25,
    inputCostPer1k: 0.0013,
    outputCostPer1k: 0.01,
    utilizationBonus: 0.02,
  },
];
