/**
 * Strategy registry. The algorithm set is closed: each `PackingAlgorithm`
 * maps to exactly one packer sharing the `PackingStrategy` contract.
 */

import { packBestFitDecreasing } from './bestFitPacker';
import { packBottomLeftFill } from './bottomLeftPacker';
import type { CuttingSheet, EvaluationBudget } from './cuttingSheet';
import { packGuillotineSplit } from './guillotinePacker';
import type { Rectangle } from './rectangles';
import type { NormalizedSheetTemplate, PackingAlgorithm } from './types';

export interface StrategyOptions {
  /** Shared across every sheet of the run; unlimited when omitted */
  budget?: EvaluationBudget;
}

/**
 * Packs pieces onto as many sheets as needed. Returned sheets are closed,
 * non-empty, and in the order they were filled.
 */
export interface PackingStrategy {
  readonly algorithm: PackingAlgorithm;
  pack(
    pieces: readonly Rectangle[],
    template: NormalizedSheetTemplate,
    options?: StrategyOptions
  ): CuttingSheet[];
}

export const PACKING_STRATEGIES: Record<PackingAlgorithm, PackingStrategy> = {
  bottom_left_fill: { algorithm: 'bottom_left_fill', pack: packBottomLeftFill },
  best_fit_decreasing: { algorithm: 'best_fit_decreasing', pack: packBestFitDecreasing },
  guillotine_split: { algorithm: 'guillotine_split', pack: packGuillotineSplit },
};

export function getPackingStrategy(algorithm: PackingAlgorithm): PackingStrategy {
  return PACKING_STRATEGIES[algorithm];
}
