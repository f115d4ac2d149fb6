import { CuttingOptimizer } from './optimizer';
import {
  PACKING_ALGORITHMS,
  type AlgorithmComparison,
  type AlgorithmComparisonEntry,
  type CutlistPart,
  type MaterialRef,
  type PackingAlgorithm,
  type ReportSheet,
} from './types';

/** Points deducted per sheet beyond the first */
export const EXTRA_SHEET_PENALTY = 5;

/**
 * 0–100 score for a layout: average per-sheet utilisation minus a penalty
 * for every sheet after the first. Empty layouts score 0.
 */
export function calculateOptimizationScore(sheets: readonly ReportSheet[]): number {
  if (sheets.length === 0) return 0;

  const avgUtilization =
    sheets.reduce((sum, s) => sum + s.utilizationPercent, 0) / sheets.length;
  const sheetPenalty = (sheets.length - 1) * EXTRA_SHEET_PENALTY;

  return Math.min(100, Math.max(0, avgUtilization - sheetPenalty));
}

/**
 * Run every strategy on the same input and rank them: score descending, then
 * fewer sheets, then declaration order. Any failing strategy fails the
 * comparison, since there is no partial result to rank.
 */
export function compareAlgorithms(
  components: readonly CutlistPart[],
  sheetWidth: number,
  sheetHeight: number,
  materialRef: MaterialRef,
  thickness: number,
  optimizer: CuttingOptimizer = new CuttingOptimizer()
): AlgorithmComparison {
  const run = (algorithm: PackingAlgorithm): AlgorithmComparisonEntry => {
    const report = optimizer.optimize(
      components, sheetWidth, sheetHeight, materialRef, thickness, algorithm
    );
    return { summary: report.summary, score: calculateOptimizationScore(report.sheets) };
  };

  const results: Record<PackingAlgorithm, AlgorithmComparisonEntry> = {
    bottom_left_fill: run('bottom_left_fill'),
    best_fit_decreasing: run('best_fit_decreasing'),
    guillotine_split: run('guillotine_split'),
  };

  const ranking = [...PACKING_ALGORITHMS].sort((a, b) => {
    const scoreDiff = results[b].score - results[a].score;
    if (scoreDiff !== 0) return scoreDiff;
    const sheetDiff = results[a].summary.totalSheets - results[b].summary.totalSheets;
    if (sheetDiff !== 0) return sheetDiff;
    return PACKING_ALGORITHMS.indexOf(a) - PACKING_ALGORITHMS.indexOf(b);
  });

  return { results, ranking, bestAlgorithm: ranking[0] };
}
