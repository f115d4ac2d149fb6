/**
 * Cutlist Module
 *
 * Barrel export for the cutting-layout optimizer.
 *
 * Usage:
 *   import { CuttingOptimizer, compareAlgorithms } from '@/lib/cutlist';
 */

// Types
export * from './types';
export * from './errors';

// Geometry
export { expandParts, fitsIn, rectangleArea, sortByAreaDescending, type Rectangle } from './rectangles';
export {
  CuttingSheet,
  EvaluationBudget,
  overlaps,
  placedHeight,
  placedRight,
  placedTop,
  placedWidth,
  type BestPosition,
  type CandidatePosition,
  type PlacedRectangle,
} from './cuttingSheet';
export { measureCuts, type CutStats } from './cutStats';

// Strategies
export { packBottomLeftFill } from './bottomLeftPacker';
export { packBestFitDecreasing } from './bestFitPacker';
export { packGuillotineSplit, pickLargestFitting, type FreeRegion } from './guillotinePacker';
export {
  PACKING_STRATEGIES,
  getPackingStrategy,
  type PackingStrategy,
  type StrategyOptions,
} from './strategies';

// Optimizer
export {
  CuttingOptimizer,
  MM2_PER_M2,
  STANDARD_SHEET_SIZE,
  buildReport,
  buildSheetRecord,
  previewFirstSheet,
} from './optimizer';
export { calculateOptimizationScore, compareAlgorithms, EXTRA_SHEET_PENALTY } from './compare';
export { getPartColorTag, getPartHue, hashPartName, type ColorTagOptions } from './colorAssignment';

// Configuration & validation
export { DEFAULT_CUTLIST_CONFIG, loadCutlistConfig, type CutlistConfig, type CutlistEnv } from './config';
export {
  DEFAULT_KERF_MM,
  optimizeRequestSchema,
  parseOptimizeRequest,
  parseParts,
  parseSheetTemplate,
  partSchema,
  sheetTemplateSchema,
  type OptimizeRequest,
} from './validation';
