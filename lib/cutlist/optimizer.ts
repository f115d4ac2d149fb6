/**
 * Cutting Optimizer
 *
 * Facade over the packing strategies: validates a run, expands parts into
 * unit pieces, dispatches to the selected strategy and turns the filled
 * sheets into the report consumed by diagram renderers and cost calculators.
 *
 * Each call works on its own state; one optimizer instance can serve
 * concurrent callers.
 */

import { getPartColorTag } from './colorAssignment';
import { DEFAULT_CUTLIST_CONFIG, type CutlistConfig } from './config';
import { measureCuts } from './cutStats';
import {
  EvaluationBudget,
  placedHeight,
  placedWidth,
  type CuttingSheet,
} from './cuttingSheet';
import { UnplaceablePieceError } from './errors';
import {
  expandParts,
  fitsIn,
  rectangleArea,
  sortByAreaDescending,
  type Rectangle,
} from './rectangles';
import { getPackingStrategy } from './strategies';
import type {
  CuttingReport,
  CutlistPart,
  MaterialRef,
  NormalizedSheetTemplate,
  PackingAlgorithm,
  ReportSheet,
  ReportSummary,
  SheetTemplate,
} from './types';
import { parseOptimizeRequest } from './validation';

/** mm² per m² */
export const MM2_PER_M2 = 1_000_000;

export class CuttingOptimizer {
  readonly config: CutlistConfig;

  constructor(config: Partial<CutlistConfig> = {}) {
    this.config = { ...DEFAULT_CUTLIST_CONFIG, ...config };
  }

  /**
   * Pack the components onto sheets of the given size.
   * Throws `CutlistInputError` for invalid input and `UnplaceablePieceError`
   * when a piece cannot fit an empty sheet.
   */
  optimize(
    components: readonly CutlistPart[],
    sheetWidth: number,
    sheetHeight: number,
    materialRef: MaterialRef,
    thickness: number,
    algorithm: PackingAlgorithm
  ): CuttingReport {
    return this.optimizeSheet(
      components,
      { width: sheetWidth, height: sheetHeight, materialRef, thickness },
      algorithm
    );
  }

  /**
   * Same as `optimize`, taking the sheet as a template (kerf included).
   */
  optimizeSheet(
    components: readonly CutlistPart[],
    template: SheetTemplate,
    algorithm: PackingAlgorithm
  ): CuttingReport {
    const request = parseOptimizeRequest({
      components,
      sheet: { ...template, kerfWidth: template.kerfWidth ?? this.config.kerfWidth },
      algorithm,
    });

    const rectangles = expandParts(request.components);
    const strategy = getPackingStrategy(request.algorithm);
    const budget = new EvaluationBudget(this.config.maxCandidateEvaluations);

    let sheets: CuttingSheet[];
    try {
      assertPiecesFit(rectangles, request.sheet);
      sheets = strategy.pack(rectangles, request.sheet, { budget });
    } catch (error) {
      if (error instanceof UnplaceablePieceError) {
        console.warn(`[cutlist] ${request.algorithm}: ${error.message}`);
      }
      throw error;
    }

    if (this.config.debug) {
      console.debug(
        `[cutlist] ${request.algorithm}: ${rectangles.length} pieces on ${sheets.length} sheet(s), ` +
          `${budget.evaluations} candidate evaluations`
      );
    }

    return buildReport(sheets, rectangles, request.algorithm);
  }
}

/**
 * Reject the largest piece that cannot fit an empty sheet before any packing
 * work is done. Strategies would report the same piece once they get stuck.
 */
function assertPiecesFit(rectangles: readonly Rectangle[], sheet: NormalizedSheetTemplate): void {
  const oversized = sortByAreaDescending(rectangles).find(
    (rect) => !fitsIn(rect, sheet.width, sheet.height)
  );
  if (oversized) {
    throw UnplaceablePieceError.forRectangle(oversized, sheet);
  }
}

// =============================================================================
// Report Assembly
// =============================================================================

export function buildSheetRecord(sheet: CuttingSheet, index: number): ReportSheet {
  const { cuts, cutLength } = measureCuts(sheet);
  return {
    id: index + 1,
    sheetWidth: sheet.width,
    sheetHeight: sheet.height,
    materialRef: sheet.materialRef,
    thickness: sheet.thickness,
    pieces: sheet.placedRectangles.map((placed) => ({
      id: placed.rectangle.id,
      name: placed.rectangle.name,
      x: placed.x,
      y: placed.y,
      effectiveWidth: placedWidth(placed),
      effectiveHeight: placedHeight(placed),
      rotated: placed.rotated,
      colorTag: getPartColorTag(placed.rectangle.name),
    })),
    utilizationPercent: sheet.utilization(),
    wastePercent: sheet.waste(),
    usedAreaM2: sheet.usedArea() / MM2_PER_M2,
    totalAreaM2: sheet.totalArea() / MM2_PER_M2,
    cutCount: cuts,
    cutLengthMm: cutLength,
  };
}

export function buildReport(
  sheets: readonly CuttingSheet[],
  rectangles: readonly Rectangle[],
  algorithm: PackingAlgorithm
): CuttingReport {
  const records = sheets.map(buildSheetRecord);

  const totalPieceAreaM2 = rectangles.reduce((sum, r) => sum + rectangleArea(r), 0) / MM2_PER_M2;
  const totalSheetAreaM2 = sheets.reduce((sum, s) => sum + s.totalArea(), 0) / MM2_PER_M2;
  const overallUtilizationPercent =
    totalSheetAreaM2 > 0 ? (totalPieceAreaM2 / totalSheetAreaM2) * 100 : 0;

  const summary: ReportSummary = {
    totalSheets: sheets.length,
    totalPieceAreaM2,
    totalSheetAreaM2,
    overallUtilizationPercent,
    overallWastePercent: 100 - overallUtilizationPercent,
    algorithmUsed: algorithm,
    totalCutCount: records.reduce((sum, r) => sum + r.cutCount, 0),
    totalCutLengthMm: records.reduce((sum, r) => sum + r.cutLengthMm, 0),
  };

  return { sheets: records, summary };
}

// =============================================================================
// Preview
// =============================================================================

/** Full-size melamine / MDF board, 2750 × 1830mm */
export const STANDARD_SHEET_SIZE = { width: 2750, height: 1830 } as const;

/**
 * Quick look at the first sheet of a bottom-left fill layout on a standard
 * board, using the first component's material and thickness.
 * Returns null for an empty part list.
 */
export function previewFirstSheet(
  components: readonly CutlistPart[],
  optimizer: CuttingOptimizer = new CuttingOptimizer()
): ReportSheet | null {
  if (components.length === 0) return null;

  const { materialRef, thickness } = components[0];
  const report = optimizer.optimize(
    components,
    STANDARD_SHEET_SIZE.width,
    STANDARD_SHEET_SIZE.height,
    materialRef,
    thickness,
    'bottom_left_fill'
  );
  return report.sheets[0] ?? null;
}
