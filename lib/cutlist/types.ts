/**
 * Cutlist Types
 *
 * Type definitions shared by the packing strategies, the optimizer facade and
 * the report consumers (diagram renderers, cost calculators).
 * All linear dimensions are millimetres; report areas are square metres.
 */

// =============================================================================
// Identifiers & Algorithms
// =============================================================================

/** Opaque identifier of the material / sheet type a piece is cut from. */
export type MaterialRef = string | number;

/**
 * Placement strategies understood by the optimizer.
 * - 'bottom_left_fill': re-scans pending pieces after every placement
 * - 'best_fit_decreasing': one pass per sheet, skipped pieces wait for the next sheet
 * - 'guillotine_split': recursive straight-cut subdivision of free regions
 */
export const PACKING_ALGORITHMS = [
  'bottom_left_fill',
  'best_fit_decreasing',
  'guillotine_split',
] as const;

export type PackingAlgorithm = (typeof PACKING_ALGORITHMS)[number];

// =============================================================================
// Input Records
// =============================================================================

/**
 * A part as supplied by the part list. One record may describe several
 * identical physical pieces via `quantity`.
 */
export interface CutlistPart {
  name: string;
  /** Length in mm (placed along the sheet width when not rotated) */
  length: number;
  /** Width in mm (placed along the sheet height when not rotated) */
  width: number;
  thickness: number;
  quantity: number;
  materialRef: MaterialRef;
  /** When false the grain direction is fixed and the piece never rotates (default: true) */
  rotatable?: boolean;
  /** Tie-break hint when two pieces have the same area; higher goes first (default: 1) */
  priority?: number;
}

/** A part after validation, with defaults applied. */
export type NormalizedPart = Required<CutlistPart>;

/**
 * Stock sheet parameters for a run.
 */
export interface SheetTemplate {
  width: number;
  height: number;
  materialRef: MaterialRef;
  thickness: number;
  /** Blade kerf in mm (default: 3) */
  kerfWidth?: number;
}

export type NormalizedSheetTemplate = Required<SheetTemplate>;

// =============================================================================
// Report (output contract)
// =============================================================================

/**
 * A single piece as drawn on a sheet diagram.
 */
export interface ReportPiece {
  id: string;
  name: string;
  /** Lower-left corner in sheet coordinates */
  x: number;
  y: number;
  /** Size after rotation */
  effectiveWidth: number;
  effectiveHeight: number;
  rotated: boolean;
  /** CSS colour derived from the piece name, for display only */
  colorTag: string;
}

/**
 * One cut sheet.
 */
export interface ReportSheet {
  /** 1-based position in the run */
  id: number;
  sheetWidth: number;
  sheetHeight: number;
  materialRef: MaterialRef;
  thickness: number;
  pieces: ReportPiece[];
  utilizationPercent: number;
  wastePercent: number;
  usedAreaM2: number;
  totalAreaM2: number;
  /** Number of merged interior cut segments */
  cutCount: number;
  /** Total length of interior cuts in mm */
  cutLengthMm: number;
}

export interface ReportSummary {
  totalSheets: number;
  totalPieceAreaM2: number;
  totalSheetAreaM2: number;
  overallUtilizationPercent: number;
  overallWastePercent: number;
  algorithmUsed: PackingAlgorithm;
  totalCutCount: number;
  totalCutLengthMm: number;
}

export interface CuttingReport {
  sheets: ReportSheet[];
  summary: ReportSummary;
}

// =============================================================================
// Algorithm Comparison
// =============================================================================

export interface AlgorithmComparisonEntry {
  summary: ReportSummary;
  /** 0–100: average sheet utilisation minus 5 points per extra sheet */
  score: number;
}

export interface AlgorithmComparison {
  results: Record<PackingAlgorithm, AlgorithmComparisonEntry>;
  /** Algorithms ordered best first */
  ranking: PackingAlgorithm[];
  bestAlgorithm: PackingAlgorithm;
}
