/**
 * Guillotine Split
 *
 * Recursive straight-cut subdivision. Each free region receives the largest
 * pending piece that fits at its origin; the remainder is cut into a region
 * to the right of the piece (piece height) and a full-width region above it.
 * Only those two leftovers are ever considered, so placements are cheap but
 * fragmentation is higher than with the candidate-position packers.
 *
 * The recursion runs on an explicit stack. The right-hand region is pushed
 * last so it is filled before the region above, matching depth-first order.
 */

import { CuttingSheet, type EvaluationBudget } from './cuttingSheet';
import { CutlistError, UnplaceablePieceError } from './errors';
import { rectangleArea, sortByAreaDescending, type Rectangle } from './rectangles';
import type { StrategyOptions } from './strategies';
import type { NormalizedSheetTemplate } from './types';

// =============================================================================
// Internal Types
// =============================================================================

/**
 * A free region awaiting subdivision. Edges are absolute sheet coordinates;
 * a piece fits when `x + width <= right`, the same sum `canPlace` tests.
 */
export interface FreeRegion {
  x: number;
  y: number;
  right: number;
  top: number;
}

interface RegionChoice {
  index: number;
  rotated: boolean;
}

// =============================================================================
// Region Filling
// =============================================================================

function fitsRegion(region: FreeRegion, width: number, height: number): boolean {
  return region.x + width <= region.right && region.y + height <= region.top;
}

/**
 * Largest-area pending piece that fits the region. The declared orientation
 * is checked before the rotated one; on equal area the earlier piece wins.
 */
export function pickLargestFitting(
  pending: readonly Rectangle[],
  region: FreeRegion,
  budget?: EvaluationBudget
): RegionChoice | null {
  let best: RegionChoice | null = null;
  let bestArea = -1;

  for (let i = 0; i < pending.length; i++) {
    const rect = pending[i];
    const area = rectangleArea(rect);

    budget?.charge();
    if (fitsRegion(region, rect.width, rect.height) && area > bestArea) {
      best = { index: i, rotated: false };
      bestArea = area;
    }

    if (rect.rotatable) {
      budget?.charge();
      if (fitsRegion(region, rect.height, rect.width) && area > bestArea) {
        best = { index: i, rotated: true };
        bestArea = area;
      }
    }
  }

  return best;
}

/**
 * Fill one sheet from `pending`, removing every piece that gets placed.
 */
function fillSheet(sheet: CuttingSheet, pending: Rectangle[], budget?: EvaluationBudget): void {
  const kerf = sheet.kerfWidth;
  const stack: FreeRegion[] = [{ x: 0, y: 0, right: sheet.width, top: sheet.height }];

  while (stack.length > 0 && pending.length > 0) {
    const region = stack.pop();
    if (!region || region.x >= region.right || region.y >= region.top) continue;

    const choice = pickLargestFitting(pending, region, budget);
    if (!choice) continue;

    const rect = pending[choice.index];
    if (!sheet.place(rect, region.x, region.y, choice.rotated)) {
      throw new CutlistError(
        `Guillotine region at (${region.x}, ${region.y}) accepted ${rect.id} but the sheet rejected it`
      );
    }
    pending.splice(choice.index, 1);

    const pieceRight = region.x + (choice.rotated ? rect.height : rect.width);
    const pieceTop = region.y + (choice.rotated ? rect.width : rect.height);

    stack.push({ x: region.x, y: pieceTop + kerf, right: region.right, top: region.top });
    stack.push({ x: pieceRight + kerf, y: region.y, right: region.right, top: pieceTop });
  }
}

// =============================================================================
// Strategy Entry Point
// =============================================================================

export function packGuillotineSplit(
  pieces: readonly Rectangle[],
  template: NormalizedSheetTemplate,
  options: StrategyOptions = {}
): CuttingSheet[] {
  const pending = sortByAreaDescending(pieces);
  const sheets: CuttingSheet[] = [];

  while (pending.length > 0) {
    const sheet = new CuttingSheet(template);
    fillSheet(sheet, pending, options.budget);

    if (sheet.placedRectangles.length === 0) {
      throw UnplaceablePieceError.forRectangle(pending[0], template);
    }
    sheets.push(sheet.close());
  }

  return sheets;
}
