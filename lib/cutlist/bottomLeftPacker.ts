/**
 * Bottom-Left Fill
 *
 * Fills one sheet at a time. After every placement the scan restarts from the
 * largest pending piece, so pieces skipped earlier get another chance at the
 * corners the new piece opened up. A sheet is closed once a full scan places
 * nothing.
 */

import { CuttingSheet } from './cuttingSheet';
import { UnplaceablePieceError } from './errors';
import { sortByAreaDescending, type Rectangle } from './rectangles';
import type { StrategyOptions } from './strategies';
import type { NormalizedSheetTemplate } from './types';

export function packBottomLeftFill(
  pieces: readonly Rectangle[],
  template: NormalizedSheetTemplate,
  options: StrategyOptions = {}
): CuttingSheet[] {
  const pending = sortByAreaDescending(pieces);
  const sheets: CuttingSheet[] = [];

  while (pending.length > 0) {
    const sheet = new CuttingSheet(template);

    let placedAny = true;
    while (placedAny && pending.length > 0) {
      placedAny = false;
      for (let i = 0; i < pending.length; i++) {
        const rect = pending[i];
        const position = sheet.findBestPosition(rect, options.budget);
        if (position && sheet.place(rect, position.x, position.y, position.rotated)) {
          pending.splice(i, 1);
          placedAny = true;
          break;
        }
      }
    }

    // A fresh sheet that takes nothing means the largest pending piece can never fit
    if (sheet.placedRectangles.length === 0) {
      throw UnplaceablePieceError.forRectangle(pending[0], template);
    }
    sheets.push(sheet.close());
  }

  return sheets;
}
