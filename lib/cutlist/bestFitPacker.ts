import { CuttingSheet } from './cuttingSheet';
import { UnplaceablePieceError } from './errors';
import { sortByAreaDescending, type Rectangle } from './rectangles';
import type { StrategyOptions } from './strategies';
import type { NormalizedSheetTemplate } from './types';

/**
 * Best-fit decreasing: a single pass over the area-sorted pieces per sheet.
 * Each piece goes to its lowest-waste position on the current sheet, or waits
 * for the next sheet. Unlike bottom-left fill, a skipped piece is not retried
 * on the same sheet after later placements.
 */
export function packBestFitDecreasing(
  pieces: readonly Rectangle[],
  template: NormalizedSheetTemplate,
  options: StrategyOptions = {}
): CuttingSheet[] {
  let pending = sortByAreaDescending(pieces);
  const sheets: CuttingSheet[] = [];

  while (pending.length > 0) {
    const sheet = new CuttingSheet(template);
    const deferred: Rectangle[] = [];

    for (const rect of pending) {
      const position = sheet.findBestPosition(rect, options.budget);
      if (!position || !sheet.place(rect, position.x, position.y, position.rotated)) {
        deferred.push(rect);
      }
    }

    if (sheet.placedRectangles.length === 0) {
      throw UnplaceablePieceError.forRectangle(pending[0], template);
    }
    sheets.push(sheet.close());
    pending = deferred;
  }

  return sheets;
}
