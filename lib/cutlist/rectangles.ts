import type { MaterialRef, NormalizedPart } from './types';

/**
 * One physical piece to cut (a part expanded by quantity).
 * `width` runs along the sheet width when unrotated.
 */
export interface Rectangle {
  readonly id: string;
  readonly name: string;
  readonly width: number;
  readonly height: number;
  readonly materialRef: MaterialRef;
  readonly priority: number;
  readonly rotatable: boolean;
}

export function rectangleArea(rect: Rectangle): number {
  return rect.width * rect.height;
}

/**
 * Whether the piece fits a container of the given size in any orientation it allows.
 */
export function fitsIn(rect: Rectangle, containerWidth: number, containerHeight: number): boolean {
  if (rect.width <= containerWidth && rect.height <= containerHeight) return true;
  return rect.rotatable && rect.height <= containerWidth && rect.width <= containerHeight;
}

/**
 * Expand parts by quantity into unit rectangles, preserving part order then
 * instance order. Ids are `<name>_<n>`; names get an ` <n>` suffix only when
 * the part has more than one piece.
 */
export function expandParts(parts: readonly NormalizedPart[]): Rectangle[] {
  const expanded: Rectangle[] = [];
  for (const part of parts) {
    for (let i = 0; i < part.quantity; i++) {
      expanded.push(
        Object.freeze({
          id: `${part.name}_${i + 1}`,
          name: part.quantity > 1 ? `${part.name} ${i + 1}` : part.name,
          width: part.length,
          height: part.width,
          materialRef: part.materialRef,
          priority: part.priority,
          rotatable: part.rotatable,
        })
      );
    }
  }
  return expanded;
}

/**
 * Largest area first; equal areas by priority (higher first), then input order.
 */
export function sortByAreaDescending(rects: readonly Rectangle[]): Rectangle[] {
  return rects
    .map((rect, index) => ({ rect, index }))
    .sort((a, b) => {
      const areaDiff = rectangleArea(b.rect) - rectangleArea(a.rect);
      if (areaDiff !== 0) return areaDiff;
      if (a.rect.priority !== b.rect.priority) return b.rect.priority - a.rect.priority;
      return a.index - b.index;
    })
    .map(({ rect }) => rect);
}
