/**
 * Cutting Sheet - geometry and feasibility for one stock sheet.
 *
 * Coordinates have their origin at the sheet's lower-left corner; x runs
 * along the sheet width and y along its height. Kerf is applied only when
 * generating candidate positions; `canPlace` checks exact coordinates.
 */

import { PackingBudgetExceededError } from './errors';
import { rectangleArea, type Rectangle } from './rectangles';
import type { MaterialRef, NormalizedSheetTemplate } from './types';

// =============================================================================
// Placed Rectangles
// =============================================================================

export interface PlacedRectangle {
  readonly rectangle: Rectangle;
  readonly x: number;
  readonly y: number;
  /** Width and height are swapped from the rectangle's declared values */
  readonly rotated: boolean;
}

export function placedWidth(p: PlacedRectangle): number {
  return p.rotated ? p.rectangle.height : p.rectangle.width;
}

export function placedHeight(p: PlacedRectangle): number {
  return p.rotated ? p.rectangle.width : p.rectangle.height;
}

export function placedRight(p: PlacedRectangle): number {
  return p.x + placedWidth(p);
}

export function placedTop(p: PlacedRectangle): number {
  return p.y + placedHeight(p);
}

/**
 * Strict interior intersection. Boxes that only share an edge do not overlap.
 */
export function overlaps(a: PlacedRectangle, b: PlacedRectangle): boolean {
  return !(
    placedRight(a) <= b.x ||
    placedRight(b) <= a.x ||
    placedTop(a) <= b.y ||
    placedTop(b) <= a.y
  );
}

// =============================================================================
// Evaluation Budget
// =============================================================================

/**
 * Caps the number of feasibility checks a run may perform.
 * One budget is shared by every sheet of a run.
 */
export class EvaluationBudget {
  private used = 0;

  constructor(private readonly limit?: number) {}

  charge(): void {
    this.used++;
    if (this.limit !== undefined && this.used > this.limit) {
      throw new PackingBudgetExceededError(this.limit);
    }
  }

  get evaluations(): number {
    return this.used;
  }
}

// =============================================================================
// Candidate Positions
// =============================================================================

export interface CandidatePosition {
  x: number;
  y: number;
}

export interface BestPosition extends CandidatePosition {
  rotated: boolean;
  /** Leftover-shape score; lower is better */
  score: number;
}

// =============================================================================
// Cutting Sheet
// =============================================================================

export class CuttingSheet {
  readonly width: number;
  readonly height: number;
  readonly materialRef: MaterialRef;
  readonly thickness: number;
  readonly kerfWidth: number;
  private readonly placements: PlacedRectangle[] = [];
  private closed = false;

  constructor(template: NormalizedSheetTemplate) {
    this.width = template.width;
    this.height = template.height;
    this.materialRef = template.materialRef;
    this.thickness = template.thickness;
    this.kerfWidth = template.kerfWidth;
  }

  /**
   * Placements in the order they were committed.
   */
  get placedRectangles(): ReadonlyArray<PlacedRectangle> {
    return this.placements;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Check whether the rectangle can sit at (x, y) without leaving the sheet
   * or overlapping an existing placement.
   */
  canPlace(rect: Rectangle, x: number, y: number, rotated: boolean): boolean {
    if (rotated && !rect.rotatable) return false;
    if (x < 0 || y < 0) return false;

    const candidate: PlacedRectangle = { rectangle: rect, x, y, rotated };
    if (placedRight(candidate) > this.width || placedTop(candidate) > this.height) {
      return false;
    }

    for (const placed of this.placements) {
      if (overlaps(candidate, placed)) return false;
    }
    return true;
  }

  /**
   * Commit a placement. Returns false and leaves the sheet untouched when the
   * position is not legal or the sheet has been closed.
   */
  place(rect: Rectangle, x: number, y: number, rotated: boolean): boolean {
    if (this.closed || !this.canPlace(rect, x, y, rotated)) return false;
    this.placements.push(Object.freeze({ rectangle: rect, x, y, rotated }));
    return true;
  }

  /**
   * Freeze the sheet once a strategy is done with it.
   */
  close(): this {
    this.closed = true;
    Object.freeze(this.placements);
    return this;
  }

  /**
   * Candidate corners: the origin, then right of, above, and diagonally past
   * each placed piece (offset by kerf). Points off the sheet are dropped and
   * duplicates keep their first occurrence.
   */
  candidatePositions(): CandidatePosition[] {
    const kerf = this.kerfWidth;
    const raw: CandidatePosition[] = [{ x: 0, y: 0 }];
    for (const placed of this.placements) {
      const right = placedRight(placed) + kerf;
      const top = placedTop(placed) + kerf;
      raw.push({ x: right, y: placed.y });
      raw.push({ x: placed.x, y: top });
      raw.push({ x: right, y: top });
    }

    const seen = new Set<string>();
    const positions: CandidatePosition[] = [];
    for (const pos of raw) {
      if (pos.x < 0 || pos.x >= this.width || pos.y < 0 || pos.y >= this.height) continue;
      const key = `${pos.x},${pos.y}`;
      if (seen.has(key)) continue;
      seen.add(key);
      positions.push(pos);
    }
    return positions;
  }

  /**
   * Score for the leftover space a placement leaves to its right and above.
   * Favours positions that keep the remaining area in regular strips.
   */
  positionWaste(x: number, y: number, w: number, h: number): number {
    return (this.width - (x + w)) * h + (this.height - (y + h)) * w;
  }

  /**
   * Best legal candidate for the rectangle, trying the declared orientation
   * before the rotated one. Ties keep the first candidate found.
   */
  findBestPosition(rect: Rectangle, budget?: EvaluationBudget): BestPosition | null {
    let best: BestPosition | null = null;
    const orientations = rect.rotatable ? [false, true] : [false];

    for (const { x, y } of this.candidatePositions()) {
      for (const rotated of orientations) {
        budget?.charge();
        if (!this.canPlace(rect, x, y, rotated)) continue;

        const w = rotated ? rect.height : rect.width;
        const h = rotated ? rect.width : rect.height;
        const score = this.positionWaste(x, y, w, h);
        if (!best || score < best.score) {
          best = { x, y, rotated, score };
        }
      }
    }
    return best;
  }

  usedArea(): number {
    return this.placements.reduce((sum, p) => sum + rectangleArea(p.rectangle), 0);
  }

  totalArea(): number {
    return this.width * this.height;
  }

  /** Percentage of the sheet covered; 0 for a zero-area sheet */
  utilization(): number {
    const total = this.totalArea();
    return total > 0 ? (this.usedArea() / total) * 100 : 0;
  }

  waste(): number {
    return 100 - this.utilization();
  }
}
