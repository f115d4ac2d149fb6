import { placedRight, placedTop, type CuttingSheet } from './cuttingSheet';

export interface CutStats {
  /** Number of merged cut segments */
  cuts: number;
  /** Total cut length in mm */
  cutLength: number;
}

interface VerticalSegment { x: number; y1: number; y2: number }
interface HorizontalSegment { y: number; x1: number; x2: number }
interface Interval { from: number; to: number }

/**
 * Estimate the saw cuts for a sheet from the right and top edges of each
 * placement. Collinear segments that touch or overlap count as one cut;
 * edges lying on the sheet border need no cut and are ignored.
 */
export function measureCuts(sheet: CuttingSheet): CutStats {
  const vertical: VerticalSegment[] = [];
  const horizontal: HorizontalSegment[] = [];

  for (const p of sheet.placedRectangles) {
    const right = placedRight(p);
    const top = placedTop(p);
    if (right < sheet.width) vertical.push({ x: right, y1: p.y, y2: top });
    if (top < sheet.height) horizontal.push({ y: top, x1: p.x, x2: right });
  }

  const v = mergeAndMeasure(vertical.map((s) => ({ line: s.x, from: s.y1, to: s.y2 })));
  const h = mergeAndMeasure(horizontal.map((s) => ({ line: s.y, from: s.x1, to: s.x2 })));
  return { cuts: v.cuts + h.cuts, cutLength: v.cutLength + h.cutLength };
}

/**
 * Group segments by the line they sit on and merge overlapping intervals.
 */
function mergeAndMeasure(segments: Array<Interval & { line: number }>): CutStats {
  const byLine = new Map<number, Interval[]>();
  for (const s of segments) {
    if (s.to <= s.from) continue;
    const arr = byLine.get(s.line) || [];
    arr.push({ from: s.from, to: s.to });
    byLine.set(s.line, arr);
  }

  let length = 0; let count = 0;
  for (const [, arr] of byLine) {
    arr.sort((a, b) => a.from - b.from || a.to - b.to);
    let cur: Interval | null = null;
    for (const seg of arr) {
      if (!cur) { cur = { ...seg }; continue; }
      if (seg.from <= cur.to) {
        cur.to = Math.max(cur.to, seg.to);
      } else {
        length += cur.to - cur.from; count++;
        cur = { ...seg };
      }
    }
    if (cur) { length += cur.to - cur.from; count++; }
  }
  return { cuts: count, cutLength: length };
}
