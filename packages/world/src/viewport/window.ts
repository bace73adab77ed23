import type { GridWindow } from '@tilecrawl/protocol';

/**
 * Tiles needed to cover a window dimension, rounded up to an odd count
 * so the focus tile has the same number of neighbours on each side.
 */
export function computeVisibleTiles(windowDimension: number, tileDimension: number): number {
  if (tileDimension <= 0) {
    throw new RangeError(`Tile dimension must be positive, got ${tileDimension}`);
  }
  const count = Math.max(1, Math.ceil(windowDimension / tileDimension));
  return count % 2 === 0 ? count + 1 : count;
}

export interface AxisRange {
  min: number;
  max: number;
  // min - (focus - half): how far the range was pushed off center
  offset: number;
}

/**
 * Visible index range along one axis for a focus index.
 * A range that would run off the grid is pushed back against the edge so it
 * still holds `visible` tiles; a grid narrower than `visible` is shown whole.
 */
export function computeAxisRange(focus: number, visible: number, size: number): AxisRange {
  const half = Math.floor(visible / 2);
  let min: number;
  let max: number;

  if (visible >= size) {
    min = 0;
    max = size - 1;
  } else {
    min = focus - half;
    max = focus + half;
    if (min < 0) {
      min = 0;
      max = visible - 1;
    } else if (max > size - 1) {
      max = size - 1;
      min = size - visible;
    }
  }

  return { min, max, offset: min - (focus - half) };
}

export function windowContains(window: GridWindow, col: number, row: number): boolean {
  return col >= window.minCol && col <= window.maxCol && row >= window.minRow && row <= window.maxRow;
}

export function windowsEqual(a: GridWindow, b: GridWindow): boolean {
  return a.minCol === b.minCol && a.maxCol === b.maxCol && a.minRow === b.minRow && a.maxRow === b.maxRow;
}

export function windowArea(window: GridWindow): number {
  if (window.maxCol < window.minCol || window.maxRow < window.minRow) return 0;
  return (window.maxCol - window.minCol + 1) * (window.maxRow - window.minRow + 1);
}

function intersect(a: GridWindow, b: GridWindow): GridWindow | null {
  const result = {
    minCol: Math.max(a.minCol, b.minCol),
    maxCol: Math.min(a.maxCol, b.maxCol),
    minRow: Math.max(a.minRow, b.minRow),
    maxRow: Math.min(a.maxRow, b.maxRow),
  };
  return windowArea(result) > 0 ? result : null;
}

/**
 * Cells of `a` not in `b`, as at most four disjoint rectangles
 * (left and right strips spanning all of `a`'s rows, then bottom and top
 * strips within the overlap's columns).
 */
export function rectDifference(a: GridWindow, b: GridWindow): GridWindow[] {
  const overlap = intersect(a, b);
  if (!overlap) {
    return windowArea(a) > 0 ? [{ ...a }] : [];
  }

  const pieces: GridWindow[] = [
    { minCol: a.minCol, maxCol: overlap.minCol - 1, minRow: a.minRow, maxRow: a.maxRow },
    { minCol: overlap.maxCol + 1, maxCol: a.maxCol, minRow: a.minRow, maxRow: a.maxRow },
    { minCol: overlap.minCol, maxCol: overlap.maxCol, minRow: a.minRow, maxRow: overlap.minRow - 1 },
    { minCol: overlap.minCol, maxCol: overlap.maxCol, minRow: overlap.maxRow + 1, maxRow: a.maxRow },
  ];

  return pieces.filter((piece) => windowArea(piece) > 0);
}
