/**
 * Pure rectangle helpers used by the grid model and the interaction layer.
 */

import type { GridCell, GridSize, PlacementRect } from "./types";

/** Whether two rects share at least one cell. */
export function rectsOverlap(a: PlacementRect, b: PlacementRect): boolean {
  return a.x < b.x + b.width && b.x < a.x + a.width && a.y < b.y + b.height && b.y < a.y + a.height;
}

/** Whether a rect has integer coordinates, a size of at least 1×1 and fits `size`. */
export function rectInBounds(rect: PlacementRect, size: GridSize): boolean {
  return (
    isWellFormed(rect) &&
    rect.x >= 0 &&
    rect.y >= 0 &&
    rect.x + rect.width <= size.columns &&
    rect.y + rect.height <= size.rows
  );
}

/** Integer coordinates and a positive size. */
export function isWellFormed(rect: PlacementRect): boolean {
  return (
    Number.isInteger(rect.x) &&
    Number.isInteger(rect.y) &&
    Number.isInteger(rect.width) &&
    Number.isInteger(rect.height) &&
    rect.width >= 1 &&
    rect.height >= 1
  );
}

/** Every cell covered by a rect, row by row. */
export function cellsOf(rect: PlacementRect): GridCell[] {
  const cells: GridCell[] = [];
  for (let y = rect.y; y < rect.y + rect.height; y++) {
    for (let x = rect.x; x < rect.x + rect.width; x++) {
      cells.push({ x, y });
    }
  }
  return cells;
}

/** Occupancy map key for a cell. */
export function cellKey(x: number, y: number): string {
  return `${x},${y}`;
}

export function translateRect(rect: PlacementRect, dx: number, dy: number): PlacementRect {
  return { ...rect, x: rect.x + dx, y: rect.y + dy };
}

export function rectsEqual(a: PlacementRect, b: PlacementRect): boolean {
  return a.x === b.x && a.y === b.y && a.width === b.width && a.height === b.height;
}

/** Smallest rect containing all of `rects`, or `undefined` for none. */
export function boundingRect(rects: Iterable<PlacementRect>): PlacementRect | undefined {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const rect of rects) {
    minX = Math.min(minX, rect.x);
    minY = Math.min(minY, rect.y);
    maxX = Math.max(maxX, rect.x + rect.width);
    maxY = Math.max(maxY, rect.y + rect.height);
  }
  if (minX === Infinity) return undefined;
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}
