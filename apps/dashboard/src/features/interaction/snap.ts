/**
 * Pixel ↔ cell conversion for drag and resize.
 *
 * Pointer deltas snap to whole cells; movement commits to the next cell
 * once it crosses half a cell, in either direction.
 */

import type { GridSize, PlacementRect } from "@/features/grid/types";

import type { PixelRect, PointerPosition, ResizeHandle } from "./types";

/** Whole-cell offset for a pixel delta, rounding half a cell away from zero. */
export function cellOffset(deltaPx: number, cellSize: number): number {
  const cells = Math.round(Math.abs(deltaPx) / cellSize);
  return deltaPx < 0 && cells > 0 ? -cells : cells;
}

export function toPixelRect(rect: PlacementRect, cellSize: number): PixelRect {
  return {
    left: rect.x * cellSize,
    top: rect.y * cellSize,
    width: rect.width * cellSize,
    height: rect.height * cellSize,
  };
}

export function containsPoint(rect: PixelRect, point: PointerPosition): boolean {
  return (
    point.x >= rect.left &&
    point.x < rect.left + rect.width &&
    point.y >= rect.top &&
    point.y < rect.top + rect.height
  );
}

/** Rectangle spanned by two corners, in any order. */
export function boxFromCorners(a: PointerPosition, b: PointerPosition): PixelRect {
  return {
    left: Math.min(a.x, b.x),
    top: Math.min(a.y, b.y),
    width: Math.abs(a.x - b.x),
    height: Math.abs(a.y - b.y),
  };
}

/** Whether a (possibly zero-size) selection box overlaps a panel's pixel rect. Shared edges do not count. */
export function boxIntersects(box: PixelRect, rect: PixelRect): boolean {
  return (
    box.left < rect.left + rect.width &&
    box.left + box.width > rect.left &&
    box.top < rect.top + rect.height &&
    box.top + box.height > rect.top
  );
}

/** Which resize handle, if any, lies under `point` within `handleSize` of the edges. */
export function detectHandle(rect: PixelRect, point: PointerPosition, handleSize: number): ResizeHandle | undefined {
  if (!containsPoint(rect, point)) return undefined;
  const nearRight = point.x >= rect.left + rect.width - handleSize;
  const nearBottom = point.y >= rect.top + rect.height - handleSize;
  if (nearRight && nearBottom) return "se";
  if (nearRight) return "e";
  if (nearBottom) return "s";
  return undefined;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Apply a cell delta to one handle of `origin`. The size never drops below
 * 1×1 and the far edge never leaves the grid.
 */
export function resizeRect(
  origin: PlacementRect,
  handle: ResizeHandle,
  dx: number,
  dy: number,
  grid: GridSize,
): PlacementRect {
  let { width, height } = origin;
  if (handle === "e" || handle === "se") {
    width = clamp(origin.width + dx, 1, grid.columns - origin.x);
  }
  if (handle === "s" || handle === "se") {
    height = clamp(origin.height + dy, 1, grid.rows - origin.y);
  }
  return { ...origin, width, height };
}
