/**
 * Shared types for grid placement.
 *
 * All coordinates and sizes are whole grid cells unless a name says `Px`.
 */

/** A single cell coordinate. */
export interface GridCell {
  x: number;
  y: number;
}

/** A rectangle of cells. `width` and `height` are at least 1. */
export interface PlacementRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Grid bounds in cells. */
export interface GridSize {
  columns: number;
  rows: number;
}

/** Panel id → rect, as committed or proposed. */
export type RectMap = ReadonlyMap<string, PlacementRect>;

/** Minimum panel size in cells. */
export const MIN_PANEL_CELLS = 1;

/** Default cell edge length in pixels. */
export const DEFAULT_CELL_SIZE_PX = 16;
