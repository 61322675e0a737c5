/**
 * Grid feature barrel export.
 */

export { GridModel } from "./GridModel";
export {
  boundingRect,
  cellKey,
  cellsOf,
  isWellFormed,
  rectInBounds,
  rectsEqual,
  rectsOverlap,
  translateRect,
} from "./geometry";

export type { Exclusion } from "./GridModel";
export type { GridCell, GridSize, PlacementRect, RectMap } from "./types";
export { DEFAULT_CELL_SIZE_PX, MIN_PANEL_CELLS } from "./types";
