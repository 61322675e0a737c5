/**
 * Cell occupancy model for the dashboard grid.
 *
 * Every mutation validates the whole target before touching the occupancy
 * map, so a rejected call leaves the model exactly as it was. A panel's own
 * cells never conflict with its new rect during move/resize.
 */

import { PlacementConflictError } from "@/lib/errors";

import { boundingRect, cellKey, cellsOf, rectInBounds, rectsOverlap } from "./geometry";
import type { GridCell, GridSize, PlacementRect, RectMap } from "./types";

/** Panel ids whose cells do not count as conflicts. */
export type Exclusion = ReadonlySet<string> | string | undefined;

function isExcluded(id: string, exclude: Exclusion): boolean {
  if (exclude === undefined) return false;
  return typeof exclude === "string" ? exclude === id : exclude.has(id);
}

function describeRect(rect: PlacementRect): string {
  return `(${rect.x},${rect.y} ${rect.width}×${rect.height})`;
}

export class GridModel {
  private gridSize: GridSize;
  /** cell key → owning panel id */
  private cells = new Map<string, string>();
  private rects = new Map<string, PlacementRect>();

  constructor(size: GridSize) {
    this.gridSize = { ...size };
  }

  /* -- Queries ------------------------------------------------------------ */

  get size(): GridSize {
    return { ...this.gridSize };
  }

  /** Snapshot of the occupancy map (cell key `x,y` → panel id). */
  occupancy(): Map<string, string> {
    return new Map(this.cells);
  }

  ownerAt(cell: GridCell): string | undefined {
    return this.cells.get(cellKey(cell.x, cell.y));
  }

  has(panelId: string): boolean {
    return this.rects.has(panelId);
  }

  rectOf(panelId: string): PlacementRect | undefined {
    const rect = this.rects.get(panelId);
    return rect ? { ...rect } : undefined;
  }

  panelIds(): string[] {
    return Array.from(this.rects.keys());
  }

  /** Ids of panels (other than `exclude`) owning any cell of `rect`. */
  conflicts(rect: PlacementRect, exclude?: Exclusion): string[] {
    const found = new Set<string>();
    for (const cell of cellsOf(rect)) {
      const owner = this.cells.get(cellKey(cell.x, cell.y));
      if (owner !== undefined && !isExcluded(owner, exclude)) found.add(owner);
    }
    return Array.from(found);
  }

  /** Whether `rect` is on-grid and free of panels other than `exclude`. */
  canPlace(rect: PlacementRect, exclude?: Exclusion): boolean {
    return rectInBounds(rect, this.gridSize) && this.conflicts(rect, exclude).length === 0;
  }

  /** Whether every rect in `rects` can be committed together. */
  canPlaceAll(rects: RectMap, exclude?: Exclusion): boolean {
    try {
      this.assertGroupPlaceable(rects, exclude);
      return true;
    } catch (error) {
      if (error instanceof PlacementConflictError) return false;
      throw error;
    }
  }

  /** First free spot of the given size in row-major order. */
  findFreeRect(width: number, height: number): PlacementRect | undefined {
    for (let y = 0; y + height <= this.gridSize.rows; y++) {
      for (let x = 0; x + width <= this.gridSize.columns; x++) {
        const rect = { x, y, width, height };
        if (this.canPlace(rect)) return rect;
      }
    }
    return undefined;
  }

  /** Smallest rect covering every placed panel. */
  contentBounds(): PlacementRect | undefined {
    return boundingRect(this.rects.values());
  }

  /* -- Mutations ---------------------------------------------------------- */

  /** Place a panel that is not on the grid yet. */
  place(panelId: string, rect: PlacementRect): void {
    if (this.rects.has(panelId)) {
      throw new Error(`Panel ${panelId} is already placed`);
    }
    this.assertPlaceable(panelId, rect);
    this.occupy(panelId, rect);
  }

  /** Move a placed panel. Its current cells do not block the new rect. */
  move(panelId: string, newRect: PlacementRect): void {
    this.relocate(panelId, newRect);
  }

  /** Resize a placed panel. Its current cells do not block the new rect. */
  resize(panelId: string, newRect: PlacementRect): void {
    this.relocate(panelId, newRect);
  }

  /**
   * Commit several panels' rects at once (group drag). The moving panels'
   * current cells are ignored; the new rects must not overlap each other.
   */
  moveMany(rects: RectMap): void {
    for (const id of rects.keys()) {
      if (!this.rects.has(id)) throw new Error(`Panel ${id} is not placed`);
    }
    this.assertGroupPlaceable(rects, new Set(rects.keys()));
    for (const id of rects.keys()) this.vacate(id);
    for (const [id, rect] of rects) this.occupy(id, rect);
  }

  /** Free every cell owned by a panel. Returns whether it was placed. */
  release(panelId: string): boolean {
    if (!this.rects.has(panelId)) return false;
    this.vacate(panelId);
    return true;
  }

  /** Change the grid bounds; fails if a placed panel would fall outside. */
  setSize(size: GridSize): void {
    const outside: string[] = [];
    for (const [id, rect] of this.rects) {
      if (!rectInBounds(rect, size)) outside.push(id);
    }
    if (outside.length > 0) {
      throw new PlacementConflictError(
        `Grid ${size.columns}×${size.rows} is too small for ${outside.join(", ")}`,
        outside,
      );
    }
    this.gridSize = { ...size };
  }

  clear(): void {
    this.cells.clear();
    this.rects.clear();
  }

  /* -- Validation --------------------------------------------------------- */

  /** Throw `PlacementConflictError` unless `rect` is on-grid and free of other panels. */
  assertPlaceable(panelId: string, rect: PlacementRect): void {
    if (!rectInBounds(rect, this.gridSize)) {
      throw new PlacementConflictError(
        `${panelId} ${describeRect(rect)} is outside the ${this.gridSize.columns}×${this.gridSize.rows} grid`,
      );
    }
    const blocking = this.conflicts(rect, panelId);
    if (blocking.length > 0) {
      throw new PlacementConflictError(
        `${panelId} ${describeRect(rect)} overlaps ${blocking.join(", ")}`,
        blocking,
      );
    }
  }

  /** Throw `PlacementConflictError` unless every rect can be committed together. */
  assertGroupPlaceable(rects: RectMap, exclude?: Exclusion): void {
    const entries = Array.from(rects.entries());
    for (const [id, rect] of entries) {
      if (!rectInBounds(rect, this.gridSize)) {
        throw new PlacementConflictError(`${id} ${describeRect(rect)} is outside the grid`);
      }
      const blocking = this.conflicts(rect, exclude);
      if (blocking.length > 0) {
        throw new PlacementConflictError(`${id} ${describeRect(rect)} overlaps ${blocking.join(", ")}`, blocking);
      }
    }
    for (let i = 0; i < entries.length; i++) {
      for (let j = i + 1; j < entries.length; j++) {
        const [idA, rectA] = entries[i];
        const [idB, rectB] = entries[j];
        if (rectsOverlap(rectA, rectB)) {
          throw new PlacementConflictError(`${idA} and ${idB} would overlap`, [idA, idB]);
        }
      }
    }
  }

  /* -- Internals ---------------------------------------------------------- */

  private relocate(panelId: string, newRect: PlacementRect): void {
    if (!this.rects.has(panelId)) {
      throw new Error(`Panel ${panelId} is not placed`);
    }
    this.assertPlaceable(panelId, newRect);
    this.vacate(panelId);
    this.occupy(panelId, newRect);
  }

  private occupy(panelId: string, rect: PlacementRect): void {
    for (const cell of cellsOf(rect)) {
      this.cells.set(cellKey(cell.x, cell.y), panelId);
    }
    this.rects.set(panelId, { ...rect });
  }

  private vacate(panelId: string): void {
    const rect = this.rects.get(panelId);
    if (!rect) return;
    for (const cell of cellsOf(rect)) {
      this.cells.delete(cellKey(cell.x, cell.y));
    }
    this.rects.delete(panelId);
  }
}
