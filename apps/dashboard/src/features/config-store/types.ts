/**
 * Shared types for the persisted layout and theme files.
 */

import type { PlacementRect } from "@/features/grid/types";

/* --------------------------------------------------------------------------
   Layout document
   -------------------------------------------------------------------------- */

export interface LayoutGrid {
  columns: number;
  rows: number;
  /** Pixels per cell. */
  cellSize: number;
  [key: string]: unknown;
}

/** A source or displayer reference inside a panel record. */
export interface ModuleRef {
  type: string;
  config: Record<string, unknown>;
  [key: string]: unknown;
}

export interface PanelRecord {
  id: string;
  placement: PlacementRect;
  zOrder: number;
  source: ModuleRef;
  displayer: ModuleRef;
  style: Record<string, unknown>;
  [key: string]: unknown;
}

export interface LayoutDocument {
  formatVersion: number;
  grid: LayoutGrid;
  panels: PanelRecord[];
  [key: string]: unknown;
}

/** Current `formatVersion`; version 1 is the flat record form. */
export const CURRENT_LAYOUT_VERSION = 2;

export const DEFAULT_LAYOUT_GRID: Readonly<LayoutGrid> = {
  columns: 64,
  rows: 40,
  cellSize: 16,
};

export const DEFAULT_PROFILE = "default";

/* --------------------------------------------------------------------------
   Theme
   -------------------------------------------------------------------------- */

/** Remembered style and config for new panels of one displayer type. */
export interface DisplayerDefaults {
  style: Record<string, unknown>;
  config: Record<string, unknown>;
}

/* --------------------------------------------------------------------------
   File access
   -------------------------------------------------------------------------- */

/**
 * The file operations ConfigStore needs. `readFile` and `unlink` reject with
 * an error whose `code` is `"ENOENT"` when the file does not exist.
 */
export interface LayoutFileSystem {
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, data: string): Promise<void>;
  rename(fromPath: string, toPath: string): Promise<void>;
  mkdir(dirPath: string): Promise<void>;
  readdir(dirPath: string): Promise<string[]>;
  unlink(filePath: string): Promise<void>;
}

export type ConfigStoreEvent =
  | { type: "saved"; path: string }
  | { type: "error"; path: string; error: unknown };

export type ConfigStoreListener = (event: ConfigStoreEvent) => void;
