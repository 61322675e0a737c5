/**
 * Upgrades for older layout documents, applied on read.
 *
 * Version 1 stored each panel as one flat record: `type` and
 * `displayer_type` name the modules, `grid_x`/`grid_y`/`width`/`height`
 * give the placement (often as strings), `title_text` the title, and every
 * other key is a module option. Grid settings lived under `window`.
 * Records already in the nested form pass through untouched.
 */

import { createLogger } from "@/lib/logger";

import { CURRENT_LAYOUT_VERSION } from "./types";

const log = createLogger("config");

type Migration = (doc: Record<string, unknown>) => Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function migrateFlatRecord(item: unknown, index: number): unknown {
  if (!isRecord(item) || isRecord(item.source)) return item;
  const { id, type, displayer_type, grid_x, grid_y, width, height, title_text, ...options } = item;
  return {
    id: typeof id === "string" && id !== "" ? id : `panel_v1_${index + 1}`,
    placement: { x: toNumber(grid_x), y: toNumber(grid_y), width: toNumber(width), height: toNumber(height) },
    zOrder: index,
    // One flat option set fed both modules; each keeps the keys it knows.
    source: { type, config: { ...options } },
    displayer: { type: displayer_type, config: { ...options } },
    style: title_text === undefined ? {} : { title: String(title_text) },
  };
}

const MIGRATIONS: Record<number, Migration> = {
  2: (doc) => {
    const { window: legacyWindow, panels, ...rest } = doc;
    const next: Record<string, unknown> = {
      ...rest,
      panels: Array.isArray(panels) ? panels.map(migrateFlatRecord) : panels,
    };
    if (isRecord(legacyWindow)) {
      const { grid_columns, grid_rows, cell_size, ...windowRest } = legacyWindow;
      next.grid = {
        ...windowRest,
        columns: toNumber(grid_columns),
        rows: toNumber(grid_rows),
        cellSize: toNumber(cell_size),
      };
    }
    return next;
  },
};

/** Version a raw document claims; anything unusable counts as version 1. */
export function layoutVersionOf(doc: Record<string, unknown>): number {
  const raw = doc.formatVersion;
  return typeof raw === "number" && Number.isInteger(raw) && raw >= 1 ? raw : 1;
}

/** Bring a raw document up to the current format version. */
export function applyLayoutMigrations(doc: Record<string, unknown>): Record<string, unknown> {
  const version = layoutVersionOf(doc);
  if (version > CURRENT_LAYOUT_VERSION) {
    log.warn(`Layout format ${version} is newer than ${CURRENT_LAYOUT_VERSION}; reading what is understood`);
  }
  let next = { ...doc };
  for (let target = version + 1; target <= CURRENT_LAYOUT_VERSION; target++) {
    const migration = MIGRATIONS[target];
    if (migration) {
      next = migration(next);
    }
  }
  next.formatVersion = CURRENT_LAYOUT_VERSION;
  return next;
}
