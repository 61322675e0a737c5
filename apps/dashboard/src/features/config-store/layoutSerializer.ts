/**
 * Layout serialization and deserialization.
 *
 * Converts layout documents to and from JSON text. Reading is forgiving:
 * older versions are migrated, malformed fields fall back to their defaults
 * and unknown keys are carried through. Panel records that cannot be read
 * at all (no id, module type or usable placement) are dropped with a
 * warning. Only text that is not JSON, or whose top level is not an object,
 * is rejected.
 */

import { z } from "zod";

import { CorruptConfigError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

import { applyLayoutMigrations, isRecord } from "./layoutMigrations";
import {
  CURRENT_LAYOUT_VERSION,
  DEFAULT_LAYOUT_GRID,
  type LayoutDocument,
  type LayoutGrid,
  type PanelRecord,
} from "./types";

const log = createLogger("config");

/* --------------------------------------------------------------------------
   Schemas
   -------------------------------------------------------------------------- */

const options = z.record(z.unknown());

const gridSchema = z
  .object({
    columns: z.number().int().positive().catch(DEFAULT_LAYOUT_GRID.columns),
    rows: z.number().int().positive().catch(DEFAULT_LAYOUT_GRID.rows),
    cellSize: z.number().int().positive().catch(DEFAULT_LAYOUT_GRID.cellSize),
  })
  .passthrough()
  .catch(() => ({ ...DEFAULT_LAYOUT_GRID }));

const placementSchema = z
  .object({
    x: z.number().int().nonnegative(),
    y: z.number().int().nonnegative(),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
  })
  .passthrough();

const moduleRefSchema = z
  .object({
    type: z.string().min(1),
    config: options.catch({}),
  })
  .passthrough();

const panelRecordSchema = z
  .object({
    id: z.string().min(1),
    placement: placementSchema,
    zOrder: z.number().int().optional().catch(undefined),
    source: moduleRefSchema,
    displayer: moduleRefSchema,
    style: options.catch({}),
  })
  .passthrough();

const documentSchema = z
  .object({
    formatVersion: z.number().catch(CURRENT_LAYOUT_VERSION),
    grid: gridSchema,
    panels: z.array(z.unknown()).catch([]),
  })
  .passthrough();

/* --------------------------------------------------------------------------
   Normalization
   -------------------------------------------------------------------------- */

function toPanelRecord(item: unknown, index: number): PanelRecord | undefined {
  const parsed = panelRecordSchema.safeParse(item);
  if (!parsed.success) {
    const path = parsed.error.issues[0]?.path.join(".") || "(record)";
    log.warn(`Dropped unreadable panel record #${index + 1} (${path})`);
    return undefined;
  }
  const { id, placement, zOrder, source, displayer, style, ...extra } = parsed.data;
  return { id, placement, zOrder: zOrder ?? index, source, displayer, style, ...extra };
}

/**
 * Migrate and validate a raw document object. The result always has the
 * current format version and its keys in canonical order, so normalizing
 * twice gives the same document.
 */
export function normalizeLayout(raw: Record<string, unknown>): LayoutDocument {
  const { formatVersion: _version, grid, panels, ...extra } = documentSchema.parse(applyLayoutMigrations(raw));
  const records: PanelRecord[] = [];
  panels.forEach((item, index) => {
    const record = toPanelRecord(item, index);
    if (record) records.push(record);
  });
  return { formatVersion: CURRENT_LAYOUT_VERSION, grid, panels: records, ...extra };
}

/** An empty layout on the given grid. */
export function emptyLayout(grid: Partial<LayoutGrid> = {}): LayoutDocument {
  return { formatVersion: CURRENT_LAYOUT_VERSION, grid: { ...DEFAULT_LAYOUT_GRID, ...grid }, panels: [] };
}

/* --------------------------------------------------------------------------
   Text
   -------------------------------------------------------------------------- */

/**
 * Serialize a layout document to JSON text. The document is normalized
 * first, so serializing a loaded document reproduces its text exactly.
 */
export function serializeLayout(doc: LayoutDocument): string {
  return `${JSON.stringify(normalizeLayout(doc), null, 2)}\n`;
}

/**
 * Parse JSON text into a layout document.
 *
 * @param location - Shown in the error when the text cannot be used.
 */
export function deserializeLayout(text: string, location: string): LayoutDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new CorruptConfigError(location, error instanceof Error ? error.message : "not valid JSON");
  }
  if (!isRecord(parsed)) {
    throw new CorruptConfigError(location, "top level is not an object");
  }
  return normalizeLayout(parsed);
}
