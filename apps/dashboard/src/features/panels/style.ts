/**
 * Reading panel styles from persisted data.
 *
 * Known keys that hold the wrong type are dropped so the panel falls back to
 * its default for them; unknown keys pass through.
 */

import { z } from "zod";

import type { PanelStyle } from "./types";

const styleSchema = z
  .object({
    title: z.string().optional().catch(undefined),
    showTitle: z.boolean().optional().catch(undefined),
    background: z.string().optional().catch(undefined),
    foreground: z.string().optional().catch(undefined),
    font: z.string().optional().catch(undefined),
    borderColor: z.string().optional().catch(undefined),
    borderWidth: z.number().nonnegative().optional().catch(undefined),
    borderRadius: z.number().nonnegative().optional().catch(undefined),
  })
  .passthrough();

/** Partial style from an untrusted value; anything but an object yields `{}`. */
export function parseStyle(value: unknown): Partial<PanelStyle> {
  const parsed = styleSchema.safeParse(value);
  if (!parsed.success) return {};
  const style: Partial<PanelStyle> = {};
  for (const [key, entry] of Object.entries(parsed.data)) {
    if (entry !== undefined) style[key] = entry;
  }
  return style;
}

/** Style keys worth remembering as a displayer type's defaults (everything but the title). */
export function reusableStyle(style: Readonly<PanelStyle>): Record<string, unknown> {
  const rest: Record<string, unknown> = { ...style };
  delete rest.title;
  return rest;
}
