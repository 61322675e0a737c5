/**
 * Shared types for pointer-driven panel interaction.
 */

import type { RectMap, PlacementRect } from "@/features/grid/types";

/** Resize direction: which edge or corner is being dragged. */
export type ResizeHandle = "e" | "s" | "se";

/** Pointer position in pixels relative to the grid origin. */
export interface PointerPosition {
  x: number;
  y: number;
}

export interface PixelRect {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface Modifiers {
  /** Extend the selection instead of replacing it (ctrl/shift). */
  add: boolean;
  /** Drag copies of the panels instead of the panels themselves. */
  copy: boolean;
}

/* --------------------------------------------------------------------------
   Events
   -------------------------------------------------------------------------- */

export type InteractionEvent =
  | ({ type: "pointerDown" } & PointerPosition & { modifiers?: Partial<Modifiers> })
  | ({ type: "pointerMove" } & PointerPosition)
  | ({ type: "pointerUp" } & PointerPosition)
  | { type: "cancel" };

/* --------------------------------------------------------------------------
   States
   -------------------------------------------------------------------------- */

export interface Preview {
  rects: RectMap;
  /** Whether the rects could be committed right now. */
  valid: boolean;
  /** Whether the rects differ from where the gesture started. */
  changed: boolean;
}

export type InteractionState =
  | { kind: "idle" }
  | {
      kind: "dragging";
      panelIds: string[];
      originPointer: PointerPosition;
      originRects: RectMap;
      copy: boolean;
      preview: Preview;
    }
  | {
      kind: "resizing";
      panelId: string;
      handle: ResizeHandle;
      originPointer: PointerPosition;
      originRect: PlacementRect;
      preview: Preview;
    }
  | {
      kind: "selectingBox";
      originPointer: PointerPosition;
      currentPointer: PointerPosition;
      additive: boolean;
      /** Selection before the gesture, restored on cancel and unioned when additive. */
      prior: string[];
      hits: string[];
    };

export type InteractionStateKind = InteractionState["kind"];

/** The transient operation behind a non-idle state. */
export interface DragOperation {
  kind: "move" | "copy" | "resize" | "selectBox";
  panelIds: string[];
  originPointer: PointerPosition;
  previewRects: RectMap;
  valid: boolean;
}

/* --------------------------------------------------------------------------
   Outcomes
   -------------------------------------------------------------------------- */

export type GestureOutcome =
  | { type: "none" }
  | { type: "committed"; kind: "move" | "copy" | "resize"; panelIds: string[] }
  | { type: "reverted"; reason: string }
  | { type: "selected"; panelIds: string[] }
  | { type: "cancelled" };
