/**
 * Interaction feature barrel export.
 */

export { InteractionController } from "./InteractionController";
export type { InteractionControllerOptions, InteractionListener } from "./InteractionController";
export { boxFromCorners, boxIntersects, cellOffset, detectHandle, resizeRect, toPixelRect } from "./snap";
export type {
  DragOperation,
  GestureOutcome,
  InteractionEvent,
  InteractionState,
  Modifiers,
  PixelRect,
  PointerPosition,
  Preview,
  ResizeHandle,
} from "./types";
