/**
 * Types shared by the dashboard composition root and its React bindings.
 */

import type { PlacementRect } from "@/features/grid/types";
import type { PanelStyle } from "@/features/panels/types";

export type NoticeLevel = "info" | "warning" | "error";

/** A message for the user that needs no immediate action. */
export interface Notice {
  level: NoticeLevel;
  message: string;
  at: number;
}

export interface SavedEvent {
  /** Profile the write belonged to, if it was a profile file. */
  profile: string | undefined;
  path: string;
}

/** Payload types of the events the dashboard publishes. */
export interface DashboardEventMap {
  notice: Notice;
  saved: SavedEvent;
}

/** What `applyDocument` did with each record of a layout. */
export interface ApplyReport {
  created: string[];
  /** Records kept as-is because their module types are not available. */
  retained: string[];
  /** Records that could not be placed or configured. */
  dropped: string[];
}

/** Snapshot of one panel for rendering. */
export interface PanelView {
  id: string;
  placement: PlacementRect;
  zOrder: number;
  sourceType: string;
  displayerType: string;
  style: PanelStyle;
}
