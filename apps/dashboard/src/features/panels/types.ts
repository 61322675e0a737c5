/**
 * Panel entities and the events PanelRegistry emits about them.
 */

import type { PlacementRect } from "@/features/grid/types";
import type { DataValue, Displayer, ModuleConfig, Source } from "@/features/modules/types";
import type { FetchErrorSeverity, SourceFetchError } from "@/lib/errors";

/* --------------------------------------------------------------------------
   Style
   -------------------------------------------------------------------------- */

export interface PanelStyle {
  title: string;
  showTitle: boolean;
  background: string;
  foreground: string;
  font: string;
  borderColor: string;
  borderWidth: number;
  borderRadius: number;
  /** Keys this version does not know are carried through untouched. */
  [key: string]: unknown;
}

export const DEFAULT_PANEL_STYLE: PanelStyle = {
  title: "",
  showTitle: true,
  background: "#1e1e1e",
  foreground: "#e0e0e0",
  font: "sans-serif 12",
  borderColor: "#3c3c3c",
  borderWidth: 1,
  borderRadius: 4,
};

/** Size used for a new panel whose source declares none. */
export const DEFAULT_PANEL_SIZE = { width: 16, height: 16 };

/* --------------------------------------------------------------------------
   Runtime
   -------------------------------------------------------------------------- */

export type PanelStatus = "pending" | "ok" | "error" | "paused";

export interface PanelRuntime {
  status: PanelStatus;
  value?: DataValue;
  error?: string;
  errorSeverity?: FetchErrorSeverity;
  /** Raised while the latest reading exceeds the alarm threshold. */
  inAlarm: boolean;
  updatedAt?: number;
}

/** Outcome of one poll, as handed from the scheduler to the registry. */
export type DeliveryResult =
  | { ok: true; value: DataValue; at: number }
  | { ok: false; error: SourceFetchError; at: number };

/* --------------------------------------------------------------------------
   Panel
   -------------------------------------------------------------------------- */

export interface Panel {
  readonly id: string;
  placement: PlacementRect;
  zOrder: number;
  sourceType: string;
  /** Resolved config, defaults applied. */
  sourceConfig: ModuleConfig;
  displayerType: string;
  displayerConfig: ModuleConfig;
  style: PanelStyle;
  source: Source;
  displayer: Displayer;
  runtime: PanelRuntime;
}

/** Source/displayer/style changes accepted by `updatePanel`. */
export interface PanelChanges {
  sourceType?: string;
  sourceConfig?: ModuleConfig;
  displayerType?: string;
  displayerConfig?: ModuleConfig;
  style?: Partial<PanelStyle>;
}

/* --------------------------------------------------------------------------
   Events
   -------------------------------------------------------------------------- */

export type PanelEvent =
  | { type: "created"; panel: Readonly<Panel> }
  | { type: "updated"; panel: Readonly<Panel> }
  | { type: "placed"; panelIds: string[] }
  | { type: "deleted"; panelId: string }
  | { type: "runtime"; panelId: string; runtime: PanelRuntime }
  | { type: "cleared" };

export type PanelListener = (event: PanelEvent) => void;
