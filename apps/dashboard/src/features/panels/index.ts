/**
 * Panels feature barrel export.
 */

export { PanelRegistry, pollIntervalMs } from "./PanelRegistry";
export type { PanelRegistryOptions, PollScheduler } from "./PanelRegistry";
export { Selection } from "./Selection";
export type { SelectionListener } from "./Selection";
export { isAlarmed } from "./alarm";
export { parseStyle, reusableStyle } from "./style";
export { DEFAULT_PANEL_SIZE, DEFAULT_PANEL_STYLE } from "./types";
export type {
  DeliveryResult,
  Panel,
  PanelChanges,
  PanelEvent,
  PanelListener,
  PanelRuntime,
  PanelStatus,
  PanelStyle,
} from "./types";
