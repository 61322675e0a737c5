/**
 * Config store feature barrel export.
 */

export { ConfigStore, DEFAULT_SAVE_DEBOUNCE_MS, isNotFound, nodeFileSystem } from "./ConfigStore";
export type { ConfigStoreOptions } from "./ConfigStore";
export { applyLayoutMigrations, layoutVersionOf } from "./layoutMigrations";
export { deserializeLayout, emptyLayout, normalizeLayout, serializeLayout } from "./layoutSerializer";
export { CURRENT_LAYOUT_VERSION, DEFAULT_LAYOUT_GRID, DEFAULT_PROFILE } from "./types";
export type {
  ConfigStoreEvent,
  ConfigStoreListener,
  DisplayerDefaults,
  LayoutDocument,
  LayoutFileSystem,
  LayoutGrid,
  ModuleRef,
  PanelRecord,
} from "./types";
