/**
 * Dashboard feature barrel export.
 */

// Composition root
export { Dashboard, createDashboard } from "./Dashboard";
export type { CreatePanelRequest, DashboardOptions } from "./Dashboard";

// Store and hooks
export { MAX_NOTICES, bindDashboardStore, toPanelView, useDashboardStore, usePanelRuntime } from "./useDashboardStore";
export type { DashboardStore } from "./useDashboardStore";
export { useDashboardConnector } from "./useDashboardConnector";
export { useVisibilityPause } from "./useVisibilityPause";

// Types
export type { ApplyReport, DashboardEventMap, Notice, NoticeLevel, PanelView, SavedEvent } from "./types";
