/**
 * Public entry point of the dashboard core.
 */

export * from "./features/grid";
export * from "./features/modules";
export * from "./features/panels";
export * from "./features/interaction";
export * from "./features/scheduler";
export * from "./features/config-store";
export * from "./features/dashboard";

export { emitEvent, onEvent, useEventBus } from "./hooks/useEventBus";
export type { DashboardEventName, EventHandler } from "./hooks/useEventBus";
export * from "./lib/errors";
export { createLogger, getLogLevel, setLogLevel } from "./lib/logger";
export type { LogLevel, Logger } from "./lib/logger";
export { loadSettings, resolveConfigDir, settingsSchema } from "./lib/settings";
export type { DashboardSettings } from "./lib/settings";
