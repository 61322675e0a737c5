/**
 * Runtime settings.
 *
 * Defaults live in the zod schema; environment variables override them.
 * Invalid values fall back to the default for that key instead of failing
 * startup.
 */

import os from "node:os";
import path from "node:path";
import { z } from "zod";

/* --------------------------------------------------------------------------
   Schema
   -------------------------------------------------------------------------- */

const logLevel = z.enum(["debug", "info", "warn", "error", "silent"]);

const positiveInt = (defaultValue: number) =>
  z.coerce.number().int().positive().catch(defaultValue);

const SETTINGS_KEY_SCHEMAS = {
  gridColumns: positiveInt(64),
  gridRows: positiveInt(40),
  cellSizePx: positiveInt(16),
  handleSizePx: positiveInt(6),
  fetchTimeoutMs: positiveInt(1500),
  autosaveDebounceMs: positiveInt(500),
  configDir: z.string().min(1).optional().catch(undefined),
  logLevel: logLevel.catch("info"),
};

export const settingsSchema = z.object(SETTINGS_KEY_SCHEMAS);

export type DashboardSettings = z.infer<typeof settingsSchema>;

/** Environment variable consulted for each setting. */
const ENV_KEYS: Record<keyof DashboardSettings, string> = {
  gridColumns: "SENSORBOARD_GRID_COLUMNS",
  gridRows: "SENSORBOARD_GRID_ROWS",
  cellSizePx: "SENSORBOARD_CELL_SIZE",
  handleSizePx: "SENSORBOARD_HANDLE_SIZE",
  fetchTimeoutMs: "SENSORBOARD_FETCH_TIMEOUT_MS",
  autosaveDebounceMs: "SENSORBOARD_AUTOSAVE_MS",
  configDir: "SENSORBOARD_CONFIG_DIR",
  logLevel: "SENSORBOARD_LOG_LEVEL",
};

/* --------------------------------------------------------------------------
   Loading
   -------------------------------------------------------------------------- */

/**
 * Build settings from environment variables and explicit overrides.
 * Overrides win over the environment, which wins over defaults.
 */
export function loadSettings(
  overrides: Partial<DashboardSettings> = {},
  env: NodeJS.ProcessEnv = process.env,
): DashboardSettings {
  const raw: Record<string, unknown> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== "") raw[key] = value;
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[key] = value;
  }
  return settingsSchema.parse(raw);
}

/**
 * Directory holding layout profiles and the theme file.
 *
 * `configDir` from settings wins; otherwise `$XDG_CONFIG_HOME/sensorboard`,
 * otherwise `~/.config/sensorboard`.
 */
export function resolveConfigDir(
  settings: Pick<DashboardSettings, "configDir">,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (settings.configDir) return settings.configDir;
  const configHome = env.XDG_CONFIG_HOME;
  if (configHome) return path.join(configHome, "sensorboard");
  return path.join(os.homedir(), ".config", "sensorboard");
}
