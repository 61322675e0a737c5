import { describe, expect, it } from "vitest";

import { loadSettings, resolveConfigDir } from "../settings";

describe("loadSettings", () => {
  it("uses defaults when nothing is set", () => {
    expect(loadSettings({}, {})).toEqual({
      gridColumns: 64,
      gridRows: 40,
      cellSizePx: 16,
      handleSizePx: 6,
      fetchTimeoutMs: 1500,
      autosaveDebounceMs: 500,
      configDir: undefined,
      logLevel: "info",
    });
  });

  it("reads environment variables and lets overrides win", () => {
    const settings = loadSettings(
      { gridRows: 12 },
      { SENSORBOARD_GRID_COLUMNS: "32", SENSORBOARD_GRID_ROWS: "30", SENSORBOARD_LOG_LEVEL: "debug" },
    );
    expect(settings.gridColumns).toBe(32);
    expect(settings.gridRows).toBe(12);
    expect(settings.logLevel).toBe("debug");
  });

  it("falls back to the default for invalid values", () => {
    const settings = loadSettings(
      {},
      { SENSORBOARD_FETCH_TIMEOUT_MS: "soon", SENSORBOARD_CELL_SIZE: "-4", SENSORBOARD_LOG_LEVEL: "loud" },
    );
    expect(settings.fetchTimeoutMs).toBe(1500);
    expect(settings.cellSizePx).toBe(16);
    expect(settings.logLevel).toBe("info");
  });
});

describe("resolveConfigDir", () => {
  it("prefers the configured directory, then XDG_CONFIG_HOME", () => {
    expect(resolveConfigDir({ configDir: "/srv/board" }, { XDG_CONFIG_HOME: "/xdg" })).toBe("/srv/board");
    expect(resolveConfigDir({ configDir: undefined }, { XDG_CONFIG_HOME: "/xdg" })).toBe("/xdg/sensorboard");
  });
});
