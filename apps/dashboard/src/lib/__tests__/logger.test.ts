import { afterEach, describe, expect, it, vi } from "vitest";

import { createLogger, getLogLevel, setLogLevel } from "../logger";

describe("createLogger", () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it("prefixes lines with the scope", () => {
    setLogLevel("debug");
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const log = createLogger("grid");
    log.info("ready");
    log.warn("slow", { ms: 40 });

    expect(info).toHaveBeenCalledWith("[sensorboard:grid] ready");
    expect(warn).toHaveBeenCalledWith("[sensorboard:grid] slow", { ms: 40 });
  });

  it("drops messages below the threshold", () => {
    setLogLevel("warn");
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const log = createLogger("scheduler");
    log.debug("tick");
    log.error("stopped");

    expect(debug).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("stays quiet when silent", () => {
    setLogLevel("silent");
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createLogger("store").error("disk full");
    expect(error).not.toHaveBeenCalled();
  });
});
