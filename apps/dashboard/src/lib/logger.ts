/**
 * Scoped console logger.
 *
 * Messages below the active threshold are dropped. The threshold is set once
 * from settings at startup (`SENSORBOARD_LOG_LEVEL`) and can be raised to
 * `silent` in tests.
 */

/* --------------------------------------------------------------------------
   Types
   -------------------------------------------------------------------------- */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug: (message: string, detail?: unknown) => void;
  info: (message: string, detail?: unknown) => void;
  warn: (message: string, detail?: unknown) => void;
  error: (message: string, detail?: unknown) => void;
}

type ConsoleMethod = "debug" | "info" | "warn" | "error";

/* --------------------------------------------------------------------------
   Threshold
   -------------------------------------------------------------------------- */

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/* --------------------------------------------------------------------------
   Factory
   -------------------------------------------------------------------------- */

function write(method: ConsoleMethod, scope: string, message: string, detail: unknown): void {
  if (RANK[method] < RANK[threshold]) return;
  const line = `[sensorboard:${scope}] ${message}`;
  if (detail !== undefined) {
    console[method](line, detail);
  } else {
    console[method](line);
  }
}

/** Create a logger whose lines are prefixed with `scope`. */
export function createLogger(scope: string): Logger {
  return {
    debug: (message, detail) => write("debug", scope, message, detail),
    info: (message, detail) => write("info", scope, message, detail),
    warn: (message, detail) => write("warn", scope, message, detail),
    error: (message, detail) => write("error", scope, message, detail),
  };
}
