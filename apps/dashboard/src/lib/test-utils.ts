/**
 * Shared test utilities used across feature test files.
 *
 * Provides a recording render surface, scriptable sources, an in-memory
 * file system and a small registry of test modules so feature tests touch
 * neither `node:os` nor the disk.
 */

import type { LayoutFileSystem } from "@/features/config-store/types";
import { ModuleRegistry } from "@/features/modules/ModuleRegistry";
import type {
  DataValue,
  Displayer,
  Point,
  RenderSurface,
  ShapeTag,
  Source,
  TextOptions,
} from "@/features/modules/types";
import { scalar } from "@/features/modules/values";
import type { PollScheduler } from "@/features/panels/PanelRegistry";

/* --------------------------------------------------------------------------
   Render surface
   -------------------------------------------------------------------------- */

export type SurfaceCall =
  | { op: "clear"; color: string }
  | { op: "fillRect"; x: number; y: number; width: number; height: number; color: string }
  | { op: "drawText"; text: string; options: TextOptions }
  | { op: "strokeArc"; cx: number; cy: number; radius: number; start: number; end: number; color: string }
  | { op: "strokePolyline"; points: Point[]; color: string };

/** Surface that records every primitive instead of drawing it. */
export class RecordingSurface implements RenderSurface {
  readonly calls: SurfaceCall[] = [];

  constructor(
    readonly width = 100,
    readonly height = 50,
  ) {}

  clear(color: string): void {
    this.calls.push({ op: "clear", color });
  }

  fillRect(x: number, y: number, width: number, height: number, color: string): void {
    this.calls.push({ op: "fillRect", x, y, width, height, color });
  }

  drawText(text: string, options: TextOptions): void {
    this.calls.push({ op: "drawText", text, options });
  }

  strokeArc(cx: number, cy: number, radius: number, start: number, end: number, color: string): void {
    this.calls.push({ op: "strokeArc", cx, cy, radius, start, end, color });
  }

  strokePolyline(points: Point[], color: string): void {
    this.calls.push({ op: "strokePolyline", points, color });
  }

  texts(): string[] {
    return this.calls.flatMap((call) => (call.op === "drawText" ? [call.text] : []));
  }
}

/* --------------------------------------------------------------------------
   Sources
   -------------------------------------------------------------------------- */

export type FetchScript = (call: number, signal: AbortSignal) => Promise<DataValue>;

/** A source whose every fetch is decided by `script`; `calls` counts them. */
export class ScriptedSource implements Source {
  calls = 0;
  closed = false;

  constructor(private readonly script: FetchScript) {}

  fetch(signal: AbortSignal): Promise<DataValue> {
    this.calls += 1;
    return this.script(this.calls, signal);
  }

  describeSchema() {
    return [];
  }

  close(): void {
    this.closed = true;
  }
}

/** Resolve after `ms` of (fake) time unless `signal` aborts first. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener("abort", () => {
      clearTimeout(timer);
      reject(new Error("aborted"));
    });
  });
}

export function percent(value: number): DataValue {
  return scalar("scalar-percentage", value, "%");
}

/** Scheduler stand-in that only records what the panel registry asks of it. */
export class RecordingScheduler implements PollScheduler {
  readonly log: string[] = [];
  readonly intervals = new Map<string, number>();
  readonly sources = new Map<string, Source>();

  register(panelId: string, source: Source, intervalMs: number): void {
    this.log.push(`register ${panelId}`);
    this.intervals.set(panelId, intervalMs);
    this.sources.set(panelId, source);
  }

  unregister(panelId: string): void {
    this.log.push(`unregister ${panelId}`);
    this.intervals.delete(panelId);
    this.sources.delete(panelId);
  }
}

/* --------------------------------------------------------------------------
   Registry
   -------------------------------------------------------------------------- */

export function stubDisplayer(accepts: readonly ShapeTag[]): Displayer {
  return {
    accepts: (shape) => accepts.includes(shape),
    render: () => undefined,
    describeSchema: () => [],
  };
}

/**
 * Registry with a `cpu` source (constant 42 %), a `text` displayer for
 * percentages and temperatures, and a `time-series-only` displayer. Extra
 * percentage sources are registered under their own keys.
 */
export function createTestRegistry(extraSources: Record<string, () => Source> = {}): ModuleRegistry {
  const registry = new ModuleRegistry();
  registry.registerSource({
    typeKey: "cpu",
    label: "CPU",
    shapeTag: "scalar-percentage",
    configSchema: [],
    defaultSize: { width: 2, height: 2 },
    create: () => new ScriptedSource(async () => percent(42)),
  });
  for (const [typeKey, create] of Object.entries(extraSources)) {
    registry.registerSource({
      typeKey,
      label: typeKey,
      shapeTag: "scalar-percentage",
      configSchema: [],
      defaultSize: { width: 2, height: 2 },
      create,
    });
  }
  registry.registerDisplayer({
    typeKey: "text",
    label: "Text",
    accepts: ["scalar-percentage", "scalar-temperature"],
    configSchema: [
      { title: "Text", options: [{ key: "maxValue", type: "number", label: "Maximum", default: 100 }] },
    ],
    create: () => stubDisplayer(["scalar-percentage", "scalar-temperature"]),
  });
  registry.registerDisplayer({
    typeKey: "time-series-only",
    label: "Time Series",
    accepts: ["time-series"],
    configSchema: [],
    create: () => stubDisplayer(["time-series"]),
  });
  return registry;
}

/* --------------------------------------------------------------------------
   File system
   -------------------------------------------------------------------------- */

function notFound(filePath: string): Error {
  return Object.assign(new Error(`ENOENT: no such file, '${filePath}'`), { code: "ENOENT" });
}

/**
 * In-memory file system. `ops` records every mutating call; `hold()` parks
 * writes until the returned release function runs.
 */
export class MemoryFileSystem implements LayoutFileSystem {
  readonly files = new Map<string, string>();
  readonly ops: string[] = [];
  failWrites = false;
  maxConcurrentWrites = 0;

  private activeWrites = 0;
  private gate: Promise<void> | undefined;

  async readFile(filePath: string): Promise<string> {
    const text = this.files.get(filePath);
    if (text === undefined) throw notFound(filePath);
    return text;
  }

  async writeFile(filePath: string, data: string): Promise<void> {
    this.activeWrites += 1;
    this.maxConcurrentWrites = Math.max(this.maxConcurrentWrites, this.activeWrites);
    try {
      if (this.gate) await this.gate;
      if (this.failWrites) throw new Error(`EACCES: permission denied, '${filePath}'`);
      this.ops.push(`write ${filePath}`);
      this.files.set(filePath, data);
    } finally {
      this.activeWrites -= 1;
    }
  }

  async rename(fromPath: string, toPath: string): Promise<void> {
    const text = this.files.get(fromPath);
    if (text === undefined) throw notFound(fromPath);
    this.ops.push(`rename ${fromPath} -> ${toPath}`);
    this.files.delete(fromPath);
    this.files.set(toPath, text);
  }

  async mkdir(): Promise<void> {
    // Directories are implied by file paths.
  }

  async readdir(dirPath: string): Promise<string[]> {
    const prefix = `${dirPath}/`;
    const names = Array.from(this.files.keys())
      .filter((filePath) => filePath.startsWith(prefix) && !filePath.slice(prefix.length).includes("/"))
      .map((filePath) => filePath.slice(prefix.length));
    if (names.length === 0) throw notFound(dirPath);
    return names;
  }

  async unlink(filePath: string): Promise<void> {
    if (!this.files.delete(filePath)) throw notFound(filePath);
    this.ops.push(`unlink ${filePath}`);
  }

  /** Park writes until the returned function is called. */
  hold(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = () => {
        this.gate = undefined;
        resolve();
      };
    });
    return release;
  }

  /** Number of completed writes to `filePath` (counted at the rename). */
  writesTo(filePath: string): number {
    return this.ops.filter((op) => op.endsWith(`-> ${filePath}`)).length;
  }
}
