/**
 * Persistence for layout profiles and displayer theme defaults.
 *
 * - Profiles live under `<configDir>/layouts/<name>.json`
 * - Autosaves are debounced per file; edits inside the quiet window
 *   coalesce into one write
 * - Writes run one at a time, each to a temporary file renamed over the
 *   target
 */

import fs from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { ConfigValidationError, CorruptConfigError, describeError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

import { isRecord } from "./layoutMigrations";
import { deserializeLayout, serializeLayout } from "./layoutSerializer";
import type {
  ConfigStoreEvent,
  ConfigStoreListener,
  DisplayerDefaults,
  LayoutDocument,
  LayoutFileSystem,
} from "./types";

const log = createLogger("config");

/* --------------------------------------------------------------------------
   Constants
   -------------------------------------------------------------------------- */

/** Quiet window for autosave (ms). */
export const DEFAULT_SAVE_DEBOUNCE_MS = 500;

const LAYOUTS_DIR = "layouts";
const THEME_FILE = "theme.json";
const PROFILE_NAME = /^[A-Za-z0-9][\w.-]*$/;

/* --------------------------------------------------------------------------
   File system
   -------------------------------------------------------------------------- */

export const nodeFileSystem: LayoutFileSystem = {
  readFile: (filePath) => fs.readFile(filePath, "utf8"),
  writeFile: (filePath, data) => fs.writeFile(filePath, data, "utf8"),
  rename: (fromPath, toPath) => fs.rename(fromPath, toPath),
  mkdir: async (dirPath) => {
    await fs.mkdir(dirPath, { recursive: true });
  },
  readdir: (dirPath) => fs.readdir(dirPath),
  unlink: (filePath) => fs.unlink(filePath),
};

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/* --------------------------------------------------------------------------
   Theme file
   -------------------------------------------------------------------------- */

const options = z.record(z.unknown()).catch({});

const themeSchema = z
  .object({
    displayers: z
      .record(z.object({ style: options, config: options }).passthrough().catch({ style: {}, config: {} }))
      .catch({}),
  })
  .passthrough();

type ThemeDocument = z.infer<typeof themeSchema>;

/* --------------------------------------------------------------------------
   Store
   -------------------------------------------------------------------------- */

export interface ConfigStoreOptions {
  configDir: string;
  fs?: LayoutFileSystem;
  /** Autosave quiet window. Defaults to {@link DEFAULT_SAVE_DEBOUNCE_MS}. */
  debounceMs?: number;
}

interface PendingSave {
  timer: ReturnType<typeof setTimeout>;
  snapshot: () => LayoutDocument;
}

export class ConfigStore {
  readonly configDir: string;

  private readonly fs: LayoutFileSystem;
  private readonly debounceMs: number;
  private pending = new Map<string, PendingSave>();
  private queue: Promise<void> = Promise.resolve();
  private theme: ThemeDocument = { displayers: {} };
  private listeners = new Set<ConfigStoreListener>();

  constructor(options: ConfigStoreOptions) {
    this.configDir = options.configDir;
    this.fs = options.fs ?? nodeFileSystem;
    this.debounceMs = options.debounceMs ?? DEFAULT_SAVE_DEBOUNCE_MS;
  }

  /* -- Paths -------------------------------------------------------------- */

  get layoutsDir(): string {
    return path.join(this.configDir, LAYOUTS_DIR);
  }

  get themePath(): string {
    return path.join(this.configDir, THEME_FILE);
  }

  profilePath(name: string): string {
    if (!PROFILE_NAME.test(name)) {
      throw new ConfigValidationError("profile", [
        { key: "name", message: "Use letters, digits, '.', '_' or '-', starting with a letter or digit" },
      ]);
    }
    return path.join(this.layoutsDir, `${name}.json`);
  }

  /* -- Documents ---------------------------------------------------------- */

  /** Read a layout; `undefined` when the file does not exist. */
  async load(filePath: string): Promise<LayoutDocument | undefined> {
    let text: string;
    try {
      text = await this.fs.readFile(filePath);
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
    return deserializeLayout(text, filePath);
  }

  /** Queue a write of `doc` to `filePath`, replacing any pending autosave of that file. */
  save(filePath: string, doc: LayoutDocument): Promise<void> {
    this.cancelPending(filePath);
    return this.enqueue(filePath, () => serializeLayout(doc));
  }

  /** Resolves once every queued write has finished. */
  idle(): Promise<void> {
    return this.queue;
  }

  /* -- Profiles ----------------------------------------------------------- */

  loadProfile(name: string): Promise<LayoutDocument | undefined> {
    return this.load(this.profilePath(name));
  }

  saveProfile(name: string, doc: LayoutDocument): Promise<void> {
    return this.save(this.profilePath(name), doc);
  }

  /** Profile names, sorted. */
  async listProfiles(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await this.fs.readdir(this.layoutsDir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
    return entries
      .filter((entry) => entry.endsWith(".json"))
      .map((entry) => entry.slice(0, -".json".length))
      .filter((name) => PROFILE_NAME.test(name))
      .sort();
  }

  /** Remove a profile file. Returns `false` when it did not exist. */
  async deleteProfile(name: string): Promise<boolean> {
    const filePath = this.profilePath(name);
    this.cancelPending(filePath);
    await this.queue;
    try {
      await this.fs.unlink(filePath);
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  /* -- Import / export ---------------------------------------------------- */

  /** Read a layout from any path; a missing file is an error here. */
  async loadFile(filePath: string): Promise<LayoutDocument> {
    const doc = await this.load(filePath);
    if (!doc) throw new CorruptConfigError(filePath, "file not found");
    return doc;
  }

  saveFile(filePath: string, doc: LayoutDocument): Promise<void> {
    return this.save(filePath, doc);
  }

  /** Whether `filePath` holds a readable layout with a panel list. */
  async isValidLayoutFile(filePath: string): Promise<boolean> {
    let text: string;
    try {
      text = await this.fs.readFile(filePath);
    } catch (error) {
      if (!isNotFound(error)) log.warn(`Could not read ${filePath}: ${describeError(error)}`);
      return false;
    }
    try {
      const raw: unknown = JSON.parse(text);
      return isRecord(raw) && Array.isArray(raw.panels);
    } catch {
      return false;
    }
  }

  /* -- Autosave ----------------------------------------------------------- */

  /**
   * Write `snapshot()` to `filePath` once no further request for the same
   * file arrives within the quiet window. Failures are reported as `error`
   * events, never thrown.
   */
  scheduleSave(filePath: string, snapshot: () => LayoutDocument): void {
    const existing = this.pending.get(filePath);
    if (existing) clearTimeout(existing.timer);
    const timer = setTimeout(() => this.runPending(filePath), this.debounceMs);
    this.pending.set(filePath, { timer, snapshot });
  }

  hasPendingSaves(): boolean {
    return this.pending.size > 0;
  }

  /** Write every pending autosave now and wait for the queue to drain. */
  async flush(): Promise<void> {
    for (const filePath of Array.from(this.pending.keys())) this.runPending(filePath);
    await this.queue;
  }

  /** Drop pending autosaves without writing them. */
  cancelAll(): void {
    for (const { timer } of this.pending.values()) clearTimeout(timer);
    this.pending.clear();
  }

  /* -- Theme -------------------------------------------------------------- */

  /** Read `theme.json`. A missing or unreadable file leaves the theme empty. */
  async loadTheme(): Promise<void> {
    let text: string;
    try {
      text = await this.fs.readFile(this.themePath);
    } catch (error) {
      if (!isNotFound(error)) log.warn(`Could not read theme: ${describeError(error)}`);
      this.theme = { displayers: {} };
      return;
    }
    try {
      this.theme = themeSchema.parse(JSON.parse(text));
    } catch (error) {
      log.warn(`Ignoring unreadable theme at ${this.themePath}: ${describeError(error)}`);
      this.theme = { displayers: {} };
    }
  }

  /** Remembered defaults for new panels of a displayer type. */
  getDisplayerDefaults(displayerType: string): DisplayerDefaults {
    const entry = this.theme.displayers[displayerType];
    return entry ? { style: { ...entry.style }, config: { ...entry.config } } : { style: {}, config: {} };
  }

  saveDisplayerDefaults(displayerType: string, defaults: DisplayerDefaults): Promise<void> {
    this.theme = {
      ...this.theme,
      displayers: { ...this.theme.displayers, [displayerType]: { style: { ...defaults.style }, config: { ...defaults.config } } },
    };
    const theme = this.theme;
    return this.enqueue(this.themePath, () => `${JSON.stringify(theme, null, 2)}\n`);
  }

  /* -- Events ------------------------------------------------------------- */

  subscribe(listener: ConfigStoreListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /* -- Internals ---------------------------------------------------------- */

  private cancelPending(filePath: string): void {
    const existing = this.pending.get(filePath);
    if (!existing) return;
    clearTimeout(existing.timer);
    this.pending.delete(filePath);
  }

  private runPending(filePath: string): void {
    const entry = this.pending.get(filePath);
    if (!entry) return;
    clearTimeout(entry.timer);
    this.pending.delete(filePath);
    this.enqueue(filePath, () => serializeLayout(entry.snapshot())).catch((error: unknown) => {
      log.error(`Autosave to ${filePath} failed: ${describeError(error)}`);
      this.emit({ type: "error", path: filePath, error });
    });
  }

  /**
   * Append a write to the queue. `render` runs when the write starts, so
   * the text reflects the state at that moment.
   */
  private enqueue(filePath: string, render: () => string): Promise<void> {
    const run = this.queue.then(() => this.write(filePath, render()));
    // A failed write is reported through `run`; later writes still go ahead.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async write(filePath: string, text: string): Promise<void> {
    const tempPath = `${filePath}.tmp`;
    await this.fs.mkdir(path.dirname(filePath));
    await this.fs.writeFile(tempPath, text);
    await this.fs.rename(tempPath, filePath);
    log.debug(`Saved ${filePath}`);
    this.emit({ type: "saved", path: filePath });
  }

  private emit(event: ConfigStoreEvent): void {
    for (const listener of this.listeners) listener(event);
  }
}
