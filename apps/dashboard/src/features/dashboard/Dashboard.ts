/**
 * Composition root: one grid, panel registry, scheduler, interaction
 * controller and config store wired together around a module registry.
 *
 * Every committed change to the layout schedules an autosave of the active
 * profile. Persistence problems reach the user as `notice` events on the
 * event bus; autosave never throws.
 */

import { ConfigStore } from "@/features/config-store/ConfigStore";
import { emptyLayout } from "@/features/config-store/layoutSerializer";
import {
  CURRENT_LAYOUT_VERSION,
  DEFAULT_PROFILE,
  type LayoutDocument,
  type LayoutFileSystem,
  type PanelRecord,
} from "@/features/config-store/types";
import { GridModel } from "@/features/grid/GridModel";
import type { PlacementRect } from "@/features/grid/types";
import { InteractionController } from "@/features/interaction/InteractionController";
import { createBuiltinRegistry } from "@/features/modules/builtins";
import type { ModuleRegistry } from "@/features/modules/ModuleRegistry";
import type { ModuleConfig } from "@/features/modules/types";
import { PanelRegistry } from "@/features/panels/PanelRegistry";
import { parseStyle, reusableStyle } from "@/features/panels/style";
import type { Panel, PanelChanges, PanelStyle } from "@/features/panels/types";
import { UpdateScheduler } from "@/features/scheduler/UpdateScheduler";
import { emitEvent } from "@/hooks/useEventBus";
import { ConfigValidationError, describeError, isDashboardError } from "@/lib/errors";
import { createLogger, setLogLevel } from "@/lib/logger";
import { type DashboardSettings, loadSettings, resolveConfigDir } from "@/lib/settings";

import type { ApplyReport, NoticeLevel } from "./types";

const log = createLogger("dashboard");

/* --------------------------------------------------------------------------
   Types
   -------------------------------------------------------------------------- */

export interface DashboardOptions {
  /** Overrides applied on top of environment settings. */
  settings?: Partial<DashboardSettings>;
  env?: NodeJS.ProcessEnv;
  /** Defaults to the builtin sources and displayers. */
  modules?: ModuleRegistry;
  fs?: LayoutFileSystem;
  profile?: string;
  now?: () => number;
}

export interface CreatePanelRequest {
  /** Omit to use the source's default size at the first free spot. */
  rect?: PlacementRect;
  sourceType: string;
  sourceConfig?: ModuleConfig;
  displayerType: string;
  displayerConfig?: ModuleConfig;
  style?: Partial<PanelStyle>;
}

function withoutKeys(config: Record<string, unknown>, keys: ReadonlySet<string>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(config).filter(([key]) => !keys.has(key)));
}

/* --------------------------------------------------------------------------
   Dashboard
   -------------------------------------------------------------------------- */

export class Dashboard {
  readonly settings: DashboardSettings;
  readonly modules: ModuleRegistry;
  readonly grid: GridModel;
  readonly panels: PanelRegistry;
  readonly scheduler: UpdateScheduler;
  readonly interaction: InteractionController;
  readonly store: ConfigStore;

  private profile: string;
  private readonly now: () => number;
  /** Records whose module types this build does not provide. */
  private retained: PanelRecord[] = [];
  private documentExtra: Record<string, unknown> = {};
  private gridExtra: Record<string, unknown> = {};
  private applying = false;
  private hidden = false;
  private disposed = false;
  private readonly unsubscribers: Array<() => void> = [];

  constructor(options: DashboardOptions = {}) {
    this.settings = loadSettings(options.settings, options.env);
    setLogLevel(this.settings.logLevel);
    this.now = options.now ?? Date.now;
    this.profile = options.profile ?? DEFAULT_PROFILE;

    this.modules = options.modules ?? createBuiltinRegistry();
    this.store = new ConfigStore({
      configDir: resolveConfigDir(this.settings, options.env),
      fs: options.fs,
      debounceMs: this.settings.autosaveDebounceMs,
    });
    this.grid = new GridModel({ columns: this.settings.gridColumns, rows: this.settings.gridRows });
    this.scheduler = new UpdateScheduler({
      fetchTimeoutMs: this.settings.fetchTimeoutMs,
      deliver: (panelId, result) => this.panels.applyDelivery(panelId, result),
      now: this.now,
    });
    this.panels = new PanelRegistry({
      grid: this.grid,
      modules: this.modules,
      scheduler: this.scheduler,
      styleDefaults: (displayerType) => parseStyle(this.store.getDisplayerDefaults(displayerType).style),
    });
    this.interaction = new InteractionController({
      grid: this.grid,
      panels: this.panels,
      cellSize: this.settings.cellSizePx,
      handleSize: this.settings.handleSizePx,
    });

    this.unsubscribers.push(
      this.panels.subscribe((event) => {
        if (this.hidden && (event.type === "created" || event.type === "updated")) {
          this.panels.setPaused([event.panel.id], true);
        }
        if (event.type !== "runtime" && !this.applying) this.scheduleAutosave();
      }),
      this.store.subscribe((event) => {
        if (event.type === "saved") {
          emitEvent("saved", { profile: this.profileOf(event.path), path: event.path });
        } else {
          this.notify("error", `Could not save layout to ${event.path}: ${describeError(event.error)}`);
        }
      }),
    );
  }

  /* -- Accessors ---------------------------------------------------------- */

  get activeProfile(): string {
    return this.profile;
  }

  get cellSize(): number {
    return this.interaction.cellSizePx;
  }

  /* -- Startup ------------------------------------------------------------ */

  /** Read the theme file, then the active profile. */
  async open(): Promise<ApplyReport> {
    await this.store.loadTheme();
    return this.loadProfile(this.profile);
  }

  /* -- Panels ------------------------------------------------------------- */

  /** Create a panel; remembered displayer defaults sit under the given config and style. */
  createPanel(request: CreatePanelRequest): Readonly<Panel> {
    const defaults = this.store.getDisplayerDefaults(request.displayerType);
    return this.panels.createPanel(
      request.rect,
      request.sourceType,
      request.sourceConfig ?? {},
      request.displayerType,
      { ...defaults.config, ...request.displayerConfig },
      request.style,
    );
  }

  updatePanel(panelId: string, changes: PanelChanges): Readonly<Panel> {
    return this.panels.updatePanel(panelId, changes);
  }

  deletePanel(panelId: string): boolean {
    return this.panels.deletePanel(panelId);
  }

  /** Delete every selected panel; returns their ids. */
  deleteSelected(): string[] {
    const ids = this.panels.selection.toArray();
    for (const id of ids) this.panels.deletePanel(id);
    return ids;
  }

  copyStyle(fromId: string, toId: string): Readonly<Panel> {
    return this.panels.copyStyle(fromId, toId);
  }

  /** Remember a panel's style and displayer config as defaults for its displayer type. */
  async saveStyleAsDefault(panelId: string): Promise<void> {
    const panel = this.panels.getPanel(panelId);
    if (!panel) throw new Error(`Unknown panel ${panelId}`);
    await this.store.saveDisplayerDefaults(panel.displayerType, {
      style: reusableStyle(panel.style),
      config: { ...panel.displayerConfig },
    });
  }

  /* -- Documents ---------------------------------------------------------- */

  /** The live layout as a document, including records kept from the last load. */
  toDocument(): LayoutDocument {
    const { columns, rows } = this.grid.size;
    const records: PanelRecord[] = this.panels.listPanels().map((panel, index) => ({
      id: panel.id,
      placement: { ...panel.placement },
      zOrder: index,
      source: { type: panel.sourceType, config: { ...panel.sourceConfig } },
      displayer: { type: panel.displayerType, config: { ...panel.displayerConfig } },
      style: { ...panel.style },
    }));
    return {
      ...this.documentExtra,
      formatVersion: CURRENT_LAYOUT_VERSION,
      grid: { ...this.gridExtra, columns, rows, cellSize: this.cellSize },
      panels: [...records, ...this.retained.map((record, index) => ({ ...record, zOrder: records.length + index }))],
    };
  }

  /**
   * Replace the live layout with `doc`. Records are restored lowest z-order
   * first. A record whose module types are unknown is kept verbatim and
   * written back on save; one that cannot be placed is dropped.
   */
  applyDocument(doc: LayoutDocument): ApplyReport {
    const report: ApplyReport = { created: [], retained: [], dropped: [] };
    this.applying = true;
    try {
      this.interaction.dispatch({ type: "cancel" });
      this.panels.clear();
      this.retained = [];

      const { grid, panels, ...rest } = doc;
      const { columns, rows, cellSize, ...gridExtra } = grid;
      const documentExtra: Record<string, unknown> = { ...rest };
      delete documentExtra.formatVersion;
      this.documentExtra = documentExtra;
      this.gridExtra = gridExtra;
      this.grid.setSize({ columns, rows });
      this.interaction.setCellSize(cellSize);

      const ordered = [...panels].sort((a, b) => a.zOrder - b.zOrder);
      for (const record of ordered) this.restore(record, report);
    } finally {
      this.applying = false;
    }
    if (report.dropped.length > 0) {
      this.notify("warning", `${report.dropped.length} panel(s) could not be restored: ${report.dropped.join(", ")}`);
    }
    return report;
  }

  /* -- Profiles ----------------------------------------------------------- */

  /**
   * Load a profile and make it active. A corrupt file yields an empty
   * layout and a notice; the next save replaces the file.
   */
  async loadProfile(name: string): Promise<ApplyReport> {
    const profilePath = this.store.profilePath(name);
    await this.store.flush();
    let doc: LayoutDocument | undefined;
    try {
      doc = await this.store.loadProfile(name);
    } catch (error) {
      if (!isDashboardError(error, "CorruptConfig")) throw error;
      log.warn(error.message);
      this.notify("warning", `${error.message}. Starting with an empty layout.`);
    }
    this.profile = name;
    log.info(`Loaded profile "${name}" from ${profilePath}`);
    return this.applyDocument(
      doc ?? emptyLayout({ columns: this.settings.gridColumns, rows: this.settings.gridRows, cellSize: this.settings.cellSizePx }),
    );
  }

  /**
   * Write the live layout under a new name and make that profile active.
   * Pending saves of the current profile are written first.
   */
  async saveProfileAs(name: string): Promise<void> {
    await this.flush();
    await this.store.saveProfile(name, this.toDocument());
    this.profile = name;
  }

  /** Flush pending writes of the current profile, then load another. */
  async switchProfile(name: string): Promise<ApplyReport> {
    await this.flush();
    return this.loadProfile(name);
  }

  listProfiles(): Promise<string[]> {
    return this.store.listProfiles();
  }

  /** Write pending autosaves now. */
  flush(): Promise<void> {
    return this.store.flush();
  }

  /* -- Lifecycle ---------------------------------------------------------- */

  /** Pause polling while the dashboard is not visible. Panels added meanwhile start paused. */
  setVisible(visible: boolean): void {
    this.hidden = !visible;
    const ids = this.panels.listPanels().map((panel) => panel.id);
    if (visible) {
      this.scheduler.resumeAll();
      this.panels.setPaused(ids, false);
    } else {
      this.scheduler.pauseAll();
      this.panels.setPaused(ids, true);
    }
  }

  /** Flush pending saves, then stop every task and release every panel. */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await this.flush();
    this.applying = true;
    this.interaction.dispose();
    this.panels.clear();
    this.scheduler.dispose();
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
  }

  /* -- Internals ---------------------------------------------------------- */

  private restore(record: PanelRecord, report: ApplyReport): void {
    const { x, y, width, height } = record.placement;
    const attempt = (sourceConfig: ModuleConfig, displayerConfig: ModuleConfig) =>
      this.panels.restorePanel(
        record.id,
        { x, y, width, height },
        record.source.type,
        sourceConfig,
        record.displayer.type,
        displayerConfig,
        parseStyle(record.style),
      );

    try {
      try {
        report.created.push(attempt(record.source.config, record.displayer.config).id);
      } catch (error) {
        if (!(error instanceof ConfigValidationError)) throw error;
        const invalid = new Set(error.issues.map((issue) => issue.key));
        log.warn(`Resetting invalid options of ${record.id} to defaults: ${Array.from(invalid).join(", ")}`);
        report.created.push(
          attempt(withoutKeys(record.source.config, invalid), withoutKeys(record.displayer.config, invalid)).id,
        );
      }
    } catch (error) {
      if (isDashboardError(error, "UnknownType") || isDashboardError(error, "IncompatibleModule")) {
        log.warn(`Keeping ${record.id} as-is: ${error.message}`);
        this.retained.push(record);
        this.panels.reserveId(record.id);
        report.retained.push(record.id);
      } else if (isDashboardError(error)) {
        log.warn(`Dropped ${record.id}: ${error.message}`);
        report.dropped.push(record.id);
      } else {
        throw error;
      }
    }
  }

  private scheduleAutosave(): void {
    if (this.disposed) return;
    this.store.scheduleSave(this.store.profilePath(this.profile), () => this.toDocument());
  }

  private profileOf(filePath: string): string | undefined {
    const prefix = `${this.store.layoutsDir}/`;
    if (!filePath.startsWith(prefix) || !filePath.endsWith(".json")) return undefined;
    return filePath.slice(prefix.length, -".json".length);
  }

  private notify(level: NoticeLevel, message: string): void {
    emitEvent("notice", { level, message, at: this.now() });
  }
}

/** Build a dashboard from settings. Call `open()` to load the active profile. */
export function createDashboard(options: DashboardOptions = {}): Dashboard {
  return new Dashboard(options);
}
