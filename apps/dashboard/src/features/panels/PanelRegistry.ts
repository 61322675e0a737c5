/**
 * Owner of every live panel.
 *
 * Creation, reconfiguration and deletion go through here so that the grid,
 * the module instances and the poll tasks never disagree. A call that fails
 * leaves no trace: nothing is placed, registered or allocated.
 */

import type { GridModel } from "@/features/grid/GridModel";
import type { PlacementRect, RectMap } from "@/features/grid/types";
import { DEFAULT_UPDATE_INTERVAL_SECONDS, numberOption } from "@/features/modules/configSchema";
import type { ModuleRegistry } from "@/features/modules/ModuleRegistry";
import type { Displayer, ModuleConfig, Source } from "@/features/modules/types";
import { PlacementConflictError, describeError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

import { isAlarmed } from "./alarm";
import { Selection } from "./Selection";
import {
  DEFAULT_PANEL_SIZE,
  DEFAULT_PANEL_STYLE,
  type DeliveryResult,
  type Panel,
  type PanelChanges,
  type PanelEvent,
  type PanelListener,
  type PanelStyle,
} from "./types";

const log = createLogger("panels");

/* --------------------------------------------------------------------------
   Collaborators
   -------------------------------------------------------------------------- */

/** The part of the update scheduler the registry drives. */
export interface PollScheduler {
  register(panelId: string, source: Source, intervalMs: number): void;
  unregister(panelId: string): void;
}

export interface PanelRegistryOptions {
  grid: GridModel;
  modules: ModuleRegistry;
  scheduler: PollScheduler;
  selection?: Selection;
  /** Per-displayer style defaults merged under each new panel's style. */
  styleDefaults?: (displayerType: string) => Partial<PanelStyle>;
}

interface Instances {
  sourceType: string;
  sourceConfig: ModuleConfig;
  source: Source;
  displayerType: string;
  displayerConfig: ModuleConfig;
  displayer: Displayer;
}

/** Poll interval in milliseconds from a resolved source config. */
export function pollIntervalMs(sourceConfig: ModuleConfig): number {
  return Math.round(numberOption(sourceConfig, "updateIntervalSeconds", DEFAULT_UPDATE_INTERVAL_SECONDS) * 1000);
}

function closeQuietly(target: { close?(): void }, panelId: string): void {
  try {
    target.close?.();
  } catch (error) {
    log.warn(`Closing a module of ${panelId} failed: ${describeError(error)}`);
  }
}

/* --------------------------------------------------------------------------
   Registry
   -------------------------------------------------------------------------- */

export class PanelRegistry {
  readonly selection: Selection;

  private readonly grid: GridModel;
  private readonly modules: ModuleRegistry;
  private readonly scheduler: PollScheduler;
  private readonly styleDefaults: (displayerType: string) => Partial<PanelStyle>;

  private panels = new Map<string, Panel>();
  private listeners = new Set<PanelListener>();
  private seq = 0;
  private nextZ = 0;

  constructor(options: PanelRegistryOptions) {
    this.grid = options.grid;
    this.modules = options.modules;
    this.scheduler = options.scheduler;
    this.selection = options.selection ?? new Selection();
    this.styleDefaults = options.styleDefaults ?? (() => ({}));
  }

  /* -- Queries ------------------------------------------------------------ */

  getPanel(id: string): Readonly<Panel> | undefined {
    return this.panels.get(id);
  }

  has(id: string): boolean {
    return this.panels.has(id);
  }

  get size(): number {
    return this.panels.size;
  }

  /** Every panel, lowest z-order first. */
  listPanels(): Readonly<Panel>[] {
    return Array.from(this.panels.values()).sort((a, b) => a.zOrder - b.zOrder);
  }

  /** Current rects of the given panels; unknown ids are skipped. */
  placementsOf(ids: Iterable<string>): Map<string, PlacementRect> {
    const rects = new Map<string, PlacementRect>();
    for (const id of ids) {
      const panel = this.panels.get(id);
      if (panel) rects.set(id, { ...panel.placement });
    }
    return rects;
  }

  /* -- Lifecycle ---------------------------------------------------------- */

  /**
   * Create a panel. Without a rect, the source's default size is placed at
   * the first free spot.
   */
  createPanel(
    rect: PlacementRect | undefined,
    sourceType: string,
    sourceConfig: ModuleConfig,
    displayerType: string,
    displayerConfig: ModuleConfig,
    style: Partial<PanelStyle> = {},
  ): Readonly<Panel> {
    return this.build(undefined, rect, sourceType, sourceConfig, displayerType, displayerConfig, style);
  }

  /**
   * Recreate a persisted panel under its saved id. An id that is already
   * live gets a fresh one instead.
   */
  restorePanel(
    id: string,
    rect: PlacementRect,
    sourceType: string,
    sourceConfig: ModuleConfig,
    displayerType: string,
    displayerConfig: ModuleConfig,
    style: Partial<PanelStyle> = {},
  ): Readonly<Panel> {
    if (this.panels.has(id)) {
      log.warn(`Panel id ${id} is already in use; restoring under a new id`);
      return this.build(undefined, rect, sourceType, sourceConfig, displayerType, displayerConfig, style);
    }
    this.reserveId(id);
    return this.build(id, rect, sourceType, sourceConfig, displayerType, displayerConfig, style);
  }

  /** Keep generated ids clear of `id`, e.g. for a record held outside the registry. */
  reserveId(id: string): void {
    const match = /^panel_(\d+)$/.exec(id);
    if (match) this.seq = Math.max(this.seq, Number(match[1]));
  }

  /**
   * Replace a panel's source, displayer or style. Placement is untouched.
   * A new source restarts the poll task and clears any error state.
   */
  updatePanel(id: string, changes: PanelChanges): Readonly<Panel> {
    const panel = this.require(id);
    const sourceType = changes.sourceType ?? panel.sourceType;
    const displayerType = changes.displayerType ?? panel.displayerType;
    const sourceChanged = changes.sourceType !== undefined || changes.sourceConfig !== undefined;
    const displayerChanged = changes.displayerType !== undefined || changes.displayerConfig !== undefined;

    if (sourceChanged || displayerChanged) {
      this.modules.assertCompatible(sourceType, displayerType);
    }

    const sourceConfig = sourceChanged
      ? this.modules.resolveConfig(
          "source",
          sourceType,
          changes.sourceConfig ?? (sourceType === panel.sourceType ? panel.sourceConfig : {}),
        )
      : panel.sourceConfig;
    const displayerConfig = displayerChanged
      ? this.modules.resolveConfig(
          "displayer",
          displayerType,
          changes.displayerConfig ?? (displayerType === panel.displayerType ? panel.displayerConfig : {}),
        )
      : panel.displayerConfig;

    const source = sourceChanged ? this.modules.createSource(sourceType, sourceConfig) : panel.source;
    let displayer: Displayer;
    try {
      displayer = displayerChanged ? this.modules.createDisplayer(displayerType, displayerConfig) : panel.displayer;
    } catch (error) {
      if (sourceChanged) closeQuietly(source, id);
      throw error;
    }

    if (displayerChanged) {
      closeQuietly(panel.displayer, id);
      panel.displayer = displayer;
      panel.displayerType = displayerType;
      panel.displayerConfig = displayerConfig;
      if (!sourceChanged && panel.runtime.value) displayer.update?.(panel.runtime.value);
    }
    if (sourceChanged) {
      if (!displayerChanged) panel.displayer.reset?.();
      this.scheduler.unregister(id);
      closeQuietly(panel.source, id);
      panel.source = source;
      panel.sourceType = sourceType;
      panel.sourceConfig = sourceConfig;
      panel.runtime = { status: "pending", inAlarm: false };
      this.scheduler.register(id, source, pollIntervalMs(sourceConfig));
    }
    if (changes.style) {
      panel.style = { ...panel.style, ...changes.style };
    }

    this.emit({ type: "updated", panel });
    return panel;
  }

  /** Stop the poll task, free the cells and close the module instances. */
  deletePanel(id: string): boolean {
    const panel = this.panels.get(id);
    if (!panel) return false;
    this.scheduler.unregister(id);
    this.grid.release(id);
    this.selection.remove(id);
    this.panels.delete(id);
    closeQuietly(panel.source, id);
    closeQuietly(panel.displayer, id);
    this.emit({ type: "deleted", panelId: id });
    return true;
  }

  /** Delete every panel. Ids keep counting up. */
  clear(): void {
    for (const [id, panel] of this.panels) {
      this.scheduler.unregister(id);
      closeQuietly(panel.source, id);
      closeQuietly(panel.displayer, id);
    }
    this.panels.clear();
    this.grid.clear();
    this.selection.clear();
    this.emit({ type: "cleared" });
  }

  /* -- Placement ---------------------------------------------------------- */

  /**
   * Commit new rects for existing panels in one grid transaction, then
   * (by default) raise them to the top z-order.
   */
  commitPlacements(rects: RectMap, options: { promote?: boolean } = {}): void {
    if (rects.size === 0) return;
    for (const id of rects.keys()) this.require(id);
    this.grid.moveMany(rects);
    for (const [id, rect] of rects) this.require(id).placement = { ...rect };
    if (options.promote ?? true) this.raise(rects.keys());
    this.emit({ type: "placed", panelIds: Array.from(rects.keys()) });
  }

  /**
   * Copy panels to new rects (source panel id → rect). The copies share the
   * originals' types, configs and style and get fresh ids. Returns the new
   * ids in the order of `rects`.
   */
  duplicatePanels(rects: RectMap): string[] {
    if (rects.size === 0) return [];
    const originals = Array.from(rects.keys()).map((id) => this.require(id));
    this.grid.assertGroupPlaceable(rects);

    const created: Instances[] = [];
    try {
      for (const original of originals) {
        created.push(
          this.instantiate(original.sourceType, original.sourceConfig, original.displayerType, original.displayerConfig),
        );
      }
    } catch (error) {
      for (const instances of created) {
        closeQuietly(instances.source, "copy");
        closeQuietly(instances.displayer, "copy");
      }
      throw error;
    }

    const ids: string[] = [];
    const ordered = originals
      .map((original, index) => ({ original, instances: created[index] }))
      .sort((a, b) => a.original.zOrder - b.original.zOrder);
    const byOriginal = new Map<string, string>();
    for (const { original, instances } of ordered) {
      const rect = rects.get(original.id);
      if (!rect) continue;
      const copy = this.insert(rect, instances, { ...original.style });
      byOriginal.set(original.id, copy.id);
      this.emit({ type: "created", panel: copy });
    }
    for (const original of originals) {
      const id = byOriginal.get(original.id);
      if (id) ids.push(id);
    }
    return ids;
  }

  /** Raise panels to the top, keeping their relative order. */
  bringToFront(ids: Iterable<string>): void {
    const known = Array.from(ids).filter((id) => this.panels.has(id));
    if (known.length === 0) return;
    this.raise(known);
    this.emit({ type: "placed", panelIds: known });
  }

  /* -- Styling ------------------------------------------------------------ */

  /**
   * Copy one panel's style onto another, keeping the target's title. When
   * both use the same displayer type the displayer config is copied too.
   */
  copyStyle(fromId: string, toId: string): Readonly<Panel> {
    const from = this.require(fromId);
    const to = this.require(toId);
    const style = { ...from.style, title: to.style.title };
    if (from.displayerType === to.displayerType) {
      return this.updatePanel(toId, { style, displayerConfig: { ...from.displayerConfig } });
    }
    return this.updatePanel(toId, { style });
  }

  /* -- Runtime ------------------------------------------------------------ */

  /** Apply one poll outcome. Results for deleted panels are ignored. */
  applyDelivery(id: string, result: DeliveryResult): void {
    const panel = this.panels.get(id);
    if (!panel) return;
    const paused = panel.runtime.status === "paused";

    if (result.ok) {
      panel.runtime = {
        status: paused ? "paused" : "ok",
        value: result.value,
        inAlarm: isAlarmed(panel.sourceConfig, result.value),
        updatedAt: result.at,
      };
      panel.displayer.update?.(result.value);
    } else {
      panel.runtime = {
        status: paused ? "paused" : "error",
        value: panel.runtime.value,
        error: result.error.message,
        errorSeverity: result.error.severity,
        inAlarm: false,
        updatedAt: result.at,
      };
    }
    this.emit({ type: "runtime", panelId: id, runtime: panel.runtime });
  }

  /** Flag panels as paused (or back to their last state) while polling is suspended. */
  setPaused(ids: Iterable<string>, paused: boolean): void {
    for (const id of ids) {
      const panel = this.panels.get(id);
      if (!panel) continue;
      const { runtime } = panel;
      if (paused && runtime.status !== "paused") {
        panel.runtime = { ...runtime, status: "paused" };
      } else if (!paused && runtime.status === "paused") {
        panel.runtime = { ...runtime, status: runtime.error ? "error" : runtime.value ? "ok" : "pending" };
      } else {
        continue;
      }
      this.emit({ type: "runtime", panelId: id, runtime: panel.runtime });
    }
  }

  /* -- Subscription ------------------------------------------------------- */

  subscribe(listener: PanelListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /* -- Internals ---------------------------------------------------------- */

  private build(
    id: string | undefined,
    rect: PlacementRect | undefined,
    sourceType: string,
    sourceConfig: ModuleConfig,
    displayerType: string,
    displayerConfig: ModuleConfig,
    style: Partial<PanelStyle>,
  ): Panel {
    this.modules.assertCompatible(sourceType, displayerType);
    const resolvedSource = this.modules.resolveConfig("source", sourceType, sourceConfig);
    const resolvedDisplayer = this.modules.resolveConfig("displayer", displayerType, displayerConfig);

    const placement = rect ?? this.defaultPlacement(sourceType);
    this.grid.assertPlaceable(id ?? "new panel", placement);

    const instances = this.instantiate(sourceType, resolvedSource, displayerType, resolvedDisplayer);
    const merged: PanelStyle = { ...DEFAULT_PANEL_STYLE, ...this.styleDefaults(displayerType), ...style };
    const panel = this.insert(placement, instances, merged, id);
    this.emit({ type: "created", panel });
    return panel;
  }

  private emit(event: PanelEvent): void {
    for (const listener of this.listeners) listener(event);
  }

  private require(id: string): Panel {
    const panel = this.panels.get(id);
    if (!panel) throw new Error(`Unknown panel ${id}`);
    return panel;
  }

  private defaultPlacement(sourceType: string): PlacementRect {
    const { width, height } = this.modules.requireSource(sourceType).defaultSize ?? DEFAULT_PANEL_SIZE;
    const rect = this.grid.findFreeRect(width, height);
    if (!rect) {
      throw new PlacementConflictError(`No free space for a ${width}×${height} panel`);
    }
    return rect;
  }

  private instantiate(
    sourceType: string,
    sourceConfig: ModuleConfig,
    displayerType: string,
    displayerConfig: ModuleConfig,
  ): Instances {
    const source = this.modules.createSource(sourceType, sourceConfig);
    try {
      const displayer = this.modules.createDisplayer(displayerType, displayerConfig);
      return { sourceType, sourceConfig, source, displayerType, displayerConfig, displayer };
    } catch (error) {
      closeQuietly(source, "new panel");
      throw error;
    }
  }

  /** Allocate an id, occupy the grid and start polling. Placement must be validated. */
  private insert(placement: PlacementRect, instances: Instances, style: PanelStyle, requestedId?: string): Panel {
    const id = requestedId ?? `panel_${++this.seq}`;
    this.grid.place(id, placement);
    const panel: Panel = {
      id,
      placement: { ...placement },
      zOrder: ++this.nextZ,
      ...instances,
      style,
      runtime: { status: "pending", inAlarm: false },
    };
    this.panels.set(id, panel);
    this.scheduler.register(id, instances.source, pollIntervalMs(instances.sourceConfig));
    log.debug(`Created ${id} (${instances.sourceType} → ${instances.displayerType})`);
    return panel;
  }

  private raise(ids: Iterable<string>): void {
    const panels = Array.from(ids, (id) => this.require(id)).sort((a, b) => a.zOrder - b.zOrder);
    for (const panel of panels) panel.zOrder = ++this.nextZ;
  }
}
