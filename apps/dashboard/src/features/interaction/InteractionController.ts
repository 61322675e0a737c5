/**
 * Pointer gesture state machine for the dashboard grid.
 *
 * One `dispatch` entry point drives drag, copy-drag, resize and rubber-band
 * selection. Previews are validated against the grid but never written to
 * it; only a valid preview reaching pointer-up is committed, through
 * PanelRegistry, in a single transaction.
 */

import type { GridModel } from "@/features/grid/GridModel";
import { rectsEqual, translateRect } from "@/features/grid/geometry";
import type { PlacementRect, RectMap } from "@/features/grid/types";
import type { PanelRegistry } from "@/features/panels/PanelRegistry";
import type { Selection } from "@/features/panels/Selection";
import { isDashboardError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

import { boxFromCorners, boxIntersects, cellOffset, containsPoint, detectHandle, resizeRect, toPixelRect } from "./snap";
import type {
  DragOperation,
  GestureOutcome,
  InteractionEvent,
  InteractionState,
  Modifiers,
  PointerPosition,
  Preview,
} from "./types";

const log = createLogger("interaction");

const IDLE: InteractionState = { kind: "idle" };

export interface InteractionControllerOptions {
  grid: GridModel;
  panels: PanelRegistry;
  /** Pixels per grid cell. */
  cellSize: number;
  /** Width in pixels of the resize band along a panel's right and bottom edges. */
  handleSize: number;
}

export type InteractionListener = (state: InteractionState) => void;

export class InteractionController {
  private readonly grid: GridModel;
  private readonly panels: PanelRegistry;
  private readonly selection: Selection;
  private cellSize: number;
  private readonly handleSize: number;

  private current: InteractionState = IDLE;
  private listeners = new Set<InteractionListener>();
  private readonly unsubscribePanels: () => void;

  constructor(options: InteractionControllerOptions) {
    this.grid = options.grid;
    this.panels = options.panels;
    this.selection = options.panels.selection;
    this.cellSize = options.cellSize;
    this.handleSize = options.handleSize;

    this.unsubscribePanels = this.panels.subscribe((event) => {
      if (event.type === "cleared" || (event.type === "deleted" && this.involves(event.panelId))) {
        this.dispatch({ type: "cancel" });
      }
    });
  }

  /* -- Public API --------------------------------------------------------- */

  get state(): InteractionState {
    return this.current;
  }

  /** The gesture in progress, if any. */
  operation(): DragOperation | undefined {
    const state = this.current;
    switch (state.kind) {
      case "idle":
        return undefined;
      case "dragging":
        return {
          kind: state.copy ? "copy" : "move",
          panelIds: state.panelIds,
          originPointer: state.originPointer,
          previewRects: state.preview.rects,
          valid: state.preview.valid,
        };
      case "resizing":
        return {
          kind: "resize",
          panelIds: [state.panelId],
          originPointer: state.originPointer,
          previewRects: state.preview.rects,
          valid: state.preview.valid,
        };
      case "selectingBox":
        return {
          kind: "selectBox",
          panelIds: state.hits,
          originPointer: state.originPointer,
          previewRects: new Map(),
          valid: true,
        };
    }
  }

  /** Feed one UI event through the state machine. */
  dispatch(event: InteractionEvent): GestureOutcome {
    switch (event.type) {
      case "pointerDown":
        return this.pointerDown(event, { add: false, copy: false, ...event.modifiers });
      case "pointerMove":
        this.pointerMove(event);
        return { type: "none" };
      case "pointerUp":
        return this.pointerUp(event);
      case "cancel":
        return this.cancel();
    }
  }

  get cellSizePx(): number {
    return this.cellSize;
  }

  /** Change the pixel size of a cell. Any gesture in progress is cancelled. */
  setCellSize(cellSize: number): void {
    this.dispatch({ type: "cancel" });
    this.cellSize = cellSize;
  }

  subscribe(listener: InteractionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  dispose(): void {
    this.unsubscribePanels();
    this.listeners.clear();
    this.current = IDLE;
  }

  /** Topmost panel under a pixel position. */
  panelAt(point: PointerPosition): string | undefined {
    const ordered = this.panels.listPanels();
    for (let i = ordered.length - 1; i >= 0; i--) {
      const panel = ordered[i];
      if (containsPoint(toPixelRect(panel.placement, this.cellSize), point)) return panel.id;
    }
    return undefined;
  }

  /* -- Transitions -------------------------------------------------------- */

  private pointerDown(point: PointerPosition, modifiers: Modifiers): GestureOutcome {
    if (this.current.kind !== "idle") return { type: "none" };
    const originPointer = { x: point.x, y: point.y };

    const single = this.selection.single();
    if (single && !modifiers.add && !modifiers.copy) {
      const rect = this.panels.getPanel(single)?.placement;
      const handle = rect ? detectHandle(toPixelRect(rect, this.cellSize), point, this.handleSize) : undefined;
      if (rect && handle) {
        this.setState({
          kind: "resizing",
          panelId: single,
          handle,
          originPointer,
          originRect: { ...rect },
          preview: { rects: new Map([[single, { ...rect }]]), valid: true, changed: false },
        });
        return { type: "none" };
      }
    }

    const hit = this.panelAt(point);
    if (hit === undefined) {
      const prior = this.selection.toArray();
      if (!modifiers.add) this.selection.clear();
      this.setState({
        kind: "selectingBox",
        originPointer,
        currentPointer: originPointer,
        additive: modifiers.add,
        prior,
        hits: [],
      });
      return { type: "none" };
    }

    if (modifiers.add) {
      this.selection.add([hit]);
    } else if (!this.selection.has(hit)) {
      this.selection.replace([hit]);
    }
    const panelIds = this.selection.toArray();
    const originRects = this.panels.placementsOf(panelIds);
    this.setState({
      kind: "dragging",
      panelIds,
      originPointer,
      originRects,
      copy: modifiers.copy,
      preview: { rects: originRects, valid: true, changed: false },
    });
    return { type: "none" };
  }

  private pointerMove(point: PointerPosition): void {
    const state = this.current;
    switch (state.kind) {
      case "idle":
        return;
      case "dragging": {
        const dx = cellOffset(point.x - state.originPointer.x, this.cellSize);
        const dy = cellOffset(point.y - state.originPointer.y, this.cellSize);
        const rects = new Map<string, PlacementRect>();
        for (const [id, rect] of state.originRects) rects.set(id, translateRect(rect, dx, dy));
        const exclude = state.copy ? undefined : new Set(state.panelIds);
        this.setState({ ...state, preview: this.preview(rects, dx !== 0 || dy !== 0, exclude) });
        return;
      }
      case "resizing": {
        const dx = cellOffset(point.x - state.originPointer.x, this.cellSize);
        const dy = cellOffset(point.y - state.originPointer.y, this.cellSize);
        const rect = resizeRect(state.originRect, state.handle, dx, dy, this.grid.size);
        const preview = this.preview(new Map([[state.panelId, rect]]), !rectsEqual(rect, state.originRect), state.panelId);
        this.setState({ ...state, preview });
        return;
      }
      case "selectingBox": {
        const currentPointer = { x: point.x, y: point.y };
        const box = boxFromCorners(state.originPointer, currentPointer);
        const hits = this.panels
          .listPanels()
          .filter((panel) => boxIntersects(box, toPixelRect(panel.placement, this.cellSize)))
          .map((panel) => panel.id);
        this.setState({ ...state, currentPointer, hits });
        return;
      }
    }
  }

  private pointerUp(point: PointerPosition): GestureOutcome {
    this.pointerMove(point);
    const state = this.current;
    this.setState(IDLE);

    switch (state.kind) {
      case "idle":
        return { type: "none" };
      case "selectingBox": {
        const ids = state.additive ? [...state.prior, ...state.hits] : state.hits;
        this.selection.replace(ids);
        return { type: "selected", panelIds: this.selection.toArray() };
      }
      case "dragging":
        return this.commit(state.preview, state.copy ? "copy" : "move");
      case "resizing":
        return this.commit(state.preview, "resize");
    }
  }

  private cancel(): GestureOutcome {
    const state = this.current;
    if (state.kind === "idle") return { type: "none" };
    if (state.kind === "selectingBox") {
      this.selection.replace(state.prior.filter((id) => this.panels.has(id)));
    }
    this.setState(IDLE);
    return { type: "cancelled" };
  }

  /* -- Internals ---------------------------------------------------------- */

  private preview(rects: RectMap, changed: boolean, exclude: ReadonlySet<string> | string | undefined): Preview {
    return { rects, changed, valid: this.grid.canPlaceAll(rects, exclude) };
  }

  private commit(preview: Preview, kind: "move" | "copy" | "resize"): GestureOutcome {
    if (!preview.changed) return { type: "none" };
    if (!preview.valid) return { type: "reverted", reason: "Target cells are occupied or off the grid" };
    try {
      if (kind === "copy") {
        const copies = this.panels.duplicatePanels(preview.rects);
        this.selection.replace(copies);
        return { type: "committed", kind, panelIds: copies };
      }
      this.panels.commitPlacements(preview.rects, { promote: true });
      return { type: "committed", kind, panelIds: Array.from(preview.rects.keys()) };
    } catch (error) {
      if (!isDashboardError(error, "PlacementConflict")) throw error;
      log.warn(`Reverted ${kind}: ${error.message}`);
      return { type: "reverted", reason: error.message };
    }
  }

  private involves(panelId: string): boolean {
    const state = this.current;
    switch (state.kind) {
      case "dragging":
        return state.panelIds.includes(panelId);
      case "resizing":
        return state.panelId === panelId;
      case "selectingBox":
        return state.hits.includes(panelId) || state.prior.includes(panelId);
      case "idle":
        return false;
    }
  }

  private setState(state: InteractionState): void {
    this.current = state;
    for (const listener of this.listeners) listener(state);
  }
}
