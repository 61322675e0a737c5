/**
 * Zustand store mirroring dashboard state for the UI.
 *
 * The dashboard stays the owner of every panel; this store only holds
 * render-ready snapshots. `bindDashboardStore` keeps it in sync.
 */

import { create, type StoreApi } from "zustand";

import { boxFromCorners } from "@/features/interaction/snap";
import type { DragOperation, InteractionState, PixelRect } from "@/features/interaction/types";
import type { Panel, PanelRuntime } from "@/features/panels/types";
import { onEvent } from "@/hooks/useEventBus";

import type { Dashboard } from "./Dashboard";
import type { Notice, PanelView } from "./types";

/* --------------------------------------------------------------------------
   Types
   -------------------------------------------------------------------------- */

interface DashboardState {
  /** Panels in z-order, bottom first. */
  panels: PanelView[];
  selection: string[];
  /** Gesture in progress, for drawing preview outlines. */
  preview: DragOperation | undefined;
  /** Rubber-band rectangle while box-selecting. */
  selectionBox: PixelRect | undefined;
  runtime: Record<string, PanelRuntime>;
  /** Most recent notices, oldest first. */
  notices: Notice[];
  profile: string;
}

interface DashboardActions {
  setPanels: (panels: PanelView[], runtime: Record<string, PanelRuntime>) => void;
  setRuntime: (panelId: string, runtime: PanelRuntime) => void;
  setSelection: (selection: string[]) => void;
  setInteraction: (preview: DragOperation | undefined, selectionBox: PixelRect | undefined) => void;
  pushNotice: (notice: Notice) => void;
  dismissNotice: (at: number) => void;
  setProfile: (profile: string) => void;
  reset: () => void;
}

export type DashboardStore = DashboardState & DashboardActions;

/* --------------------------------------------------------------------------
   Initial state
   -------------------------------------------------------------------------- */

export const MAX_NOTICES = 20;

const INITIAL_STATE: DashboardState = {
  panels: [],
  selection: [],
  preview: undefined,
  selectionBox: undefined,
  runtime: {},
  notices: [],
  profile: "",
};

/* --------------------------------------------------------------------------
   Store
   -------------------------------------------------------------------------- */

export const useDashboardStore = create<DashboardStore>((set) => ({
  ...INITIAL_STATE,

  setPanels: (panels, runtime) => set({ panels, runtime }),

  setRuntime: (panelId, runtime) =>
    set((state) => ({
      runtime: { ...state.runtime, [panelId]: runtime },
    })),

  setSelection: (selection) => set({ selection }),

  setInteraction: (preview, selectionBox) => set({ preview, selectionBox }),

  pushNotice: (notice) =>
    set((state) => ({
      notices: [...state.notices, notice].slice(-MAX_NOTICES),
    })),

  dismissNotice: (at) =>
    set((state) => ({
      notices: state.notices.filter((n) => n.at !== at),
    })),

  setProfile: (profile) => set({ profile }),

  reset: () => set({ ...INITIAL_STATE }),
}));

/** Select one panel's runtime record. */
export function usePanelRuntime(panelId: string): PanelRuntime | undefined {
  return useDashboardStore((state) => state.runtime[panelId]);
}

/* --------------------------------------------------------------------------
   Binding
   -------------------------------------------------------------------------- */

export function toPanelView(panel: Readonly<Panel>): PanelView {
  return {
    id: panel.id,
    placement: { ...panel.placement },
    zOrder: panel.zOrder,
    sourceType: panel.sourceType,
    displayerType: panel.displayerType,
    style: { ...panel.style },
  };
}

function selectionBoxOf(state: InteractionState): PixelRect | undefined {
  return state.kind === "selectingBox" ? boxFromCorners(state.originPointer, state.currentPointer) : undefined;
}

/**
 * Mirror `dashboard` into `store` until the returned function is called.
 * The store is filled immediately.
 */
export function bindDashboardStore(
  dashboard: Dashboard,
  store: StoreApi<DashboardStore> = useDashboardStore,
): () => void {
  const syncPanels = () => {
    const panels = dashboard.panels.listPanels();
    store.getState().setPanels(
      panels.map(toPanelView),
      Object.fromEntries(panels.map((panel) => [panel.id, panel.runtime])),
    );
  };

  syncPanels();
  store.getState().setSelection(dashboard.panels.selection.toArray());
  store.getState().setInteraction(dashboard.interaction.operation(), selectionBoxOf(dashboard.interaction.state));
  store.getState().setProfile(dashboard.activeProfile);

  const unsubscribers = [
    dashboard.panels.subscribe((event) => {
      if (event.type === "runtime") {
        store.getState().setRuntime(event.panelId, event.runtime);
      } else {
        syncPanels();
        store.getState().setProfile(dashboard.activeProfile);
      }
    }),
    dashboard.panels.selection.subscribe((selected) => store.getState().setSelection(selected)),
    dashboard.interaction.subscribe((state) =>
      store.getState().setInteraction(dashboard.interaction.operation(), selectionBoxOf(state)),
    ),
    onEvent("notice", (notice) => store.getState().pushNotice(notice)),
    onEvent("saved", (event) => {
      if (event.profile !== undefined) store.getState().setProfile(event.profile);
    }),
  ];

  return () => {
    for (const unsubscribe of unsubscribers) unsubscribe();
  };
}
