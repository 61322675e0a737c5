// @vitest-environment jsdom
/**
 * Tests for the dashboard store binding and its React hooks.
 */

import { act, cleanup, renderHook } from "@testing-library/react";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { emitEvent, useEventBus } from "@/hooks/useEventBus";
import { MemoryFileSystem, createTestRegistry } from "@/lib/test-utils";

import { type Dashboard, createDashboard } from "../Dashboard";
import type { Notice } from "../types";
import { useDashboardConnector } from "../useDashboardConnector";
import { MAX_NOTICES, bindDashboardStore, useDashboardStore, usePanelRuntime } from "../useDashboardStore";
import { useVisibilityPause } from "../useVisibilityPause";

/* --------------------------------------------------------------------------
   Helpers
   -------------------------------------------------------------------------- */

function makeDashboard(): Dashboard {
  return createDashboard({
    settings: { configDir: "/cfg", gridColumns: 10, gridRows: 10, logLevel: "silent" },
    env: {},
    modules: createTestRegistry(),
    fs: new MemoryFileSystem(),
    now: () => 1000,
  });
}

function panelIds(): string[] {
  return useDashboardStore.getState().panels.map((panel) => panel.id);
}

function setVisibility(state: DocumentVisibilityState) {
  Object.defineProperty(document, "visibilityState", { configurable: true, get: () => state });
  document.dispatchEvent(new Event("visibilitychange"));
}

/* --------------------------------------------------------------------------
   Tests
   -------------------------------------------------------------------------- */

describe("bindDashboardStore", () => {
  let dashboard: Dashboard;
  let unbind: () => void;

  beforeEach(() => {
    vi.useFakeTimers();
    useDashboardStore.getState().reset();
    dashboard = makeDashboard();
    unbind = () => undefined;
  });

  afterEach(async () => {
    unbind();
    await dashboard.dispose();
    vi.useRealTimers();
  });

  it("fills the store at once and follows panel changes until unbound", () => {
    dashboard.createPanel({ rect: { x: 0, y: 0, width: 2, height: 2 }, sourceType: "cpu", displayerType: "text" });
    unbind = bindDashboardStore(dashboard);

    expect(panelIds()).toEqual(["panel_1"]);
    expect(useDashboardStore.getState().profile).toBe("default");
    expect(useDashboardStore.getState().runtime.panel_1).toEqual({ status: "pending", inAlarm: false });

    dashboard.createPanel({ rect: { x: 2, y: 0, width: 2, height: 2 }, sourceType: "cpu", displayerType: "text" });
    dashboard.deletePanel("panel_1");
    expect(panelIds()).toEqual(["panel_2"]);

    unbind();
    unbind = () => undefined;
    dashboard.deletePanel("panel_2");
    expect(panelIds()).toEqual(["panel_2"]);
  });

  it("records runtime updates per panel", async () => {
    unbind = bindDashboardStore(dashboard);
    dashboard.createPanel({ sourceType: "cpu", displayerType: "text" });

    await vi.advanceTimersByTimeAsync(1);

    expect(useDashboardStore.getState().runtime.panel_1?.status).toBe("ok");
  });

  it("mirrors the selection box and the resulting selection", () => {
    dashboard.createPanel({ rect: { x: 0, y: 0, width: 2, height: 2 }, sourceType: "cpu", displayerType: "text" });
    unbind = bindDashboardStore(dashboard);

    dashboard.interaction.dispatch({ type: "pointerDown", x: 100, y: 100 });
    dashboard.interaction.dispatch({ type: "pointerMove", x: 10, y: 10 });

    const state = useDashboardStore.getState();
    expect(state.selectionBox).toEqual({ left: 10, top: 10, width: 90, height: 90 });
    expect(state.preview?.kind).toBe("selectBox");
    expect(state.preview?.panelIds).toEqual(["panel_1"]);

    dashboard.interaction.dispatch({ type: "pointerUp", x: 10, y: 10 });
    expect(useDashboardStore.getState().selectionBox).toBeUndefined();
    expect(useDashboardStore.getState().preview).toBeUndefined();
    expect(useDashboardStore.getState().selection).toEqual(["panel_1"]);
  });

  it("keeps only the most recent notices", () => {
    unbind = bindDashboardStore(dashboard);
    for (let i = 0; i < MAX_NOTICES + 2; i++) {
      emitEvent("notice", { level: "info", message: `n${i}`, at: i });
    }

    const { notices } = useDashboardStore.getState();
    expect(notices).toHaveLength(MAX_NOTICES);
    expect(notices[0].message).toBe("n2");

    useDashboardStore.getState().dismissNotice(2);
    expect(useDashboardStore.getState().notices[0].message).toBe("n3");
  });
});

describe("dashboard hooks", () => {
  let dashboard: Dashboard;

  beforeEach(() => {
    vi.useFakeTimers();
    useDashboardStore.getState().reset();
    dashboard = makeDashboard();
  });

  afterEach(async () => {
    cleanup();
    setVisibility("visible");
    await dashboard.dispose();
    vi.useRealTimers();
  });

  it("connects the store while mounted and resets it on unmount", () => {
    dashboard.createPanel({ sourceType: "cpu", displayerType: "text" });
    const { unmount } = renderHook(() => useDashboardConnector(dashboard));

    expect(panelIds()).toEqual(["panel_1"]);

    unmount();
    expect(panelIds()).toEqual([]);
  });

  it("selects one panel's runtime", async () => {
    renderHook(() => useDashboardConnector(dashboard));
    const { result } = renderHook(() => usePanelRuntime("panel_1"));
    expect(result.current).toBeUndefined();

    act(() => {
      dashboard.createPanel({ sourceType: "cpu", displayerType: "text" });
    });
    expect(result.current?.status).toBe("pending");

    await act(async () => {
      await vi.advanceTimersByTimeAsync(1);
    });
    expect(result.current?.status).toBe("ok");
  });

  it("pauses polling while the document is hidden", () => {
    dashboard.createPanel({ sourceType: "cpu", displayerType: "text" });
    renderHook(() => useVisibilityPause(dashboard));

    act(() => setVisibility("hidden"));
    expect(dashboard.scheduler.stats()).toMatchObject({ active: 0, paused: 1 });

    act(() => setVisibility("visible"));
    expect(dashboard.scheduler.stats()).toMatchObject({ active: 1, paused: 0 });
  });

  it("delivers bus events to the latest handler", () => {
    const received: Notice[] = [];
    const { rerender, unmount } = renderHook(
      ({ tag }: { tag: string }) =>
        useEventBus("notice", (notice) => received.push({ ...notice, message: `${tag}:${notice.message}` })),
      { initialProps: { tag: "a" } },
    );

    rerender({ tag: "b" });
    emitEvent("notice", { level: "info", message: "hello", at: 1 });
    unmount();
    emitEvent("notice", { level: "info", message: "ignored", at: 2 });

    expect(received).toEqual([{ level: "info", message: "b:hello", at: 1 }]);
  });
});
