import { beforeEach, describe, expect, it } from "vitest";

import { GridModel } from "@/features/grid/GridModel";
import type { ModuleRegistry } from "@/features/modules/ModuleRegistry";
import { IncompatibleModuleError, PlacementConflictError, SourceFetchError } from "@/lib/errors";
import { RecordingScheduler, ScriptedSource, createTestRegistry, percent, stubDisplayer } from "@/lib/test-utils";

import { PanelRegistry } from "../PanelRegistry";
import type { PanelEvent } from "../types";

/* --------------------------------------------------------------------------
   Setup
   -------------------------------------------------------------------------- */

function rect(x: number, y: number, width: number, height: number) {
  return { x, y, width, height };
}

describe("PanelRegistry", () => {
  let grid: GridModel;
  let modules: ModuleRegistry;
  let scheduler: RecordingScheduler;
  let panels: PanelRegistry;
  let events: PanelEvent[];

  beforeEach(() => {
    grid = new GridModel({ columns: 10, rows: 10 });
    modules = createTestRegistry();
    scheduler = new RecordingScheduler();
    panels = new PanelRegistry({ grid, modules, scheduler });
    events = [];
    panels.subscribe((event) => events.push(event));
  });

  /* -- Creation ----------------------------------------------------------- */

  it("creates a panel only for compatible source and displayer", () => {
    const panel = panels.createPanel(rect(0, 0, 2, 2), "cpu", {}, "text", {});
    expect(panel.id).toBe("panel_1");
    expect(scheduler.log).toEqual(["register panel_1"]);

    expect(() => panels.createPanel(rect(4, 4, 2, 2), "cpu", {}, "time-series-only", {})).toThrow(
      IncompatibleModuleError,
    );
    expect(panels.size).toBe(1);
    expect(grid.occupancy().size).toBe(4);
    expect(scheduler.log).toEqual(["register panel_1"]);
  });

  it("creates nothing when the rect is taken", () => {
    panels.createPanel(rect(0, 0, 3, 3), "cpu", {}, "text", {});
    expect(() => panels.createPanel(rect(1, 1, 2, 2), "cpu", {}, "text", {})).toThrow(PlacementConflictError);
    expect(panels.size).toBe(1);
    expect(scheduler.log).toEqual(["register panel_1"]);

    expect(panels.createPanel(rect(3, 0, 2, 2), "cpu", {}, "text", {}).id).toBe("panel_2");
  });

  it("places the source's default size at the first free spot", () => {
    panels.createPanel(undefined, "cpu", {}, "text", {});
    const second = panels.createPanel(undefined, "cpu", {}, "text", {});
    expect(second.placement).toEqual(rect(2, 0, 2, 2));
  });

  it("polls at the configured update interval and stores resolved configs", () => {
    const panel = panels.createPanel(rect(0, 0, 2, 2), "cpu", { updateIntervalSeconds: "0.5" }, "text", {});
    expect(scheduler.intervals.get(panel.id)).toBe(500);
    expect(panel.sourceConfig.updateIntervalSeconds).toBe(0.5);
    expect(panel.displayerConfig).toEqual({ maxValue: 100 });
    expect(panel.style.showTitle).toBe(true);
  });

  it("merges style defaults for the displayer type under the given style", () => {
    const themed = new PanelRegistry({
      grid,
      modules,
      scheduler,
      styleDefaults: (displayerType) => (displayerType === "text" ? { background: "#000000", font: "mono 10" } : {}),
    });
    const panel = themed.createPanel(rect(0, 0, 2, 2), "cpu", {}, "text", {}, { font: "serif 9" });
    expect(panel.style.background).toBe("#000000");
    expect(panel.style.font).toBe("serif 9");
  });

  it("restores a panel under its saved id and keeps new ids clear of it", () => {
    const restored = panels.restorePanel("panel_5", rect(0, 0, 2, 2), "cpu", {}, "text", {});
    expect(restored.id).toBe("panel_5");
    expect(grid.ownerAt({ x: 1, y: 1 })).toBe("panel_5");

    panels.reserveId("panel_9");
    panels.reserveId("custom");
    expect(panels.createPanel(rect(2, 0, 2, 2), "cpu", {}, "text", {}).id).toBe("panel_10");
    expect(panels.restorePanel("panel_5", rect(4, 0, 2, 2), "cpu", {}, "text", {}).id).toBe("panel_11");
  });

  /* -- Update & delete ---------------------------------------------------- */

  it("keeps instances on a style-only update", () => {
    const panel = panels.createPanel(rect(0, 0, 2, 2), "cpu", {}, "text", {});
    const { source, displayer } = panel;
    panels.updatePanel(panel.id, { style: { title: "Load" } });

    expect(panel.source).toBe(source);
    expect(panel.displayer).toBe(displayer);
    expect(panel.style.title).toBe("Load");
    expect(scheduler.log).toEqual(["register panel_1"]);
  });

  it("restarts polling when the source is reconfigured", () => {
    const panel = panels.createPanel(rect(0, 0, 2, 2), "cpu", {}, "text", {});
    const oldSource = panel.source;
    panels.updatePanel(panel.id, { sourceConfig: { updateIntervalSeconds: 5 } });

    expect(scheduler.log).toEqual(["register panel_1", "unregister panel_1", "register panel_1"]);
    expect(scheduler.intervals.get(panel.id)).toBe(5000);
    expect(oldSource instanceof ScriptedSource && oldSource.closed).toBe(true);
    expect(panel.placement).toEqual(rect(0, 0, 2, 2));
  });

  it("refuses an incompatible reconfiguration and keeps the panel as it was", () => {
    const panel = panels.createPanel(rect(0, 0, 2, 2), "cpu", {}, "text", {});
    expect(() => panels.updatePanel(panel.id, { displayerType: "time-series-only" })).toThrow(
      IncompatibleModuleError,
    );
    expect(panel.displayerType).toBe("text");
  });

  it("deletes a panel completely", () => {
    const panel = panels.createPanel(rect(0, 0, 2, 2), "cpu", {}, "text", {});
    panels.selection.replace([panel.id]);
    const { source } = panel;

    expect(panels.deletePanel(panel.id)).toBe(true);
    expect(scheduler.log).toEqual(["register panel_1", "unregister panel_1"]);
    expect(grid.occupancy().size).toBe(0);
    expect(panels.selection.has(panel.id)).toBe(false);
    expect(source instanceof ScriptedSource && source.closed).toBe(true);
    expect(panels.deletePanel(panel.id)).toBe(false);

    expect(panels.createPanel(rect(0, 0, 2, 2), "cpu", {}, "text", {}).id).toBe("panel_2");
  });

  it("tells subscribers about every change until they unsubscribe", () => {
    const seen: string[] = [];
    const unsubscribe = panels.subscribe((event) => seen.push(event.type));

    const panel = panels.createPanel(rect(0, 0, 2, 2), "cpu", {}, "text", {});
    panels.updatePanel(panel.id, { style: { title: "Load" } });
    panels.applyDelivery(panel.id, { ok: true, value: percent(5), at: 1 });
    panels.deletePanel(panel.id);
    unsubscribe();
    panels.clear();

    expect(seen).toEqual(["created", "updated", "runtime", "deleted"]);
    expect(events.map((event) => event.type)).toEqual(["created", "updated", "runtime", "deleted", "cleared"]);
  });

  it("resets the displayer when the source is replaced", () => {
    const calls: string[] = [];
    let made = 0;
    modules = createTestRegistry({ mem: () => new ScriptedSource(async () => percent(7)) });
    modules.registerDisplayer({
      typeKey: "history",
      label: "History",
      accepts: ["scalar-percentage"],
      configSchema: [],
      create: () => {
        const tag = `d${++made}`;
        return {
          ...stubDisplayer(["scalar-percentage"]),
          update: () => {
            calls.push(`${tag} update`);
          },
          reset: () => {
            calls.push(`${tag} reset`);
          },
        };
      },
    });
    panels = new PanelRegistry({ grid, modules, scheduler });
    const panel = panels.createPanel(rect(0, 0, 2, 2), "cpu", {}, "history", {});

    panels.applyDelivery(panel.id, { ok: true, value: percent(10), at: 1 });
    panels.updatePanel(panel.id, { sourceType: "mem" });
    expect(calls).toEqual(["d1 update", "d1 reset"]);

    panels.applyDelivery(panel.id, { ok: true, value: percent(20), at: 2 });
    panels.updatePanel(panel.id, { sourceType: "cpu", displayerConfig: {} });
    expect(calls).toEqual(["d1 update", "d1 reset", "d1 update"]);

    panels.applyDelivery(panel.id, { ok: true, value: percent(30), at: 3 });
    panels.updatePanel(panel.id, { displayerConfig: {} });
    expect(calls).toEqual(["d1 update", "d1 reset", "d1 update", "d2 update", "d3 update"]);
  });

  /* -- Placement ---------------------------------------------------------- */

  it("commits placements and promotes in relative z-order", () => {
    const a = panels.createPanel(rect(0, 0, 2, 2), "cpu", {}, "text", {});
    const b = panels.createPanel(rect(2, 0, 2, 2), "cpu", {}, "text", {});
    const c = panels.createPanel(rect(4, 0, 2, 2), "cpu", {}, "text", {});

    panels.commitPlacements(
      new Map([
        [b.id, rect(2, 4, 2, 2)],
        [a.id, rect(0, 4, 2, 2)],
      ]),
    );

    expect(panels.listPanels().map((p) => p.id)).toEqual([c.id, a.id, b.id]);
    expect(a.placement).toEqual(rect(0, 4, 2, 2));
    expect(grid.rectOf(b.id)).toEqual(rect(2, 4, 2, 2));
    expect(events.at(-1)).toEqual({ type: "placed", panelIds: [b.id, a.id] });
  });

  it("duplicates panels with fresh ids and copied configuration", () => {
    const a = panels.createPanel(rect(0, 0, 2, 2), "cpu", { alarmEnabled: true }, "text", { maxValue: 50 }, {
      title: "CPU",
    });
    const [copyId] = panels.duplicatePanels(new Map([[a.id, rect(5, 5, 2, 2)]]));

    const copy = panels.getPanel(copyId);
    expect(copyId).toBe("panel_2");
    expect(copy?.sourceConfig.alarmEnabled).toBe(true);
    expect(copy?.displayerConfig).toEqual({ maxValue: 50 });
    expect(copy?.style.title).toBe("CPU");
    expect(copy?.source).not.toBe(a.source);
    expect(a.placement).toEqual(rect(0, 0, 2, 2));
  });

  it("rejects duplicates that would overlap anything", () => {
    const a = panels.createPanel(rect(0, 0, 2, 2), "cpu", {}, "text", {});
    expect(() => panels.duplicatePanels(new Map([[a.id, rect(1, 1, 2, 2)]]))).toThrow(PlacementConflictError);
    expect(panels.size).toBe(1);
  });

  /* -- Styling & runtime -------------------------------------------------- */

  it("copies style and, for matching displayers, the displayer config", () => {
    const from = panels.createPanel(rect(0, 0, 2, 2), "cpu", {}, "text", { maxValue: 50 }, {
      title: "From",
      background: "#101010",
    });
    const to = panels.createPanel(rect(2, 0, 2, 2), "cpu", {}, "text", {}, { title: "To" });

    panels.copyStyle(from.id, to.id);
    expect(to.style.background).toBe("#101010");
    expect(to.style.title).toBe("To");
    expect(to.displayerConfig).toEqual({ maxValue: 50 });
  });

  it("raises and clears the value alarm", () => {
    const panel = panels.createPanel(rect(0, 0, 2, 2), "cpu", { alarmEnabled: true, alarmHighValue: 50 }, "text", {});

    panels.applyDelivery(panel.id, { ok: true, value: percent(60), at: 1 });
    expect(panel.runtime).toEqual({ status: "ok", value: percent(60), inAlarm: true, updatedAt: 1 });

    panels.applyDelivery(panel.id, { ok: true, value: percent(40), at: 2 });
    expect(panel.runtime.inAlarm).toBe(false);

    panels.applyDelivery(panel.id, { ok: false, error: new SourceFetchError("sensor gone", "permanent"), at: 3 });
    expect(panel.runtime).toEqual({
      status: "error",
      value: percent(40),
      error: "sensor gone",
      errorSeverity: "permanent",
      inAlarm: false,
      updatedAt: 3,
    });
  });

  it("stays paused when a reading arrives while polling is suspended", () => {
    const panel = panels.createPanel(rect(0, 0, 2, 2), "cpu", {}, "text", {});
    panels.setPaused([panel.id], true);

    panels.applyDelivery(panel.id, { ok: true, value: percent(30), at: 5 });
    expect(panel.runtime).toEqual({ status: "paused", value: percent(30), inAlarm: false, updatedAt: 5 });

    panels.setPaused([panel.id], false);
    expect(panel.runtime.status).toBe("ok");
  });

  it("ignores deliveries for deleted panels", () => {
    const panel = panels.createPanel(rect(0, 0, 2, 2), "cpu", {}, "text", {});
    panels.deletePanel(panel.id);
    const count = events.length;
    panels.applyDelivery(panel.id, { ok: true, value: percent(10), at: 1 });
    expect(events.length).toBe(count);
  });

  it("clears every panel without reusing ids", () => {
    panels.createPanel(rect(0, 0, 2, 2), "cpu", {}, "text", {});
    panels.createPanel(rect(2, 0, 2, 2), "cpu", {}, "text", {});
    panels.clear();

    expect(panels.size).toBe(0);
    expect(grid.occupancy().size).toBe(0);
    expect(events.at(-1)).toEqual({ type: "cleared" });
    expect(panels.createPanel(rect(0, 0, 2, 2), "cpu", {}, "text", {}).id).toBe("panel_3");
  });
});
