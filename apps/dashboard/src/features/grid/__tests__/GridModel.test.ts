import { beforeEach, describe, expect, it } from "vitest";

import { PlacementConflictError, isDashboardError } from "@/lib/errors";

import { GridModel } from "../GridModel";
import { cellKey, rectsOverlap } from "../geometry";
import type { PlacementRect } from "../types";

/* --------------------------------------------------------------------------
   Helpers
   -------------------------------------------------------------------------- */

function rect(x: number, y: number, width: number, height: number): PlacementRect {
  return { x, y, width, height };
}

function assertDisjoint(grid: GridModel): void {
  const ids = grid.panelIds();
  for (let i = 0; i < ids.length; i++) {
    for (let j = i + 1; j < ids.length; j++) {
      const a = grid.rectOf(ids[i]);
      const b = grid.rectOf(ids[j]);
      expect(a && b && rectsOverlap(a, b)).toBe(false);
    }
  }
}

/* --------------------------------------------------------------------------
   Tests
   -------------------------------------------------------------------------- */

describe("GridModel", () => {
  let grid: GridModel;

  beforeEach(() => {
    grid = new GridModel({ columns: 10, rows: 10 });
  });

  it("rejects an overlapping placement and leaves occupancy unchanged", () => {
    grid.place("a", rect(0, 0, 3, 3));
    const before = grid.occupancy();

    let caught: unknown;
    try {
      grid.place("b", rect(1, 1, 2, 2));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(PlacementConflictError);
    expect(isDashboardError(caught, "PlacementConflict")).toBe(true);
    expect(caught instanceof PlacementConflictError && caught.conflictingIds).toEqual(["a"]);
    expect(grid.occupancy()).toEqual(before);
    expect(grid.has("b")).toBe(false);
  });

  it("moves a panel into an empty region and frees its old cells", () => {
    grid.place("a", rect(0, 0, 2, 2));
    grid.move("a", rect(5, 5, 2, 2));

    for (const [x, y] of [[0, 0], [1, 0], [0, 1], [1, 1]]) {
      expect(grid.ownerAt({ x, y })).toBeUndefined();
    }
    for (const [x, y] of [[5, 5], [6, 5], [5, 6], [6, 6]]) {
      expect(grid.ownerAt({ x, y })).toBe("a");
    }
    expect(grid.occupancy().size).toBe(4);
  });

  it("ignores the panel's own cells when moving by one cell", () => {
    grid.place("a", rect(0, 0, 3, 3));
    grid.move("a", rect(1, 0, 3, 3));
    expect(grid.rectOf("a")).toEqual(rect(1, 0, 3, 3));
    expect(grid.ownerAt({ x: 0, y: 0 })).toBeUndefined();
  });

  it("rejects rects that leave the grid", () => {
    grid.place("a", rect(0, 0, 2, 2));
    expect(() => grid.move("a", rect(9, 0, 2, 2))).toThrow(PlacementConflictError);
    expect(() => grid.place("b", rect(-1, 0, 1, 1))).toThrow(PlacementConflictError);
    expect(() => grid.place("c", rect(0, 0, 0, 1))).toThrow(PlacementConflictError);
    expect(grid.rectOf("a")).toEqual(rect(0, 0, 2, 2));
  });

  it("resizes in place and reports conflicts with neighbours", () => {
    grid.place("a", rect(0, 0, 2, 2));
    grid.place("b", rect(3, 0, 2, 2));

    grid.resize("a", rect(0, 0, 3, 4));
    expect(grid.rectOf("a")).toEqual(rect(0, 0, 3, 4));

    expect(() => grid.resize("a", rect(0, 0, 4, 4))).toThrow(/overlaps b/);
    expect(grid.rectOf("a")).toEqual(rect(0, 0, 3, 4));
    assertDisjoint(grid);
  });

  it("releases every cell of a panel", () => {
    grid.place("a", rect(2, 2, 2, 3));
    expect(grid.release("a")).toBe(true);
    expect(grid.occupancy().size).toBe(0);
    expect(grid.release("a")).toBe(false);
  });

  it("moves a group atomically, excluding the group's own cells", () => {
    grid.place("a", rect(0, 0, 2, 2));
    grid.place("b", rect(2, 0, 2, 2));
    grid.place("c", rect(6, 0, 2, 2));

    grid.moveMany(new Map([
      ["a", rect(1, 0, 2, 2)],
      ["b", rect(3, 0, 2, 2)],
    ]));
    expect(grid.rectOf("a")).toEqual(rect(1, 0, 2, 2));
    expect(grid.rectOf("b")).toEqual(rect(3, 0, 2, 2));
    assertDisjoint(grid);
  });

  it("rejects a group move when any member is blocked", () => {
    grid.place("a", rect(0, 0, 2, 2));
    grid.place("b", rect(2, 0, 2, 2));
    grid.place("c", rect(5, 0, 2, 2));
    const before = grid.occupancy();

    expect(() =>
      grid.moveMany(new Map([
        ["a", rect(2, 0, 2, 2)],
        ["b", rect(4, 0, 2, 2)],
      ])),
    ).toThrow(PlacementConflictError);
    expect(grid.occupancy()).toEqual(before);
  });

  it("rejects a group whose new rects overlap each other", () => {
    grid.place("a", rect(0, 0, 2, 2));
    grid.place("b", rect(4, 0, 2, 2));
    expect(() =>
      grid.moveMany(new Map([
        ["a", rect(0, 4, 2, 2)],
        ["b", rect(1, 4, 2, 2)],
      ])),
    ).toThrow(/would overlap/);
  });

  it("finds the first free spot in row-major order", () => {
    grid.place("a", rect(0, 0, 4, 2));
    expect(grid.findFreeRect(3, 2)).toEqual(rect(4, 0, 3, 2));
    expect(grid.findFreeRect(10, 9)).toBeUndefined();
  });

  it("reports the smallest rect covering every panel", () => {
    expect(grid.contentBounds()).toBeUndefined();
    grid.place("a", rect(1, 2, 2, 2));
    grid.place("b", rect(5, 0, 3, 1));
    expect(grid.contentBounds()).toEqual(rect(1, 0, 7, 4));

    grid.release("b");
    expect(grid.contentBounds()).toEqual(rect(1, 2, 2, 2));
  });

  it("refuses to shrink the grid below a placed panel", () => {
    grid.place("a", rect(6, 6, 3, 3));
    expect(() => grid.setSize({ columns: 8, rows: 10 })).toThrow(PlacementConflictError);
    expect(grid.size).toEqual({ columns: 10, rows: 10 });

    grid.setSize({ columns: 9, rows: 9 });
    expect(grid.size).toEqual({ columns: 9, rows: 9 });
  });

  it("keeps cell sets disjoint across a random sequence of mutations", () => {
    let seed = 7;
    const next = (max: number) => {
      seed = (seed * 16807) % 2147483647;
      return seed % max;
    };

    for (let step = 0; step < 300; step++) {
      const id = `p${next(8)}`;
      const target = rect(next(10), next(10), 1 + next(4), 1 + next(4));
      try {
        if (grid.has(id)) {
          if (next(5) === 0) grid.release(id);
          else grid.move(id, target);
        } else {
          grid.place(id, target);
        }
      } catch (error) {
        expect(error).toBeInstanceOf(PlacementConflictError);
      }
      assertDisjoint(grid);
    }

    const owned = new Map<string, number>();
    for (const owner of grid.occupancy().values()) {
      owned.set(owner, (owned.get(owner) ?? 0) + 1);
    }
    for (const id of grid.panelIds()) {
      const r = grid.rectOf(id);
      expect(owned.get(id)).toBe(r ? r.width * r.height : 0);
    }
    expect(grid.occupancy().has(cellKey(-1, -1))).toBe(false);
  });
});
