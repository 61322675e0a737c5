import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { numericReading } from "@/features/modules/values";
import type { DeliveryResult } from "@/features/panels/types";
import { SourceFetchError } from "@/lib/errors";
import { ScriptedSource, delay, percent } from "@/lib/test-utils";

import { UpdateScheduler } from "../UpdateScheduler";

/* --------------------------------------------------------------------------
   Setup
   -------------------------------------------------------------------------- */

/** Source that answers every call immediately with the call number. */
function counting(): ScriptedSource {
  return new ScriptedSource(async (call) => percent(call));
}

describe("UpdateScheduler", () => {
  let deliveries: Array<{ panelId: string; result: DeliveryResult }>;
  let scheduler: UpdateScheduler;

  /** Delivered readings for one panel; failures appear as their message. */
  const outcomes = (panelId: string): Array<number | string | undefined> =>
    deliveries
      .filter((entry) => entry.panelId === panelId)
      .map(({ result }) => (result.ok ? numericReading(result.value) : result.error.message));

  beforeEach(() => {
    vi.useFakeTimers();
    deliveries = [];
    scheduler = new UpdateScheduler({
      fetchTimeoutMs: 500,
      deliver: (panelId, result) => deliveries.push({ panelId, result }),
    });
  });

  afterEach(() => {
    scheduler.dispose();
    vi.useRealTimers();
  });

  /* -- Polling ------------------------------------------------------------ */

  it("polls immediately on registration and then on every interval", async () => {
    const source = counting();
    scheduler.register("panel_1", source, 1000);
    expect(source.calls).toBe(1);

    await vi.advanceTimersByTimeAsync(2010);
    expect(outcomes("panel_1")).toEqual([1, 2, 3]);
  });

  it("retries a timed-out fetch on the next tick without disturbing other panels", async () => {
    const signals: AbortSignal[] = [];
    const slow = new ScriptedSource((call, signal) => {
      signals.push(signal);
      if (call === 2) {
        return new Promise((_, reject) => {
          signal.addEventListener("abort", () => reject(signal.reason));
        });
      }
      return Promise.resolve(percent(call * 10));
    });
    const steady = counting();

    scheduler.register("slow", slow, 1000);
    scheduler.register("steady", steady, 1000);
    await vi.advanceTimersByTimeAsync(2010);

    expect(outcomes("slow")).toEqual([10, "Fetch timed out after 500 ms", 30]);
    expect(signals[1].aborted).toBe(true);
    const failure = deliveries.find((entry) => entry.panelId === "slow" && !entry.result.ok)?.result;
    expect(failure).toMatchObject({ ok: false, error: { severity: "transient" } });

    expect(outcomes("steady")).toEqual([1, 2, 3]);
    expect(scheduler.stats()).toEqual({ active: 2, paused: 0, stopped: 0, inFlight: 0, skipped: 0 });
  });

  it("skips ticks while the previous fetch is still running", async () => {
    const source = new ScriptedSource(async (call) => {
      if (call === 1) await delay(2500);
      return percent(call);
    });
    const scheduler = new UpdateScheduler({
      fetchTimeoutMs: 5000,
      deliver: (panelId, result) => deliveries.push({ panelId, result }),
    });

    scheduler.register("panel_1", source, 1000);
    await vi.advanceTimersByTimeAsync(1500);
    expect(scheduler.stats().inFlight).toBe(1);

    await vi.advanceTimersByTimeAsync(1510);
    expect(source.calls).toBe(2);
    expect(scheduler.stats().skipped).toBe(2);
    expect(outcomes("panel_1")).toEqual([1, 2]);
    scheduler.dispose();
  });

  /* -- Failures ----------------------------------------------------------- */

  it("keeps retrying after transient and unexpected errors", async () => {
    const source = new ScriptedSource(() => {
      throw new Error("boom");
    });
    scheduler.register("panel_1", source, 1000);
    await vi.advanceTimersByTimeAsync(2010);

    expect(source.calls).toBe(3);
    expect(outcomes("panel_1")).toEqual(["boom", "boom", "boom"]);
    expect(scheduler.stateOf("panel_1")).toBe("active");
  });

  it("stops only the failing task on a permanent error", async () => {
    const failing = new ScriptedSource(async () => {
      throw new SourceFetchError("No sensor", "permanent");
    });
    const steady = counting();
    scheduler.register("failing", failing, 1000);
    scheduler.register("steady", steady, 1000);
    await vi.advanceTimersByTimeAsync(5010);

    expect(failing.calls).toBe(1);
    expect(outcomes("failing")).toEqual(["No sensor"]);
    expect(scheduler.stateOf("failing")).toBe("stopped");
    expect(steady.calls).toBe(6);
    expect(scheduler.stats()).toEqual({ active: 1, paused: 0, stopped: 1, inFlight: 0, skipped: 0 });
  });

  it("restarts a stopped task when it is registered again", async () => {
    scheduler.register(
      "panel_1",
      new ScriptedSource(async () => {
        throw new SourceFetchError("No sensor", "permanent");
      }),
      1000,
    );
    await vi.advanceTimersByTimeAsync(10);

    const replacement = counting();
    scheduler.register("panel_1", replacement, 1000);
    await vi.advanceTimersByTimeAsync(10);

    expect(scheduler.stateOf("panel_1")).toBe("active");
    expect(outcomes("panel_1")).toEqual(["No sensor", 1]);
  });

  /* -- Cancellation ------------------------------------------------------- */

  it("aborts and drops the in-flight fetch of an unregistered panel", async () => {
    let signal: AbortSignal | undefined;
    const source = new ScriptedSource(async (_call, abort) => {
      signal = abort;
      await delay(1000, abort);
      return percent(5);
    });
    scheduler.register("panel_1", source, 1000);
    await vi.advanceTimersByTimeAsync(500);

    scheduler.unregister("panel_1");
    await vi.advanceTimersByTimeAsync(2000);

    expect(signal?.aborted).toBe(true);
    expect(source.calls).toBe(1);
    expect(deliveries).toEqual([]);
    expect(scheduler.has("panel_1")).toBe(false);
  });

  it("discards a result that is waiting in the mailbox", async () => {
    const drains: Array<() => void> = [];
    const scheduler = new UpdateScheduler({
      fetchTimeoutMs: 500,
      deliver: (panelId, result) => deliveries.push({ panelId, result }),
      scheduleDrain: (drain) => {
        drains.push(drain);
        return () => undefined;
      },
    });
    scheduler.register("panel_1", counting(), 1000);
    await vi.advanceTimersByTimeAsync(10);
    expect(drains).toHaveLength(1);

    scheduler.unregister("panel_1");
    drains[0]();
    expect(deliveries).toEqual([]);
    scheduler.dispose();
  });

  /* -- Control ------------------------------------------------------------ */

  it("pauses a task and polls straight away on resume", async () => {
    const source = counting();
    scheduler.register("panel_1", source, 1000);
    await vi.advanceTimersByTimeAsync(1500);
    expect(source.calls).toBe(2);

    scheduler.pause("panel_1");
    expect(scheduler.stats().paused).toBe(1);
    await vi.advanceTimersByTimeAsync(3000);
    expect(source.calls).toBe(2);

    scheduler.resume("panel_1");
    expect(source.calls).toBe(3);
    await vi.advanceTimersByTimeAsync(1010);
    expect(source.calls).toBe(4);
  });

  it("pauses and resumes every task together", async () => {
    const first = counting();
    const second = counting();
    scheduler.register("panel_1", first, 1000);
    scheduler.register("panel_2", second, 1000);

    scheduler.pauseAll();
    expect(scheduler.stats()).toEqual({ active: 0, paused: 2, stopped: 0, inFlight: 2, skipped: 0 });
    await vi.advanceTimersByTimeAsync(5000);

    scheduler.resumeAll();
    expect([first.calls, second.calls]).toEqual([2, 2]);
    expect(scheduler.stats().active).toBe(2);
  });

  it("registers tasks paused while everything is paused", async () => {
    scheduler.pauseAll();
    const source = counting();
    scheduler.register("panel_1", source, 1000);

    expect(source.calls).toBe(0);
    expect(scheduler.stats()).toEqual({ active: 0, paused: 1, stopped: 0, inFlight: 0, skipped: 0 });
    await vi.advanceTimersByTimeAsync(3000);
    expect(source.calls).toBe(0);

    scheduler.resumeAll();
    expect(source.calls).toBe(1);
    expect(scheduler.stats().active).toBe(1);
  });

  it("applies a new interval from the moment it is set", async () => {
    const source = counting();
    scheduler.register("panel_1", source, 1000);
    await vi.advanceTimersByTimeAsync(10);

    scheduler.setInterval("panel_1", 250);
    await vi.advanceTimersByTimeAsync(990);
    expect(source.calls).toBe(4);
  });

  it("stops everything on dispose", async () => {
    const source = counting();
    scheduler.register("panel_1", source, 1000);
    scheduler.dispose();
    await vi.advanceTimersByTimeAsync(3000);

    expect(source.calls).toBe(1);
    expect(scheduler.stats()).toEqual({ active: 0, paused: 0, stopped: 0, inFlight: 0, skipped: 0 });
  });
});
