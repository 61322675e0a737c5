import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { DeliveryResult } from "@/features/panels/types";
import { SourceFetchError } from "@/lib/errors";
import { percent } from "@/lib/test-utils";

import { DeliveryMailbox } from "../DeliveryMailbox";

function ok(value: number, at = 0): DeliveryResult {
  return { ok: true, value: percent(value), at };
}

describe("DeliveryMailbox", () => {
  let delivered: Array<[string, DeliveryResult]>;
  let drains: Array<() => void>;
  let mailbox: DeliveryMailbox;

  beforeEach(() => {
    delivered = [];
    drains = [];
    mailbox = new DeliveryMailbox(
      (panelId, result) => delivered.push([panelId, result]),
      (drain) => {
        drains.push(drain);
        return () => undefined;
      },
    );
  });

  it("keeps only the latest result per panel until drained", () => {
    mailbox.post("panel_1", ok(10));
    mailbox.post("panel_1", ok(20));
    mailbox.post("panel_2", ok(30));

    expect(drains).toHaveLength(1);
    expect(mailbox.pending).toBe(2);
    expect(mailbox.coalescedCount).toBe(1);

    drains[0]();
    expect(delivered).toEqual([
      ["panel_1", ok(20)],
      ["panel_2", ok(30)],
    ]);
    expect(mailbox.pending).toBe(0);
  });

  it("schedules a fresh drain after the previous one ran", () => {
    mailbox.post("panel_1", ok(1));
    drains[0]();
    mailbox.post("panel_1", ok(2));
    expect(drains).toHaveLength(2);
  });

  it("drops a discarded panel's pending result", () => {
    const failure: DeliveryResult = { ok: false, error: new SourceFetchError("offline"), at: 5 };
    mailbox.post("panel_1", ok(1));
    mailbox.post("panel_2", failure);
    mailbox.discard("panel_1");

    mailbox.drain();
    expect(delivered).toEqual([["panel_2", failure]]);
  });
});

describe("DeliveryMailbox default drain", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("drains on the next macrotask", () => {
    const handler = vi.fn();
    const mailbox = new DeliveryMailbox(handler);
    mailbox.post("panel_1", ok(1));
    expect(handler).not.toHaveBeenCalled();

    vi.advanceTimersByTime(0);
    expect(handler).toHaveBeenCalledWith("panel_1", ok(1));
  });

  it("delivers nothing after dispose", () => {
    const handler = vi.fn();
    const mailbox = new DeliveryMailbox(handler);
    mailbox.post("panel_1", ok(1));
    mailbox.dispose();

    vi.advanceTimersByTime(10);
    expect(handler).not.toHaveBeenCalled();
  });
});
