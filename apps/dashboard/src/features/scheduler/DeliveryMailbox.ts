/**
 * One-slot-per-panel delivery buffer between poll tasks and the UI side.
 *
 * Posting overwrites whatever the slot held, so a burst of results for one
 * panel collapses to the latest. Slots drain together on the next
 * macrotask.
 */

import type { DeliveryResult } from "@/features/panels/types";

export type DeliveryHandler = (panelId: string, result: DeliveryResult) => void;

/** Defers a drain; returns a cancel function. */
export type DrainScheduler = (drain: () => void) => () => void;

const nextMacrotask: DrainScheduler = (drain) => {
  const handle = setTimeout(drain, 0);
  return () => clearTimeout(handle);
};

export class DeliveryMailbox {
  private slots = new Map<string, DeliveryResult>();
  private cancelDrain: (() => void) | undefined;
  private coalesced = 0;

  constructor(
    private readonly handler: DeliveryHandler,
    private readonly scheduleDrain: DrainScheduler = nextMacrotask,
  ) {}

  /** Store the latest result for a panel, replacing any undrained one. */
  post(panelId: string, result: DeliveryResult): void {
    if (this.slots.has(panelId)) this.coalesced += 1;
    this.slots.set(panelId, result);
    this.cancelDrain ??= this.scheduleDrain(() => this.drain());
  }

  /** Drop a panel's pending result (panel deleted or re-registered). */
  discard(panelId: string): void {
    this.slots.delete(panelId);
  }

  /** Hand every pending result to the handler now. */
  drain(): void {
    this.cancelDrain?.();
    this.cancelDrain = undefined;
    const pending = Array.from(this.slots);
    this.slots.clear();
    for (const [panelId, result] of pending) this.handler(panelId, result);
  }

  get pending(): number {
    return this.slots.size;
  }

  /** Results overwritten before they were drained. */
  get coalescedCount(): number {
    return this.coalesced;
  }

  dispose(): void {
    this.cancelDrain?.();
    this.cancelDrain = undefined;
    this.slots.clear();
  }
}
