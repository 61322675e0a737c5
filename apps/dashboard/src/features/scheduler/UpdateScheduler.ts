/**
 * Per-panel polling of data sources.
 *
 * Every panel gets its own timer; the first tick fires on registration
 * unless polling is paused as a whole. A tick that finds the previous fetch
 * still running is skipped. Fetches are bounded by a timeout that aborts
 * them, and results travel to the UI side through a coalescing mailbox. A
 * panel's failures never touch another panel's task.
 */

import type { DataValue, Source } from "@/features/modules/types";
import type { PollScheduler } from "@/features/panels/PanelRegistry";
import type { DeliveryResult } from "@/features/panels/types";
import { SourceFetchError, describeError, toSourceFetchError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

import { DeliveryMailbox, type DeliveryHandler, type DrainScheduler } from "./DeliveryMailbox";

const log = createLogger("scheduler");

/* --------------------------------------------------------------------------
   Types
   -------------------------------------------------------------------------- */

export type PollTaskState = "active" | "paused" | "stopped";

export interface SchedulerStats {
  active: number;
  paused: number;
  /** Tasks halted by a permanent source error. */
  stopped: number;
  inFlight: number;
  /** Ticks skipped because the previous fetch was still running. */
  skipped: number;
}

export interface UpdateSchedulerOptions {
  /** Receives drained results, one per panel per drain. */
  deliver: DeliveryHandler;
  /** Upper bound on a single fetch. */
  fetchTimeoutMs: number;
  now?: () => number;
  scheduleDrain?: DrainScheduler;
}

interface PollTask {
  panelId: string;
  source: Source;
  intervalMs: number;
  state: PollTaskState;
  timer?: ReturnType<typeof setInterval>;
  /** Controller of the fetch currently running, if any. */
  inFlight?: AbortController;
}

/* --------------------------------------------------------------------------
   Scheduler
   -------------------------------------------------------------------------- */

export class UpdateScheduler implements PollScheduler {
  private tasks = new Map<string, PollTask>();
  private readonly mailbox: DeliveryMailbox;
  private readonly fetchTimeoutMs: number;
  private readonly now: () => number;
  private skipped = 0;
  /** Set by `pauseAll`; tasks registered meanwhile start paused. */
  private suspended = false;

  constructor(options: UpdateSchedulerOptions) {
    this.mailbox = new DeliveryMailbox(options.deliver, options.scheduleDrain);
    this.fetchTimeoutMs = options.fetchTimeoutMs;
    this.now = options.now ?? Date.now;
  }

  /* -- Registration ------------------------------------------------------- */

  /** Start polling `source` for a panel, replacing any existing task. */
  register(panelId: string, source: Source, intervalMs: number): void {
    if (this.tasks.has(panelId)) this.unregister(panelId);
    const task: PollTask = { panelId, source, intervalMs, state: this.suspended ? "paused" : "active" };
    this.tasks.set(panelId, task);
    if (task.state === "paused") return;
    this.startTimer(task);
    this.tick(task);
  }

  /** Cancel a panel's task. Any result still in flight is dropped. */
  unregister(panelId: string): void {
    const task = this.tasks.get(panelId);
    if (!task) return;
    this.stopTimer(task);
    task.state = "stopped";
    task.inFlight?.abort(new SourceFetchError("Poll task cancelled", "transient"));
    task.inFlight = undefined;
    this.tasks.delete(panelId);
    this.mailbox.discard(panelId);
  }

  has(panelId: string): boolean {
    return this.tasks.has(panelId);
  }

  stateOf(panelId: string): PollTaskState | undefined {
    return this.tasks.get(panelId)?.state;
  }

  /* -- Control ------------------------------------------------------------ */

  pause(panelId: string): void {
    const task = this.tasks.get(panelId);
    if (!task || task.state !== "active") return;
    task.state = "paused";
    this.stopTimer(task);
  }

  /** Resume a paused task; it polls straight away. */
  resume(panelId: string): void {
    const task = this.tasks.get(panelId);
    if (!task || task.state !== "paused") return;
    task.state = "active";
    this.startTimer(task);
    this.tick(task);
  }

  pauseAll(): void {
    this.suspended = true;
    for (const panelId of this.tasks.keys()) this.pause(panelId);
  }

  resumeAll(): void {
    this.suspended = false;
    for (const panelId of this.tasks.keys()) this.resume(panelId);
  }

  /** Change a task's interval; an active task keeps its phase from now on. */
  setInterval(panelId: string, intervalMs: number): void {
    const task = this.tasks.get(panelId);
    if (!task) return;
    task.intervalMs = intervalMs;
    if (task.state === "active") {
      this.stopTimer(task);
      this.startTimer(task);
    }
  }

  stats(): SchedulerStats {
    const stats: SchedulerStats = { active: 0, paused: 0, stopped: 0, inFlight: 0, skipped: this.skipped };
    for (const task of this.tasks.values()) {
      stats[task.state] += 1;
      if (task.inFlight) stats.inFlight += 1;
    }
    return stats;
  }

  /** Deliver pending results now instead of on the next macrotask. */
  flushDeliveries(): void {
    this.mailbox.drain();
  }

  dispose(): void {
    for (const panelId of Array.from(this.tasks.keys())) this.unregister(panelId);
    this.mailbox.dispose();
  }

  /* -- Polling ------------------------------------------------------------ */

  private tick(task: PollTask): void {
    if (task.state !== "active") return;
    if (task.inFlight) {
      this.skipped += 1;
      log.debug(`Skipped tick for ${task.panelId}: previous fetch still running`);
      return;
    }
    this.poll(task).catch((error: unknown) => {
      log.error(`Poll of ${task.panelId} failed unexpectedly: ${describeError(error)}`);
    });
  }

  private async poll(task: PollTask): Promise<void> {
    const controller = new AbortController();
    task.inFlight = controller;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new SourceFetchError(`Fetch timed out after ${this.fetchTimeoutMs} ms`, "transient");
        controller.abort(error);
        reject(error);
      }, this.fetchTimeoutMs);
    });

    let result: DeliveryResult;
    try {
      const value = await Promise.race([this.invoke(task.source, controller.signal), timedOut]);
      result = { ok: true, value, at: this.now() };
    } catch (error) {
      result = { ok: false, error: toSourceFetchError(error), at: this.now() };
    } finally {
      clearTimeout(timer);
    }

    // Cancelled or replaced while the fetch ran.
    if (task.inFlight !== controller) return;
    task.inFlight = undefined;
    if (this.tasks.get(task.panelId) !== task) return;

    if (!result.ok) {
      if (result.error.severity === "permanent") {
        task.state = "stopped";
        this.stopTimer(task);
        log.warn(`Stopped polling ${task.panelId}: ${result.error.message}`);
      } else {
        log.debug(`Fetch for ${task.panelId} failed: ${result.error.message}`);
      }
    }
    this.mailbox.post(task.panelId, result);
  }

  /** A fetch that throws synchronously still yields a rejection. */
  private invoke(source: Source, signal: AbortSignal): Promise<DataValue> {
    try {
      return source.fetch(signal);
    } catch (error) {
      return Promise.reject(error);
    }
  }

  private startTimer(task: PollTask): void {
    task.timer = setInterval(() => this.tick(task), task.intervalMs);
  }

  private stopTimer(task: PollTask): void {
    if (task.timer !== undefined) clearInterval(task.timer);
    task.timer = undefined;
  }
}
