/**
 * Dashboard event bus.
 *
 * A lightweight in-memory emitter for the events listed in
 * `DashboardEventMap`. Components subscribe with `useEventBus`; code outside
 * React uses `onEvent`.
 */

import { useEffect, useRef } from "react";

import type { DashboardEventMap } from "@/features/dashboard/types";

/* --------------------------------------------------------------------------
   Types
   -------------------------------------------------------------------------- */

export type DashboardEventName = keyof DashboardEventMap;

export type EventHandler<K extends DashboardEventName> = (payload: DashboardEventMap[K]) => void;

/* --------------------------------------------------------------------------
   Global emitter (singleton)
   -------------------------------------------------------------------------- */

const handlers: { [K in DashboardEventName]: Set<EventHandler<K>> } = {
  notice: new Set(),
  saved: new Set(),
};

/** Emit an event to all registered listeners. */
export function emitEvent<K extends DashboardEventName>(event: K, payload: DashboardEventMap[K]): void {
  for (const handler of Array.from(handlers[event])) {
    handler(payload);
  }
}

/** Subscribe outside React. Returns the unsubscribe function. */
export function onEvent<K extends DashboardEventName>(event: K, handler: EventHandler<K>): () => void {
  handlers[event].add(handler);
  return () => {
    handlers[event].delete(handler);
  };
}

/** Subscribe to a named event. Automatically unsubscribes on unmount. */
export function useEventBus<K extends DashboardEventName>(event: K, handler: EventHandler<K>): void {
  const handlerRef = useRef(handler);
  handlerRef.current = handler;

  useEffect(() => {
    return onEvent(event, (payload) => {
      handlerRef.current(payload);
    });
  }, [event]);
}
