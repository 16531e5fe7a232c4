/**
 * pagewise - Event Emitter
 * Typed side-channel for collection events (requests, state changes, resets)
 */

import type { EventHandler, Unsubscribe, EventMap } from "../types";
import { LOG_PREFIX } from "../constants";

type HandlerSets<T extends EventMap> = {
  [K in keyof T]?: Set<EventHandler<T[K]>>;
};

// =============================================================================
// Event Emitter
// =============================================================================

export const createEmitter = <T extends EventMap>() => {
  const handlers: HandlerSets<T> = {};

  const off = <K extends keyof T>(
    event: K,
    handler: EventHandler<T[K]>,
  ): void => {
    const set = handlers[event];
    if (!set) return;

    set.delete(handler);
    if (set.size === 0) {
      delete handlers[event];
    }
  };

  /** Returns the matching `off` */
  const on = <K extends keyof T>(
    event: K,
    handler: EventHandler<T[K]>,
  ): Unsubscribe => {
    const set = handlers[event] ?? new Set<EventHandler<T[K]>>();
    set.add(handler);
    handlers[event] = set;

    return () => off(event, handler);
  };

  /**
   * Deliver `payload` to a snapshot of the current handlers.
   * A throwing handler is logged and the rest still run.
   */
  const emit = <K extends keyof T>(event: K, payload: T[K]): void => {
    const set = handlers[event];
    if (!set) return;

    for (const handler of [...set]) {
      try {
        handler(payload);
      } catch (error) {
        console.error(
          `${LOG_PREFIX} Error in event handler for "${String(event)}":`,
          error,
        );
      }
    }
  };

  /** Drop the handlers of one event, or of every event */
  const clear = (event?: keyof T): void => {
    if (event !== undefined) {
      delete handlers[event];
      return;
    }

    for (const key in handlers) {
      delete handlers[key];
    }
  };

  return { on, off, emit, clear };
};

export type Emitter<T extends EventMap> = ReturnType<typeof createEmitter<T>>;
