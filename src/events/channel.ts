/**
 * pagewise - Channel
 * Ordered, single-subscriber delivery queue
 *
 * Producers may send from anywhere (a resolved fetch, a timer callback);
 * values are queued and handed to the subscriber in FIFO order from a
 * scheduled flush, so the consumer only ever runs from one place.
 * Values sent while nobody is subscribed are dropped.
 */

import type { Unsubscribe } from "../types";
import { LOG_PREFIX } from "../constants";

// =============================================================================
// Types
// =============================================================================

/** Runs a flush at some later point */
export type Scheduler = (task: () => void) => void;

/** Channel configuration */
export interface ChannelConfig {
  /** Delivery scheduler (default: queueMicrotask) */
  schedule?: Scheduler;

  /** Name used in error output */
  name?: string;
}

/** Channel instance */
export interface Channel<T> {
  /** Queue a value for delivery */
  send: (value: T) => void;

  /** Set the subscriber, replacing any previous one */
  subscribe: (handler: (value: T) => void) => Unsubscribe;

  /** Drop queued values and refuse new ones */
  close: () => void;

  isClosed: () => boolean;

  /** Number of values waiting for delivery */
  pending: () => number;
}

// =============================================================================
// Schedulers
// =============================================================================

/** Delivers inline, inside `send` */
export const syncScheduler: Scheduler = (task) => task();

/** Delivers on the microtask queue */
export const microtaskScheduler: Scheduler = (task) => queueMicrotask(task);

// =============================================================================
// Channel
// =============================================================================

export const createChannel = <T>(config: ChannelConfig = {}): Channel<T> => {
  const { schedule = microtaskScheduler, name = "channel" } = config;

  let queue: T[] = [];
  let handler: ((value: T) => void) | null = null;
  let closed = false;
  let scheduled = false;
  let flushing = false;

  const flush = (): void => {
    scheduled = false;
    flushing = true;

    try {
      while (!closed && queue.length > 0) {
        const batch = queue;
        queue = [];

        for (const value of batch) {
          if (closed) break;
          if (!handler) continue;

          try {
            handler(value);
          } catch (error) {
            console.error(`${LOG_PREFIX} Error in ${name} subscriber:`, error);
          }
        }
      }
    } finally {
      flushing = false;
    }
  };

  const send = (value: T): void => {
    if (closed) return;

    queue.push(value);

    // A running flush picks the value up
    if (scheduled || flushing) return;

    scheduled = true;
    schedule(flush);
  };

  const subscribe = (next: (value: T) => void): Unsubscribe => {
    handler = next;

    return () => {
      if (handler === next) {
        handler = null;
      }
    };
  };

  const close = (): void => {
    closed = true;
    queue = [];
    handler = null;
  };

  return {
    send,
    subscribe,
    close,
    isClosed: () => closed,
    pending: () => queue.length,
  };
};
