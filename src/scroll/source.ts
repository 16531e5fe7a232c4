/**
 * pagewise - Scroll Source
 * Reports the last visible row of a fixed-row-height scroll container
 *
 * Combine with a notifier to get a complete view:
 *
 * ```ts
 * const source = createScrollSource(container, {
 *   itemSize: 48,
 *   getItemCount: collection.size,
 * });
 * collection.attachTo({ ...notifier, onScroll: source.onScroll });
 * ```
 */

import type { ScrollListener, Unsubscribe } from "../types";
import { DEFAULT_IDLE_TIMEOUT, LOG_PREFIX } from "../constants";

// =============================================================================
// Types
// =============================================================================

/** Scroll source configuration */
export interface ScrollSourceConfig {
  /** Row height in pixels */
  itemSize: number;

  /**
   * Report only after scrolling has been idle this long, in ms
   * (default: 0, report on every scroll event)
   */
  idleTimeout?: number;

  /**
   * Current row count; caps the reported index. Pass the collection's
   * `size` so that overscrolling past the last row still reports it.
   */
  getItemCount?: () => number;
}

/** Scroll source instance */
export interface ScrollSource {
  /** Subscribe to last-visible-index reports */
  onScroll: (listener: ScrollListener) => Unsubscribe;

  /** Last visible row for the current scroll position */
  getLastVisibleIndex: () => number;

  /** Stop listening to the element */
  destroy: () => void;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Index of the last row intersecting the viewport.
 * -1 when nothing is visible.
 */
export const calculateLastVisibleIndex = (
  scrollTop: number,
  containerSize: number,
  itemSize: number,
  itemCount?: number,
): number => {
  if (itemSize <= 0 || containerSize <= 0) {
    return -1;
  }

  const index = Math.ceil((scrollTop + containerSize) / itemSize) - 1;

  if (itemCount !== undefined) {
    return Math.min(index, itemCount - 1);
  }
  return index;
};

// =============================================================================
// Scroll Source Implementation
// =============================================================================

export const createScrollSource = (
  element: HTMLElement,
  config: ScrollSourceConfig,
): ScrollSource => {
  const {
    itemSize,
    idleTimeout: idleMs = DEFAULT_IDLE_TIMEOUT,
    getItemCount,
  } = config;

  const listeners = new Set<ScrollListener>();
  let idleTimeout: ReturnType<typeof setTimeout> | null = null;
  let destroyed = false;

  const getLastVisibleIndex = (): number =>
    calculateLastVisibleIndex(
      element.scrollTop,
      element.clientHeight,
      itemSize,
      getItemCount?.(),
    );

  const report = (): void => {
    const index = getLastVisibleIndex();

    listeners.forEach((listener) => {
      try {
        listener(index);
      } catch (error) {
        console.error(`${LOG_PREFIX} Error in scroll listener:`, error);
      }
    });
  };

  const handleScroll = (): void => {
    if (idleMs <= 0) {
      report();
      return;
    }

    if (idleTimeout) {
      clearTimeout(idleTimeout);
    }

    idleTimeout = setTimeout(() => {
      idleTimeout = null;
      report();
    }, idleMs);
  };

  const onScroll = (listener: ScrollListener): Unsubscribe => {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  };

  const destroy = (): void => {
    if (destroyed) return;
    destroyed = true;

    if (idleTimeout) {
      clearTimeout(idleTimeout);
      idleTimeout = null;
    }

    element.removeEventListener("scroll", handleScroll);
    listeners.clear();
  };

  element.addEventListener("scroll", handleScroll, { passive: true });

  return {
    onScroll,
    getLastVisibleIndex,
    destroy,
  };
};
