/**
 * pagewise - Paged Collection
 * Owns the entry sequence and the loading state of an infinite list
 *
 * The collection listens to the view's last-visible-index stream, asks the
 * page loader for the next page when the last row comes into view, and
 * applies what the loader reports through two channels:
 *
 * - items: fetched batches, appended before the footer
 * - loadingState: Loading / Error place the footer row, Done removes it
 *
 * No ordering between the two channels is assumed; a Done that overtakes
 * its batch leaves the same sequence behind.
 */

// Debug flag - set to true to enable logging
const DEBUG = false;
const log = (...args: unknown[]) => {
  if (DEBUG) console.log("[paged-collection]", ...args);
};

import {
  LoadingState,
  type EventHandler,
  type KeyFn,
  type ListEntry,
  type PagedCollectionEvents,
  type PagingView,
  type Unsubscribe,
} from "../types";
import type { PageLoader } from "../paging/loader";
import { createEmitter } from "../events/emitter";
import {
  createChannel,
  microtaskScheduler,
  syncScheduler,
  type Scheduler,
} from "../events/channel";
import { createSequence, isFooterEntry } from "./sequence";

// =============================================================================
// Types
// =============================================================================

/** Paged collection configuration */
export interface PagedCollectionConfig<T> {
  /** Page loader bound at creation */
  loader?: PageLoader<T> | null;

  /** Identity used for duplicate suppression (default: the item itself) */
  getKey?: KeyFn<T>;

  /** Request the first page as soon as a view is attached (default: true) */
  eager?: boolean;

  /** How channel deliveries are scheduled (default: microtask) */
  schedule?: Scheduler | "sync";
}

/** Paged collection instance */
export interface PagedCollection<T> {
  // View
  /** Subscribe to the view's scroll stream; loads the first page when eager */
  attachTo: (view: PagingView) => void;

  /** Release the scroll subscription */
  detach: () => void;

  /** React to the last visible row changing */
  onScrollPositionChanged: (lastVisibleIndex: number) => void;

  // Mutation
  /** Append unless present. Returns whether it was added */
  addItem: (item: T) => boolean;

  /** Append the items not yet present. Returns how many were added */
  addItems: (batch: readonly T[]) => number;

  /** Insert at `position` unless present anywhere */
  insertItem: (item: T, position: number) => boolean;

  /** Remove the item at `position`; refused while a load is active */
  removeItemAt: (position: number) => T | undefined;

  /** Empty the list, reset the loader and fetch the first page again */
  clearAndReload: () => void;

  // Access
  getItem: (position: number) => ListEntry<T> | undefined;
  isFooter: (position: number) => boolean;
  contains: (item: T) => boolean;
  getEntries: () => ListEntry<T>[];
  getItems: () => T[];

  /** Entries including the footer row */
  size: () => number;

  /** Items excluding the footer row */
  itemCount: () => number;

  getLoadingState: () => LoadingState;
  hasFooter: () => boolean;

  // Loader
  setPageLoader: (loader: PageLoader<T> | null) => void;
  getPageLoader: () => PageLoader<T> | null;

  // Events
  on: <K extends keyof PagedCollectionEvents<T>>(
    event: K,
    handler: EventHandler<PagedCollectionEvents<T>[K]>,
  ) => Unsubscribe;

  off: <K extends keyof PagedCollectionEvents<T>>(
    event: K,
    handler: EventHandler<PagedCollectionEvents<T>[K]>,
  ) => void;

  // Lifecycle
  /** Detach, unbind the loader and drop pending deliveries */
  dispose: () => void;

  isDisposed: () => boolean;
}

// =============================================================================
// Paged Collection Implementation
// =============================================================================

export const createPagedCollection = <T>(
  config: PagedCollectionConfig<T> = {},
): PagedCollection<T> => {
  const { getKey, eager = true, schedule = microtaskScheduler } = config;
  const scheduler = schedule === "sync" ? syncScheduler : schedule;

  const sequence = createSequence<T>(getKey);
  const emitter = createEmitter<PagedCollectionEvents<T>>();

  const itemsChannel = createChannel<T[]>({
    schedule: scheduler,
    name: "items channel",
  });
  const loadingStateChannel = createChannel<LoadingState>({
    schedule: scheduler,
    name: "loading state channel",
  });

  let loadingState: LoadingState = LoadingState.Done;
  let loader: PageLoader<T> | null = null;
  let disconnectLoader: Unsubscribe | null = null;
  let view: PagingView | null = null;
  let unsubscribeScroll: Unsubscribe | null = null;
  let disposed = false;

  // ==========================================================================
  // Loading State
  // ==========================================================================

  const setLoadingState = (state: LoadingState): void => {
    const previous = loadingState;
    loadingState = state;
    emitter.emit("loading:change", { state, previous });
  };

  /**
   * Reflect a loading state in the footer slot.
   * Repeating a state replaces the footer in place.
   */
  const applyLoadingState = (state: LoadingState): void => {
    log(`applyLoadingState: ${loadingState} -> ${state}`);

    if (state === LoadingState.Done) {
      const index = sequence.removeFooter();

      if (index >= 0) {
        view?.notifyRemoved(index);

        if (sequence.itemCount() === 0) {
          loader?.showPlaceholder();
        }
      }
    } else {
      const placement = sequence.setFooter(state);

      if (placement.change === "inserted") {
        view?.notifyInserted(placement.index);
      } else {
        view?.notifyChanged(placement.index);
      }
    }

    setLoadingState(state);
  };

  /**
   * Ask the loader for the next page, or settle on Done when there
   * is nothing left to ask for.
   */
  const requestPage = (): void => {
    if (disposed) return;

    if (!loader) {
      applyLoadingState(LoadingState.Done);
      return;
    }

    const position = loader.getPosition();

    if (position.reachedEnd) {
      applyLoadingState(LoadingState.Done);
      emitter.emit("end:reached", { position });
      return;
    }

    applyLoadingState(LoadingState.Loading);
    emitter.emit("fetch:request", { position });

    if (!loader.fetchNextPage()) {
      log("requestPage: loader not connected");
      applyLoadingState(LoadingState.Done);
    }
  };

  // ==========================================================================
  // View
  // ==========================================================================

  const detach = (): void => {
    unsubscribeScroll?.();
    unsubscribeScroll = null;
    view = null;
  };

  const attachTo = (next: PagingView): void => {
    if (disposed) return;

    detach();
    view = next;
    unsubscribeScroll = next.onScroll((lastVisibleIndex) => {
      onScrollPositionChanged(lastVisibleIndex);
    });

    if (eager) {
      requestPage();
    }
  };

  const onScrollPositionChanged = (lastVisibleIndex: number): void => {
    if (disposed) return;

    if (lastVisibleIndex === sequence.size() - 1) {
      log(`onScrollPositionChanged: end reached at ${lastVisibleIndex}`);
      requestPage();
    }
  };

  // ==========================================================================
  // Mutation
  // ==========================================================================

  const placeItems = (items: readonly T[], index: number): T[] => {
    const wasEmpty = sequence.itemCount() === 0;
    const added = sequence.insert(items, index);

    if (added.length > 0 && wasEmpty) {
      loader?.hidePlaceholder();
    }

    return added;
  };

  const addItem = (item: T): boolean => {
    const start = sequence.itemCount();
    const added = placeItems([item], start);

    if (added.length === 0) {
      return false;
    }

    view?.notifyInserted(start);
    emitter.emit("items:add", { items: added, start });
    return true;
  };

  const addItems = (batch: readonly T[]): number => {
    const start = sequence.itemCount();
    const added = placeItems(batch, start);

    if (added.length === 0) {
      return 0;
    }

    view?.notifyRangeInserted(start, added.length);
    emitter.emit("items:add", { items: added, start });
    return added.length;
  };

  const insertItem = (item: T, position: number): boolean => {
    if (
      !Number.isInteger(position) ||
      position < 0 ||
      position > sequence.itemCount()
    ) {
      return false;
    }

    const added = placeItems([item], position);

    if (added.length === 0) {
      return false;
    }

    view?.notifyInserted(position);
    emitter.emit("items:add", { items: added, start: position });
    return true;
  };

  const removeItemAt = (position: number): T | undefined => {
    if (loadingState !== LoadingState.Done) {
      log(`removeItemAt(${position}): refused while ${loadingState}`);
      return undefined;
    }

    const item = sequence.removeAt(position);

    if (item === undefined) {
      return undefined;
    }

    view?.notifyRemoved(position);
    emitter.emit("items:remove", { item, index: position });

    if (sequence.size() === 0) {
      loader?.showPlaceholder();
    }

    return item;
  };

  const clearAndReload = (): void => {
    if (disposed) return;

    sequence.clear();
    view?.notifyReset();

    if (loadingState !== LoadingState.Done) {
      setLoadingState(LoadingState.Done);
    }
    emitter.emit("reset", {});

    if (!loader) return;

    // The footer waits for the loader's own Loading emission
    loader.resetPosition();
    emitter.emit("fetch:request", { position: loader.getPosition() });
    loader.fetchNextPage();
  };

  // ==========================================================================
  // Loader
  // ==========================================================================

  const setPageLoader = (next: PageLoader<T> | null): void => {
    disconnectLoader?.();
    disconnectLoader = null;
    loader = next;

    if (next && !disposed) {
      disconnectLoader = next.connect({
        items: itemsChannel.send,
        loadingState: loadingStateChannel.send,
      });
    }
  };

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  const dispose = (): void => {
    if (disposed) return;

    detach();
    disconnectLoader?.();
    disconnectLoader = null;
    itemsChannel.close();
    loadingStateChannel.close();
    emitter.clear();
    disposed = true;
  };

  // ==========================================================================
  // Initialization
  // ==========================================================================

  itemsChannel.subscribe((batch) => {
    addItems(batch);
  });
  loadingStateChannel.subscribe(applyLoadingState);

  if (config.loader) {
    setPageLoader(config.loader);
  }

  return {
    attachTo,
    detach,
    onScrollPositionChanged,

    addItem,
    addItems,
    insertItem,
    removeItemAt,
    clearAndReload,

    getItem: sequence.get,
    isFooter: (position) => isFooterEntry(sequence.get(position)),
    contains: sequence.has,
    getEntries: sequence.entries,
    getItems: sequence.items,
    size: sequence.size,
    itemCount: sequence.itemCount,
    getLoadingState: () => loadingState,
    hasFooter: () => sequence.footer() !== null,

    setPageLoader,
    getPageLoader: () => loader,

    on: emitter.on,
    off: emitter.off,

    dispose,
    isDisposed: () => disposed,
  };
};
