/**
 * pagewise - Page Loader
 * Position bookkeeping and the fetch contract for one pagination
 *
 * The application supplies a `fetch` routine; the loader hands it the
 * current request and a sink, and turns the sink calls into emissions on
 * whatever output (a collection's channels) it is connected to.
 */

// Debug flag - set to true to enable logging
const DEBUG = false;
const log = (...args: unknown[]) => {
  if (DEBUG) console.log("[page-loader]", ...args);
};

import {
  LoadingState,
  type PageFetcher,
  type PageOutput,
  type PagePosition,
  type PageSink,
  type Placeholder,
  type Unsubscribe,
} from "../types";
import { DEFAULT_OFFSET, DEFAULT_PAGE_SIZE, LOG_PREFIX } from "../constants";

// =============================================================================
// Types
// =============================================================================

/** Partial update accepted by `configure` */
export interface PageLoaderOptions {
  /** Position a pagination starts from (default: 0) */
  offset?: number;

  /** Items per page (default: 20) */
  pageSize?: number;

  /** Empty-state collaborator; `null` unbinds it */
  placeholder?: Placeholder | null;
}

/** Page loader configuration */
export interface PageLoaderConfig<T> extends PageLoaderOptions {
  /** Application-specific data access */
  fetch: PageFetcher<T>;
}

/** Page loader instance */
export interface PageLoader<T> {
  /** Update offset, page size or placeholder */
  configure: (options: PageLoaderOptions) => void;

  /**
   * Fetch the page at the current position.
   * Returns false when nothing will report back: the loader is not
   * connected. A fetch already in flight counts as started.
   */
  fetchNextPage: () => boolean;

  /** Move past `itemsLoaded` items; a short page marks the end */
  advancePosition: (itemsLoaded: number) => void;

  /** Start a new pagination epoch */
  resetPosition: () => void;

  showPlaceholder: () => void;
  hidePlaceholder: () => void;

  /** Snapshot of the pagination state */
  getPosition: () => PagePosition;

  /** Whether a fetch has started and not yet ended */
  isFetching: () => boolean;

  /** Route emissions to `output` until the returned function is called */
  connect: (output: PageOutput<T>) => Unsubscribe;
}

// =============================================================================
// Helpers
// =============================================================================

const toCount = (value: number): number =>
  Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : 0;

const toError = (reason: unknown): Error =>
  reason instanceof Error ? reason : new Error(String(reason));

// =============================================================================
// Page Loader Implementation
// =============================================================================

export const createPageLoader = <T>(
  config: PageLoaderConfig<T>,
): PageLoader<T> => {
  const { fetch } = config;

  let offset = toCount(config.offset ?? DEFAULT_OFFSET);
  let pageSize = toCount(config.pageSize ?? DEFAULT_PAGE_SIZE);
  let placeholder: Placeholder | null = config.placeholder ?? null;

  let currentPosition = offset;
  let reachedEnd = false;
  let firstLoad = true;

  let output: PageOutput<T> | null = null;
  let fetching = false;

  // Bumped whenever in-flight work must be abandoned
  let generation = 0;

  // ==========================================================================
  // Position
  // ==========================================================================

  const configure = (options: PageLoaderOptions): void => {
    if (options.offset !== undefined) {
      offset = toCount(options.offset);
      if (firstLoad) {
        currentPosition = offset;
      }
    }

    if (options.pageSize !== undefined) {
      pageSize = toCount(options.pageSize);
    }

    if (options.placeholder !== undefined) {
      placeholder = options.placeholder;
    }
  };

  const advancePosition = (itemsLoaded: number): void => {
    const loaded = toCount(itemsLoaded);

    if (loaded < pageSize) {
      reachedEnd = true;
    }
    currentPosition += loaded;

    log(`advance: +${loaded} -> ${currentPosition}, reachedEnd=${reachedEnd}`);
  };

  const resetPosition = (): void => {
    generation++;
    fetching = false;
    currentPosition = offset;
    reachedEnd = false;
    firstLoad = true;
  };

  const getPosition = (): PagePosition => ({
    offset,
    pageSize,
    currentPosition,
    reachedEnd,
  });

  // ==========================================================================
  // Placeholder
  // ==========================================================================

  const showPlaceholder = (): void => {
    placeholder?.showPlaceholder();
  };

  const hidePlaceholder = (): void => {
    placeholder?.hidePlaceholder();
  };

  // ==========================================================================
  // Fetching
  // ==========================================================================

  const fetchNextPage = (): boolean => {
    const target = output;
    if (!target) {
      log("fetchNextPage: not connected");
      return false;
    }

    if (fetching) {
      log("fetchNextPage: skipped, fetch in flight");
      return true;
    }

    fetching = true;
    firstLoad = false;

    const started = generation;
    let settled = false;

    const isCurrent = (): boolean =>
      started === generation && output === target;

    const sink: PageSink<T> = {
      loading: () => {
        if (settled || !isCurrent()) return;
        target.loadingState(LoadingState.Loading);
      },

      items: (batch) => {
        if (settled || !isCurrent()) return;
        target.items(batch);
      },

      done: (itemsLoaded) => {
        if (settled) return;
        settled = true;
        if (!isCurrent()) return;

        fetching = false;
        advancePosition(itemsLoaded);
        target.loadingState(LoadingState.Done);
      },

      error: (reason) => {
        if (settled) return;
        settled = true;
        if (!isCurrent()) return;

        fetching = false;
        console.error(`${LOG_PREFIX} Page fetch failed:`, toError(reason));
        target.loadingState(LoadingState.Error);
      },
    };

    const request = { offset: currentPosition, limit: pageSize };
    log(`fetchNextPage: offset=${request.offset}, limit=${request.limit}`);

    let result: void | Promise<void>;
    try {
      result = fetch(request, sink);
    } catch (error) {
      sink.error(error);
      return true;
    }

    if (result instanceof Promise) {
      result.catch((error) => {
        sink.error(error);
      });
    }

    return true;
  };

  const connect = (next: PageOutput<T>): Unsubscribe => {
    generation++;
    fetching = false;
    output = next;

    return () => {
      if (output === next) {
        generation++;
        fetching = false;
        output = null;
      }
    };
  };

  return {
    configure,
    fetchNextPage,
    advancePosition,
    resetPosition,
    showPlaceholder,
    hidePlaceholder,
    getPosition,
    isFetching: () => fetching,
    connect,
  };
};
