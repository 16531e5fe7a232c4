/**
 * pagewise - Type Definitions
 * Types and interfaces for the paged collection and its page loader
 */

// =============================================================================
// Utility Types
// =============================================================================

/** Event map base type */
export type EventMap = Record<string, unknown>;

/** Event handler type */
export type EventHandler<T> = (payload: T) => void;

/** Unsubscribe function */
export type Unsubscribe = () => void;

// =============================================================================
// Loading State
// =============================================================================

/** Loading state values */
export const LoadingState = {
  Done: "done",
  Loading: "loading",
  Error: "error",
} as const;

/** Page loading state */
export type LoadingState = (typeof LoadingState)[keyof typeof LoadingState];

/** A loading state that occupies the footer slot */
export type FooterMarker = Exclude<LoadingState, "done">;

// =============================================================================
// Entries
// =============================================================================

/** A real item in the sequence */
export interface ItemEntry<T> {
  kind: "item";
  item: T;
}

/** The synthetic trailing row */
export interface FooterEntry {
  kind: "footer";
  state: FooterMarker;
}

/** One slot of the sequence */
export type ListEntry<T> = ItemEntry<T> | FooterEntry;

/** Derives the identity used for duplicate suppression */
export type KeyFn<T> = (item: T) => unknown;

// =============================================================================
// Paging
// =============================================================================

/** Pagination bookkeeping */
export interface PagePosition {
  /** Position a pagination epoch starts from */
  offset: number;

  /** Items requested per page */
  pageSize: number;

  /** Position the next page is fetched from */
  currentPosition: number;

  /** Data source is exhausted for this epoch */
  reachedEnd: boolean;
}

/** Parameters handed to a fetch routine */
export interface PageRequest {
  /** Position to read from (the loader's currentPosition) */
  offset: number;

  /** Number of items to read (the loader's pageSize) */
  limit: number;
}

/**
 * Progress reporting for a single fetch.
 * Every fetch must end with exactly one `done` or `error`.
 */
export interface PageSink<T> {
  /** Report that the fetch has started */
  loading: () => void;

  /** Deliver a fetched batch */
  items: (batch: T[]) => void;

  /** Advance the position by `itemsLoaded` and report Done */
  done: (itemsLoaded: number) => void;

  /** Report a failed fetch */
  error: (reason?: unknown) => void;
}

/** Application-specific data access */
export type PageFetcher<T> = (
  request: PageRequest,
  sink: PageSink<T>,
) => void | Promise<void>;

/** Where a page loader delivers its emissions */
export interface PageOutput<T> {
  items: (batch: T[]) => void;
  loadingState: (state: LoadingState) => void;
}

/** Empty-state UI toggled when the sequence becomes empty */
export interface Placeholder {
  showPlaceholder: () => void;
  hidePlaceholder: () => void;
}

/** Async adapter shape accepted by `fromAdapter` */
export interface PageAdapter<T> {
  /** Fetch one page */
  read: (params: PageRequest) => Promise<PageAdapterResponse<T>>;
}

/** Response returned by `PageAdapter.read` */
export interface PageAdapterResponse<T> {
  items: T[];
}

// =============================================================================
// View
// =============================================================================

/** Mutation notifications consumed by the list widget */
export interface ViewNotifier {
  notifyInserted: (index: number) => void;
  notifyRangeInserted: (start: number, count: number) => void;
  notifyChanged: (index: number) => void;
  notifyRemoved: (index: number) => void;
  notifyReset: () => void;
}

/** Receives the index of the last visible row */
export type ScrollListener = (lastVisibleIndex: number) => void;

/** The hosting list widget */
export interface PagingView extends ViewNotifier {
  /** Subscribe to last-visible-index changes */
  onScroll: (listener: ScrollListener) => Unsubscribe;
}

// =============================================================================
// Events
// =============================================================================

/** Events emitted by a paged collection */
export interface PagedCollectionEvents<T> extends EventMap {
  /** Footer state applied */
  "loading:change": { state: LoadingState; previous: LoadingState };

  /** A page was requested from the loader */
  "fetch:request": { position: PagePosition };

  /** Scroll reached the end of an exhausted source */
  "end:reached": { position: PagePosition };

  /** Items added to the sequence */
  "items:add": { items: T[]; start: number };

  /** Item removed from the sequence */
  "items:remove": { item: T; index: number };

  /** Sequence cleared by a reload */
  reset: Record<string, never>;
}
