/**
 * pagewise - Paged collections for infinite lists
 * Page-boundary state machine and list-mutation contract, framework agnostic
 *
 * @packageDocumentation
 */

// Collection
export {
  createPagedCollection,
  createSequence,
  isItemEntry,
  isFooterEntry,
  type PagedCollection,
  type PagedCollectionConfig,
  type Sequence,
  type FooterPlacement,
} from "./collection";

// Paging
export {
  createPageLoader,
  fromAdapter,
  type PageLoader,
  type PageLoaderConfig,
  type PageLoaderOptions,
} from "./paging";

// Scroll
export {
  createScrollSource,
  calculateLastVisibleIndex,
  type ScrollSource,
  type ScrollSourceConfig,
} from "./scroll";

// Events
export {
  createEmitter,
  createChannel,
  syncScheduler,
  microtaskScheduler,
  type Emitter,
  type Channel,
  type ChannelConfig,
  type Scheduler,
} from "./events";

// Constants
export { DEFAULT_OFFSET, DEFAULT_PAGE_SIZE } from "./constants";

// Types
export { LoadingState } from "./types";
export type {
  FooterMarker,
  ItemEntry,
  FooterEntry,
  ListEntry,
  KeyFn,
  PagePosition,
  PageRequest,
  PageSink,
  PageFetcher,
  PageOutput,
  PageAdapter,
  PageAdapterResponse,
  Placeholder,
  ViewNotifier,
  ScrollListener,
  PagingView,
  PagedCollectionEvents,
  EventMap,
  EventHandler,
  Unsubscribe,
} from "./types";
