/**
 * pagewise - Test Helpers
 * Fakes for the view, the placeholder and the fetch routine
 */

import { vi } from "vitest";
import type {
  PageFetcher,
  PageRequest,
  PageSink,
  PagingView,
  Placeholder,
  ScrollListener,
} from "../src/types";

/** Wait for pending promise callbacks and microtasks */
export const flushPromises = (): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, 0));

export interface Doc {
  id: number;
  title: string;
}

export const createDocs = (count: number, startId: number = 1): Doc[] =>
  Array.from({ length: count }, (_, i) => ({
    id: startId + i,
    title: `Doc ${startId + i}`,
  }));

/** View double recording notifications, with a scroll trigger */
export const createMockView = () => {
  const listeners = new Set<ScrollListener>();

  const view = {
    notifyInserted: vi.fn((_index: number) => {}),
    notifyRangeInserted: vi.fn((_start: number, _count: number) => {}),
    notifyChanged: vi.fn((_index: number) => {}),
    notifyRemoved: vi.fn((_index: number) => {}),
    notifyReset: vi.fn(() => {}),
    onScroll: vi.fn((listener: ScrollListener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    }),
  } satisfies PagingView;

  const scrollTo = (lastVisibleIndex: number): void => {
    listeners.forEach((listener) => listener(lastVisibleIndex));
  };

  return { view, scrollTo, listenerCount: () => listeners.size };
};

export const createMockPlaceholder = () =>
  ({
    showPlaceholder: vi.fn(() => {}),
    hidePlaceholder: vi.fn(() => {}),
  }) satisfies Placeholder;

/** A fetch call captured by `createManualFetcher` */
export interface FetchCall<T> {
  request: PageRequest;
  sink: PageSink<T>;
}

/**
 * Fetch routine that records each call and leaves completion to the test.
 * `respond` runs the usual success sequence on the latest call.
 */
export const createManualFetcher = <T>() => {
  const calls: FetchCall<T>[] = [];

  const fetch: PageFetcher<T> = (request, sink) => {
    calls.push({ request, sink });
  };

  const latest = (): FetchCall<T> => {
    const call = calls[calls.length - 1];
    if (!call) {
      throw new Error("fetch was not called");
    }
    return call;
  };

  const respond = (items: T[]): void => {
    const { sink } = latest();
    sink.loading();
    sink.items(items);
    sink.done(items.length);
  };

  const fail = (reason: unknown = new Error("request failed")): void => {
    const { sink } = latest();
    sink.loading();
    sink.error(reason);
  };

  return { fetch, calls, latest, respond, fail };
};
