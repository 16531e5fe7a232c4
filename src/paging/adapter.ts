/**
 * pagewise - Adapter Bridge
 * Turns a promise-returning `read` into a fetch routine
 */

import type { PageAdapter, PageFetcher } from "../types";

/**
 * Wrap an async adapter so it honours the fetch contract:
 * Loading first, then the batch and Done, or Error on rejection.
 *
 * ```ts
 * const loader = createPageLoader({
 *   pageSize: 25,
 *   fetch: fromAdapter({
 *     read: async ({ offset, limit }) => {
 *       const res = await fetch(`/api/posts?offset=${offset}&limit=${limit}`);
 *       return { items: await res.json() };
 *     },
 *   }),
 * });
 * ```
 */
export const fromAdapter =
  <T>(adapter: PageAdapter<T>): PageFetcher<T> =>
  async (request, sink) => {
    sink.loading();

    try {
      const response = await adapter.read(request);
      sink.items(response.items);
      sink.done(response.items.length);
    } catch (error) {
      sink.error(error);
    }
  };
