/**
 * pagewise - Adapter Bridge Tests
 */

import { describe, it, expect, vi } from "vitest";
import { createPageLoader, fromAdapter } from "../../src/paging";
import type { PageAdapter, PageRequest, PageSink } from "../../src/types";
import { createDocs, flushPromises, type Doc } from "../helpers";

const createRecordingSink = () => {
  const calls: string[] = [];
  const sink: PageSink<Doc> = {
    loading: () => calls.push("loading"),
    items: (batch) => calls.push(`items:${batch.length}`),
    done: (itemsLoaded) => calls.push(`done:${itemsLoaded}`),
    error: (reason) => calls.push(`error:${String(reason)}`),
  };
  return { sink, calls };
};

const createMockAdapter = (total: number): PageAdapter<Doc> => ({
  read: vi.fn(async ({ offset, limit }: PageRequest) => {
    const end = Math.min(offset + limit, total);
    return { items: createDocs(Math.max(0, end - offset), offset + 1) };
  }),
});

describe("fromAdapter", () => {
  it("should report loading, the batch and done", async () => {
    const adapter = createMockAdapter(100);
    const { sink, calls } = createRecordingSink();

    await fromAdapter(adapter)({ offset: 0, limit: 10 }, sink);

    expect(adapter.read).toHaveBeenCalledWith({ offset: 0, limit: 10 });
    expect(calls).toEqual(["loading", "items:10", "done:10"]);
  });

  it("should report the short final page", async () => {
    const adapter = createMockAdapter(25);
    const { sink, calls } = createRecordingSink();

    await fromAdapter(adapter)({ offset: 20, limit: 10 }, sink);

    expect(calls).toEqual(["loading", "items:5", "done:5"]);
  });

  it("should report error when read rejects", async () => {
    const adapter: PageAdapter<Doc> = {
      read: () => Promise.reject("offline"),
    };
    const { sink, calls } = createRecordingSink();

    await fromAdapter(adapter)({ offset: 0, limit: 10 }, sink);

    expect(calls).toEqual(["loading", "error:offline"]);
  });

  it("should drive a page loader to the end of the source", async () => {
    const adapter = createMockAdapter(25);
    const loader = createPageLoader<Doc>({
      fetch: fromAdapter(adapter),
      pageSize: 10,
    });
    const batches: Doc[][] = [];
    loader.connect({
      items: (batch) => batches.push(batch),
      loadingState: () => {},
    });

    loader.fetchNextPage();
    await flushPromises();
    loader.fetchNextPage();
    await flushPromises();
    loader.fetchNextPage();
    await flushPromises();

    expect(batches.map((batch) => batch.length)).toEqual([10, 10, 5]);
    expect(batches[2]?.[0]?.id).toBe(21);
    expect(loader.getPosition()).toMatchObject({
      currentPosition: 25,
      reachedEnd: true,
    });
  });
});
