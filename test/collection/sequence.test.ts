/**
 * pagewise - Entry Sequence Tests
 */

import { describe, it, expect } from "vitest";
import {
  createSequence,
  isFooterEntry,
  isItemEntry,
} from "../../src/collection";
import { createDocs, type Doc } from "../helpers";

describe("createSequence", () => {
  it("should start empty without a footer", () => {
    const sequence = createSequence<Doc>();

    expect(sequence.size()).toBe(0);
    expect(sequence.itemCount()).toBe(0);
    expect(sequence.footer()).toBeNull();
  });

  it("should insert only items that are not present", () => {
    const [a, b, c] = createDocs(3);
    const sequence = createSequence<Doc>();

    expect(sequence.insert([a, b], 0)).toEqual([a, b]);
    expect(sequence.insert([b, c, c], 2)).toEqual([c]);
    expect(sequence.items()).toEqual([a, b, c]);
  });

  it("should compare by key when a key function is given", () => {
    const sequence = createSequence<Doc>((doc) => doc.id);

    sequence.insert([{ id: 1, title: "first" }], 0);

    expect(sequence.has({ id: 1, title: "edited" })).toBe(true);
    expect(sequence.insert([{ id: 1, title: "edited" }], 1)).toEqual([]);
  });

  it("should compare by identity by default", () => {
    const sequence = createSequence<Doc>();

    sequence.insert([{ id: 1, title: "same" }], 0);

    expect(sequence.has({ id: 1, title: "same" })).toBe(false);
  });

  it("should keep the footer last when inserting past it", () => {
    const docs = createDocs(2);
    const sequence = createSequence<Doc>();

    sequence.setFooter("loading");
    sequence.insert(docs, 10);

    expect(sequence.size()).toBe(3);
    expect(sequence.itemCount()).toBe(2);
    expect(sequence.get(2)).toEqual({ kind: "footer", state: "loading" });
  });

  it("should insert a very large batch ahead of the footer", () => {
    const batch = Array.from({ length: 200_000 }, (_, i) => i);
    const sequence = createSequence<number>();
    sequence.insert([-1], 0);
    sequence.setFooter("loading");

    expect(sequence.insert(batch, 1)).toHaveLength(200_000);

    expect(sequence.size()).toBe(200_002);
    expect(sequence.get(0)).toEqual({ kind: "item", item: -1 });
    expect(sequence.get(200_000)).toEqual({ kind: "item", item: 199_999 });
    expect(sequence.get(200_001)).toEqual({ kind: "footer", state: "loading" });
  });

  it("should replace an existing footer in place", () => {
    const sequence = createSequence<Doc>();
    sequence.insert(createDocs(2), 0);

    expect(sequence.setFooter("loading")).toEqual({
      index: 2,
      change: "inserted",
    });
    expect(sequence.setFooter("error")).toEqual({ index: 2, change: "changed" });
    expect(sequence.size()).toBe(3);
    expect(sequence.footer()).toBe("error");
  });

  it("should remove the footer and report its index", () => {
    const sequence = createSequence<Doc>();
    sequence.insert(createDocs(4), 0);
    sequence.setFooter("loading");

    expect(sequence.removeFooter()).toBe(4);
    expect(sequence.removeFooter()).toBe(-1);
    expect(sequence.size()).toBe(4);
  });

  it("should remove items but never the footer through removeAt", () => {
    const [a, b] = createDocs(2);
    const sequence = createSequence<Doc>();
    sequence.insert([a, b], 0);
    sequence.setFooter("error");

    expect(sequence.removeAt(2)).toBeUndefined();
    expect(sequence.removeAt(0)).toBe(a);
    expect(sequence.has(a)).toBe(false);
    expect(sequence.size()).toBe(2);
  });

  it("should return undefined for out-of-range access", () => {
    const sequence = createSequence<Doc>();
    sequence.insert(createDocs(1), 0);

    expect(sequence.get(-1)).toBeUndefined();
    expect(sequence.get(1)).toBeUndefined();
    expect(sequence.get(0.5)).toBeUndefined();
    expect(sequence.removeAt(3)).toBeUndefined();
  });

  it("should forget keys on clear", () => {
    const [a] = createDocs(1);
    const sequence = createSequence<Doc>();
    sequence.insert([a], 0);
    sequence.setFooter("loading");

    sequence.clear();

    expect(sequence.size()).toBe(0);
    expect(sequence.insert([a], 0)).toEqual([a]);
  });

  it("should discriminate entries", () => {
    const [a] = createDocs(1);
    const sequence = createSequence<Doc>();
    sequence.insert([a], 0);
    sequence.setFooter("loading");

    const [first, last] = sequence.entries();

    expect(isItemEntry(first)).toBe(true);
    expect(isFooterEntry(first)).toBe(false);
    expect(isFooterEntry(last)).toBe(true);
    expect(isItemEntry(undefined)).toBe(false);
  });
});
