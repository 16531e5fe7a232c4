/**
 * pagewise - Entry Sequence
 * Ordered items with an optional trailing footer slot
 *
 * Items are unique by key; membership is tracked in a Set so
 * duplicate checks stay O(1). The footer, when present, is always last.
 */

import type {
  FooterEntry,
  FooterMarker,
  ItemEntry,
  KeyFn,
  ListEntry,
} from "../types";

// =============================================================================
// Types
// =============================================================================

/** Outcome of placing a footer */
export interface FooterPlacement {
  index: number;
  change: "inserted" | "changed";
}

/** Sequence instance */
export interface Sequence<T> {
  /** Entries including the footer */
  size: () => number;

  /** Items only */
  itemCount: () => number;

  /** Footer state, or null without a footer */
  footer: () => FooterMarker | null;

  get: (index: number) => ListEntry<T> | undefined;
  has: (item: T) => boolean;

  /**
   * Insert the items not already present at `index` (clamped before the footer).
   * Returns the items actually inserted.
   */
  insert: (items: readonly T[], index: number) => T[];

  /** Remove the item at `index`; footer slots are never removed here */
  removeAt: (index: number) => T | undefined;

  /** Place or replace the footer */
  setFooter: (state: FooterMarker) => FooterPlacement;

  /** Remove the footer, returning its former index or -1 */
  removeFooter: () => number;

  clear: () => void;

  entries: () => ListEntry<T>[];
  items: () => T[];
}

// =============================================================================
// Guards
// =============================================================================

export const isItemEntry = <T>(
  entry: ListEntry<T> | undefined,
): entry is ItemEntry<T> => entry?.kind === "item";

export const isFooterEntry = <T>(
  entry: ListEntry<T> | undefined,
): entry is FooterEntry => entry?.kind === "footer";

// =============================================================================
// Sequence Implementation
// =============================================================================

const identity = <T>(item: T): unknown => item;

export const createSequence = <T>(getKey: KeyFn<T> = identity): Sequence<T> => {
  let entries: ListEntry<T>[] = [];
  const keys = new Set<unknown>();

  const lastEntry = (): ListEntry<T> | undefined => entries[entries.length - 1];

  const footer = (): FooterMarker | null => {
    const last = lastEntry();
    return isFooterEntry(last) ? last.state : null;
  };

  const itemCount = (): number =>
    footer() === null ? entries.length : entries.length - 1;

  const get = (index: number): ListEntry<T> | undefined => {
    if (!Number.isInteger(index) || index < 0 || index >= entries.length) {
      return undefined;
    }
    return entries[index];
  };

  const has = (item: T): boolean => keys.has(getKey(item));

  const insert = (items: readonly T[], index: number): T[] => {
    const added: T[] = [];

    for (const item of items) {
      const key = getKey(item);
      if (keys.has(key)) continue;

      keys.add(key);
      added.push(item);
    }

    if (added.length > 0) {
      const at = Math.min(Math.max(0, index), itemCount());
      const fresh = added.map((item): ListEntry<T> => ({ kind: "item", item }));
      entries = entries.slice(0, at).concat(fresh, entries.slice(at));
    }

    return added;
  };

  const removeAt = (index: number): T | undefined => {
    const entry = get(index);
    if (!isItemEntry(entry)) {
      return undefined;
    }

    entries.splice(index, 1);
    keys.delete(getKey(entry.item));
    return entry.item;
  };

  const setFooter = (state: FooterMarker): FooterPlacement => {
    const marker: ListEntry<T> = { kind: "footer", state };

    if (footer() !== null) {
      const index = entries.length - 1;
      entries[index] = marker;
      return { index, change: "changed" };
    }

    entries.push(marker);
    return { index: entries.length - 1, change: "inserted" };
  };

  const removeFooter = (): number => {
    if (footer() === null) {
      return -1;
    }

    entries.pop();
    return entries.length;
  };

  const clear = (): void => {
    entries = [];
    keys.clear();
  };

  return {
    size: () => entries.length,
    itemCount,
    footer,
    get,
    has,
    insert,
    removeAt,
    setFooter,
    removeFooter,
    clear,
    entries: () => [...entries],
    items: () =>
      entries.flatMap((entry) => (entry.kind === "item" ? [entry.item] : [])),
  };
};
