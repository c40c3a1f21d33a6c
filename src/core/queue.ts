import type { ExternalId } from "../types/brands";
import type { QueueState, StakeEntry } from "./types";

export const emptyQueue = (): QueueState => ({ entries: [], index: new Map() });

/* ── ordering ────────────────────────────────────────────── */

/**
 * Negative when `a` ranks ahead of `b`: higher priority first, then lighter
 * weight, then earlier timestamp.
 */
export const compareEntries = (a: StakeEntry, b: StakeEntry): number => {
  if (a.priorityValue !== b.priorityValue) return a.priorityValue > b.priorityValue ? -1 : 1;
  if (a.weight !== b.weight) return a.weight < b.weight ? -1 : 1;
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
  return 0;
};

// Upper bound: the slot after every entry that ranks ahead of or equal to
// `entry`. `at(i)` reads a virtual sequence of length `n`.
const upperBound = (
  n: number,
  at: (i: number) => StakeEntry,
  entry: StakeEntry,
): number => {
  let lo = 0;
  let hi = n;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (compareEntries(at(mid), entry) <= 0) lo = mid + 1;
    else hi = mid;
  }
  return lo;
};

/* ── lookups ─────────────────────────────────────────────── */

export const positionOf = (q: QueueState, id: ExternalId): number | undefined =>
  q.index.get(id);

export const isLive = (q: QueueState, id: ExternalId): boolean => q.index.has(id);

export const entryOf = (q: QueueState, id: ExternalId): StakeEntry | undefined => {
  const pos = q.index.get(id);
  return pos === undefined ? undefined : q.entries[pos];
};

/* ── mutations (copy-on-write) ───────────────────────────── */

export interface Placed {
  queue: QueueState;
  position: number;
}

/** Insert a new entry, shifting the tail one slot outward. */
export const insert = (q: QueueState, entry: StakeEntry): Placed => {
  if (q.index.has(entry.externalId)) {
    throw new Error(`duplicate live id ${entry.externalId}`);
  }
  const entries = [...q.entries];
  const index = new Map(q.index);
  const position = upperBound(entries.length, (i) => entries[i], entry);

  entries.push(entry);
  for (let i = entries.length - 2; i >= position; i--) {
    const shifted = entries[i];
    entries[i + 1] = shifted;
    index.set(shifted.externalId, i + 1);
  }
  entries[position] = entry;
  index.set(entry.externalId, position);

  return { queue: { entries, index }, position };
};

export interface Moved {
  queue: QueueState;
  from: number;
  to: number;
}

/**
 * Replace a live entry with its repriced version and move it to the slot its
 * new key ranks at. Only the run strictly between the two slots shifts.
 */
export const reposition = (q: QueueState, updated: StakeEntry): Moved => {
  const from = q.index.get(updated.externalId);
  if (from === undefined) throw new Error(`unknown id ${updated.externalId}`);

  const entries = [...q.entries];
  const index = new Map(q.index);
  // rank against the queue with the old entry taken out
  const to = upperBound(
    entries.length - 1,
    (i) => (i < from ? entries[i] : entries[i + 1]),
    updated,
  );

  if (to < from) {
    for (let i = from - 1; i >= to; i--) {
      const shifted = entries[i];
      entries[i + 1] = shifted;
      index.set(shifted.externalId, i + 1);
    }
  } else if (to > from) {
    for (let i = from + 1; i <= to; i++) {
      const shifted = entries[i];
      entries[i - 1] = shifted;
      index.set(shifted.externalId, i - 1);
    }
  }
  entries[to] = updated;
  index.set(updated.externalId, to);

  return { queue: { entries, index }, from, to };
};

export interface Removed {
  queue: QueueState;
  entry: StakeEntry;
}

/** Remove the entry at `position`, shifting everything behind it headward. */
export const removeAt = (q: QueueState, position: number): Removed => {
  const entry = q.entries[position];
  if (entry === undefined) throw new Error(`no entry at ${position}`);

  const entries = [...q.entries];
  const index = new Map(q.index);
  for (let i = position + 1; i < entries.length; i++) {
    const shifted = entries[i];
    entries[i - 1] = shifted;
    index.set(shifted.externalId, i - 1);
  }
  entries.pop();
  index.delete(entry.externalId);

  return { queue: { entries, index }, entry };
};

/* ── invariant check ─────────────────────────────────────── */

/** Returns a description of the first violation found, or null. */
export const checkQueue = (q: QueueState): string | null => {
  if (q.index.size !== q.entries.length) {
    return `index holds ${q.index.size} ids for ${q.entries.length} entries`;
  }
  for (let i = 0; i < q.entries.length; i++) {
    const e = q.entries[i];
    if (q.index.get(e.externalId) !== i) return `index of ${e.externalId} is not ${i}`;
    if (i > 0 && compareEntries(q.entries[i - 1], e) > 0) {
      return `entries ${i - 1} and ${i} are out of order`;
    }
  }
  return null;
};
