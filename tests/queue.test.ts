import fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
  checkQueue,
  compareEntries,
  emptyQueue,
  entryOf,
  insert,
  isLive,
  positionOf,
  removeAt,
  reposition,
} from "../src/core/queue";
import type { QueueState } from "../src/core/types";
import { asExternalId } from "../src/types/brands";
import { entry, ids } from "./helpers/state";

const build = (...entries: ReturnType<typeof entry>[]): QueueState =>
  entries.reduce((q, e) => insert(q, e).queue, emptyQueue());

describe("ordering", () => {
  it("ranks higher priority first", () => {
    expect(compareEntries(entry("a", 10n), entry("b", 5n))).toBeLessThan(0);
  });

  it("breaks priority ties by lower weight", () => {
    expect(compareEntries(entry("a", 5n, 3n), entry("b", 5n, 2n))).toBeGreaterThan(0);
  });

  it("breaks weight ties by earlier timestamp", () => {
    expect(compareEntries(entry("a", 5n, 2n, 1n), entry("b", 5n, 2n, 2n))).toBeLessThan(0);
    expect(compareEntries(entry("a", 5n, 2n, 1n), entry("b", 5n, 2n, 1n))).toBe(0);
  });
});

describe("insert", () => {
  it("places a higher priority ahead of an earlier entry", () => {
    const first = insert(emptyQueue(), entry("first", 5n));
    const second = insert(first.queue, entry("second", 10n));

    expect(first.position).toBe(0);
    expect(second.position).toBe(0);
    expect(ids(second.queue.entries)).toEqual(["second", "first"]);
    expect(positionOf(second.queue, asExternalId("first"))).toBe(1);
  });

  it("places a new entry after its equals", () => {
    const q = build(entry("a", 5n), entry("b", 5n), entry("c", 5n));
    expect(ids(q.entries)).toEqual(["a", "b", "c"]);
  });

  it("shifts the tail and keeps the index in step", () => {
    const q = build(entry("a", 50n), entry("b", 30n), entry("c", 10n));
    const { queue, position } = insert(q, entry("d", 40n));

    expect(position).toBe(1);
    expect(ids(queue.entries)).toEqual(["a", "d", "b", "c"]);
    expect([...queue.index.entries()].sort((x, y) => x[1] - y[1])).toEqual([
      ["a", 0],
      ["d", 1],
      ["b", 2],
      ["c", 3],
    ]);
  });

  it("leaves the input queue untouched", () => {
    const q = build(entry("a", 5n));
    insert(q, entry("b", 10n));
    expect(ids(q.entries)).toEqual(["a"]);
    expect(q.index.size).toBe(1);
  });

  it("refuses a live duplicate id", () => {
    const q = build(entry("a", 5n));
    expect(() => insert(q, entry("a", 7n))).toThrow("duplicate live id a");
  });
});

describe("reposition", () => {
  const q = build(entry("a", 50n), entry("b", 40n), entry("c", 30n), entry("d", 20n));

  it("moves an entry toward the head", () => {
    const moved = reposition(q, entry("d", 45n));
    expect(moved.from).toBe(3);
    expect(moved.to).toBe(1);
    expect(ids(moved.queue.entries)).toEqual(["a", "d", "b", "c"]);
    expect(checkQueue(moved.queue)).toBeNull();
  });

  it("moves an entry toward the tail", () => {
    const moved = reposition(q, entry("a", 10n));
    expect(moved.from).toBe(0);
    expect(moved.to).toBe(3);
    expect(ids(moved.queue.entries)).toEqual(["b", "c", "d", "a"]);
    expect(checkQueue(moved.queue)).toBeNull();
  });

  it("keeps the slot when the new key ranks in place", () => {
    const moved = reposition(q, entry("b", 35n));
    expect(moved.from).toBe(1);
    expect(moved.to).toBe(1);
    expect(moved.queue.entries[1]?.priorityValue).toBe(35n);
  });

  it("puts a repriced entry after its new equals", () => {
    const moved = reposition(q, entry("d", 40n));
    expect(ids(moved.queue.entries)).toEqual(["a", "b", "d", "c"]);
  });

  it("rejects ids that are not live", () => {
    expect(() => reposition(q, entry("z", 1n))).toThrow("unknown id z");
  });
});

describe("removeAt", () => {
  it("shifts everything behind the removed slot headward", () => {
    const q = build(entry("a", 50n), entry("b", 40n), entry("c", 30n));
    const { queue, entry: removed } = removeAt(q, 0);

    expect(removed.externalId).toBe("a");
    expect(ids(queue.entries)).toEqual(["b", "c"]);
    expect(isLive(queue, asExternalId("a"))).toBe(false);
    expect(entryOf(queue, asExternalId("c"))?.priorityValue).toBe(30n);
    expect(positionOf(queue, asExternalId("c"))).toBe(1);
  });

  it("rejects an empty slot", () => {
    expect(() => removeAt(emptyQueue(), 0)).toThrow("no entry at 0");
  });
});

describe("checkQueue", () => {
  it("reports an out-of-order pair", () => {
    const bad: QueueState = {
      entries: [entry("a", 1n), entry("b", 2n)],
      index: new Map([
        [asExternalId("a"), 0],
        [asExternalId("b"), 1],
      ]),
    };
    expect(checkQueue(bad)).toBe("entries 0 and 1 are out of order");
  });

  it("reports a stale index", () => {
    const bad: QueueState = {
      entries: [entry("a", 2n), entry("b", 1n)],
      index: new Map([
        [asExternalId("a"), 1],
        [asExternalId("b"), 1],
      ]),
    };
    expect(checkQueue(bad)).toBe("index of a is not 0");
  });
});

describe("queue invariants under random operations", () => {
  type Op =
    | { kind: "insert"; priority: bigint; weight: bigint; ts: bigint }
    | { kind: "remove"; pick: number }
    | { kind: "reprice"; pick: number; priority: bigint; weight: bigint; ts: bigint };

  const key = {
    priority: fc.bigInt({ min: 0n, max: 5n }),
    weight: fc.bigInt({ min: 2n, max: 4n }),
    ts: fc.bigInt({ min: 0n, max: 3n }),
  };
  const op: fc.Arbitrary<Op> = fc.oneof(
    fc.record({ kind: fc.constant("insert" as const), ...key }),
    fc.record({ kind: fc.constant("remove" as const), pick: fc.nat() }),
    fc.record({ kind: fc.constant("reprice" as const), pick: fc.nat(), ...key }),
  );

  it("stays sorted with an exact index", () => {
    fc.assert(
      fc.property(fc.array(op, { maxLength: 60 }), (ops) => {
        let q = emptyQueue();
        let next = 0;
        for (const o of ops) {
          const n = q.entries.length;
          if (o.kind === "insert") {
            q = insert(q, entry(`id-${next++}`, o.priority, o.weight, o.ts)).queue;
          } else if (n > 0 && o.kind === "remove") {
            q = removeAt(q, o.pick % n).queue;
          } else if (n > 0 && o.kind === "reprice") {
            const target = q.entries[o.pick % n];
            if (target) {
              q = reposition(q, entry(target.externalId, o.priority, o.weight, o.ts)).queue;
            }
          }
          expect(checkQueue(q)).toBeNull();
        }
      }),
    );
  });
});
