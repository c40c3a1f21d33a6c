import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { RegistryError } from "../src/core/errors";
import { liveBalances } from "../src/core/ledger";
import { checkQueue } from "../src/core/queue";
import { applyCommand, genesis } from "../src/core/reducer";
import type { Command, RegistryState } from "../src/core/types";
import { asExternalId } from "../src/types/brands";
import { ALICE, BOB, CAROL, CONTROLLER, OWNER, RATES, ROLES } from "./helpers/accounts";

const actor = fc.constantFrom(ALICE, BOB, CAROL, CONTROLLER, OWNER);
const id = fc.constantFrom("j1", "j2", "j3", "j4").map(asExternalId);
const weight = fc.bigInt({ min: 1n, max: 6n });
const priority = fc.bigInt({ min: 0n, max: 12n });

const command: fc.Arbitrary<Command> = fc.oneof(
  fc.record({ type: fc.constant("register" as const), caller: actor }),
  fc.record({
    type: fc.constant("transfer" as const),
    caller: actor,
    recipient: actor,
    amount: fc.bigInt({ min: 0n, max: 80n }),
  }),
  fc.record({
    type: fc.constant("enterQueue" as const),
    caller: actor,
    weight,
    priorityValue: priority,
    externalId: id,
  }),
  fc.record({
    type: fc.constant("changeStake" as const),
    caller: actor,
    weight,
    priorityValue: priority,
    externalId: id,
  }),
  fc.record({ type: fc.constant("removeStake" as const), caller: actor, externalId: id }),
  fc.record({ type: fc.constant("dequeue" as const), caller: actor }),
);

const step = fc.record({ cmd: command, dt: fc.bigInt({ min: 0n, max: 30n }) });

const settledTotal = (s: RegistryState): bigint =>
  [...s.accounts.values()].reduce(
    (sum, a) => sum + a.settledRegular + a.settledRestricted,
    0n,
  );

const lockedTotal = (s: RegistryState): bigint =>
  s.queue.entries.reduce((sum, e) => sum + e.stakedCoins, 0n);

/** Run a command sequence, skipping rejected commands, and check after each step. */
const replay = (
  steps: { cmd: Command; dt: bigint }[],
  check: (state: RegistryState, now: bigint) => void,
) => {
  let state = genesis(ROLES);
  let now = 0n;
  for (const { cmd, dt } of steps) {
    now += dt;
    try {
      state = applyCommand(state, cmd, now, RATES).next;
    } catch (err) {
      if (!(err instanceof RegistryError)) throw err;
    }
    check(state, now);
  }
};

describe("registry invariants", () => {
  it("keeps the queue sorted with an exact index", () => {
    fc.assert(
      fc.property(fc.array(step, { maxLength: 80 }), (steps) =>
        replay(steps, (state) => {
          expect(checkQueue(state.queue)).toBeNull();
        }),
      ),
    );
  });

  it("conserves value across accrual, transfers, escrow and consumption", () => {
    fc.assert(
      fc.property(fc.array(step, { maxLength: 80 }), (steps) =>
        replay(steps, (state) => {
          const { accrued, escrowed, refunded, destroyed } = state.supply;
          const settled = settledTotal(state);
          expect(settled + lockedTotal(state) + destroyed).toBe(accrued);
          expect(accrued + refunded - escrowed).toBe(settled);
          expect(escrowed - refunded - destroyed).toBe(lockedTotal(state));
        }),
      ),
    );
  });

  it("answers balance views identically and without mutation", () => {
    fc.assert(
      fc.property(fc.array(step, { maxLength: 40 }), (steps) =>
        replay(steps, (state, now) => {
          for (const account of state.accounts.values()) {
            const first = liveBalances(account, RATES, now);
            const second = liveBalances(account, RATES, now);
            expect(second).toEqual(first);
            expect(state.accounts.get(account.address)).toBe(account);
          }
        }),
      ),
    );
  });

  it("returns every stake in full on removal", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 2n, max: 6n }),
        // cost(6, 8) = 78 stays below the 100 accrued by t = 100
        fc.bigInt({ min: 0n, max: 8n }),
        fc.bigInt({ min: 0n, max: 50n }),
        (w, p, dt) => {
          const registered = applyCommand(
            genesis(ROLES),
            { type: "register", caller: ALICE },
            0n,
            RATES,
          ).next;
          const at = 100n + dt;
          const before = liveBalances(registered.accounts.get(ALICE), RATES, at).regular;
          const job = asExternalId("job");
          const entered = applyCommand(
            registered,
            { type: "enterQueue", caller: ALICE, weight: w, priorityValue: p, externalId: job },
            at,
            RATES,
          ).next;
          const removed = applyCommand(
            entered,
            { type: "removeStake", caller: ALICE, externalId: job },
            at,
            RATES,
          ).next;
          expect(liveBalances(removed.accounts.get(ALICE), RATES, at).regular).toBe(before);
        },
      ),
    );
  });
});
