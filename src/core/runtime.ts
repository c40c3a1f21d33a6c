import { loadConfig, type RegistryConfig } from "../config";
import { makeLogger, type ILogger } from "../logging";
import { normalizeCommand, parseCommand, toAddress } from "../model/validation";
import type { ExternalId } from "../types/brands";
import { accessGate, listRegisteredAccounts } from "./access";
import { notInQueue, RegistryError } from "./errors";
import { computeStateRoot, hashCommand } from "./hash";
import { liveBalances } from "./ledger";
import { add, sub } from "./math";
import { cost, priorityFromStake } from "./pricing";
import { entryOf } from "./queue";
import { applyCommand, genesis, type Applied } from "./reducer";
import type {
  Address,
  Command,
  Hex,
  Receipt,
  RegistryEvent,
  RegistryState,
  Roles,
  StakeEntry,
  Supply,
} from "./types";

export type Clock = () => bigint;

/** Wall-clock seconds. */
export const systemClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));

export type Listener = (event: RegistryEvent, receipt: Receipt) => void;

export interface RuntimeOptions {
  config?: RegistryConfig;
  clock?: Clock;
  logger?: ILogger;
  state?: RegistryState;
}

/** Supply counters plus the totals derived from them. */
export interface SupplyView extends Supply {
  locked: bigint; // escrowed stake still in the queue
  minted: bigint; // accrued + refunded
  burned: bigint; // escrowed
}

export interface Committed<T> {
  receipt: Receipt;
  output: T;
}

/* ── runtime shell ───────────────────────────────────────── */
export class Runtime {
  private current: RegistryState;
  private seq = 0;
  private readonly config: RegistryConfig;
  private readonly clock: Clock;
  private readonly log: ILogger;
  private readonly listeners = new Set<Listener>();
  private readonly outbox: { event: RegistryEvent; receipt: Receipt }[] = [];
  private draining = false;

  constructor(opts: RuntimeOptions = {}) {
    this.config = opts.config ?? loadConfig();
    this.clock = opts.clock ?? systemClock;
    this.log = opts.logger ?? makeLogger(this.config.logLevel);
    this.current = opts.state ?? genesis(this.config.roles);
  }

  get state(): RegistryState {
    return this.current;
  }

  /* ── commit path ─────────────────────────────────────── */

  /**
   * Apply one command: sample the clock once, commit on success, then notify.
   * Addresses are lowercased first.
   */
  execute(input: Command): Committed<StakeEntry | undefined> {
    const cmd = normalizeCommand(input);
    const now = this.clock();
    this.log.debug({ type: cmd.type, now: now.toString() }, "apply");
    const applied = this.apply(cmd, now);

    // the receipt is built before the swap so a failure here commits nothing
    const receipt: Receipt = {
      seq: this.seq + 1,
      timestamp: now,
      inputHash: hashCommand(cmd),
      root: computeStateRoot(applied.next),
      events: applied.events,
    };
    this.current = applied.next;
    this.seq = receipt.seq;
    this.log.info(
      { type: cmd.type, seq: receipt.seq, root: receipt.root, events: receipt.events.length },
      "commit",
    );

    for (const event of applied.events) this.outbox.push({ event, receipt });
    this.drain();
    return { receipt, output: applied.output };
  }

  private apply(cmd: Command, now: bigint): Applied {
    try {
      return applyCommand(this.current, cmd, now, this.config.rates);
    } catch (err) {
      if (err instanceof RegistryError) {
        this.log.warn({ type: cmd.type, code: err.code, details: err.details }, err.message);
      }
      throw err;
    }
  }

  /** Validate untrusted input and execute it. */
  submit(raw: unknown): Committed<StakeEntry | undefined> {
    return this.execute(parseCommand(raw));
  }

  // Listeners may call back into the runtime; their events are queued behind
  // the ones already pending. A failing listener does not stop delivery.
  private drain(): void {
    if (this.draining) return;
    this.draining = true;
    try {
      for (let next = this.outbox.shift(); next; next = this.outbox.shift()) {
        for (const listener of [...this.listeners]) {
          try {
            listener(next.event, next.receipt);
          } catch (err) {
            this.log.error({ err, type: next.event.type }, "listener failed");
          }
        }
      }
    } finally {
      this.draining = false;
    }
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /* ── operations ──────────────────────────────────────── */

  register(caller: Address): Receipt {
    return this.execute({ type: "register", caller }).receipt;
  }

  transfer(caller: Address, recipient: Address, amount: bigint): Receipt {
    return this.execute({ type: "transfer", caller, recipient, amount }).receipt;
  }

  enterQueue(
    caller: Address,
    weight: bigint,
    priorityValue: bigint,
    externalId: ExternalId,
  ): Receipt {
    return this.execute({ type: "enterQueue", caller, weight, priorityValue, externalId })
      .receipt;
  }

  changeStakeBalance(
    caller: Address,
    weight: bigint,
    priorityValue: bigint,
    externalId: ExternalId,
  ): Receipt {
    return this.execute({ type: "changeStake", caller, weight, priorityValue, externalId })
      .receipt;
  }

  removeStakeFromQueue(caller: Address, externalId: ExternalId): Receipt {
    return this.execute({ type: "removeStake", caller, externalId }).receipt;
  }

  /** Consume the head of the queue and return it. */
  dequeueItem(caller: Address): StakeEntry {
    const { output } = this.execute({ type: "dequeue", caller });
    if (!output) throw new Error("dequeue committed without an entry");
    return output;
  }

  setController(caller: Address, controller: Address): Receipt {
    return this.execute({ type: "setController", caller, controller }).receipt;
  }

  transferOwnership(caller: Address, owner: Address): Receipt {
    return this.execute({ type: "transferOwnership", caller, owner }).receipt;
  }

  /* ── views (never mutate) ────────────────────────────── */

  isRegistered(account: Address): boolean {
    return accessGate(this.current).isRegistered(toAddress(account));
  }

  liveRegularBalance(account: Address, now: bigint = this.clock()): bigint {
    return liveBalances(this.current.accounts.get(toAddress(account)), this.config.rates, now)
      .regular;
  }

  liveRestrictedBalance(account: Address, now: bigint = this.clock()): bigint {
    return liveBalances(this.current.accounts.get(toAddress(account)), this.config.rates, now)
      .restricted;
  }

  getQueuePosition(externalId: ExternalId): number {
    const position = this.current.queue.index.get(externalId);
    if (position === undefined) throw notInQueue(externalId);
    return position;
  }

  getQueueContents(): readonly StakeEntry[] {
    return this.current.queue.entries;
  }

  getStake(externalId: ExternalId): StakeEntry | undefined {
    return entryOf(this.current.queue, externalId);
  }

  listRegisteredAccounts(): Address[] {
    return listRegisteredAccounts(this.current);
  }

  cost(weight: bigint, priorityValue: bigint): bigint {
    return cost(weight, priorityValue);
  }

  priorityFromStake(weight: bigint, stakedCoins: bigint): bigint {
    return priorityFromStake(weight, stakedCoins);
  }

  supply(): SupplyView {
    const s = this.current.supply;
    return {
      ...s,
      locked: sub(sub(s.escrowed, s.refunded), s.destroyed),
      minted: add(s.accrued, s.refunded),
      burned: s.escrowed,
    };
  }

  stateRoot(): Hex {
    return computeStateRoot(this.current);
  }

  roles(): Roles {
    return this.current.roles;
  }
}
