import type { ExternalId } from "../types/brands";
import { accessGate, type AccessGate } from "./access";
import {
  alreadyQueued,
  invalidAmount,
  notAuthorized,
  notInQueue,
  notOwner,
  notStakeOwner,
  queueEmpty,
  unregistered,
} from "./errors";
import * as ledger from "./ledger";
import { add, MAX_UINT256, sub } from "./math";
import { cost } from "./pricing";
import { emptyQueue, entryOf, insert, isLive, removeAt, reposition } from "./queue";
import type {
  Account,
  AccrualRates,
  Address,
  Command,
  QueueState,
  RegistryEvent,
  RegistryState,
  Roles,
  StakeEntry,
  Supply,
} from "./types";

/* ── genesis ─────────────────────────────────────────────── */

export const ZERO_SUPPLY: Supply = { accrued: 0n, escrowed: 0n, refunded: 0n, destroyed: 0n };

export const genesis = (roles: Roles): RegistryState => ({
  accounts: new Map(),
  queue: emptyQueue(),
  roles,
  supply: ZERO_SUPPLY,
});

/* ── draft: the working copy of one operation ────────────── */

export interface Draft extends ledger.LedgerBook {
  accounts: Map<Address, Account>;
  queue: QueueState;
  roles: Roles;
  supply: Supply;
  events: RegistryEvent[];
}

export interface OpContext {
  readonly now: bigint; // sampled once per operation
  readonly rates: AccrualRates;
  readonly gate: AccessGate;
}

export const openDraft = (state: RegistryState): Draft => ({
  accounts: new Map(state.accounts),
  queue: state.queue,
  roles: state.roles,
  supply: state.supply,
  events: [],
});

export const sealDraft = (d: Draft): RegistryState => ({
  accounts: d.accounts,
  queue: d.queue,
  roles: d.roles,
  supply: d.supply,
});

const queueUpdated = (d: Draft, externalId: ExternalId, position: number) =>
  d.events.push({
    type: "QueueUpdated",
    externalId,
    position,
    length: d.queue.entries.length,
  });

// Rejects caller-supplied quantities outside uint256 before anything is touched.
const requireUint = (field: string, value: bigint): void => {
  if (value < 0n || value > MAX_UINT256) throw invalidAmount(field, value);
};

/* ── ledger operations ───────────────────────────────────── */

export const register = (d: Draft, ctx: OpContext, caller: Address): void => {
  ledger.register(d, caller, ctx.now);
};

export const transfer = (
  d: Draft,
  ctx: OpContext,
  caller: Address,
  recipient: Address,
  amount: bigint,
): void => {
  requireUint("amount", amount);
  ledger.transfer(d, ctx.gate, ctx.rates, caller, recipient, amount, ctx.now);
};

/* ── queue operations ────────────────────────────────────── */

export const enterQueue = (
  d: Draft,
  ctx: OpContext,
  caller: Address,
  weight: bigint,
  priorityValue: bigint,
  externalId: ExternalId,
): void => {
  requireUint("weight", weight);
  requireUint("priorityValue", priorityValue);
  if (!ctx.gate.isRegistered(caller)) throw unregistered(caller);
  if (isLive(d.queue, externalId)) throw alreadyQueued(externalId);

  const stake = cost(weight, priorityValue);
  if (!ledger.checkpoint(d, ctx.rates, caller, ctx.now)) throw unregistered(caller);
  ledger.burnRegular(d, caller, stake);

  const entry: StakeEntry = {
    externalId,
    owner: caller,
    weight,
    priorityValue,
    stakedCoins: stake,
    timestamp: ctx.now,
  };
  const { queue, position } = insert(d.queue, entry);
  d.queue = queue;

  d.events.push({
    type: "EnteredQueue",
    account: caller,
    externalId,
    weight,
    priorityValue,
    stakedCoins: stake,
    position,
  });
  queueUpdated(d, externalId, position);
};

export const changeStakeBalance = (
  d: Draft,
  ctx: OpContext,
  caller: Address,
  weight: bigint,
  priorityValue: bigint,
  externalId: ExternalId,
): void => {
  requireUint("weight", weight);
  requireUint("priorityValue", priorityValue);
  const current = entryOf(d.queue, externalId);
  if (!current) throw notInQueue(externalId);
  if (current.owner !== caller) throw notStakeOwner(caller, externalId);

  const stake = cost(weight, priorityValue);
  if (!ledger.checkpoint(d, ctx.rates, caller, ctx.now)) throw unregistered(caller);

  if (stake > current.stakedCoins) {
    ledger.burnRegular(d, caller, sub(stake, current.stakedCoins));
  } else if (stake < current.stakedCoins) {
    ledger.mintRegular(d, caller, sub(current.stakedCoins, stake));
  }

  const updated: StakeEntry = {
    ...current,
    weight,
    priorityValue,
    stakedCoins: stake,
    timestamp: ctx.now,
  };
  const { queue, from, to } = reposition(d.queue, updated);
  d.queue = queue;

  d.events.push({
    type: "StakeChanged",
    account: caller,
    externalId,
    weight,
    priorityValue,
    stakedCoins: stake,
    previousPosition: from,
    position: to,
  });
  if (from !== to) queueUpdated(d, externalId, to);
};

export const removeStakeFromQueue = (
  d: Draft,
  ctx: OpContext,
  caller: Address,
  externalId: ExternalId,
): StakeEntry => {
  const position = d.queue.index.get(externalId);
  if (position === undefined) throw notInQueue(externalId);
  const { queue, entry } = removeAt(d.queue, position);
  if (entry.owner !== caller && !ctx.gate.isOwner(caller)) {
    throw notStakeOwner(caller, externalId);
  }

  ledger.checkpoint(d, ctx.rates, entry.owner, ctx.now);
  ledger.mintRegular(d, entry.owner, entry.stakedCoins);
  d.queue = queue;

  d.events.push({
    type: "StakeRemoved",
    account: entry.owner,
    externalId,
    refunded: entry.stakedCoins,
  });
  return entry;
};

/** Consume the head of the queue. The stake is destroyed, not refunded. */
export const dequeueItem = (d: Draft, ctx: OpContext, caller: Address): StakeEntry => {
  if (!ctx.gate.isController(caller)) throw notAuthorized(caller);
  if (d.queue.entries.length === 0) throw queueEmpty();

  const { queue, entry } = removeAt(d.queue, 0);
  d.queue = queue;
  d.supply = { ...d.supply, destroyed: add(d.supply.destroyed, entry.stakedCoins) };

  d.events.push({ type: "ItemDequeued", controller: caller, entry });
  return entry;
};

/* ── role operations ─────────────────────────────────────── */

export const setController = (
  d: Draft,
  ctx: OpContext,
  caller: Address,
  controller: Address,
): void => {
  if (!ctx.gate.isOwner(caller)) throw notOwner(caller);
  const previous = d.roles.controller;
  d.roles = { ...d.roles, controller };
  d.events.push({ type: "ControllerChanged", previous, controller });
};

export const transferOwnership = (
  d: Draft,
  ctx: OpContext,
  caller: Address,
  owner: Address,
): void => {
  if (!ctx.gate.isOwner(caller)) throw notOwner(caller);
  const previous = d.roles.owner;
  d.roles = { ...d.roles, owner };
  d.events.push({ type: "OwnershipTransferred", previous, owner });
};

/* ── command-level reducer ───────────────────────────────── */

/** Route a command to its operation. Returns the consumed entry for dequeue. */
export const dispatch = (d: Draft, ctx: OpContext, cmd: Command): StakeEntry | undefined => {
  switch (cmd.type) {
    case "register":
      register(d, ctx, cmd.caller);
      return undefined;
    case "transfer":
      transfer(d, ctx, cmd.caller, cmd.recipient, cmd.amount);
      return undefined;
    case "enterQueue":
      enterQueue(d, ctx, cmd.caller, cmd.weight, cmd.priorityValue, cmd.externalId);
      return undefined;
    case "changeStake":
      changeStakeBalance(d, ctx, cmd.caller, cmd.weight, cmd.priorityValue, cmd.externalId);
      return undefined;
    case "removeStake":
      removeStakeFromQueue(d, ctx, cmd.caller, cmd.externalId);
      return undefined;
    case "dequeue":
      return dequeueItem(d, ctx, cmd.caller);
    case "setController":
      setController(d, ctx, cmd.caller, cmd.controller);
      return undefined;
    case "transferOwnership":
      transferOwnership(d, ctx, cmd.caller, cmd.owner);
      return undefined;
  }
};

export interface Applied {
  next: RegistryState;
  events: RegistryEvent[];
  output: StakeEntry | undefined;
}

/**
 * Apply one command atomically. Throws a RegistryError on rejection; the input
 * state is never modified.
 */
export const applyCommand = (
  state: RegistryState,
  cmd: Command,
  now: bigint,
  rates: AccrualRates,
): Applied => {
  const draft = openDraft(state);
  const output = dispatch(draft, { now, rates, gate: accessGate(state) }, cmd);
  return { next: sealDraft(draft), events: draft.events, output };
};
