import type { ExternalId } from "../types/brands";

export type Hex = `0x${string}`;
export type Address = Hex;

/* ── ledger ──────────────────────────────────────────────── */
export interface Account {
  readonly address: Address;
  readonly registered: boolean; // never reverts to false
  readonly registrationTime: bigint; // seconds
  readonly lastCheckpoint: bigint; // non-decreasing
  readonly settledRegular: bigint;
  readonly settledRestricted: bigint;
}

export interface Balances {
  readonly regular: bigint;
  readonly restricted: bigint;
}

// base units accrued per `interval` seconds
export interface AccrualRates {
  readonly regular: bigint;
  readonly restricted: bigint;
  readonly interval: bigint;
}

export interface Supply {
  readonly accrued: bigint; // minted by time accrual
  readonly escrowed: bigint; // burned into the queue
  readonly refunded: bigint; // minted back out of the queue
  readonly destroyed: bigint; // stake consumed by dequeue
}

/* ── queue ───────────────────────────────────────────────── */
export interface StakeEntry {
  readonly externalId: ExternalId;
  readonly owner: Address;
  readonly weight: bigint;
  readonly priorityValue: bigint;
  readonly stakedCoins: bigint;
  readonly timestamp: bigint; // time of last (re)pricing
}

export interface QueueState {
  readonly entries: readonly StakeEntry[]; // position 0 is served next
  readonly index: ReadonlyMap<ExternalId, number>; // live ids only
}

/* ── roles ───────────────────────────────────────────────── */
export interface Roles {
  readonly owner: Address;
  readonly controller: Address;
}

/* ── registry state ──────────────────────────────────────── */
export interface RegistryState {
  readonly accounts: ReadonlyMap<Address, Account>; // registration order
  readonly queue: QueueState;
  readonly roles: Roles;
  readonly supply: Supply;
}

/* ── commands ────────────────────────────────────────────── */
export type Command =
  | { type: "register"; caller: Address }
  | { type: "transfer"; caller: Address; recipient: Address; amount: bigint }
  | {
      type: "enterQueue";
      caller: Address;
      weight: bigint;
      priorityValue: bigint;
      externalId: ExternalId;
    }
  | {
      type: "changeStake";
      caller: Address;
      weight: bigint;
      priorityValue: bigint;
      externalId: ExternalId;
    }
  | { type: "removeStake"; caller: Address; externalId: ExternalId }
  | { type: "dequeue"; caller: Address }
  | { type: "setController"; caller: Address; controller: Address }
  | { type: "transferOwnership"; caller: Address; owner: Address };

/* ── notifications ───────────────────────────────────────── */
export type RegistryEvent =
  | { type: "WalletRegistered"; account: Address; registrationTime: bigint }
  | {
      type: "Transfer";
      from: Address;
      to: Address;
      amount: bigint;
      restrictedPortion: bigint;
      regularPortion: bigint;
    }
  | {
      type: "EnteredQueue";
      account: Address;
      externalId: ExternalId;
      weight: bigint;
      priorityValue: bigint;
      stakedCoins: bigint;
      position: number;
    }
  | { type: "QueueUpdated"; externalId: ExternalId; position: number; length: number }
  | {
      type: "StakeChanged";
      account: Address;
      externalId: ExternalId;
      weight: bigint;
      priorityValue: bigint;
      stakedCoins: bigint;
      previousPosition: number;
      position: number;
    }
  | { type: "StakeRemoved"; account: Address; externalId: ExternalId; refunded: bigint }
  | { type: "ItemDequeued"; controller: Address; entry: StakeEntry }
  | { type: "ControllerChanged"; previous: Address; controller: Address }
  | { type: "OwnershipTransferred"; previous: Address; owner: Address };

export type EventType = RegistryEvent["type"];

/* ── per-operation receipt ───────────────────────────────── */
export interface Receipt {
  seq: number; // monotone operation counter
  timestamp: bigint;
  inputHash: Hex; // keccak256(RLP(command))
  root: Hex; // state root after the operation
  events: readonly RegistryEvent[];
}
