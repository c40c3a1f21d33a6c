import {
  alreadyRegistered,
  insufficientBalance,
  unregistered,
  unregisteredRecipient,
  unregisteredSender,
} from "./errors";
import { add, min, mulDiv, sub } from "./math";
import type { AccessGate } from "./access";
import type {
  Account,
  AccrualRates,
  Address,
  Balances,
  RegistryEvent,
  Supply,
} from "./types";

/**
 * Mutable working copy of the ledger for one operation. The reducer owns it
 * and discards it when the operation fails.
 */
export interface LedgerBook {
  accounts: Map<Address, Account>;
  supply: Supply;
  events: RegistryEvent[];
}

const ZERO: Balances = { regular: 0n, restricted: 0n };

/* ── accrual ─────────────────────────────────────────────── */

// Measured from registration so that any sequence of checkpoints settles the
// same total as a single one.
const accruedSince = (
  rate: bigint,
  interval: bigint,
  start: bigint,
  at: bigint,
): bigint => mulDiv(sub(at, start), rate, interval);

/** Value accrued between the account's last checkpoint and `now`. */
export const pendingAccrual = (
  account: Account,
  rates: AccrualRates,
  now: bigint,
): Balances => {
  const { registrationTime: t0, lastCheckpoint: t1 } = account;
  // rejects now < lastCheckpoint
  sub(now, t1);
  return {
    regular: sub(
      accruedSince(rates.regular, rates.interval, t0, now),
      accruedSince(rates.regular, rates.interval, t0, t1),
    ),
    restricted: sub(
      accruedSince(rates.restricted, rates.interval, t0, now),
      accruedSince(rates.restricted, rates.interval, t0, t1),
    ),
  };
};

/** Settled value plus pending accrual. Pure; unknown accounts read as zero. */
export const liveBalances = (
  account: Account | undefined,
  rates: AccrualRates,
  now: bigint,
): Balances => {
  if (!account?.registered) return ZERO;
  const pending = pendingAccrual(account, rates, now);
  return {
    regular: add(account.settledRegular, pending.regular),
    restricted: add(account.settledRestricted, pending.restricted),
  };
};

/* ── settlement ──────────────────────────────────────────── */

export const openAccount = (address: Address, now: bigint): Account => ({
  address,
  registered: true,
  registrationTime: now,
  lastCheckpoint: now,
  settledRegular: 0n,
  settledRestricted: 0n,
});

export const register = (book: LedgerBook, address: Address, now: bigint): Account => {
  if (book.accounts.get(address)?.registered) throw alreadyRegistered(address);
  const account = openAccount(address, now);
  book.accounts.set(address, account);
  book.events.push({ type: "WalletRegistered", account: address, registrationTime: now });
  return account;
};

/**
 * Materialise accrual up to `now`. Returns the settled account, or undefined
 * when the address is not registered (in which case nothing changes).
 */
export const checkpoint = (
  book: LedgerBook,
  rates: AccrualRates,
  address: Address,
  now: bigint,
): Account | undefined => {
  const account = book.accounts.get(address);
  if (!account?.registered) return undefined;

  const pending = pendingAccrual(account, rates, now);
  const settled: Account = {
    ...account,
    lastCheckpoint: now,
    settledRegular: add(account.settledRegular, pending.regular),
    settledRestricted: add(account.settledRestricted, pending.restricted),
  };
  book.accounts.set(address, settled);
  book.supply = {
    ...book.supply,
    accrued: add(add(book.supply.accrued, pending.regular), pending.restricted),
  };
  return settled;
};

/* ── value movement ──────────────────────────────────────── */

const requireSettled = (book: LedgerBook, address: Address): Account => {
  const account = book.accounts.get(address);
  if (!account) throw unregistered(address);
  return account;
};

/** Escrow `amount` out of the regular balance. Caller must be checkpointed. */
export const burnRegular = (book: LedgerBook, address: Address, amount: bigint): void => {
  const account = requireSettled(book, address);
  if (account.settledRegular < amount) {
    throw insufficientBalance(address, amount, account.settledRegular);
  }
  book.accounts.set(address, {
    ...account,
    settledRegular: sub(account.settledRegular, amount),
  });
  book.supply = { ...book.supply, escrowed: add(book.supply.escrowed, amount) };
};

/** Return escrowed value to the regular balance. Caller must be checkpointed. */
export const mintRegular = (book: LedgerBook, address: Address, amount: bigint): void => {
  const account = requireSettled(book, address);
  book.accounts.set(address, {
    ...account,
    settledRegular: add(account.settledRegular, amount),
  });
  book.supply = { ...book.supply, refunded: add(book.supply.refunded, amount) };
};

export interface TransferResult {
  restrictedPortion: bigint;
  regularPortion: bigint;
}

/**
 * Move `amount` from `from` to `to`. Restricted value is spent first and stays
 * restricted on the recipient side.
 */
export const transfer = (
  book: LedgerBook,
  gate: AccessGate,
  rates: AccrualRates,
  from: Address,
  to: Address,
  amount: bigint,
  now: bigint,
): TransferResult => {
  if (!gate.isRegistered(from)) throw unregisteredSender(from);
  if (!gate.isRegistered(to)) throw unregisteredRecipient(to);

  checkpoint(book, rates, from, now);
  checkpoint(book, rates, to, now);

  const sender = requireSettled(book, from);
  const available = add(sender.settledRegular, sender.settledRestricted);
  if (amount > available) throw insufficientBalance(from, amount, available);

  const restrictedPortion = min(amount, sender.settledRestricted);
  const regularPortion = sub(amount, restrictedPortion);

  book.accounts.set(from, {
    ...sender,
    settledRestricted: sub(sender.settledRestricted, restrictedPortion),
    settledRegular: sub(sender.settledRegular, regularPortion),
  });
  // re-read: `to` may be `from`
  const recipient = requireSettled(book, to);
  book.accounts.set(to, {
    ...recipient,
    settledRestricted: add(recipient.settledRestricted, restrictedPortion),
    settledRegular: add(recipient.settledRegular, regularPortion),
  });

  book.events.push({
    type: "Transfer",
    from,
    to,
    amount,
    restrictedPortion,
    regularPortion,
  });
  return { restrictedPortion, regularPortion };
};
