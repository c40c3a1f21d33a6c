import * as rlp from "rlp";
import type {
  Account,
  Command,
  Roles,
  StakeEntry,
  Supply,
} from "../core/types";

/* — account — */
export const encAccount = (a: Account): rlp.Input => [
  a.address,
  a.registered ? 1 : 0,
  a.registrationTime,
  a.lastCheckpoint,
  a.settledRegular,
  a.settledRestricted,
];

/* — stake entry — */
export const encStakeEntry = (e: StakeEntry): rlp.Input => [
  e.externalId,
  e.owner,
  e.weight,
  e.priorityValue,
  e.stakedCoins,
  e.timestamp,
];

/* — roles / supply — */
export const encRoles = (r: Roles): rlp.Input => [r.owner, r.controller];

export const encSupply = (s: Supply): rlp.Input => [
  s.accrued,
  s.escrowed,
  s.refunded,
  s.destroyed,
];

/* — command — */
export const encCommand = (c: Command): rlp.Input => {
  switch (c.type) {
    case "register":
      return [c.type, c.caller];
    case "transfer":
      return [c.type, c.caller, c.recipient, c.amount];
    case "enterQueue":
    case "changeStake":
      return [c.type, c.caller, c.weight, c.priorityValue, c.externalId];
    case "removeStake":
      return [c.type, c.caller, c.externalId];
    case "dequeue":
      return [c.type, c.caller];
    case "setController":
      return [c.type, c.caller, c.controller];
    case "transferOwnership":
      return [c.type, c.caller, c.owner];
  }
};

export const encode = (v: rlp.Input): Uint8Array => rlp.encode(v);
