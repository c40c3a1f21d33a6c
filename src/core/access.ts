import type { Address, RegistryState } from "./types";

/** Role predicates consumed by every operation. */
export interface AccessGate {
  isRegistered(account: Address): boolean;
  isController(caller: Address): boolean;
  isOwner(caller: Address): boolean;
}

export const accessGate = (
  state: Pick<RegistryState, "accounts" | "roles">,
): AccessGate => ({
  isRegistered: (account) => state.accounts.get(account)?.registered === true,
  isController: (caller) => caller === state.roles.controller,
  isOwner: (caller) => caller === state.roles.owner,
});

export const listRegisteredAccounts = (
  state: Pick<RegistryState, "accounts">,
): Address[] =>
  [...state.accounts.values()].filter((a) => a.registered).map((a) => a.address);
