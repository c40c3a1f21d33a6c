import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex, concatBytes } from "@noble/hashes/utils";
import {
  encAccount,
  encCommand,
  encode,
  encRoles,
  encStakeEntry,
  encSupply,
} from "../codec/rlp";
import type { Command, Hex, RegistryState } from "./types";

export const toHex = (b: Uint8Array): Hex => `0x${bytesToHex(b)}`;

/* ── Merkle helper ───────────────────────────────────────── */
export const merkle = (leaves: Uint8Array[]): Uint8Array => {
  if (leaves.length === 0) return keccak_256(new Uint8Array());
  if (leaves.length === 1) return leaves[0];
  const next: Uint8Array[] = [];
  for (let i = 0; i < leaves.length; i += 2) {
    const left = leaves[i];
    const right = i + 1 < leaves.length ? leaves[i + 1] : left;
    next.push(keccak_256(concatBytes(left, right)));
  }
  return merkle(next);
};

/* ── accounts, sorted by address ─────────────────────────── */
export const computeAccountsRoot = (state: RegistryState): Uint8Array =>
  merkle(
    [...state.accounts.values()]
      .sort((a, b) => (a.address < b.address ? -1 : a.address > b.address ? 1 : 0))
      .map((a) => keccak_256(encode(encAccount(a)))),
  );

/* ── queue, in served order ──────────────────────────────── */
export const computeQueueRoot = (state: RegistryState): Uint8Array =>
  merkle(state.queue.entries.map((e) => keccak_256(encode(encStakeEntry(e)))));

/* ── global state root ───────────────────────────────────── */
export const computeStateRoot = (state: RegistryState): Hex =>
  toHex(
    keccak_256(
      encode([
        computeAccountsRoot(state),
        computeQueueRoot(state),
        encRoles(state.roles),
        encSupply(state.supply),
      ]),
    ),
  );

export const hashCommand = (cmd: Command): Hex =>
  toHex(keccak_256(encode(encCommand(cmd))));
