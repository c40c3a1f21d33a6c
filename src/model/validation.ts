import {
  bigint,
  check,
  custom,
  getDotPath,
  integer,
  literal,
  maxLength,
  minLength,
  number,
  object,
  pipe,
  regex,
  safeParse,
  string,
  transform,
  union,
  variant,
  type BaseIssue,
} from "valibot";
import { invalidCommand } from "../core/errors";
import { MAX_UINT256 } from "../core/math";
import type { Address, Command } from "../core/types";
import { asExternalId } from "../types/brands";

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

/** Addresses compare by string, so every accepted address is lowercased. */
export const toAddress = (a: Address): Address => `0x${a.slice(2).toLowerCase()}`;

/** Lowercase every address a command carries. */
export const normalizeCommand = (cmd: Command): Command => {
  switch (cmd.type) {
    case "transfer":
      return { ...cmd, caller: toAddress(cmd.caller), recipient: toAddress(cmd.recipient) };
    case "setController":
      return { ...cmd, caller: toAddress(cmd.caller), controller: toAddress(cmd.controller) };
    case "transferOwnership":
      return { ...cmd, caller: toAddress(cmd.caller), owner: toAddress(cmd.owner) };
    default:
      return { ...cmd, caller: toAddress(cmd.caller) };
  }
};

export const addressSchema = pipe(
  custom<Address>(
    (input) => typeof input === "string" && ADDRESS_RE.test(input),
    "address must be 0x followed by 40 hex digits",
  ),
  transform(toAddress),
);

export const amountSchema = pipe(
  union([
    bigint(),
    pipe(
      string(),
      regex(/^\d+$/, "amount must be a decimal integer"),
      transform((s) => BigInt(s)),
    ),
    pipe(number(), integer(), transform((n) => BigInt(n))),
  ]),
  check((n) => n >= 0n && n <= MAX_UINT256, "amount must fit in uint256"),
);

export const externalIdSchema = pipe(
  string(),
  minLength(1, "external id must not be empty"),
  maxLength(128, "external id is longer than 128 characters"),
  transform(asExternalId),
);

/* ── commands ────────────────────────────────────────────── */

const priced = {
  caller: addressSchema,
  weight: amountSchema,
  priorityValue: amountSchema,
  externalId: externalIdSchema,
};

export const commandSchema = variant("type", [
  object({ type: literal("register"), caller: addressSchema }),
  object({
    type: literal("transfer"),
    caller: addressSchema,
    recipient: addressSchema,
    amount: amountSchema,
  }),
  object({ type: literal("enterQueue"), ...priced }),
  object({ type: literal("changeStake"), ...priced }),
  object({
    type: literal("removeStake"),
    caller: addressSchema,
    externalId: externalIdSchema,
  }),
  object({ type: literal("dequeue"), caller: addressSchema }),
  object({
    type: literal("setController"),
    caller: addressSchema,
    controller: addressSchema,
  }),
  object({
    type: literal("transferOwnership"),
    caller: addressSchema,
    owner: addressSchema,
  }),
]);

export const describeIssues = (issues: readonly BaseIssue<unknown>[]): string =>
  issues
    .map((issue) => {
      const path = getDotPath(issue);
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");

/** Turn untrusted input into a typed command or throw InvalidCommand. */
export const parseCommand = (raw: unknown): Command => {
  const result = safeParse(commandSchema, raw);
  if (!result.success) throw invalidCommand(describeIssues(result.issues));
  return result.output;
};
