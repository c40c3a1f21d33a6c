import {
  check,
  object,
  optional,
  picklist,
  pipe,
  regex,
  safeParse,
  string,
  transform,
} from "valibot";
import { MAX_UINT256 } from "./core/math";
import type { AccrualRates, Address, Roles } from "./core/types";
import type { LogLevel } from "./logging";
import { addressSchema, describeIssues } from "./model/validation";

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

export interface RegistryConfig {
  rates: AccrualRates;
  roles: Roles;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  override name = "ConfigError";
}

const integerVar = (fallback: bigint) =>
  pipe(
    optional(string(), fallback.toString()),
    regex(/^\d+$/, "must be a non-negative integer"),
    transform((s) => BigInt(s)),
    check((n) => n <= MAX_UINT256, "must fit in uint256"),
  );

const envSchema = object({
  REGULAR_RATE: integerVar(10n),
  RESTRICTED_RATE: integerVar(5n),
  ACCRUAL_INTERVAL: pipe(
    integerVar(10n),
    check((n) => n > 0n, "must be positive"),
  ),
  REGISTRY_OWNER: optional(addressSchema, ZERO_ADDRESS),
  REGISTRY_CONTROLLER: optional(addressSchema, ZERO_ADDRESS),
  LOG_LEVEL: optional(
    picklist(["fatal", "error", "warn", "info", "debug", "trace", "silent"]),
    "info",
  ),
});

export const loadConfig = (
  env: Record<string, string | undefined> = process.env,
): RegistryConfig => {
  const result = safeParse(envSchema, env);
  if (!result.success) {
    throw new ConfigError(`invalid configuration: ${describeIssues(result.issues)}`);
  }
  const c = result.output;
  return {
    rates: {
      regular: c.REGULAR_RATE,
      restricted: c.RESTRICTED_RATE,
      interval: c.ACCRUAL_INTERVAL,
    },
    roles: { owner: c.REGISTRY_OWNER, controller: c.REGISTRY_CONTROLLER },
    logLevel: c.LOG_LEVEL,
  };
};
