export * from "./core/types";
export * from "./core/errors";
export { MAX_UINT256, UNIT, log2 } from "./core/math";
export { BASE, cost, logBase, priorityFromStake } from "./core/pricing";
export { compareEntries, checkQueue, emptyQueue } from "./core/queue";
export { accessGate, listRegisteredAccounts, type AccessGate } from "./core/access";
export { liveBalances, pendingAccrual } from "./core/ledger";
export { applyCommand, genesis, type Applied } from "./core/reducer";
export { computeStateRoot, hashCommand } from "./core/hash";
export {
  Runtime,
  systemClock,
  type Clock,
  type Committed,
  type Listener,
  type RuntimeOptions,
  type SupplyView,
} from "./core/runtime";
export { ConfigError, loadConfig, ZERO_ADDRESS, type RegistryConfig } from "./config";
export { makeLogger, type ILogger, type LogLevel } from "./logging";
export { addressSchema, amountSchema, commandSchema, parseCommand } from "./model/validation";
export { asExternalId, type Brand, type ExternalId } from "./types/brands";
