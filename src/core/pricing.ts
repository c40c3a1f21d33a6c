import { invalidWeight } from "./errors";
import { UNIT, log2, mul, mulDiv } from "./math";

export const BASE = (12n * UNIT) / 10n; // 1.2
const LOG2_BASE = log2(BASE);

/**
 * log_1.2(weight) in UD60x18. Weight is a whole number; anything at or below
 * one has a non-positive logarithm and is rejected.
 */
export const logBase = (weight: bigint): bigint => {
  if (weight <= 1n) throw invalidWeight(weight);
  return mulDiv(log2(mul(weight, UNIT)), UNIT, LOG2_BASE);
};

/** Stake required to hold `priorityValue` at `weight`. */
export const cost = (weight: bigint, priorityValue: bigint): bigint =>
  mulDiv(logBase(weight), priorityValue, UNIT);

/**
 * Approximate inverse of {@link cost}. Truncation in both directions means
 * `priorityFromStake(w, cost(w, p)) <= p`.
 */
export const priorityFromStake = (weight: bigint, stakedCoins: bigint): bigint =>
  mulDiv(stakedCoins, UNIT, logBase(weight));
