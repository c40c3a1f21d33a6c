import { divisionByZero, overflow, underflow } from "./errors";

// Constants
export const MAX_UINT256 = 2n ** 256n - 1n;
export const UNIT = 10n ** 18n; // UD60x18 fixed-point one
const HALF_UNIT = UNIT / 2n;
const DOUBLE_UNIT = UNIT * 2n;

/* ── checked uint256 arithmetic ──────────────────────────── */

export const add = (a: bigint, b: bigint): bigint => {
  const r = a + b;
  if (r > MAX_UINT256) throw overflow("add");
  return r;
};

export const sub = (a: bigint, b: bigint): bigint => {
  if (b > a) throw underflow("sub", a, b);
  return a - b;
};

export const mul = (a: bigint, b: bigint): bigint => {
  const r = a * b;
  if (r > MAX_UINT256) throw overflow("mul");
  return r;
};

// truncates toward zero
export const div = (a: bigint, b: bigint): bigint => {
  if (b === 0n) throw divisionByZero("div");
  return a / b;
};

/** a·b/d, multiplying first so the single truncation happens last */
export const mulDiv = (a: bigint, b: bigint, d: bigint): bigint =>
  div(mul(a, b), d);

export const min = (a: bigint, b: bigint): bigint => (a < b ? a : b);

/* ── fixed-point logarithm ───────────────────────────────── */

const msb = (x: bigint): bigint => {
  let n = 0n;
  while (x > 1n) {
    x >>= 1n;
    n += 1n;
  }
  return n;
};

/**
 * Binary logarithm of a UD60x18 value, truncated.
 * Integer part from the most significant bit, fraction by iterative squaring.
 */
export const log2 = (x: bigint): bigint => {
  if (x < UNIT) throw underflow("log2", x, UNIT);
  if (x > MAX_UINT256) throw overflow("log2");

  const n = msb(x / UNIT);
  let result = n * UNIT;
  let y = x >> n;
  if (y === UNIT) return result;

  for (let delta = HALF_UNIT; delta > 0n; delta >>= 1n) {
    y = (y * y) / UNIT;
    if (y >= DOUBLE_UNIT) {
      result += delta;
      y >>= 1n;
    }
  }
  return result;
};
