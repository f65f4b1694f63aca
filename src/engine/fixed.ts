import { BPS_DENOMINATOR, PRECISION, type Price, type Quantity, type Side } from "./types.js";

/**
 * Fixed-point arithmetic for settlement.
 *
 * quote(q, p) = q * p / 1e18, truncated toward zero. All operands are
 * non-negative so truncation is a floor.
 *
 * BUY locks  quote(qty, price) of the quote asset.
 * SELL locks qty of the base asset.
 */

export const FIXED_DECIMALS = 18;

export function quoteAmount(quantity: Quantity, price: Price): bigint {
  return (quantity * price) / PRECISION;
}

/** Fee skimmed from an amount, floor(amount * bps / 10000). */
export function feeAmount(amount: bigint, feeBps: number): bigint {
  return (amount * BigInt(feeBps)) / BPS_DENOMINATOR;
}

/** Amount held in custody for `quantity` of a resting order. */
export function lockRequired(side: Side, price: Price, quantity: Quantity): bigint {
  return side === "BUY" ? quoteAmount(quantity, price) : quantity;
}

/**
 * Quote released from a resting buy when `filled` of its `available` trades:
 * the drop in its lock. Never less than quoteAmount(filled, price), so the
 * truncation lands on the selling taker's side.
 */
export function quoteRelease(available: Quantity, filled: Quantity, price: Price): bigint {
  return quoteAmount(available, price) - quoteAmount(available - filled, price);
}

const DECIMAL_RE = /^(\d+)(?:\.(\d+))?$/;

/** "1.5" -> 1500000000000000000n. Rejects negatives and more than 18 decimals. */
export function parseFixed(value: string): bigint {
  const match = DECIMAL_RE.exec(value.trim());
  if (!match) {
    throw new RangeError(`Not a decimal amount: "${value}"`);
  }
  const whole = match[1] ?? "0";
  const frac = match[2] ?? "";
  if (frac.length > FIXED_DECIMALS) {
    throw new RangeError(`More than ${FIXED_DECIMALS} decimals: "${value}"`);
  }
  return BigInt(whole) * PRECISION + BigInt(frac.padEnd(FIXED_DECIMALS, "0"));
}

/** 1500000000000000000n -> "1.5" */
export function formatFixed(value: bigint): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;
  const whole = abs / PRECISION;
  const frac = (abs % PRECISION).toString().padStart(FIXED_DECIMALS, "0").replace(/0+$/, "");
  const body = frac.length > 0 ? `${whole}.${frac}` : whole.toString();
  return negative ? `-${body}` : body;
}
