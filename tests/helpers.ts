import { parseFixed } from "../src/engine/fixed.js";
import type { Order, Side } from "../src/engine/types.js";

/** Small seeded PRNG so randomized tests replay identically. */
export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Decimal string to 18-decimal fixed point. */
export function fx(value: string): bigint {
  return parseFixed(value);
}

export function makeOrder(id: string, side: Side, price: bigint, qty: bigint, owner = "u-maker"): Order {
  return {
    id,
    owner,
    side,
    price,
    originalQuantity: qty,
    availableQuantity: qty,
    timestamp: 1_700_000_000,
    expiresAt: 0,
    seq: 1n,
    status: "CREATED",
  };
}
