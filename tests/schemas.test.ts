import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { parseCancelOrder, parseSubmitOrder } from "../src/schemas/index.js";

const valid = { owner: "alice", side: "BUY", price: "100.5", quantity: "2", timestamp: 1 };

describe("parseSubmitOrder", () => {
  it("converts decimal strings to fixed point", () => {
    expect(parseSubmitOrder(valid)).toEqual({
      owner: "alice",
      side: "BUY",
      price: 100_500_000_000_000_000_000n,
      quantity: 2_000_000_000_000_000_000n,
      timestamp: 1,
    });
  });

  it("keeps expiresAt", () => {
    expect(parseSubmitOrder({ ...valid, expiresAt: 99 }).expiresAt).toBe(99);
  });

  it.each([
    ["zero price", { ...valid, price: "0" }],
    ["non-numeric price", { ...valid, price: "abc" }],
    ["too many decimals", { ...valid, quantity: "1.0000000000000000001" }],
    ["unknown side", { ...valid, side: "HOLD" }],
    ["negative timestamp", { ...valid, timestamp: -1 }],
    ["missing owner", { ...valid, owner: "" }],
  ])("rejects %s", (_name, input) => {
    expect(() => parseSubmitOrder(input)).toThrow(ZodError);
  });
});

describe("parseCancelOrder", () => {
  it("accepts a sha256 order id", () => {
    const orderId = `0x${"a".repeat(64)}`;
    expect(parseCancelOrder({ orderId, caller: "alice" })).toEqual({ orderId, caller: "alice" });
  });

  it("rejects a short id", () => {
    expect(() => parseCancelOrder({ orderId: "0xdead", caller: "alice" })).toThrow(ZodError);
  });
});
