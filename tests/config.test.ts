import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig } from "../src/config.js";
import { createMatchingEngine } from "../src/index.js";
import { InMemoryLedger } from "../src/engine/ledger.js";

const PAIR = { id: "BASE-QUOTE", baseAsset: "BASE", quoteAsset: "QUOTE" };

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      NODE_ENV: "development",
      LOG_LEVEL: "info",
      TAKER_FEE_BPS: 100,
      MAX_ORDERS_PER_CALL: 1500,
      FEE_RECIPIENT: "fees",
      CUSTODY_ACCOUNT: "custody",
    });
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({ TAKER_FEE_BPS: "25", MAX_ORDERS_PER_CALL: "10" });
    expect(config.TAKER_FEE_BPS).toBe(25);
    expect(config.MAX_ORDERS_PER_CALL).toBe(10);
  });

  it("reports an unknown log level as a config error", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ConfigError);
  });

  it("rejects out-of-range values", () => {
    try {
      loadConfig({ TAKER_FEE_BPS: "5000" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect(err instanceof ConfigError && Object.keys(err.fieldErrors)).toEqual(["TAKER_FEE_BPS"]);
    }
  });
});

describe("createMatchingEngine", () => {
  it("takes the fee from configuration", () => {
    const engine = createMatchingEngine(PAIR, new InMemoryLedger("custody"));
    expect(engine.summary().takerFeeBps).toBe(100);
  });

  it("lets callers override configured values", () => {
    const engine = createMatchingEngine(PAIR, new InMemoryLedger("custody"), { takerFeeBps: 5 });
    expect(engine.summary().takerFeeBps).toBe(5);
  });
});
