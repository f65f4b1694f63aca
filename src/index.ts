import { getConfig } from "./config.js";
import { MatchingEngine, type EngineOptions } from "./engine/engine.js";
import type { Ledger } from "./engine/ledger.js";
import type { Pair } from "./engine/types.js";

export { MatchingEngine } from "./engine/engine.js";
export type { EngineOptions, CancelResult } from "./engine/engine.js";
export { Book } from "./engine/book.js";
export { PriceIndex } from "./engine/price-index.js";
export type { TreeNode } from "./engine/price-index.js";
export { PriceLevelQueue } from "./engine/level-queue.js";
export { OrderTable } from "./engine/order-table.js";
export { OwnerOrderRegistry } from "./engine/owner-registry.js";
export { EventLog } from "./engine/events.js";
export type { EngineEvent, LoggedEvent } from "./engine/events.js";
export { InMemoryLedger, LedgerError } from "./engine/ledger.js";
export type { Ledger, LedgerEntry, LedgerErrorCode } from "./engine/ledger.js";
export { InstrumentLock } from "./engine/serial.js";
export * from "./engine/errors.js";
export * from "./engine/fixed.js";
export * from "./engine/types.js";
export * from "./schemas/index.js";
export { loadConfig, getConfig, ConfigError } from "./config.js";
export type { Config } from "./config.js";
export { logger, resolveLogLevel, LOG_LEVELS } from "./logger.js";
export type { LogLevel } from "./logger.js";

/**
 * Engine for one pair with fee, match limit and accounts taken from the
 * process configuration unless overridden.
 */
export function createMatchingEngine(
  pair: Pair,
  ledger: Ledger,
  overrides: Partial<Omit<EngineOptions, "pair" | "ledger">> = {},
): MatchingEngine {
  const config = getConfig();
  return new MatchingEngine({
    pair,
    ledger,
    custody: overrides.custody ?? config.CUSTODY_ACCOUNT,
    feeRecipient: overrides.feeRecipient ?? config.FEE_RECIPIENT,
    takerFeeBps: overrides.takerFeeBps ?? config.TAKER_FEE_BPS,
    maxOrdersPerCall: overrides.maxOrdersPerCall ?? config.MAX_ORDERS_PER_CALL,
    events: overrides.events,
    logger: overrides.logger,
  });
}
