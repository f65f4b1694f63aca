import { PriceLevelNotFoundError, invariant } from "./errors.js";
import { PriceLevelQueue } from "./level-queue.js";
import { PriceIndex } from "./price-index.js";
import { EMPTY_PRICE } from "./types.js";
import type { BookLevel, LevelStats, Order, OrderId, Price, Quantity, Side } from "./types.js";

interface PriceLevel {
  queue: PriceLevelQueue;
  orderCount: number;
  orderValue: Quantity;
}

/**
 * One side of the market.
 *
 * - BUY book: best price is the highest key
 * - SELL book: best price is the lowest key
 * - Within each price level: FIFO by arrival
 *
 * A price is in the index exactly when its level queue is non-empty. The
 * level aggregates are updated on every queue change so depth queries never
 * walk the queue.
 */
export class Book {
  private readonly index = new PriceIndex();
  private readonly levels = new Map<Price, PriceLevel>();

  constructor(readonly side: Side) {}

  // ── Queries ──────────────────────────────────────────────────

  bestPrice(): Price {
    return this.side === "BUY" ? this.index.max() : this.index.min();
  }

  /** Next price behind `price` in matching order, EMPTY_PRICE at the end. */
  nextPrice(price: Price): Price {
    return this.side === "BUY" ? this.index.predecessor(price) : this.index.successor(price);
  }

  nextOrderIdAtPrice(price: Price): OrderId {
    return this.levelAt(price).queue.head;
  }

  nextOrderIdAfter(price: Price, id: OrderId): OrderId {
    return this.levelAt(price).queue.next(id);
  }

  hasLevel(price: Price): boolean {
    return this.index.exists(price);
  }

  get levelCount(): number {
    return this.index.size;
  }

  levelStats(price: Price): LevelStats {
    const level = this.levelAt(price);
    return { orderCount: level.orderCount, orderValue: level.orderValue };
  }

  /** Ids queued at `price`, oldest first. */
  orderIdsAt(price: Price): OrderId[] {
    return [...this.levelAt(price).queue];
  }

  queueLength(price: Price): number {
    return this.levelAt(price).queue.length;
  }

  /** Best `n` prices, padded with EMPTY_PRICE. */
  topPrices(n: number): Price[] {
    const prices: Price[] = [];
    let cursor = this.bestPrice();
    for (let i = 0; i < n; i++) {
      prices.push(cursor);
      if (cursor !== EMPTY_PRICE) cursor = this.nextPrice(cursor);
    }
    return prices;
  }

  top3Prices(): [Price, Price, Price] {
    const [first = EMPTY_PRICE, second = EMPTY_PRICE, third = EMPTY_PRICE] = this.topPrices(3);
    return [first, second, third];
  }

  /** Best `n` non-empty levels in matching order. */
  depth(n: number): BookLevel[] {
    const levels: BookLevel[] = [];
    let cursor = this.bestPrice();
    while (cursor !== EMPTY_PRICE && levels.length < n) {
      const level = this.levelAt(cursor);
      levels.push({ price: cursor, orderCount: level.orderCount, totalQuantity: level.orderValue });
      cursor = this.nextPrice(cursor);
    }
    return levels;
  }

  /** Every price in matching order. */
  *prices(): IterableIterator<Price> {
    let cursor = this.bestPrice();
    while (cursor !== EMPTY_PRICE) {
      yield cursor;
      cursor = this.nextPrice(cursor);
    }
  }

  // ── Mutations ────────────────────────────────────────────────

  insert(id: OrderId, price: Price, quantity: Quantity): void {
    const level = this.levels.get(price) ?? { queue: new PriceLevelQueue(), orderCount: 0, orderValue: 0n };
    level.queue.push(id);
    this.levels.set(price, level);
    this.index.insert(price);
    level.orderCount += 1;
    level.orderValue += quantity;
  }

  remove(order: Order): void {
    const level = this.levelAt(order.price);
    level.orderCount -= 1;
    level.orderValue -= order.availableQuantity;
    level.queue.remove(order.id);

    if (level.queue.isEmpty()) {
      invariant(level.orderCount === 0 && level.orderValue === 0n, `stale aggregates at empty level ${order.price}`);
      this.levels.delete(order.price);
      this.index.remove(order.price);
    }
  }

  /** A resting order at `price` lost `delta` of its quantity but stays queued. */
  update(price: Price, delta: Quantity): void {
    this.levelAt(price).orderValue -= delta;
  }

  // ── Internal ─────────────────────────────────────────────────

  private levelAt(price: Price): PriceLevel {
    const level = this.levels.get(price);
    if (!level) throw new PriceLevelNotFoundError(price);
    return level;
  }
}
