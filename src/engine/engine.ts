import { createHash } from "node:crypto";
import { logger as rootLogger, type Logger } from "../logger.js";
import { Book } from "./book.js";
import {
  EngineError,
  InvalidPriceError,
  InvalidQuantityError,
  NotOrderOwnerError,
  OrderIdAlreadyExistsError,
  OrderNotFoundError,
  SettlementError,
} from "./errors.js";
import { EventLog, type EngineEvent } from "./events.js";
import { feeAmount, lockRequired, quoteAmount, quoteRelease } from "./fixed.js";
import type { Ledger } from "./ledger.js";
import { OrderTable } from "./order-table.js";
import { OwnerOrderRegistry } from "./owner-registry.js";
import {
  DEFAULT_MAX_ORDERS_PER_CALL,
  EMPTY_ORDER_ID,
  EMPTY_PRICE,
  oppositeSide,
} from "./types.js";
import type {
  Asset,
  BookLevel,
  BookSnapshot,
  BookSummary,
  Fill,
  IncomingOrder,
  LevelStats,
  Order,
  OrderId,
  Owner,
  Pair,
  Price,
  Quantity,
  Side,
  SubmitResult,
  SubmitStatus,
} from "./types.js";

export interface EngineOptions {
  pair: Pair;
  ledger: Ledger;
  /** Account holding the funds locked by resting orders. */
  custody: Owner;
  feeRecipient: Owner;
  takerFeeBps: number;
  /** Resting orders one submit may consume. */
  maxOrdersPerCall?: number;
  events?: EventLog;
  logger?: Logger;
}

export interface CancelResult {
  order: Order;
  refund: bigint;
}

interface PlannedFill {
  maker: Order;
  quantity: Quantity;
  full: boolean;
}

interface MatchPlan {
  fills: PlannedFill[];
  remaining: Quantity;
  /** The match limit stopped the walk while the remainder still crossed. */
  capped: boolean;
}

/** Length-prefixed fields, so no field value can shift into its neighbour. */
function encodeIdFields(fields: readonly (string | number | bigint)[]): string {
  return fields.map((field) => `${String(field).length}:${String(field)}`).join("");
}

/**
 * Deterministic, single-threaded matching engine for one instrument.
 *
 * Matching rules:
 * - BUY crosses asks priced <= its limit, SELL crosses bids priced >= its limit.
 * - Price-time priority (FIFO within each price level).
 * - Execution price = resting (maker) order price.
 * - Fee charged to the taker only, out of the asset the taker receives.
 *
 * A submit walks the opposite book without touching it, settles every fill
 * through the ledger in one atomic section, and only then applies the plan
 * to the books. A ledger failure therefore leaves the engine as it was.
 * Calls must not interleave; async hosts queue them through InstrumentLock.
 */
export class MatchingEngine {
  readonly pair: Pair;
  readonly events: EventLog;

  private readonly bids = new Book("BUY");
  private readonly asks = new Book("SELL");
  private readonly orders = new OrderTable();
  private readonly owners = new OwnerOrderRegistry();
  private readonly ledger: Ledger;
  private readonly custody: Owner;
  private readonly feeRecipient: Owner;
  private readonly takerFeeBps: number;
  private readonly maxOrdersPerCall: number;
  private readonly log: Logger;

  private nonce = 0n;
  private lastPrice: Price = EMPTY_PRICE;

  constructor(options: EngineOptions) {
    const maxOrders = options.maxOrdersPerCall ?? DEFAULT_MAX_ORDERS_PER_CALL;
    if (!Number.isInteger(maxOrders) || maxOrders < 1) {
      throw new RangeError(`maxOrdersPerCall must be a positive integer, got ${maxOrders}`);
    }
    if (!Number.isInteger(options.takerFeeBps) || options.takerFeeBps < 0 || options.takerFeeBps > 10_000) {
      throw new RangeError(`takerFeeBps must be an integer in [0, 10000], got ${options.takerFeeBps}`);
    }

    this.pair = options.pair;
    this.ledger = options.ledger;
    this.custody = options.custody;
    this.feeRecipient = options.feeRecipient;
    this.takerFeeBps = options.takerFeeBps;
    this.maxOrdersPerCall = maxOrders;
    this.log = (options.logger ?? rootLogger).child({ pair: options.pair.id });
    this.events = options.events ?? new EventLog(this.log);
  }

  // ── Order processing ────────────────────────────────────────

  submit(input: IncomingOrder): SubmitResult {
    const { owner, side, price, quantity } = input;
    if (price <= 0n) throw new InvalidPriceError(price);
    if (quantity <= 0n) throw new InvalidQuantityError(quantity);

    const nonce = this.nonce + 1n;
    const orderId = this.orderIdFor(input, nonce);
    if (this.orders.exists(orderId)) throw new OrderIdAlreadyExistsError(orderId);

    const plan = this.planMatches(side, price, quantity);
    const restingQuantity = plan.remaining;
    const filledQuantity = quantity - restingQuantity;

    let fills: Fill[];
    try {
      fills = this.ledger.runAtomic(() => {
        const settled = plan.fills.map((planned) => this.settleFill(orderId, owner, side, planned));
        if (restingQuantity > 0n) {
          this.moveFunds(this.lockedAsset(side), owner, this.custody, lockRequired(side, price, restingQuantity));
        }
        return settled;
      });
    } catch (err) {
      this.log.error({ err, orderId, owner, side, price: price.toString() }, "Settlement failed, order rejected");
      throw new SettlementError("submit", err);
    }

    // Settlement committed: apply the plan.
    this.nonce = nonce;
    const events: EngineEvent[] = [{ type: "OrderCreated", orderId, owner, side, price, quantity }];

    let takerRemaining = quantity;
    for (const planned of plan.fills) {
      const maker = planned.maker;
      if (planned.full) {
        this.bookFor(maker.side).remove(maker);
        this.orders.delete(maker.id);
        this.owners.remove(maker.owner, maker.id);
        maker.availableQuantity = 0n;
        events.push({
          type: "OrderFilled",
          orderId: maker.id,
          owner: maker.owner,
          counterparty: owner,
          price: maker.price,
          quantity: planned.quantity,
        });
      } else {
        maker.availableQuantity -= planned.quantity;
        maker.status = "PARTIALLY_FILLED";
        this.bookFor(maker.side).update(maker.price, planned.quantity);
        events.push({
          type: "OrderPartiallyFilled",
          orderId: maker.id,
          owner: maker.owner,
          counterparty: owner,
          price: maker.price,
          quantity: planned.quantity,
          remainingQuantity: maker.availableQuantity,
        });
      }

      takerRemaining -= planned.quantity;
      if (takerRemaining === 0n) {
        events.push({ type: "OrderFilled", orderId, owner, counterparty: maker.owner, price: maker.price, quantity: planned.quantity });
      } else {
        events.push({
          type: "OrderPartiallyFilled",
          orderId,
          owner,
          counterparty: maker.owner,
          price: maker.price,
          quantity: planned.quantity,
          remainingQuantity: takerRemaining,
        });
      }
      this.lastPrice = maker.price;
    }

    if (restingQuantity > 0n) {
      this.orders.create({
        id: orderId,
        owner,
        side,
        price,
        originalQuantity: quantity,
        availableQuantity: restingQuantity,
        timestamp: input.timestamp,
        expiresAt: input.expiresAt ?? 0,
        seq: nonce,
        status: filledQuantity > 0n ? "PARTIALLY_FILLED" : "CREATED",
      });
      this.bookFor(side).insert(orderId, price, restingQuantity);
      this.owners.add(owner, orderId);
    }

    if (plan.capped) {
      this.log.warn(
        { orderId, owner, resting: restingQuantity.toString(), limit: this.maxOrdersPerCall },
        "Match limit reached, remainder rests on a crossed book",
      );
    }

    this.events.append(this.pair.id, events);

    const status = this.submitStatus(filledQuantity, restingQuantity);
    this.log.debug(
      { orderId, owner, side, price: price.toString(), fills: fills.length, status },
      "Order processed",
    );

    return { orderId, status, filledQuantity, restingQuantity, fills };
  }

  /** Cancel a resting order and refund its lock to the owner. */
  cancel(orderId: OrderId, caller: Owner): CancelResult {
    const order = this.orders.find(orderId);
    if (!order) throw new OrderNotFoundError(orderId);
    if (order.owner !== caller) throw new NotOrderOwnerError(orderId, caller);

    const refund = lockRequired(order.side, order.price, order.availableQuantity);
    try {
      this.ledger.runAtomic(() => {
        this.moveFunds(this.lockedAsset(order.side), this.custody, order.owner, refund);
      });
    } catch (err) {
      this.log.error({ err, orderId, owner: order.owner }, "Refund failed, cancel rejected");
      throw new SettlementError("cancel", err);
    }

    this.bookFor(order.side).remove(order);
    this.orders.delete(orderId);
    this.owners.remove(order.owner, orderId);

    this.events.append(this.pair.id, [
      { type: "OrderCanceled", orderId, owner: order.owner, quantity: order.availableQuantity },
    ]);
    this.log.debug({ orderId, owner: order.owner, refund: refund.toString() }, "Order canceled");

    return { order: { ...order }, refund };
  }

  // ── Queries ──────────────────────────────────────────────────

  bestBidPrice(): Price {
    return this.bids.bestPrice();
  }

  bestAskPrice(): Price {
    return this.asks.bestPrice();
  }

  lastTradePrice(): Price {
    return this.lastPrice;
  }

  topNPrices(side: Side, n: number): Price[] {
    return this.bookFor(side).topPrices(n);
  }

  top3Prices(side: Side): [Price, Price, Price] {
    return this.bookFor(side).top3Prices();
  }

  depth(side: Side, n = 20): BookLevel[] {
    return this.bookFor(side).depth(n);
  }

  levelStats(price: Price, side: Side): LevelStats {
    return this.bookFor(side).levelStats(price);
  }

  ordersOf(owner: Owner): OrderId[] {
    return this.owners.ordersOf(owner);
  }

  orderDetail(orderId: OrderId): Order {
    return { ...this.orders.get(orderId) };
  }

  hasOrder(orderId: OrderId): boolean {
    return this.orders.exists(orderId);
  }

  orderCount(): number {
    return this.orders.size;
  }

  /** Amount of the locked asset custody holds for a resting order. */
  lockedAmount(orderId: OrderId): bigint {
    const order = this.orders.get(orderId);
    return lockRequired(order.side, order.price, order.availableQuantity);
  }

  /** Sum of all locks: base held for asks, quote held for bids. */
  lockedTotals(): { base: bigint; quote: bigint } {
    let base = 0n;
    let quote = 0n;
    for (const order of this.orders.values()) {
      const locked = lockRequired(order.side, order.price, order.availableQuantity);
      if (order.side === "BUY") quote += locked;
      else base += locked;
    }
    return { base, quote };
  }

  summary(): BookSummary {
    return {
      pair: { ...this.pair },
      bestBid: this.bestBidPrice(),
      bestAsk: this.bestAskPrice(),
      lastTradePrice: this.lastPrice,
      takerFeeBps: this.takerFeeBps,
      orderCount: this.orders.size,
    };
  }

  // ── Snapshot / rebuild ──────────────────────────────────────

  snapshot(): BookSnapshot {
    return {
      pairId: this.pair.id,
      nonce: this.nonce,
      lastTradePrice: this.lastPrice,
      bids: this.restingOrders(this.bids),
      asks: this.restingOrders(this.asks),
    };
  }

  /**
   * Rebuild an empty engine from a snapshot. Funds are assumed to already sit
   * in custody, so no ledger calls and no events are made.
   */
  restore(snapshot: BookSnapshot): void {
    if (snapshot.pairId !== this.pair.id) {
      throw new EngineError("validation", "PAIR_MISMATCH", `Snapshot is for ${snapshot.pairId}, not ${this.pair.id}`);
    }
    if (this.orders.size > 0) {
      throw new EngineError("conflict", "BOOK_NOT_EMPTY", "Restore requires an empty book");
    }

    // Validate everything before the first insert; a rejected snapshot leaves the engine empty.
    const seen = new Set<OrderId>();
    const entries: [Side, readonly Order[]][] = [
      ["BUY", snapshot.bids],
      ["SELL", snapshot.asks],
    ];
    for (const [side, orders] of entries) {
      for (const order of orders) {
        if (order.side !== side) {
          throw new EngineError("validation", "SIDE_MISMATCH", `Order ${order.id} is ${order.side} but listed as ${side}`);
        }
        if (seen.has(order.id)) throw new OrderIdAlreadyExistsError(order.id);
        if (order.price <= 0n) throw new InvalidPriceError(order.price);
        if (order.availableQuantity <= 0n || order.availableQuantity > order.originalQuantity) {
          throw new InvalidQuantityError(order.availableQuantity);
        }
        seen.add(order.id);
      }
    }

    for (const order of [...snapshot.bids, ...snapshot.asks]) {
      this.orders.create({ ...order });
      this.bookFor(order.side).insert(order.id, order.price, order.availableQuantity);
      this.owners.add(order.owner, order.id);
    }

    this.nonce = snapshot.nonce;
    this.lastPrice = snapshot.lastTradePrice;
    this.log.info({ orderCount: this.orders.size }, "Book restored");
  }

  // ── Private helpers ──────────────────────────────────────────

  /**
   * Walk the opposite book in price-time order without mutating it.
   * Stops when the incoming quantity is used up, the best remaining price no
   * longer crosses, or maxOrdersPerCall resting orders have been consumed.
   */
  private planMatches(side: Side, price: Price, quantity: Quantity): MatchPlan {
    const book = this.bookFor(oppositeSide(side));
    const crosses = (bookPrice: Price): boolean => (side === "BUY" ? price >= bookPrice : price <= bookPrice);

    const fills: PlannedFill[] = [];
    let remaining = quantity;
    let processed = 0;
    let levelPrice = book.bestPrice();
    let makerId = levelPrice === EMPTY_PRICE ? EMPTY_ORDER_ID : book.nextOrderIdAtPrice(levelPrice);

    while (remaining > 0n && levelPrice !== EMPTY_PRICE && crosses(levelPrice) && processed < this.maxOrdersPerCall) {
      const maker = this.orders.get(makerId);

      if (remaining >= maker.availableQuantity) {
        fills.push({ maker, quantity: maker.availableQuantity, full: true });
        remaining -= maker.availableQuantity;

        makerId = book.nextOrderIdAfter(levelPrice, makerId);
        if (makerId === EMPTY_ORDER_ID) {
          levelPrice = book.nextPrice(levelPrice);
          makerId = levelPrice === EMPTY_PRICE ? EMPTY_ORDER_ID : book.nextOrderIdAtPrice(levelPrice);
        }
      } else {
        fills.push({ maker, quantity: remaining, full: false });
        remaining = 0n;
      }
      processed++;
    }

    const capped = remaining > 0n && levelPrice !== EMPTY_PRICE && crosses(levelPrice);
    return { fills, remaining, capped };
  }

  /** Ledger movements for one fill. Runs inside the atomic section. */
  private settleFill(takerOrderId: OrderId, taker: Owner, takerSide: Side, planned: PlannedFill): Fill {
    const { maker, quantity } = planned;
    const { baseAsset, quoteAsset } = this.pair;

    let quote: bigint;
    let fee: bigint;
    if (takerSide === "BUY") {
      // Taker pays quote to the maker; custody releases the maker's base.
      quote = quoteAmount(quantity, maker.price);
      fee = feeAmount(quantity, this.takerFeeBps);
      this.moveFunds(quoteAsset, taker, maker.owner, quote);
      this.moveFunds(baseAsset, this.custody, taker, quantity - fee);
      if (fee > 0n) this.ledger.transferFee(baseAsset, this.feeRecipient, fee);
    } else {
      // Taker delivers base to the maker; custody releases the maker's quote.
      quote = quoteRelease(maker.availableQuantity, quantity, maker.price);
      fee = feeAmount(quote, this.takerFeeBps);
      this.moveFunds(baseAsset, taker, maker.owner, quantity);
      this.moveFunds(quoteAsset, this.custody, taker, quote - fee);
      if (fee > 0n) this.ledger.transferFee(quoteAsset, this.feeRecipient, fee);
    }

    return {
      makerOrderId: maker.id,
      takerOrderId,
      makerOwner: maker.owner,
      takerOwner: taker,
      price: maker.price,
      quantity,
      quoteAmount: quote,
      takerFee: fee,
      makerFilled: planned.full,
    };
  }

  private moveFunds(asset: Asset, from: Owner, to: Owner, amount: bigint): void {
    if (amount > 0n) this.ledger.transfer(asset, from, to, amount);
  }

  private lockedAsset(side: Side): Asset {
    return side === "BUY" ? this.pair.quoteAsset : this.pair.baseAsset;
  }

  private bookFor(side: Side): Book {
    return side === "BUY" ? this.bids : this.asks;
  }

  private orderIdFor(input: IncomingOrder, nonce: bigint): OrderId {
    const digest = createHash("sha256")
      .update(encodeIdFields([this.pair.id, input.owner, input.side, input.price, input.quantity, input.timestamp, nonce]))
      .digest("hex");
    return `0x${digest}`;
  }

  private submitStatus(filled: Quantity, resting: Quantity): SubmitStatus {
    if (resting === 0n) return "FILLED";
    return filled > 0n ? "PARTIALLY_RESTING" : "RESTING";
  }

  private restingOrders(book: Book): Order[] {
    const result: Order[] = [];
    for (const price of book.prices()) {
      for (const id of book.orderIdsAt(price)) {
        result.push({ ...this.orders.get(id) });
      }
    }
    return result;
  }
}
