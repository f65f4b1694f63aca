/**
 * Prices, quantities and asset amounts are bigint fixed-point values with
 * 18 decimals. Price 0 never trades and doubles as the EMPTY sentinel.
 */

export type Price = bigint;
export type Quantity = bigint;
export type OrderId = string;
export type Owner = string;
export type Asset = string;

export type Side = "BUY" | "SELL";
export type OrderStatus = "CREATED" | "PARTIALLY_FILLED";

export const PRECISION = 10n ** 18n;
export const EMPTY_PRICE: Price = 0n;
export const EMPTY_ORDER_ID: OrderId = "";
export const BPS_DENOMINATOR = 10_000n;
export const DEFAULT_MAX_ORDERS_PER_CALL = 1500;

export interface Pair {
  id: string;
  baseAsset: Asset;
  quoteAsset: Asset;
}

export interface Order {
  id: OrderId;
  owner: Owner;
  side: Side;
  price: Price;
  originalQuantity: Quantity;
  availableQuantity: Quantity;
  /** Caller-supplied creation time. */
  timestamp: number;
  /** Stored for the host; expiry is not enforced by the book. */
  expiresAt: number;
  /** Intake order within the engine, used for time priority on restore. */
  seq: bigint;
  status: OrderStatus;
}

export interface IncomingOrder {
  owner: Owner;
  side: Side;
  price: Price;
  quantity: Quantity;
  timestamp: number;
  expiresAt?: number;
}

export interface Fill {
  makerOrderId: OrderId;
  takerOrderId: OrderId;
  makerOwner: Owner;
  takerOwner: Owner;
  price: Price; // execution price = maker's resting price
  quantity: Quantity;
  quoteAmount: bigint;
  /** Charged to the taker, in the asset the taker receives. */
  takerFee: bigint;
  /** True when the maker order left the book with this fill. */
  makerFilled: boolean;
}

export type SubmitStatus = "RESTING" | "PARTIALLY_RESTING" | "FILLED";

export interface SubmitResult {
  orderId: OrderId;
  status: SubmitStatus;
  filledQuantity: Quantity;
  restingQuantity: Quantity;
  fills: Fill[];
}

export interface LevelStats {
  orderCount: number;
  orderValue: Quantity;
}

export interface BookLevel {
  price: Price;
  orderCount: number;
  totalQuantity: Quantity;
}

export interface BookSummary {
  pair: Pair;
  bestBid: Price;
  bestAsk: Price;
  lastTradePrice: Price;
  takerFeeBps: number;
  orderCount: number;
}

export interface BookSnapshot {
  pairId: string;
  nonce: bigint;
  lastTradePrice: Price;
  /** Resting orders, best price first, oldest first within a price. */
  bids: Order[];
  asks: Order[];
}

export function oppositeSide(side: Side): Side {
  return side === "BUY" ? "SELL" : "BUY";
}
