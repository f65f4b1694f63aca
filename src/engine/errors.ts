/**
 * Error taxonomy of the matching core.
 *
 * Everything extending EngineError is surfaced to the caller and leaves state
 * untouched. InvariantViolationError is different: it means the book is
 * corrupt and must never be caught by the core.
 */

export type EngineErrorKind = "validation" | "not_found" | "conflict" | "authorization" | "settlement";

export class EngineError extends Error {
  constructor(
    public readonly kind: EngineErrorKind,
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "EngineError";
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ── Validation ───────────────────────────────────────────────

export class InvalidPriceError extends EngineError {
  constructor(price: bigint) {
    super("validation", "INVALID_PRICE", "Price must be greater than zero", { price: price.toString() });
    this.name = "InvalidPriceError";
  }
}

export class InvalidQuantityError extends EngineError {
  constructor(quantity: bigint) {
    super("validation", "INVALID_QUANTITY", "Quantity must be greater than zero", { quantity: quantity.toString() });
    this.name = "InvalidQuantityError";
  }
}

export class OrderIdAlreadyExistsError extends EngineError {
  constructor(orderId: string) {
    super("validation", "ORDER_ID_ALREADY_EXISTS", `Order id already exists: ${orderId}`, { orderId });
    this.name = "OrderIdAlreadyExistsError";
  }
}

// ── Not found ────────────────────────────────────────────────

export class OrderNotFoundError extends EngineError {
  constructor(orderId: string) {
    super("not_found", "ORDER_ID_DOES_NOT_EXIST", `Order not found: ${orderId}`, { orderId });
    this.name = "OrderNotFoundError";
  }
}

export class PriceLevelNotFoundError extends EngineError {
  constructor(price: bigint) {
    super("not_found", "PRICE_LEVEL_NOT_FOUND", `No price level at ${price}`, { price: price.toString() });
    this.name = "PriceLevelNotFoundError";
  }
}

export class NodeNotFoundError extends EngineError {
  constructor(price: bigint) {
    super("not_found", "NODE_NOT_FOUND", `Price ${price} is not in the index`, { price: price.toString() });
    this.name = "NodeNotFoundError";
  }
}

export class EmptyQueueError extends EngineError {
  constructor() {
    super("not_found", "EMPTY_QUEUE", "Queue is empty");
    this.name = "EmptyQueueError";
  }
}

export class ItemDoesNotExistError extends EngineError {
  constructor(id: string) {
    super("not_found", "ITEM_DOES_NOT_EXIST", `Item does not exist: ${id}`, { id });
    this.name = "ItemDoesNotExistError";
  }
}

// ── Conflict ─────────────────────────────────────────────────

export class ItemAlreadyExistsError extends EngineError {
  constructor(id: string) {
    super("conflict", "ITEM_ALREADY_EXISTS", `Item already exists: ${id === "" ? "<empty>" : id}`, { id });
    this.name = "ItemAlreadyExistsError";
  }
}

// ── Authorization ────────────────────────────────────────────

export class NotOrderOwnerError extends EngineError {
  constructor(orderId: string, caller: string) {
    super("authorization", "NOT_ORDER_OWNER", "Only the order owner can cancel it", { orderId, caller });
    this.name = "NotOrderOwnerError";
  }
}

// ── Settlement ───────────────────────────────────────────────

export class SettlementError extends EngineError {
  constructor(operation: "submit" | "cancel", cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("settlement", "SETTLEMENT_FAILED", `Settlement failed during ${operation}: ${reason}`, { operation });
    this.name = "SettlementError";
    this.cause = cause;
  }
}

// ── Fatal ────────────────────────────────────────────────────

export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(`Invariant violated: ${message}`);
    this.name = "InvariantViolationError";
  }
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message);
  }
}
