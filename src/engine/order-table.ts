import { OrderIdAlreadyExistsError, OrderNotFoundError } from "./errors.js";
import type { Order, OrderId } from "./types.js";

/** Resting orders by id. The only place order fields are stored. */
export class OrderTable {
  private readonly orders = new Map<OrderId, Order>();

  get size(): number {
    return this.orders.size;
  }

  exists(id: OrderId): boolean {
    return this.orders.has(id);
  }

  create(order: Order): Order {
    if (this.orders.has(order.id)) {
      throw new OrderIdAlreadyExistsError(order.id);
    }
    this.orders.set(order.id, order);
    return order;
  }

  /** Live record; callers mutate it in place. */
  get(id: OrderId): Order {
    const order = this.orders.get(id);
    if (!order) throw new OrderNotFoundError(id);
    return order;
  }

  find(id: OrderId): Order | undefined {
    return this.orders.get(id);
  }

  delete(id: OrderId): Order {
    const order = this.get(id);
    this.orders.delete(id);
    return order;
  }

  values(): IterableIterator<Order> {
    return this.orders.values();
  }
}
