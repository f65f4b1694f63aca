import { EmptyQueueError, ItemAlreadyExistsError, ItemDoesNotExistError, invariant } from "./errors.js";
import { EMPTY_ORDER_ID, type OrderId } from "./types.js";

interface Link {
  prev: OrderId;
  next: OrderId;
}

/**
 * FIFO of order ids at one price. Links are kept in an id-keyed arena so any
 * id can be spliced out in O(1); matching always drains from the head.
 */
export class PriceLevelQueue {
  private first: OrderId = EMPTY_ORDER_ID;
  private last: OrderId = EMPTY_ORDER_ID;
  private readonly links = new Map<OrderId, Link>();

  get head(): OrderId {
    return this.first;
  }

  get tail(): OrderId {
    return this.last;
  }

  get length(): number {
    return this.links.size;
  }

  isEmpty(): boolean {
    return this.first === EMPTY_ORDER_ID;
  }

  exists(id: OrderId): boolean {
    return this.links.has(id);
  }

  /** Id queued behind `id`, or EMPTY_ORDER_ID at the tail. */
  next(id: OrderId): OrderId {
    const link = this.links.get(id);
    if (!link) throw new ItemDoesNotExistError(id);
    return link.next;
  }

  push(id: OrderId): void {
    if (id === EMPTY_ORDER_ID || this.links.has(id)) {
      throw new ItemAlreadyExistsError(id);
    }

    this.links.set(id, { prev: this.last, next: EMPTY_ORDER_ID });
    if (this.last === EMPTY_ORDER_ID) {
      this.first = id;
    } else {
      this.linkAt(this.last).next = id;
    }
    this.last = id;
  }

  remove(id: OrderId): void {
    if (this.isEmpty()) throw new EmptyQueueError();
    const link = this.links.get(id);
    if (!link) throw new ItemDoesNotExistError(id);

    if (link.prev === EMPTY_ORDER_ID) {
      invariant(this.first === id, `queue head is ${this.first}, expected ${id}`);
      this.first = link.next;
    } else {
      const prev = this.linkAt(link.prev);
      invariant(prev.next === id, `${link.prev} does not link forward to ${id}`);
      prev.next = link.next;
    }

    if (link.next === EMPTY_ORDER_ID) {
      invariant(this.last === id, `queue tail is ${this.last}, expected ${id}`);
      this.last = link.prev;
    } else {
      const next = this.linkAt(link.next);
      invariant(next.prev === id, `${link.next} does not link back to ${id}`);
      next.prev = link.prev;
    }

    this.links.delete(id);
  }

  *[Symbol.iterator](): IterableIterator<OrderId> {
    let cursor = this.first;
    while (cursor !== EMPTY_ORDER_ID) {
      yield cursor;
      cursor = this.linkAt(cursor).next;
    }
  }

  private linkAt(id: OrderId): Link {
    const link = this.links.get(id);
    invariant(link, `dangling queue link to ${id}`);
    return link;
  }
}
