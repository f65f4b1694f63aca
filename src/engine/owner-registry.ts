import { ItemAlreadyExistsError, ItemDoesNotExistError, invariant } from "./errors.js";
import type { OrderId, Owner } from "./types.js";

interface OwnerEntry {
  orderIds: OrderId[];
  index: Map<OrderId, number>;
}

/**
 * Open order ids per owner. Removal swaps the target with the last id and
 * pops, so it is O(1) and does not preserve insertion order.
 */
export class OwnerOrderRegistry {
  private readonly entries = new Map<Owner, OwnerEntry>();

  add(owner: Owner, id: OrderId): void {
    let entry = this.entries.get(owner);
    if (!entry) {
      entry = { orderIds: [], index: new Map() };
      this.entries.set(owner, entry);
    }
    if (entry.index.has(id)) throw new ItemAlreadyExistsError(id);

    entry.index.set(id, entry.orderIds.length);
    entry.orderIds.push(id);
  }

  remove(owner: Owner, id: OrderId): void {
    const entry = this.entries.get(owner);
    const position = entry?.index.get(id);
    if (!entry || position === undefined) throw new ItemDoesNotExistError(id);

    const lastPosition = entry.orderIds.length - 1;
    const lastId = entry.orderIds[lastPosition];
    invariant(lastId !== undefined, `registry of ${owner} is empty but indexes ${id}`);

    entry.orderIds[position] = lastId;
    entry.index.set(lastId, position);
    entry.orderIds.pop();
    entry.index.delete(id);

    if (entry.orderIds.length === 0) {
      this.entries.delete(owner);
    }
  }

  has(owner: Owner, id: OrderId): boolean {
    return this.entries.get(owner)?.index.has(id) ?? false;
  }

  /** Position of `id` in the owner's array, -1 when absent. */
  indexOf(owner: Owner, id: OrderId): number {
    return this.entries.get(owner)?.index.get(id) ?? -1;
  }

  ordersOf(owner: Owner): OrderId[] {
    return [...(this.entries.get(owner)?.orderIds ?? [])];
  }
}
