import { describe, it, expect, beforeEach } from "vitest";
import { PriceLevelQueue } from "../src/engine/level-queue.js";
import { EmptyQueueError, ItemAlreadyExistsError, ItemDoesNotExistError } from "../src/engine/errors.js";

describe("PriceLevelQueue", () => {
  let queue: PriceLevelQueue;

  beforeEach(() => {
    queue = new PriceLevelQueue();
  });

  it("starts empty", () => {
    expect(queue.isEmpty()).toBe(true);
    expect(queue.head).toBe("");
    expect(queue.tail).toBe("");
    expect(queue.length).toBe(0);
  });

  it("drains in arrival order", () => {
    queue.push("A");
    queue.push("B");
    queue.push("C");

    const drained: string[] = [];
    while (!queue.isEmpty()) {
      const head = queue.head;
      drained.push(head);
      queue.remove(head);
    }
    expect(drained).toEqual(["A", "B", "C"]);
  });

  it("splices an interior id and relinks its neighbours", () => {
    for (const id of ["A", "B", "C", "D"]) queue.push(id);
    queue.remove("C");

    expect([...queue]).toEqual(["A", "B", "D"]);
    expect(queue.next("B")).toBe("D");
    expect(queue.exists("C")).toBe(false);
    expect(queue.length).toBe(3);
  });

  it("moves head and tail when the ends are removed", () => {
    for (const id of ["A", "B", "C"]) queue.push(id);
    queue.remove("A");
    expect(queue.head).toBe("B");
    queue.remove("C");
    expect(queue.tail).toBe("B");
    expect(queue.head).toBe("B");
    queue.remove("B");
    expect(queue.isEmpty()).toBe(true);
    expect(queue.tail).toBe("");
  });

  it("accepts an id again after it was removed", () => {
    queue.push("A");
    queue.remove("A");
    queue.push("A");
    expect([...queue]).toEqual(["A"]);
  });

  it("rejects the empty id and duplicates", () => {
    expect(() => queue.push("")).toThrow(ItemAlreadyExistsError);
    queue.push("A");
    expect(() => queue.push("A")).toThrow(ItemAlreadyExistsError);
  });

  it("rejects removal from an empty queue", () => {
    expect(() => queue.remove("A")).toThrow(EmptyQueueError);
  });

  it("rejects removal of a missing id", () => {
    queue.push("A");
    expect(() => queue.remove("B")).toThrow(ItemDoesNotExistError);
    expect(() => queue.next("B")).toThrow(ItemDoesNotExistError);
  });

  it("reports EMPTY after the tail", () => {
    queue.push("A");
    expect(queue.next("A")).toBe("");
  });
});
