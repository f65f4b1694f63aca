import { describe, it, expect, beforeEach } from "vitest";
import { OwnerOrderRegistry } from "../src/engine/owner-registry.js";
import { ItemAlreadyExistsError, ItemDoesNotExistError } from "../src/engine/errors.js";
import { mulberry32 } from "./helpers.js";

describe("OwnerOrderRegistry", () => {
  let registry: OwnerOrderRegistry;

  beforeEach(() => {
    registry = new OwnerOrderRegistry();
  });

  it("lists an owner's ids in insertion order until something is removed", () => {
    registry.add("alice", "a");
    registry.add("alice", "b");
    registry.add("bob", "x");
    expect(registry.ordersOf("alice")).toEqual(["a", "b"]);
    expect(registry.ordersOf("bob")).toEqual(["x"]);
    expect(registry.ordersOf("carol")).toEqual([]);
  });

  it("swaps the last id into the removed slot", () => {
    for (const id of ["a", "b", "c", "d"]) registry.add("alice", id);
    registry.remove("alice", "b");

    expect(registry.ordersOf("alice")).toEqual(["a", "d", "c"]);
    expect(registry.indexOf("alice", "d")).toBe(1);
    expect(registry.indexOf("alice", "b")).toBe(-1);
  });

  it("removes the last id without moving anything", () => {
    for (const id of ["a", "b"]) registry.add("alice", id);
    registry.remove("alice", "b");
    expect(registry.ordersOf("alice")).toEqual(["a"]);
    expect(registry.indexOf("alice", "a")).toBe(0);
  });

  it("forgets owners with no orders left", () => {
    registry.add("alice", "a");
    registry.remove("alice", "a");
    expect(registry.ordersOf("alice")).toEqual([]);
    expect(registry.has("alice", "a")).toBe(false);
  });

  it("returns a copy", () => {
    registry.add("alice", "a");
    registry.ordersOf("alice").push("zzz");
    expect(registry.ordersOf("alice")).toEqual(["a"]);
  });

  it("rejects duplicates and unknown ids", () => {
    registry.add("alice", "a");
    expect(() => registry.add("alice", "a")).toThrow(ItemAlreadyExistsError);
    expect(() => registry.remove("alice", "nope")).toThrow(ItemDoesNotExistError);
    expect(() => registry.remove("bob", "a")).toThrow(ItemDoesNotExistError);
  });

  it("keeps index[id] equal to the id's position after any removal", () => {
    const rand = mulberry32(42);
    const live: string[] = [];
    for (let i = 0; i < 200; i++) {
      const id = `o${i}`;
      registry.add("alice", id);
      live.push(id);
    }

    while (live.length > 0) {
      const pick = Math.floor(rand() * live.length);
      const [id] = live.splice(pick, 1);
      if (id === undefined) throw new Error("empty pick");
      registry.remove("alice", id);

      const ids = registry.ordersOf("alice");
      expect(ids.length).toBe(live.length);
      ids.forEach((x, i) => {
        expect(registry.indexOf("alice", x)).toBe(i);
      });
    }
  });
});
