/**
 * Tests for the trove owners array.
 *
 * Covers:
 * - Append and lookup
 * - Duplicate rejection
 * - Swap-and-pop removal
 */

import { describe, it, expect, beforeEach } from "vitest";
import { OwnerRegistry } from "../src/owners.js";
import { LedgerError } from "../src/types.js";

describe("OwnerRegistry", () => {
  let registry: OwnerRegistry;

  beforeEach(() => {
    registry = new OwnerRegistry();
  });

  it("assigns indexes in insertion order", () => {
    expect(registry.add("alice")).toBe(0);
    expect(registry.add("bob")).toBe(1);
    expect(registry.at(1)).toBe("bob");
    expect(registry.count).toBe(2);
  });

  it("throws on a duplicate owner", () => {
    registry.add("alice");
    expect(() => registry.add("alice")).toThrow(LedgerError);
    expect(() => registry.add("alice")).toThrow(/already registered/);
  });

  it("moves the last owner into the removed slot", () => {
    registry.add("alice");
    registry.add("bob");
    registry.add("carol");

    const removal = registry.remove("alice");

    expect(removal).toEqual({ removedIndex: 0, moved: { owner: "carol", index: 0 } });
    expect(registry.getAll()).toEqual(["carol", "bob"]);
    expect(registry.indexOf("carol")).toBe(0);
    expect(registry.has("alice")).toBe(false);
  });

  it("pops without moving when removing the last owner", () => {
    registry.add("alice");
    registry.add("bob");

    expect(registry.remove("bob")).toEqual({ removedIndex: 1 });
    expect(registry.getAll()).toEqual(["alice"]);
  });

  it("throws when removing an unknown owner", () => {
    expect(() => registry.remove("nobody")).toThrow(/Unknown owner/);
  });

  it("resets to a given array", () => {
    registry.add("alice");
    registry.reset(["bob", "carol"]);
    expect(registry.getAll()).toEqual(["bob", "carol"]);
    expect(registry.indexOf("alice")).toBeUndefined();
  });
});
