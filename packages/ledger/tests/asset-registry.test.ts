/**
 * Tests for AssetRegistry.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AssetRegistry } from "../src/asset-registry.js";
import { ALICE, BOB, X, Y, Z } from "./helpers.js";

describe("AssetRegistry", () => {
  let registry: AssetRegistry;

  beforeEach(() => {
    registry = new AssetRegistry();
  });

  it("appends assets in registration order", () => {
    expect(registry.register(ALICE, X)).toBe(true);
    expect(registry.register(ALICE, Y)).toBe(true);
    expect(registry.list(ALICE)).toEqual([X, Y]);
    expect(registry.size(ALICE)).toBe(2);
  });

  it("ignores duplicate registrations", () => {
    registry.register(ALICE, X);
    expect(registry.register(ALICE, X)).toBe(false);
    expect(registry.list(ALICE)).toEqual([X]);
  });

  it("keeps accounts separate", () => {
    registry.register(ALICE, X);
    registry.register(BOB, Y);
    expect(registry.has(ALICE, Y)).toBe(false);
    expect(registry.list(BOB)).toEqual([Y]);
  });

  it("returns an empty list for unknown accounts", () => {
    expect(registry.list("nobody")).toEqual([]);
    expect(registry.size("nobody")).toBe(0);
  });

  describe("remove", () => {
    beforeEach(() => {
      registry.register(ALICE, X);
      registry.register(ALICE, Y);
      registry.register(ALICE, Z);
    });

    it("moves the last entry into the removed slot", () => {
      expect(registry.remove(ALICE, X)).toBe(true);
      expect(registry.list(ALICE)).toEqual([Z, Y]);
    });

    it("truncates when removing the last entry", () => {
      registry.remove(ALICE, Z);
      expect(registry.list(ALICE)).toEqual([X, Y]);
    });

    it("keeps the index consistent after a swap", () => {
      registry.remove(ALICE, X);
      registry.remove(ALICE, Z);
      expect(registry.list(ALICE)).toEqual([Y]);
      expect(registry.has(ALICE, Z)).toBe(false);
      expect(registry.has(ALICE, Y)).toBe(true);
    });

    it("returns false for absent assets and unknown accounts", () => {
      expect(registry.remove(ALICE, "0xdead")).toBe(false);
      expect(registry.remove(BOB, X)).toBe(false);
      expect(registry.size(ALICE)).toBe(3);
    });

    it("allows re-registration after removal", () => {
      registry.remove(ALICE, Y);
      expect(registry.register(ALICE, Y)).toBe(true);
      expect(registry.list(ALICE)).toEqual([X, Z, Y]);
    });
  });

  it("returns listings that later mutations do not affect", () => {
    registry.register(ALICE, X);
    const listing = registry.list(ALICE);
    registry.register(ALICE, Y);
    registry.remove(ALICE, X);
    expect(listing).toEqual([X]);
  });
});
