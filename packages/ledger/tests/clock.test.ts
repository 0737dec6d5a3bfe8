import { describe, it, expect } from "vitest";
import { ManualClock, systemClock } from "../src/clock.js";
import { parseQuantity } from "../src/quantity.js";

describe("ManualClock", () => {
  it("moves only when told to", () => {
    const clock = new ManualClock(10);
    expect(clock.now()).toBe(10);
    clock.advance(5);
    expect(clock.now()).toBe(15);
    clock.set(3);
    expect(clock.now()).toBe(3);
  });

  it("refuses to advance backwards", () => {
    expect(() => new ManualClock().advance(-1)).toThrow(RangeError);
  });
});

describe("systemClock", () => {
  it("reports whole seconds", () => {
    expect(Number.isInteger(systemClock.now())).toBe(true);
  });
});

describe("parseQuantity", () => {
  it("parses decimal integers", () => {
    expect(parseQuantity("1500")).toBe(1500n);
    expect(parseQuantity("340282366920938463463374607431768211456")).toBe(2n ** 128n);
  });

  it.each(["", "-1", "1.5", "1e3", " 1", "0x10"])("rejects %j", (raw) => {
    expect(() => parseQuantity(raw)).toThrow(`Invalid quantity: "${raw}"`);
  });
});
