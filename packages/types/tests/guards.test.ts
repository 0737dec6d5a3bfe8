/**
 * Runtime type guard tests for @lockbox/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isQuantityString,
  isCustodyEventType,
  isAuthorizedTransferRequest,
  isEventMetadata,
  isCustodyEvent,
} from "../src/guards.js";
import { isNullAsset } from "../src/ids.js";

const META = {
  eventId: "evt-1",
  timestamp: "2024-01-01T00:00:00.000Z",
  actor: "alice",
  correlationId: "op-1",
  source: "ledger",
};

// =============================================================================
// Identifiers
// =============================================================================

describe("isNullAsset", () => {
  it("treats the canonical zero address as null", () => {
    expect(isNullAsset("0x0000000000000000000000000000000000000000")).toBe(true);
  });

  it("treats empty and blank identifiers as null", () => {
    expect(isNullAsset("")).toBe(true);
    expect(isNullAsset("   ")).toBe(true);
  });

  it("treats short zero hex as null", () => {
    expect(isNullAsset("0x0")).toBe(true);
  });

  it("accepts real identifiers", () => {
    expect(isNullAsset("0x00000000000000000000000000000000000000a1")).toBe(false);
    expect(isNullAsset("USDC")).toBe(false);
    expect(isNullAsset("0x")).toBe(false);
  });
});

// =============================================================================
// Scalars
// =============================================================================

describe("isQuantityString", () => {
  it("accepts unsigned integers", () => {
    expect(isQuantityString("0")).toBe(true);
    expect(isQuantityString("100000000000000000000")).toBe(true);
  });

  it("rejects signs, fractions and numbers", () => {
    expect(isQuantityString("-1")).toBe(false);
    expect(isQuantityString("1.5")).toBe(false);
    expect(isQuantityString("1e3")).toBe(false);
    expect(isQuantityString("")).toBe(false);
    expect(isQuantityString(100)).toBe(false);
  });
});

describe("isCustodyEventType", () => {
  it("accepts known types", () => {
    expect(isCustodyEventType("asset.withdraw_failed")).toBe(true);
  });

  it("rejects unknown types", () => {
    expect(isCustodyEventType("asset.burned")).toBe(false);
    expect(isCustodyEventType(1)).toBe(false);
  });
});

// =============================================================================
// Authorization
// =============================================================================

describe("isAuthorizedTransferRequest", () => {
  const valid = {
    asset: "USDC",
    amount: "100",
    owner: "alice",
    nonce: "n-1",
    deadline: 1_700_000_000,
    signature: "sig",
  };

  it("accepts a complete request", () => {
    expect(isAuthorizedTransferRequest(valid)).toBe(true);
  });

  it("rejects a numeric amount", () => {
    expect(isAuthorizedTransferRequest({ ...valid, amount: 100 })).toBe(false);
  });

  it("rejects a fractional deadline", () => {
    expect(isAuthorizedTransferRequest({ ...valid, deadline: 1.5 })).toBe(false);
  });

  it("rejects an empty nonce or owner", () => {
    expect(isAuthorizedTransferRequest({ ...valid, nonce: "" })).toBe(false);
    expect(isAuthorizedTransferRequest({ ...valid, owner: "" })).toBe(false);
  });

  it("rejects non-objects", () => {
    expect(isAuthorizedTransferRequest(null)).toBe(false);
    expect(isAuthorizedTransferRequest([valid])).toBe(false);
  });
});

// =============================================================================
// Events
// =============================================================================

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(META)).toBe(true);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata({ ...META, source: "treasury" })).toBe(false);
  });
});

describe("isCustodyEvent", () => {
  it("accepts an account.created event", () => {
    expect(
      isCustodyEvent({
        type: "account.created",
        metadata: META,
        payload: { account: "alice", startTime: 0, lockPeriod: 86400, rearmed: false },
      }),
    ).toBe(true);
  });

  it("accepts an asset.withdraw_failed event", () => {
    expect(
      isCustodyEvent({
        type: "asset.withdraw_failed",
        metadata: { ...META, source: "withdrawal" },
        payload: { account: "alice", asset: "USDC", amount: "5", reason: "frozen" },
      }),
    ).toBe(true);
  });

  it("rejects a deposit with a numeric balance", () => {
    expect(
      isCustodyEvent({
        type: "asset.deposited",
        metadata: META,
        payload: { account: "alice", asset: "USDC", amount: "5", newBalance: 5 },
      }),
    ).toBe(false);
  });

  it("rejects a withdrawal failure without a reason", () => {
    expect(
      isCustodyEvent({
        type: "asset.withdraw_failed",
        metadata: META,
        payload: { account: "alice", asset: "USDC", amount: "5" },
      }),
    ).toBe(false);
  });

  it("rejects an unknown type", () => {
    expect(
      isCustodyEvent({ type: "asset.minted", metadata: META, payload: {} }),
    ).toBe(false);
  });
});
