/**
 * Tests for InMemoryAssetBank and transfer authorizations.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryAssetBank } from "../src/asset-bank.js";
import { ManualClock } from "../src/clock.js";
import {
  authorizeTransfer,
  signTransferAuthorization,
  verifyTransferAuthorization,
} from "../src/permit.js";
import type { TransferAuthorizationFields } from "../src/permit.js";
import { TransferError } from "../src/types.js";
import { ALICE, BOB, X, Y } from "./helpers.js";

const SECRET = "test-secret";
const CUSTODY = "custody-test";

function fields(overrides?: Partial<TransferAuthorizationFields>): TransferAuthorizationFields {
  return {
    asset: X,
    amount: "100",
    owner: ALICE,
    nonce: "n-1",
    deadline: 1_000,
    spender: CUSTODY,
    ...overrides,
  };
}

describe("transfer authorizations", () => {
  it("signs deterministically regardless of field order", () => {
    const a = signTransferAuthorization(fields(), SECRET);
    const b = signTransferAuthorization(
      {
        spender: CUSTODY,
        deadline: 1_000,
        nonce: "n-1",
        owner: ALICE,
        amount: "100",
        asset: X,
      },
      SECRET,
    );
    expect(a).toBe(b);
  });

  it("verifies for the intended spender only", () => {
    const request = authorizeTransfer(fields(), SECRET);
    expect(verifyTransferAuthorization(request, CUSTODY, SECRET)).toBe(true);
    expect(verifyTransferAuthorization(request, "other-custody", SECRET)).toBe(false);
    expect(verifyTransferAuthorization(request, CUSTODY, "wrong-secret")).toBe(false);
  });

  it("rejects tampered fields", () => {
    const request = authorizeTransfer(fields(), SECRET);
    expect(verifyTransferAuthorization({ ...request, amount: "1000" }, CUSTODY, SECRET)).toBe(
      false,
    );
    expect(verifyTransferAuthorization({ ...request, signature: "" }, CUSTODY, SECRET)).toBe(
      false,
    );
  });
});

describe("InMemoryAssetBank", () => {
  let clock: ManualClock;
  let bank: InMemoryAssetBank;

  beforeEach(() => {
    clock = new ManualClock(500);
    bank = new InMemoryAssetBank({ custodyId: CUSTODY, signingSecret: SECRET, clock });
    bank.mint(X, ALICE, 1_000n);
  });

  function pull(quantity: bigint, overrides?: Partial<TransferAuthorizationFields>) {
    return bank.pullInto(CUSTODY, X, ALICE, quantity, authorizeTransfer(fields(overrides), SECRET));
  }

  describe("pullInto", () => {
    it("moves funds into custody", async () => {
      await pull(100n);

      expect(bank.balanceOf(X, ALICE)).toBe(900n);
      expect(bank.custodyBalance(CUSTODY, X)).toBe(100n);
    });

    it("accepts less than the permitted amount", async () => {
      await pull(40n);
      expect(bank.custodyBalance(CUSTODY, X)).toBe(40n);
    });

    it.each<{ label: string; quantity: bigint; overrides: Partial<TransferAuthorizationFields> }>([
      { label: "a larger quantity than permitted", quantity: 101n, overrides: {} },
      { label: "another owner", quantity: 100n, overrides: { owner: BOB } },
      { label: "another asset", quantity: 100n, overrides: { asset: Y } },
      { label: "another spender", quantity: 100n, overrides: { spender: "other-custody" } },
      { label: "a malformed amount", quantity: 1n, overrides: { amount: "1e3" } },
    ])("rejects an authorization for $label", async ({ quantity, overrides }) => {
      await expect(pull(quantity, overrides)).rejects.toMatchObject({ code: "UNAUTHORIZED" });
      expect(bank.balanceOf(X, ALICE)).toBe(1_000n);
    });

    it("rejects a malformed authorization before checking its signature", async () => {
      const request = { ...authorizeTransfer(fields(), SECRET), deadline: 1.5 };

      await expect(bank.pullInto(CUSTODY, X, ALICE, 1n, request)).rejects.toThrow(
        new TransferError("UNAUTHORIZED", "Malformed authorization"),
      );
      await expect(pull(1n, { amount: "-5" })).rejects.toThrow("Malformed authorization");
      expect(bank.balanceOf(X, ALICE)).toBe(1_000n);
    });

    it("accepts an authorization up to its deadline", async () => {
      clock.set(1_000);
      await expect(pull(100n)).resolves.toBeUndefined();
    });

    it("rejects an expired authorization", async () => {
      clock.set(1_001);
      await expect(pull(100n)).rejects.toThrow("Authorization expired at 1000");
    });

    it("rejects a reused nonce", async () => {
      await pull(10n);
      await expect(pull(10n)).rejects.toThrow('Authorization nonce "n-1" already used');
      expect(bank.custodyBalance(CUSTODY, X)).toBe(10n);
    });

    it("does not consume the nonce when funds are short", async () => {
      const request = authorizeTransfer(fields({ amount: "5000" }), SECRET);

      await expect(bank.pullInto(CUSTODY, X, ALICE, 2_000n, request)).rejects.toMatchObject({
        code: "INSUFFICIENT_FUNDS",
      });
      bank.mint(X, ALICE, 1_000n);
      await expect(bank.pullInto(CUSTODY, X, ALICE, 2_000n, request)).resolves.toBeUndefined();
      expect(bank.custodyBalance(CUSTODY, X)).toBe(2_000n);
    });
  });

  describe("pushOut", () => {
    beforeEach(async () => {
      await pull(100n);
    });

    it("pays out of custody", async () => {
      await expect(bank.pushOut(X, BOB, 60n)).resolves.toBe(true);
      expect(bank.balanceOf(X, BOB)).toBe(60n);
      expect(bank.custodyBalance(CUSTODY, X)).toBe(40n);
    });

    it("reports failure for a blocked recipient", async () => {
      bank.block(X, BOB);
      await expect(bank.pushOut(X, BOB, 60n)).resolves.toBe(false);
      expect(bank.custodyBalance(CUSTODY, X)).toBe(100n);

      bank.unblock(X, BOB);
      await expect(bank.pushOut(X, BOB, 60n)).resolves.toBe(true);
    });

    it("throws for a frozen asset", async () => {
      bank.freeze(X);
      await expect(bank.pushOut(X, BOB, 60n)).rejects.toBeInstanceOf(TransferError);
      await expect(bank.pushOut(X, BOB, 60n)).rejects.toMatchObject({ code: "ASSET_FROZEN" });

      bank.thaw(X);
      await expect(bank.pushOut(X, BOB, 60n)).resolves.toBe(true);
    });

    it("throws when custody holds too little", async () => {
      await expect(bank.pushOut(X, BOB, 101n)).rejects.toMatchObject({
        code: "INSUFFICIENT_FUNDS",
      });
    });
  });

  it("rejects non-positive mints", () => {
    expect(() => bank.mint(X, ALICE, 0n)).toThrow(TransferError);
  });
});
