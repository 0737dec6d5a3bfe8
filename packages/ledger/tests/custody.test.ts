/**
 * Tests for the Custody coordinator wired to the in-memory asset bank.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryEventStore } from "@lockbox/event-store";
import { AdminToggle } from "../src/admin-toggle.js";
import { InMemoryAssetBank } from "../src/asset-bank.js";
import { ManualClock } from "../src/clock.js";
import { Custody } from "../src/custody.js";
import { authorizeTransfer } from "../src/permit.js";
import { ALICE, BOB, DAY, X, Y } from "./helpers.js";

const SECRET = "test-secret";
const CUSTODY = "custody-test";

describe("Custody", () => {
  let clock: ManualClock;
  let bank: InMemoryAssetBank;
  let toggle: AdminToggle;
  let events: InMemoryEventStore;
  let custody: Custody;
  let nonce = 0;

  beforeEach(() => {
    clock = new ManualClock(1_700_000_000);
    bank = new InMemoryAssetBank({ custodyId: CUSTODY, signingSecret: SECRET, clock });
    toggle = new AdminToggle("owner");
    events = new InMemoryEventStore();
    custody = new Custody({ custodyId: CUSTODY, transfers: bank, events, clock, pause: toggle });
    bank.mint(X, ALICE, 1_000n);
    bank.mint(Y, ALICE, 1_000n);
  });

  function deposit(asset: string, quantity: bigint, lockPeriod: number = DAY) {
    nonce++;
    return custody.deposit({
      account: ALICE,
      asset,
      quantity,
      lockPeriod,
      authorization: authorizeTransfer(
        {
          asset,
          amount: quantity.toString(),
          owner: ALICE,
          nonce: `n-${nonce}`,
          deadline: clock.now() + 600,
          spender: CUSTODY,
        },
        SECRET,
      ),
    });
  }

  it("moves funds in on deposit and out on withdrawal", async () => {
    await deposit(X, 300n);
    await deposit(Y, 200n);
    expect(bank.custodyBalance(CUSTODY, X)).toBe(300n);
    expect(bank.balanceOf(X, ALICE)).toBe(700n);

    clock.advance(DAY);
    const outcomes = await custody.withdrawAll(ALICE);

    expect(outcomes.map((o) => o.status)).toEqual(["withdrawn", "withdrawn"]);
    expect(bank.balanceOf(X, ALICE)).toBe(1_000n);
    expect(bank.balanceOf(Y, ALICE)).toBe(1_000n);
    expect(bank.custodyBalance(CUSTODY, X)).toBe(0n);
  });

  it("keeps forfeited funds in custody", async () => {
    await deposit(X, 300n);
    await custody.removeAsset(ALICE, X);

    expect(bank.custodyBalance(CUSTODY, X)).toBe(300n);
    expect(custody.totalForfeited(X)).toBe(300n);
  });

  it("surfaces a rejected authorization as UNAUTHORIZED", async () => {
    await expect(
      custody.deposit({
        account: ALICE,
        asset: X,
        quantity: 10n,
        lockPeriod: DAY,
        authorization: authorizeTransfer(
          {
            asset: X,
            amount: "10",
            owner: ALICE,
            nonce: "forged",
            deadline: clock.now() + 600,
            spender: CUSTODY,
          },
          "wrong-secret",
        ),
      }),
    ).rejects.toMatchObject({ code: "UNAUTHORIZED" });
    expect(custody.getLockState(ALICE)).toBeUndefined();
  });

  it("surfaces insufficient holder funds as TRANSFER_FAILED", async () => {
    await expect(deposit(X, 5_000n)).rejects.toMatchObject({ code: "TRANSFER_FAILED" });
  });

  it("restores a blocked asset and withdraws it once unblocked", async () => {
    await deposit(X, 300n);
    await deposit(Y, 200n);
    clock.advance(DAY);
    bank.block(Y, ALICE);

    const first = await custody.withdrawAll(ALICE);
    expect(first[1]).toEqual({
      asset: Y,
      amount: 200n,
      status: "failed",
      reason: "transfer reported failure",
    });
    expect(custody.balanceOf(ALICE, Y)).toBe(200n);

    bank.unblock(Y, ALICE);
    const second = await custody.withdrawAll(ALICE);
    expect(second).toEqual([{ asset: Y, amount: 200n, status: "withdrawn" }]);
    expect(bank.balanceOf(Y, ALICE)).toBe(1_000n);
  });

  it("stops mutations while paused and resumes after", async () => {
    toggle.pause("owner");
    await expect(deposit(X, 1n)).rejects.toMatchObject({ code: "SYSTEM_PAUSED" });

    toggle.unpause("owner");
    await expect(deposit(X, 1n)).resolves.toMatchObject({ newBalance: 1n });
  });

  it("rejects pausing by anyone but the owner", () => {
    expect(() => toggle.pause(BOB)).toThrow('"bob" is not the custody owner');
    expect(toggle.isPaused()).toBe(false);
  });

  it("records every change in a verifiable event log", async () => {
    await deposit(X, 300n);
    clock.advance(DAY);
    await custody.withdrawAll(ALICE);

    expect(custody.readAccountEvents(ALICE).map((e) => e.version)).toEqual([1, 2, 3]);
    expect(events.verifyIntegrity()).toMatchObject({ valid: true, lastVerifiedPosition: 3 });
  });

  it("notifies subscribers of committed events", async () => {
    const seen: string[] = [];
    custody.events.subscribeAll((stored) => {
      seen.push(stored.event.type);
    });

    await deposit(X, 300n);

    expect(seen).toEqual(["account.created", "asset.deposited"]);
  });
});
