/**
 * @lockbox/ledger: WithdrawalCoordinator.
 *
 * Full-balance withdrawal once the lock has elapsed, and forfeiting
 * removal of a single asset.
 *
 * withdrawAll ordering:
 * 1. Preconditions (paused, unknown account, still locked) fail the call
 * 2. Every registered balance is snapshotted, then zeroed
 * 3. Each non-zero snapshot entry is pushed out once, in registry order
 * 4. A failed push restores that asset's balance; others are unaffected
 * 5. The per-asset events are published as one batch after the loop
 *
 * While transfers are in flight the account reads as drained.
 */

import type { AccountId, AssetId } from "@lockbox/types";
import type { AccountLedger } from "./account-ledger.js";
import { assertNotPaused } from "./admin-toggle.js";
import { OperationEvents } from "./context.js";
import type { CustodyContext, EventDraft } from "./context.js";
import { formatQuantity } from "./quantity.js";
import type { RemovalResult, WithdrawalOutcome } from "./types.js";
import { CustodyError } from "./types.js";

/** Reason recorded when a transfer-out resolves false. */
export const REPORTED_FAILURE_REASON = "transfer reported failure";

export class WithdrawalCoordinator {
  constructor(
    private readonly _ctx: CustodyContext,
    private readonly _ledger: AccountLedger,
  ) {}

  async withdrawAll(account: AccountId): Promise<readonly WithdrawalOutcome[]> {
    assertNotPaused(this._ctx.pause);

    return this._ctx.mutex.runExclusive(account, async () => {
      assertNotPaused(this._ctx.pause);
      const now = this._ctx.clock.now();
      const unlockTime = this._ledger.unlockTime(account);
      if (now < unlockTime) {
        throw new CustodyError(
          "STILL_LOCKED",
          `Account "${account}" is locked until ${unlockTime} (now ${now})`,
        );
      }

      const entries = this._ledger
        .listAssets(account)
        .map((asset) => ({ asset, amount: this._ledger.balanceOf(account, asset) }));
      for (const { asset } of entries) {
        this._ledger.setBalance(account, asset, 0n);
      }

      const outcomes: WithdrawalOutcome[] = [];
      const drafts: EventDraft[] = [];

      for (const { asset, amount } of entries) {
        if (amount === 0n) {
          continue;
        }
        const failure = await this._pushOut(asset, account, amount);

        if (failure === undefined) {
          drafts.push({
            type: "asset.withdrawn",
            payload: { account, asset, amount: formatQuantity(amount) },
          });
          outcomes.push({ asset, amount, status: "withdrawn" });
        } else {
          this._ledger.setBalance(account, asset, amount);
          drafts.push({
            type: "asset.withdraw_failed",
            payload: { account, asset, amount: formatQuantity(amount), reason: failure },
          });
          outcomes.push({ asset, amount, status: "failed", reason: failure });
        }
      }

      if (drafts.length > 0) {
        new OperationEvents(this._ctx.events, account, "withdrawal", now).publish(...drafts);
      }
      return outcomes;
    });
  }

  /** Push one asset out; returns the failure reason, if any. */
  private async _pushOut(
    asset: AssetId,
    account: AccountId,
    amount: bigint,
  ): Promise<string | undefined> {
    try {
      const ok = await this._ctx.transfers.pushOut(asset, account, amount);
      return ok ? undefined : REPORTED_FAILURE_REASON;
    } catch (err) {
      return err instanceof Error ? err.message : String(err);
    }
  }

  /**
   * Drop `asset` from `account` and forfeit its balance to custody.
   * Ignores the lock; fails NO_BALANCE when nothing is held.
   */
  async removeAsset(account: AccountId, asset: AssetId): Promise<RemovalResult> {
    assertNotPaused(this._ctx.pause);

    return this._ctx.mutex.runExclusive(account, async () => {
      assertNotPaused(this._ctx.pause);
      const now = this._ctx.clock.now();
      if (!this._ledger.hasAccount(account)) {
        throw new CustodyError("NO_ACCOUNT", `No ledger entry for account "${account}"`);
      }
      if (this._ledger.balanceOf(account, asset) === 0n) {
        throw new CustodyError(
          "NO_BALANCE",
          `Account "${account}" holds no "${asset}"`,
        );
      }

      const amount = this._ledger.forfeit(account, asset);
      new OperationEvents(this._ctx.events, account, "withdrawal", now).publish({
        type: "asset.removed",
        payload: { account, asset, amount: formatQuantity(amount) },
      });

      return { account, asset, amount };
    });
  }
}
