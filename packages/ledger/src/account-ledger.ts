/**
 * @lockbox/ledger: AccountLedger.
 *
 * Owns the account → lock-state → per-asset balance mapping and the
 * deposit operation.
 *
 * API surface:
 * - deposit(): Pull funds into custody, starting or re-arming a lock cycle
 * - balanceOf() / listAssets() / listBalances(): Holdings queries
 * - unlockTime() / isUnlocked() / getLockState(): Lock queries
 * - totalForfeited(): Units surrendered through asset removal
 * - snapshot() / restore(): Serializable state
 *
 * Invariants:
 * - An account without an entry has no balances and no registered assets
 * - Entries are never deleted
 * - nonZeroAssetCount equals the number of registered assets whose
 *   balance is non-zero, after every committed change
 * - Nothing is written unless the transfer into custody succeeded
 */

import { isNullAsset, isQuantityString } from "@lockbox/types";
import type { AccountId, AssetId } from "@lockbox/types";
import { AssetRegistry } from "./asset-registry.js";
import { assertNotPaused } from "./admin-toggle.js";
import { OperationEvents } from "./context.js";
import type { CustodyContext, EventDraft } from "./context.js";
import { formatQuantity } from "./quantity.js";
import type {
  AccountLockState,
  AccountSnapshot,
  BalanceListing,
  DepositRequest,
  DepositResult,
  HoldingSnapshot,
  LedgerSnapshot,
} from "./types.js";
import { CustodyError, TransferError } from "./types.js";

interface AccountRecord {
  createdAt: number;
  lockPeriod: number;
  nonZeroAssetCount: number;
  readonly balances: Map<AssetId, bigint>;
}

/** A lock cycle a deposit is about to start. */
interface PlannedCycle {
  readonly createdAt: number;
  readonly lockPeriod: number;
  readonly rearmed: boolean;
}

export class AccountLedger {
  private readonly _accounts = new Map<AccountId, AccountRecord>();
  private readonly _forfeited = new Map<AssetId, bigint>();

  constructor(
    private readonly _ctx: CustodyContext,
    readonly registry: AssetRegistry = new AssetRegistry(),
  ) {}

  // ─── Deposit ─────────────────────────────────────────────────────────

  /**
   * Deposit `quantity` of `asset` for `account`.
   *
   * Validation (fail-closed, nothing written on failure):
   * 1. Not paused
   * 2. quantity > 0
   * 3. asset is not the null asset
   * 4. lockPeriod is a non-negative safe integer, and non-zero when a
   *    lock cycle starts (first deposit, or re-arm)
   * 5. The transfer into custody succeeds
   *
   * A lock cycle is re-armed only when every registered balance is zero
   * and the current cycle has elapsed; otherwise the hint is ignored.
   */
  async deposit(request: DepositRequest): Promise<DepositResult> {
    const { account, asset, lockPeriod, quantity, authorization } = request;

    assertNotPaused(this._ctx.pause);
    if (quantity <= 0n) {
      throw new CustodyError(
        "INVALID_AMOUNT",
        `Deposit quantity must be greater than 0, got ${formatQuantity(quantity)}`,
      );
    }
    if (isNullAsset(asset)) {
      throw new CustodyError("INVALID_ASSET", `Invalid asset identifier: "${asset}"`);
    }
    if (!Number.isSafeInteger(lockPeriod) || lockPeriod < 0) {
      throw new CustodyError(
        "INVALID_LOCK_PERIOD",
        `Lock period must be a whole number of seconds, got ${lockPeriod}`,
      );
    }

    return this._ctx.mutex.runExclusive(account, async () => {
      assertNotPaused(this._ctx.pause);
      const now = this._ctx.clock.now();
      const existing = this._accounts.get(account);
      const cycle = this._planCycle(existing, lockPeriod, now);

      try {
        await this._ctx.transfers.pullInto(
          this._ctx.custodyId,
          asset,
          account,
          quantity,
          authorization,
        );
      } catch (err) {
        throw pullFailure(err, asset, account);
      }

      // Commit
      const record = existing ?? this._createRecord(account);
      if (cycle !== undefined) {
        record.createdAt = cycle.createdAt;
        record.lockPeriod = cycle.lockPeriod;
      }
      this.registry.register(account, asset);
      const newBalance = (record.balances.get(asset) ?? 0n) + quantity;
      this._write(record, asset, newBalance);

      const drafts: EventDraft[] = [];
      if (cycle !== undefined) {
        drafts.push({
          type: "account.created",
          payload: {
            account,
            startTime: cycle.createdAt,
            lockPeriod: cycle.lockPeriod,
            rearmed: cycle.rearmed,
          },
        });
      }
      drafts.push({
        type: "asset.deposited",
        payload: {
          account,
          asset,
          amount: formatQuantity(quantity),
          newBalance: formatQuantity(newBalance),
        },
      });
      new OperationEvents(this._ctx.events, account, "ledger", now).publish(...drafts);

      return {
        account,
        asset,
        amount: quantity,
        newBalance,
        created: existing === undefined,
        rearmed: cycle?.rearmed ?? false,
        unlockTime: record.createdAt + record.lockPeriod,
      };
    });
  }

  /**
   * Decide whether this deposit starts a lock cycle.
   * Creation and re-arm are exclusive: a new account never re-arms.
   */
  private _planCycle(
    record: AccountRecord | undefined,
    lockPeriod: number,
    now: number,
  ): PlannedCycle | undefined {
    let rearmed: boolean;
    if (record === undefined) {
      rearmed = false;
    } else if (
      record.nonZeroAssetCount === 0 &&
      now >= record.createdAt + record.lockPeriod
    ) {
      rearmed = true;
    } else {
      return undefined;
    }

    if (lockPeriod === 0) {
      throw new CustodyError(
        "INVALID_LOCK_PERIOD",
        "Lock period must be greater than 0 when a lock cycle starts",
      );
    }
    if (!Number.isSafeInteger(now + lockPeriod)) {
      throw new CustodyError(
        "INVALID_LOCK_PERIOD",
        `Lock period ${lockPeriod} overflows the unlock time`,
      );
    }
    return { createdAt: now, lockPeriod, rearmed };
  }

  private _createRecord(account: AccountId): AccountRecord {
    const record: AccountRecord = {
      createdAt: 0,
      lockPeriod: 0,
      nonZeroAssetCount: 0,
      balances: new Map(),
    };
    this._accounts.set(account, record);
    return record;
  }

  /** Store a balance, keeping nonZeroAssetCount in step. */
  private _write(record: AccountRecord, asset: AssetId, value: bigint): void {
    const previous = record.balances.get(asset) ?? 0n;
    if (previous === 0n && value !== 0n) {
      record.nonZeroAssetCount++;
    } else if (previous !== 0n && value === 0n) {
      record.nonZeroAssetCount--;
    }
    record.balances.set(asset, value);
  }

  // ─── Writes used by WithdrawalCoordinator ────────────────────────────

  /**
   * Overwrite a stored balance. Callers must hold the account's lock.
   * @internal
   */
  setBalance(account: AccountId, asset: AssetId, value: bigint): void {
    this._write(this._requireRecord(account), asset, value);
  }

  /**
   * Zero a balance, drop the asset from the registry and keep the units
   * in custody as forfeited. Callers must hold the account's lock.
   * @internal
   */
  forfeit(account: AccountId, asset: AssetId): bigint {
    const record = this._requireRecord(account);
    const amount = record.balances.get(asset) ?? 0n;
    this._write(record, asset, 0n);
    record.balances.delete(asset);
    this.registry.remove(account, asset);
    this._forfeited.set(asset, (this._forfeited.get(asset) ?? 0n) + amount);
    return amount;
  }

  private _requireRecord(account: AccountId): AccountRecord {
    const record = this._accounts.get(account);
    if (record === undefined) {
      throw new CustodyError("NO_ACCOUNT", `No ledger entry for account "${account}"`);
    }
    return record;
  }

  // ─── Query Operations ────────────────────────────────────────────────

  hasAccount(account: AccountId): boolean {
    return this._accounts.has(account);
  }

  /** Stored balance; 0 for unknown accounts or assets. */
  balanceOf(account: AccountId, asset: AssetId): bigint {
    return this._accounts.get(account)?.balances.get(asset) ?? 0n;
  }

  /**
   * Unix seconds at which the account's lock elapses.
   * Throws NO_ACCOUNT for an account without an entry.
   */
  unlockTime(account: AccountId): number {
    const record = this._requireRecord(account);
    return record.createdAt + record.lockPeriod;
  }

  /** Whether the lock has elapsed; false for unknown accounts. */
  isUnlocked(account: AccountId, now: number = this._ctx.clock.now()): boolean {
    const record = this._accounts.get(account);
    return record !== undefined && now >= record.createdAt + record.lockPeriod;
  }

  getLockState(account: AccountId): AccountLockState | undefined {
    const record = this._accounts.get(account);
    if (record === undefined) {
      return undefined;
    }
    return {
      account,
      createdAt: record.createdAt,
      lockPeriod: record.lockPeriod,
      unlockTime: record.createdAt + record.lockPeriod,
      nonZeroAssetCount: record.nonZeroAssetCount,
    };
  }

  listAssets(account: AccountId): readonly AssetId[] {
    return this.registry.list(account);
  }

  listBalances(account: AccountId): BalanceListing {
    const assets = this.registry.list(account);
    return {
      assets,
      balances: assets.map((asset) => this.balanceOf(account, asset)),
    };
  }

  totalForfeited(asset: AssetId): bigint {
    return this._forfeited.get(asset) ?? 0n;
  }

  get accountCount(): number {
    return this._accounts.size;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(createdAt: string = new Date().toISOString()): LedgerSnapshot {
    const accounts: AccountSnapshot[] = [];
    for (const [account, record] of this._accounts) {
      accounts.push({
        account,
        createdAt: record.createdAt,
        lockPeriod: record.lockPeriod,
        holdings: this.registry.list(account).map((asset) => ({
          asset,
          balance: formatQuantity(record.balances.get(asset) ?? 0n),
        })),
      });
    }
    const forfeited: HoldingSnapshot[] = [...this._forfeited].map(([asset, amount]) => ({
      asset,
      balance: formatQuantity(amount),
    }));
    return { version: 1, accounts, forfeited, createdAt };
  }

  /**
   * Load a snapshot into this (empty) ledger.
   * Registries and counters are rebuilt from the holdings.
   * Must run before the ledger serves any operation.
   */
  restore(snapshot: LedgerSnapshot): void {
    if (this._accounts.size > 0 || this._forfeited.size > 0) {
      throw new CustodyError("INVALID_SNAPSHOT", "Cannot restore into a non-empty ledger");
    }
    if (snapshot.version !== 1) {
      throw new CustodyError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(snapshot.version)}`,
      );
    }
    validateSnapshot(snapshot);

    for (const entry of snapshot.accounts) {
      const record = this._createRecord(entry.account);
      record.createdAt = entry.createdAt;
      record.lockPeriod = entry.lockPeriod;
      for (const holding of entry.holdings) {
        this.registry.register(entry.account, holding.asset);
        this._write(record, holding.asset, BigInt(holding.balance));
      }
    }
    for (const holding of snapshot.forfeited) {
      this._forfeited.set(holding.asset, BigInt(holding.balance));
    }
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────

function pullFailure(err: unknown, asset: AssetId, account: AccountId): CustodyError {
  if (err instanceof CustodyError) {
    return err;
  }
  const detail = err instanceof Error ? err.message : String(err);
  if (err instanceof TransferError && err.code === "UNAUTHORIZED") {
    return new CustodyError(
      "UNAUTHORIZED",
      `Transfer of "${asset}" from "${account}" not authorized: ${detail}`,
      { cause: err },
    );
  }
  return new CustodyError(
    "TRANSFER_FAILED",
    `Transfer of "${asset}" from "${account}" into custody failed: ${detail}`,
    { cause: err },
  );
}

function validateSnapshot(snapshot: LedgerSnapshot): void {
  const seenAccounts = new Set<AccountId>();
  for (const entry of snapshot.accounts) {
    if (seenAccounts.has(entry.account)) {
      throw new CustodyError("INVALID_SNAPSHOT", `Duplicate account "${entry.account}"`);
    }
    seenAccounts.add(entry.account);

    if (
      !Number.isSafeInteger(entry.createdAt) ||
      !Number.isSafeInteger(entry.lockPeriod) ||
      entry.createdAt < 0 ||
      entry.lockPeriod < 0
    ) {
      throw new CustodyError(
        "INVALID_SNAPSHOT",
        `Invalid lock state for account "${entry.account}"`,
      );
    }
    assertHoldings(entry.holdings, `account "${entry.account}"`);
  }
  assertHoldings(snapshot.forfeited, "forfeited totals");
}

function assertHoldings(holdings: readonly HoldingSnapshot[], where: string): void {
  const seen = new Set<AssetId>();
  for (const holding of holdings) {
    if (seen.has(holding.asset) || isNullAsset(holding.asset)) {
      throw new CustodyError(
        "INVALID_SNAPSHOT",
        `Invalid or duplicate asset "${holding.asset}" in ${where}`,
      );
    }
    seen.add(holding.asset);
    if (!isQuantityString(holding.balance)) {
      throw new CustodyError(
        "INVALID_SNAPSHOT",
        `Invalid balance "${holding.balance}" for "${holding.asset}" in ${where}`,
      );
    }
  }
}
