/**
 * Custody: time-locked custody ledger coordinator.
 *
 * Composes:
 * - AccountLedger (deposits, balances, lock state)
 * - WithdrawalCoordinator (withdrawAll, removeAsset)
 * - AssetRegistry (per-account asset lists)
 *
 * over one CustodyContext, so every operation shares the clock, transfer
 * port, event store, pause switch and per-account lock.
 */

import { InMemoryEventStore } from "@lockbox/event-store";
import type { EventStore, StoredEvent } from "@lockbox/event-store";
import type { AccountId, AssetId } from "@lockbox/types";
import { AccountLedger } from "./account-ledger.js";
import { AccountMutex } from "./account-mutex.js";
import { NEVER_PAUSED } from "./admin-toggle.js";
import { AssetRegistry } from "./asset-registry.js";
import { systemClock } from "./clock.js";
import { accountStreamId } from "./context.js";
import type { CustodyContext } from "./context.js";
import { WithdrawalCoordinator } from "./withdrawal-coordinator.js";
import type {
  AccountLockState,
  AssetTransferPort,
  BalanceListing,
  Clock,
  DepositRequest,
  DepositResult,
  LedgerSnapshot,
  PauseSwitch,
  RemovalResult,
  WithdrawalOutcome,
} from "./types.js";

export interface CustodyOptions {
  readonly custodyId: string;
  readonly transfers: AssetTransferPort;
  readonly events?: EventStore | undefined;
  readonly clock?: Clock | undefined;
  readonly pause?: PauseSwitch | undefined;
}

// =============================================================================
// Custody
// =============================================================================

export class Custody {
  readonly context: CustodyContext;
  readonly registry: AssetRegistry;
  readonly ledger: AccountLedger;
  readonly withdrawals: WithdrawalCoordinator;

  constructor(options: CustodyOptions) {
    this.context = {
      custodyId: options.custodyId,
      transfers: options.transfers,
      events: options.events ?? new InMemoryEventStore(),
      clock: options.clock ?? systemClock,
      pause: options.pause ?? NEVER_PAUSED,
      mutex: new AccountMutex(),
    };
    this.registry = new AssetRegistry();
    this.ledger = new AccountLedger(this.context, this.registry);
    this.withdrawals = new WithdrawalCoordinator(this.context, this.ledger);
  }

  get events(): EventStore {
    return this.context.events;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mutations
  // ───────────────────────────────────────────────────────────────────────

  deposit(request: DepositRequest): Promise<DepositResult> {
    return this.ledger.deposit(request);
  }

  withdrawAll(account: AccountId): Promise<readonly WithdrawalOutcome[]> {
    return this.withdrawals.withdrawAll(account);
  }

  removeAsset(account: AccountId, asset: AssetId): Promise<RemovalResult> {
    return this.withdrawals.removeAsset(account, asset);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  balanceOf(account: AccountId, asset: AssetId): bigint {
    return this.ledger.balanceOf(account, asset);
  }

  unlockTime(account: AccountId): number {
    return this.ledger.unlockTime(account);
  }

  isUnlocked(account: AccountId): boolean {
    return this.ledger.isUnlocked(account);
  }

  listAssets(account: AccountId): readonly AssetId[] {
    return this.ledger.listAssets(account);
  }

  listBalances(account: AccountId): BalanceListing {
    return this.ledger.listBalances(account);
  }

  getLockState(account: AccountId): AccountLockState | undefined {
    return this.ledger.getLockState(account);
  }

  totalForfeited(asset: AssetId): bigint {
    return this.ledger.totalForfeited(asset);
  }

  /** The account's event stream, oldest first. */
  readAccountEvents(account: AccountId): readonly StoredEvent[] {
    return this.context.events.read(accountStreamId(account));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Persistence
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return this.ledger.snapshot();
  }

  restore(snapshot: LedgerSnapshot): void {
    this.ledger.restore(snapshot);
  }
}
