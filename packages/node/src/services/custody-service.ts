/**
 * CustodyService: Composition root for the custody ledger.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. The service owns the event store, the pause switch
 * and the development asset bank, and converts bigint quantities to
 * decimal strings at the HTTP boundary.
 */

import type { Logger } from "pino";
import { InMemoryEventStore } from "@lockbox/event-store";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "@lockbox/event-store";
import {
  AdminToggle,
  Custody,
  accountStreamId,
  CustodyError,
  InMemoryAssetBank,
  formatQuantity,
  parseQuantity,
  systemClock,
} from "@lockbox/ledger";
import type { Clock } from "@lockbox/ledger";
import type {
  AccountView,
  BalanceView,
  CustodyStatus,
  DepositDto,
  DepositResponse,
  RemovalResponse,
  WithdrawalOutcomeResponse,
} from "../types/dto.js";

// =============================================================================
// Configuration
// =============================================================================

export interface CustodyServiceConfig {
  readonly custodyId: string;
  /** Only this subject may pause and unpause */
  readonly adminId: string;
  /** Secret the development bank checks authorizations against */
  readonly signingSecret: string;
  readonly startPaused?: boolean | undefined;
  readonly clock?: Clock | undefined;
  /** When given, every committed custody event is logged */
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class CustodyService {
  readonly custody: Custody;
  readonly bank: InMemoryAssetBank;
  readonly toggle: AdminToggle;
  readonly eventStore: InMemoryEventStore;
  readonly config: CustodyServiceConfig;

  private readonly _subscription: Subscription | undefined;
  private _ready = false;

  constructor(config: CustodyServiceConfig) {
    this.config = config;
    const clock = config.clock ?? systemClock;

    const logger = config.logger;
    this.eventStore = new InMemoryEventStore({
      onHandlerError:
        logger === undefined
          ? undefined
          : ({ error, globalPosition, streamId }) => {
              logger.error({ err: error, globalPosition, streamId }, "Event subscriber failed");
            },
    });
    this.toggle = new AdminToggle(config.adminId, { paused: config.startPaused });
    this.bank = new InMemoryAssetBank({
      custodyId: config.custodyId,
      signingSecret: config.signingSecret,
      clock,
    });
    this.custody = new Custody({
      custodyId: config.custodyId,
      transfers: this.bank,
      events: this.eventStore,
      clock,
      pause: this.toggle,
    });

    if (logger !== undefined) {
      this._subscription = this.eventStore.subscribeAll((stored) => {
        logEvent(logger, stored);
      });
    }

    this._ready = true;
  }

  // ─── Account Operations ────────────────────────────────────────────

  async deposit(account: string, dto: DepositDto): Promise<DepositResponse> {
    const result = await this.custody.deposit({
      account,
      asset: dto.asset,
      lockPeriod: dto.lockPeriod,
      quantity: parseQuantity(dto.amount),
      authorization: dto.authorization,
    });
    return {
      account: result.account,
      asset: result.asset,
      amount: formatQuantity(result.amount),
      newBalance: formatQuantity(result.newBalance),
      created: result.created,
      rearmed: result.rearmed,
      unlockTime: result.unlockTime,
    };
  }

  async withdrawAll(account: string): Promise<readonly WithdrawalOutcomeResponse[]> {
    const outcomes = await this.custody.withdrawAll(account);
    return outcomes.map((o) =>
      o.status === "withdrawn"
        ? { asset: o.asset, amount: formatQuantity(o.amount), status: o.status }
        : {
            asset: o.asset,
            amount: formatQuantity(o.amount),
            status: o.status,
            reason: o.reason,
          },
    );
  }

  async removeAsset(account: string, asset: string): Promise<RemovalResponse> {
    const result = await this.custody.removeAsset(account, asset);
    return {
      account: result.account,
      asset: result.asset,
      forfeited: formatQuantity(result.amount),
    };
  }

  // ─── Queries ───────────────────────────────────────────────────────

  getAccount(account: string): AccountView {
    const state = this.custody.getLockState(account);
    if (state === undefined) {
      throw new CustodyError("NO_ACCOUNT", `No ledger entry for account "${account}"`);
    }
    const { assets, balances } = this.custody.listBalances(account);
    return {
      account,
      createdAt: state.createdAt,
      lockPeriod: state.lockPeriod,
      unlockTime: state.unlockTime,
      unlocked: this.custody.isUnlocked(account),
      nonZeroAssetCount: state.nonZeroAssetCount,
      balances: assets.map((asset, i) => ({
        asset,
        balance: formatQuantity(balances[i] ?? 0n),
      })),
    };
  }

  getBalance(account: string, asset: string): BalanceView {
    return {
      account,
      asset,
      balance: formatQuantity(this.custody.balanceOf(account, asset)),
    };
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAccountEvents(account: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.read(accountStreamId(account), options);
  }

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  // ─── Administration ────────────────────────────────────────────────

  pause(actor: string): CustodyStatus {
    this.toggle.pause(actor);
    this.config.logger?.warn({ actor }, "Custody paused");
    return this.status();
  }

  unpause(actor: string): CustodyStatus {
    this.toggle.unpause(actor);
    this.config.logger?.info({ actor }, "Custody unpaused");
    return this.status();
  }

  status(): CustodyStatus {
    return {
      custodyId: this.config.custodyId,
      paused: this.toggle.isPaused(),
      accounts: this.custody.ledger.accountCount,
      events: this.eventStore.globalPosition(),
    };
  }

  /** Fund a holder in the development bank. */
  mint(asset: string, holder: string, amount: string): BalanceView {
    const quantity = parseQuantity(amount);
    if (quantity === 0n) {
      throw new CustodyError("INVALID_AMOUNT", "Mint amount must be greater than 0");
    }
    this.bank.mint(asset, holder, quantity);
    return {
      account: holder,
      asset,
      balance: formatQuantity(this.bank.balanceOf(asset, holder)),
    };
  }

  // ─── Health ────────────────────────────────────────────────────────

  isReady(): boolean {
    return this._ready;
  }

  checkIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  stop(): void {
    this._subscription?.unsubscribe();
    this._ready = false;
  }
}

// =============================================================================
// Event Logging
// =============================================================================

function logEvent(logger: Logger, stored: StoredEvent): void {
  const fields = {
    type: stored.event.type,
    streamId: stored.streamId,
    position: stored.globalPosition,
    correlationId: stored.event.metadata.correlationId,
    payload: stored.event.payload,
  };
  if (stored.event.type === "asset.withdraw_failed") {
    logger.warn(fields, "Withdrawal failed");
  } else {
    logger.info(fields, "Custody event");
  }
}
