/**
 * @lockbox/ledger: Types for the custody ledger.
 *
 * Ports (transfer, clock, pause switch), operation inputs/outputs,
 * snapshots and the structured error type.
 *
 * Rules:
 * - Public types are readonly
 * - Quantities are bigint in memory, decimal strings when serialized
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { AccountId, AssetId, AuthorizedTransferRequest } from "@lockbox/types";

// ─── Ports ───────────────────────────────────────────────────────────────

/**
 * Moves assets into and out of custody. Implemented outside the core
 * (a token bridge, a chain client, the in-memory bank).
 *
 * One call is one attempt; the core never retries.
 */
export interface AssetTransferPort {
  /**
   * Pull `quantity` of `asset` from `fromAccount` into `custodyId`'s
   * custody, as permitted by `authorization`.
   *
   * @throws TransferError (or any error) when the pull does not happen
   */
  pullInto(
    custodyId: string,
    asset: AssetId,
    fromAccount: AccountId,
    quantity: bigint,
    authorization: AuthorizedTransferRequest,
  ): Promise<void>;

  /**
   * Push `quantity` of `asset` out of custody to `toAccount`.
   *
   * Resolves `false` when the call went through but the asset reported
   * failure; rejects when the call itself failed. Both are failures.
   */
  pushOut(asset: AssetId, toAccount: AccountId, quantity: bigint): Promise<boolean>;
}

/** Source of the current time, in unix seconds. */
export interface Clock {
  now(): number;
}

/** External enable/disable switch for state-mutating operations. */
export interface PauseSwitch {
  isPaused(): boolean;
}

// ─── Account State ───────────────────────────────────────────────────────

/**
 * Lock-cycle state of an existing account.
 */
export interface AccountLockState {
  readonly account: AccountId;
  /** Unix seconds at which the current lock cycle started */
  readonly createdAt: number;
  /** Lock duration in seconds */
  readonly lockPeriod: number;
  /** createdAt + lockPeriod */
  readonly unlockTime: number;
  /** Registered assets whose balance is currently non-zero */
  readonly nonZeroAssetCount: number;
}

/**
 * Registered assets and their balances as parallel sequences,
 * in registry order.
 */
export interface BalanceListing {
  readonly assets: readonly AssetId[];
  readonly balances: readonly bigint[];
}

// ─── Operations ──────────────────────────────────────────────────────────

export interface DepositRequest {
  readonly account: AccountId;
  readonly asset: AssetId;
  /** Lock period in seconds; applied only when a lock cycle starts */
  readonly lockPeriod: number;
  readonly quantity: bigint;
  readonly authorization: AuthorizedTransferRequest;
}

export interface DepositResult {
  readonly account: AccountId;
  readonly asset: AssetId;
  readonly amount: bigint;
  readonly newBalance: bigint;
  /** The account had no entry before this deposit */
  readonly created: boolean;
  /** A drained, expired lock cycle was restarted by this deposit */
  readonly rearmed: boolean;
  readonly unlockTime: number;
}

export type WithdrawalOutcome =
  | {
      readonly asset: AssetId;
      readonly amount: bigint;
      readonly status: "withdrawn";
    }
  | {
      readonly asset: AssetId;
      readonly amount: bigint;
      readonly status: "failed";
      readonly reason: string;
    };

export interface RemovalResult {
  readonly account: AccountId;
  readonly asset: AssetId;
  /** Units forfeited to custody */
  readonly amount: bigint;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface HoldingSnapshot {
  readonly asset: AssetId;
  readonly balance: string;
}

export interface AccountSnapshot {
  readonly account: AccountId;
  readonly createdAt: number;
  readonly lockPeriod: number;
  /** Registered assets in registry order, including drained ones */
  readonly holdings: readonly HoldingSnapshot[];
}

/**
 * Serializable snapshot of the entire ledger state.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly accounts: readonly AccountSnapshot[];
  readonly forfeited: readonly HoldingSnapshot[];
  readonly createdAt: string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type CustodyErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ASSET"
  | "INVALID_LOCK_PERIOD"
  | "NO_ACCOUNT"
  | "STILL_LOCKED"
  | "NO_BALANCE"
  | "SYSTEM_PAUSED"
  | "TRANSFER_FAILED"
  | "UNAUTHORIZED"
  | "REENTRANT_CALL"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the custody core.
 * Always thrown, never returned as a value.
 */
export class CustodyError extends Error {
  public readonly code: CustodyErrorCode;

  constructor(code: CustodyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CustodyError";
    this.code = code;
  }
}

export type TransferErrorCode =
  | "UNAUTHORIZED"
  | "INSUFFICIENT_FUNDS"
  | "ASSET_FROZEN"
  | "TRANSFER_FAILED";

/**
 * Error raised by an AssetTransferPort.
 */
export class TransferError extends Error {
  public readonly code: TransferErrorCode;

  constructor(code: TransferErrorCode, message: string) {
    super(message);
    this.name = "TransferError";
    this.code = code;
  }
}
