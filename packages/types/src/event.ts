/**
 * Custody Event Types
 *
 * Every committed state change in the custody ledger is published as
 * a CustodyEvent. Events are immutable, JSON-safe (quantities are
 * decimal strings) and discriminated by `type`.
 */

import type { AccountId, AssetId } from "./ids.js";

/**
 * Metadata common to all custody events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp of the operation that emitted the event */
  readonly timestamp: string;

  /** Account (or operator) on whose behalf the operation ran */
  readonly actor: string;

  /** Shared by all events emitted by one operation */
  readonly correlationId: string;

  /** Which component emitted this event */
  readonly source: "ledger" | "withdrawal";
}

/**
 * Payload shape for each event type.
 */
export interface CustodyEventPayloads {
  /** A lock cycle started: first deposit, or re-arm of a drained, expired account */
  readonly "account.created": {
    readonly account: AccountId;
    readonly startTime: number;
    readonly lockPeriod: number;
    readonly rearmed: boolean;
  };

  readonly "asset.deposited": {
    readonly account: AccountId;
    readonly asset: AssetId;
    readonly amount: string;
    readonly newBalance: string;
  };

  readonly "asset.withdrawn": {
    readonly account: AccountId;
    readonly asset: AssetId;
    readonly amount: string;
  };

  /** The transfer-out failed; the balance was restored */
  readonly "asset.withdraw_failed": {
    readonly account: AccountId;
    readonly asset: AssetId;
    readonly amount: string;
    readonly reason: string;
  };

  /** The asset was dropped from the account and its balance forfeited */
  readonly "asset.removed": {
    readonly account: AccountId;
    readonly asset: AssetId;
    readonly amount: string;
  };
}

export type CustodyEventType = keyof CustodyEventPayloads;

/**
 * A custody event of a specific type.
 */
export interface TypedCustodyEvent<T extends CustodyEventType> {
  readonly type: T;
  readonly metadata: EventMetadata;
  readonly payload: CustodyEventPayloads[T];
}

/**
 * Any custody event, discriminated by `type`.
 */
export type CustodyEvent = {
  [T in CustodyEventType]: TypedCustodyEvent<T>;
}[CustodyEventType];

/** All event types, in lifecycle order. */
export const CUSTODY_EVENT_TYPES: readonly CustodyEventType[] = [
  "account.created",
  "asset.deposited",
  "asset.withdrawn",
  "asset.withdraw_failed",
  "asset.removed",
];
