/**
 * @lockbox/ledger: Shared runtime for custody components.
 *
 * AccountLedger and WithdrawalCoordinator operate on one context so that
 * they share the same clock, transfer port, event stream, pause switch
 * and per-account lock.
 */

import { randomUUID } from "node:crypto";
import type {
  AccountId,
  CustodyEvent,
  CustodyEventPayloads,
  CustodyEventType,
  EventMetadata,
} from "@lockbox/types";
import type { EventStore } from "@lockbox/event-store";
import type { AccountMutex } from "./account-mutex.js";
import type { AssetTransferPort, Clock, PauseSwitch } from "./types.js";

export interface CustodyContext {
  /** Identity of this custodian towards the transfer port */
  readonly custodyId: string;
  readonly clock: Clock;
  readonly transfers: AssetTransferPort;
  readonly events: EventStore;
  readonly pause: PauseSwitch;
  readonly mutex: AccountMutex;
}

/** Event stream holding one account's history. */
export function accountStreamId(account: AccountId): string {
  return `account-${account}`;
}

/** An event before metadata is attached. */
export type EventDraft = {
  [T in CustodyEventType]: {
    readonly type: T;
    readonly payload: CustodyEventPayloads[T];
  };
}[CustodyEventType];

/**
 * Builds the events of one operation: shared correlation ID,
 * timestamp taken from the operation's clock reading.
 */
export class OperationEvents {
  private readonly _metadata: Omit<EventMetadata, "eventId">;

  constructor(
    private readonly _store: EventStore,
    private readonly _account: AccountId,
    source: EventMetadata["source"],
    now: number,
  ) {
    this._metadata = {
      timestamp: new Date(now * 1000).toISOString(),
      actor: _account,
      correlationId: randomUUID(),
      source,
    };
  }

  build(draft: EventDraft): CustodyEvent {
    return { ...draft, metadata: { eventId: randomUUID(), ...this._metadata } };
  }

  /** Append drafts to the account's stream as one batch. */
  publish(...drafts: readonly EventDraft[]): void {
    this._store.append(
      accountStreamId(this._account),
      drafts.map((d) => this.build(d)),
    );
  }
}
