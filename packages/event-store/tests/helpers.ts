/**
 * Test helpers for @lockbox/event-store.
 */

import type { CustodyEvent } from "@lockbox/types";

let seq = 0;

export function depositEvent(
  account: string,
  amount: string,
  newBalance: string = amount,
): CustodyEvent {
  seq++;
  return {
    type: "asset.deposited",
    metadata: {
      eventId: `evt-${seq}`,
      timestamp: "2024-01-01T00:00:00.000Z",
      actor: account,
      correlationId: `op-${seq}`,
      source: "ledger",
    },
    payload: { account, asset: "USDC", amount, newBalance },
  };
}

export function withdrawnEvent(account: string, amount: string): CustodyEvent {
  seq++;
  return {
    type: "asset.withdrawn",
    metadata: {
      eventId: `evt-${seq}`,
      timestamp: "2024-01-02T00:00:00.000Z",
      actor: account,
      correlationId: `op-${seq}`,
      source: "withdrawal",
    },
    payload: { account, asset: "USDC", amount },
  };
}

export const FIXED_NOW = (): Date => new Date("2024-01-01T00:00:00.000Z");
