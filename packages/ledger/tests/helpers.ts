/**
 * Test helpers for @lockbox/ledger.
 */

import type { AccountId, AssetId, AuthorizedTransferRequest } from "@lockbox/types";
import { AdminToggle } from "../src/admin-toggle.js";
import { ManualClock } from "../src/clock.js";
import { Custody } from "../src/custody.js";
import type { AssetTransferPort } from "../src/types.js";

export const X = "0x00000000000000000000000000000000000000aa";
export const Y = "0x00000000000000000000000000000000000000bb";
export const Z = "0x00000000000000000000000000000000000000cc";
export const NULL = "0x0000000000000000000000000000000000000000";

export const ALICE = "alice";
export const BOB = "bob";

export const DAY = 86_400;

/** An authorization the scripted port never inspects. */
export function permit(asset: AssetId = X, owner: AccountId = ALICE): AuthorizedTransferRequest {
  return {
    asset,
    amount: "1000000",
    owner,
    nonce: "n-1",
    deadline: 9_999_999_999,
    signature: "unchecked",
  };
}

export interface TransferCall {
  readonly asset: AssetId;
  readonly account: AccountId;
  readonly quantity: bigint;
}

type Hook = (call: TransferCall) => Promise<void>;

/**
 * Transfer port whose behavior each test scripts.
 */
export class ScriptedTransferPort implements AssetTransferPort {
  readonly pulls: TransferCall[] = [];
  readonly pushes: TransferCall[] = [];

  /** Thrown by every pullInto while set */
  pullError: unknown = undefined;
  /** Per-asset pushOut result: a boolean to resolve, an Error to throw */
  readonly pushResults = new Map<AssetId, boolean | Error>();

  onPull: Hook | undefined = undefined;
  onPush: Hook | undefined = undefined;

  async pullInto(
    _custodyId: string,
    asset: AssetId,
    fromAccount: AccountId,
    quantity: bigint,
    _authorization: AuthorizedTransferRequest,
  ): Promise<void> {
    const call = { asset, account: fromAccount, quantity };
    if (this.onPull !== undefined) {
      await this.onPull(call);
    }
    if (this.pullError !== undefined) {
      throw this.pullError;
    }
    this.pulls.push(call);
  }

  async pushOut(asset: AssetId, toAccount: AccountId, quantity: bigint): Promise<boolean> {
    const call = { asset, account: toAccount, quantity };
    if (this.onPush !== undefined) {
      await this.onPush(call);
    }
    this.pushes.push(call);
    const result = this.pushResults.get(asset) ?? true;
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }
}

export interface Harness {
  readonly custody: Custody;
  readonly clock: ManualClock;
  readonly port: ScriptedTransferPort;
  readonly toggle: AdminToggle;
}

export function makeHarness(start: number = 0): Harness {
  const clock = new ManualClock(start);
  const port = new ScriptedTransferPort();
  const toggle = new AdminToggle("owner");
  const custody = new Custody({
    custodyId: "custody-test",
    transfers: port,
    clock,
    pause: toggle,
  });
  return { custody, clock, port, toggle };
}

/** Deposit with a scripted authorization. */
export function depositFor(
  custody: Custody,
  account: AccountId,
  asset: AssetId,
  quantity: bigint,
  lockPeriod: number = DAY,
) {
  return custody.deposit({
    account,
    asset,
    quantity,
    lockPeriod,
    authorization: permit(asset, account),
  });
}

export function eventTypes(custody: Custody, account: AccountId): string[] {
  return custody.readAccountEvents(account).map((e) => e.event.type);
}

/** A promise plus the function that resolves it. */
export function gate(): { readonly wait: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { wait, open };
}
