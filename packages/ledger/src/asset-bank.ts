/**
 * @lockbox/ledger: In-memory asset bank.
 *
 * Reference AssetTransferPort for development and tests. Holds balances
 * for any number of assets and holders, custodians included, and checks
 * signed transfer authorizations on the way in.
 *
 * Failure injection:
 * - block(asset, recipient): pushOut resolves false
 * - freeze(asset): pushOut throws ASSET_FROZEN
 */

import { isAuthorizedTransferRequest } from "@lockbox/types";
import type { AccountId, AssetId, AuthorizedTransferRequest } from "@lockbox/types";
import { systemClock } from "./clock.js";
import { formatQuantity } from "./quantity.js";
import { verifyTransferAuthorization } from "./permit.js";
import type { AssetTransferPort, Clock } from "./types.js";
import { TransferError } from "./types.js";

export interface InMemoryAssetBankOptions {
  /** Holder that pushOut pays from */
  readonly custodyId: string;
  /** Secret authorizations are signed with */
  readonly signingSecret: string;
  /** Used for authorization deadlines */
  readonly clock?: Clock | undefined;
}

export class InMemoryAssetBank implements AssetTransferPort {
  readonly custodyId: string;
  private readonly _secret: string;
  private readonly _clock: Clock;

  /** asset → holder → balance */
  private readonly _holdings = new Map<AssetId, Map<string, bigint>>();
  private readonly _usedNonces = new Set<string>();
  private readonly _blocked = new Set<string>();
  private readonly _frozen = new Set<AssetId>();

  constructor(options: InMemoryAssetBankOptions) {
    this.custodyId = options.custodyId;
    this._secret = options.signingSecret;
    this._clock = options.clock ?? systemClock;
  }

  // ─── Funding & Queries ───────────────────────────────────────────────

  mint(asset: AssetId, holder: string, amount: bigint): void {
    if (amount <= 0n) {
      throw new TransferError("TRANSFER_FAILED", "Mint amount must be greater than 0");
    }
    this._credit(asset, holder, amount);
  }

  balanceOf(asset: AssetId, holder: string): bigint {
    return this._holdings.get(asset)?.get(holder) ?? 0n;
  }

  custodyBalance(custodyId: string, asset: AssetId): bigint {
    return this.balanceOf(asset, custodyId);
  }

  // ─── Failure Injection ───────────────────────────────────────────────

  block(asset: AssetId, recipient: AccountId): void {
    this._blocked.add(blockKey(asset, recipient));
  }

  unblock(asset: AssetId, recipient: AccountId): void {
    this._blocked.delete(blockKey(asset, recipient));
  }

  freeze(asset: AssetId): void {
    this._frozen.add(asset);
  }

  thaw(asset: AssetId): void {
    this._frozen.delete(asset);
  }

  // ─── AssetTransferPort ───────────────────────────────────────────────

  async pullInto(
    custodyId: string,
    asset: AssetId,
    fromAccount: AccountId,
    quantity: bigint,
    authorization: AuthorizedTransferRequest,
  ): Promise<void> {
    this._checkAuthorization(custodyId, asset, fromAccount, quantity, authorization);

    const available = this.balanceOf(asset, fromAccount);
    if (available < quantity) {
      throw new TransferError(
        "INSUFFICIENT_FUNDS",
        `"${fromAccount}" holds ${formatQuantity(available)} of "${asset}", needs ${formatQuantity(quantity)}`,
      );
    }

    this._usedNonces.add(nonceKey(authorization));
    this._debit(asset, fromAccount, quantity);
    this._credit(asset, custodyId, quantity);
  }

  async pushOut(asset: AssetId, toAccount: AccountId, quantity: bigint): Promise<boolean> {
    if (this._frozen.has(asset)) {
      throw new TransferError("ASSET_FROZEN", `Asset "${asset}" is frozen`);
    }
    if (this._blocked.has(blockKey(asset, toAccount))) {
      return false;
    }
    if (this.balanceOf(asset, this.custodyId) < quantity) {
      throw new TransferError(
        "INSUFFICIENT_FUNDS",
        `Custody holds less than ${formatQuantity(quantity)} of "${asset}"`,
      );
    }

    this._debit(asset, this.custodyId, quantity);
    this._credit(asset, toAccount, quantity);
    return true;
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _checkAuthorization(
    custodyId: string,
    asset: AssetId,
    fromAccount: AccountId,
    quantity: bigint,
    authorization: AuthorizedTransferRequest,
  ): void {
    const reject = (reason: string): never => {
      throw new TransferError("UNAUTHORIZED", reason);
    };

    if (!isAuthorizedTransferRequest(authorization)) {
      reject("Malformed authorization");
    }
    if (!verifyTransferAuthorization(authorization, custodyId, this._secret)) {
      reject("Invalid authorization signature");
    }
    if (authorization.owner !== fromAccount) {
      reject(`Authorization owner "${authorization.owner}" is not "${fromAccount}"`);
    }
    if (authorization.asset !== asset) {
      reject(`Authorization is for "${authorization.asset}", not "${asset}"`);
    }
    if (quantity > BigInt(authorization.amount)) {
      reject(`Authorization permits ${authorization.amount}, requested ${formatQuantity(quantity)}`);
    }
    if (this._clock.now() > authorization.deadline) {
      reject(`Authorization expired at ${authorization.deadline}`);
    }
    if (this._usedNonces.has(nonceKey(authorization))) {
      reject(`Authorization nonce "${authorization.nonce}" already used`);
    }
  }

  private _credit(asset: AssetId, holder: string, amount: bigint): void {
    let holders = this._holdings.get(asset);
    if (holders === undefined) {
      holders = new Map();
      this._holdings.set(asset, holders);
    }
    holders.set(holder, (holders.get(holder) ?? 0n) + amount);
  }

  private _debit(asset: AssetId, holder: string, amount: bigint): void {
    const holders = this._holdings.get(asset);
    holders?.set(holder, (holders.get(holder) ?? 0n) - amount);
  }
}

function blockKey(asset: AssetId, recipient: AccountId): string {
  return `${asset}\u0000${recipient}`;
}

function nonceKey(authorization: AuthorizedTransferRequest): string {
  return `${authorization.owner}\u0000${authorization.nonce}`;
}
