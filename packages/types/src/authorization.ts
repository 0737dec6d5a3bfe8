/**
 * Transfer Authorization
 *
 * A single-use, expiring capability produced by an external signer.
 * It permits the custodian to pull at most `amount` units of `asset`
 * from `owner` exactly once.
 *
 * The custody core never inspects these fields; it passes the object
 * through to the AssetTransferPort, which is responsible for verifying it.
 */

import type { AccountId, AssetId } from "./ids.js";

export interface AuthorizedTransferRequest {
  /** Asset the capability is scoped to */
  readonly asset: AssetId;

  /** Maximum quantity in base units, as a decimal integer string */
  readonly amount: string;

  /** Account the funds are pulled from */
  readonly owner: AccountId;

  /** Single-use nonce chosen by the signer */
  readonly nonce: string;

  /** Unix seconds after which the capability is void */
  readonly deadline: number;

  /** Signer-specific proof over the fields above */
  readonly signature: string;
}
