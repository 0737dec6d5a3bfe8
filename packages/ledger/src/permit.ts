/**
 * @lockbox/ledger: Transfer authorizations.
 *
 * An authorization lets a spender (the custodian) pull up to `amount` of
 * an owner's asset once, before `deadline`. It is signed with
 * HMAC-SHA256 over the RFC 8785 canonical form of its fields.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { AuthorizedTransferRequest } from "@lockbox/types";

/** Everything an authorization commits to. */
export interface TransferAuthorizationFields {
  readonly asset: string;
  readonly amount: string;
  readonly owner: string;
  readonly nonce: string;
  /** Unix seconds; the authorization is usable up to and including this instant */
  readonly deadline: number;
  /** Custody that may spend the authorization */
  readonly spender: string;
}

export function signTransferAuthorization(
  fields: TransferAuthorizationFields,
  secret: string,
): string {
  const message = canonicalize({
    asset: fields.asset,
    amount: fields.amount,
    owner: fields.owner,
    nonce: fields.nonce,
    deadline: fields.deadline,
    spender: fields.spender,
  });
  return createHmac("sha256", secret).update(message).digest("base64url");
}

/**
 * Build a signed request for `spender`. Used by wallets, the demo and tests.
 */
export function authorizeTransfer(
  fields: TransferAuthorizationFields,
  secret: string,
): AuthorizedTransferRequest {
  return {
    asset: fields.asset,
    amount: fields.amount,
    owner: fields.owner,
    nonce: fields.nonce,
    deadline: fields.deadline,
    signature: signTransferAuthorization(fields, secret),
  };
}

/** Constant-time check of a request's signature for `spender`. */
export function verifyTransferAuthorization(
  request: AuthorizedTransferRequest,
  spender: string,
  secret: string,
): boolean {
  const expected = Buffer.from(
    signTransferAuthorization({ ...request, spender }, secret),
  );
  const actual = Buffer.from(request.signature);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}
