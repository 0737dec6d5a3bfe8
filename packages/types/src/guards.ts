/**
 * Runtime Type Guards
 *
 * Narrowing functions for custody domain types. The event store checks
 * every appended event with isCustodyEvent, the asset bank checks
 * incoming authorizations with isAuthorizedTransferRequest, and
 * quantity strings are checked when balances are parsed or restored.
 */

import type { AuthorizedTransferRequest } from "./authorization.js";
import type { CustodyEvent, CustodyEventType, EventMetadata } from "./event.js";
import { CUSTODY_EVENT_TYPES } from "./event.js";

const QUANTITY = /^\d+$/;
const EVENT_SOURCES = new Set<string>(["ledger", "withdrawal"]);
const EVENT_TYPES = new Set<string>(CUSTODY_EVENT_TYPES);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Scalar guards
// =============================================================================

/**
 * A base-unit quantity string: unsigned decimal digits, no sign,
 * no fraction, no exponent.
 */
export function isQuantityString(value: unknown): value is string {
  return typeof value === "string" && QUANTITY.test(value);
}

export function isCustodyEventType(value: unknown): value is CustodyEventType {
  return typeof value === "string" && EVENT_TYPES.has(value);
}

// =============================================================================
// Authorization guards
// =============================================================================

export function isAuthorizedTransferRequest(
  value: unknown,
): value is AuthorizedTransferRequest {
  if (!isRecord(value)) return false;
  return (
    typeof value.asset === "string" &&
    isQuantityString(value.amount) &&
    typeof value.owner === "string" &&
    value.owner.length > 0 &&
    typeof value.nonce === "string" &&
    value.nonce.length > 0 &&
    typeof value.deadline === "number" &&
    Number.isSafeInteger(value.deadline) &&
    typeof value.signature === "string"
  );
}

// =============================================================================
// Event guards
// =============================================================================

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    typeof value.source === "string" &&
    EVENT_SOURCES.has(value.source)
  );
}

function hasAccountAsset(payload: Record<string, unknown>): boolean {
  return typeof payload.account === "string" && typeof payload.asset === "string";
}

export function isCustodyEvent(value: unknown): value is CustodyEvent {
  if (!isRecord(value)) return false;
  const type = value.type;
  if (!isCustodyEventType(type) || !isEventMetadata(value.metadata)) {
    return false;
  }
  const payload = value.payload;
  if (!isRecord(payload)) return false;

  switch (type) {
    case "account.created":
      return (
        typeof payload.account === "string" &&
        typeof payload.startTime === "number" &&
        typeof payload.lockPeriod === "number" &&
        typeof payload.rearmed === "boolean"
      );
    case "asset.deposited":
      return (
        hasAccountAsset(payload) &&
        isQuantityString(payload.amount) &&
        isQuantityString(payload.newBalance)
      );
    case "asset.withdraw_failed":
      return (
        hasAccountAsset(payload) &&
        isQuantityString(payload.amount) &&
        typeof payload.reason === "string"
      );
    case "asset.withdrawn":
    case "asset.removed":
      return hasAccountAsset(payload) && isQuantityString(payload.amount);
  }
}
