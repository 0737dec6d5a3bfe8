/**
 * @lockbox/types: Shared domain types for the Lockbox stack.
 *
 * Used across all Lockbox packages:
 * - Account and asset identifiers
 * - Transfer authorization capabilities
 * - Custody events
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Quantities cross package boundaries as decimal strings
 */

// Identifiers
export type { AccountId, AssetId } from "./ids.js";
export { isNullAsset } from "./ids.js";

// Authorization
export type { AuthorizedTransferRequest } from "./authorization.js";

// Events
export type {
  EventMetadata,
  CustodyEventPayloads,
  CustodyEventType,
  TypedCustodyEvent,
  CustodyEvent,
} from "./event.js";
export { CUSTODY_EVENT_TYPES } from "./event.js";

// Runtime type guards
export {
  isQuantityString,
  isCustodyEventType,
  isAuthorizedTransferRequest,
  isCustodyEvent,
} from "./guards.js";
