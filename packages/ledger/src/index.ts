/**
 * @lockbox/ledger: Time-locked, multi-asset custody ledger.
 *
 * Each account deposits any number of assets under one lock cycle and
 * withdraws its whole balance set once the lock has elapsed. A fully
 * drained account whose lock has elapsed starts a fresh cycle on its
 * next deposit.
 *
 * Design rules:
 * - All public types are readonly
 * - Quantities are bigint; no floating point
 * - One operation per account at a time, external transfers included
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Every committed change is published to the event store
 */

// Coordinator
export { Custody } from "./custody.js";
export type { CustodyOptions } from "./custody.js";

// Components
export { AccountLedger } from "./account-ledger.js";
export { WithdrawalCoordinator, REPORTED_FAILURE_REASON } from "./withdrawal-coordinator.js";
export { AssetRegistry } from "./asset-registry.js";
export { AccountMutex } from "./account-mutex.js";
export { AdminToggle, NEVER_PAUSED, assertNotPaused } from "./admin-toggle.js";
export type { AdminToggleOptions } from "./admin-toggle.js";
export { systemClock, ManualClock } from "./clock.js";
export { accountStreamId, OperationEvents } from "./context.js";
export type { CustodyContext, EventDraft } from "./context.js";

// Quantities
export { parseQuantity, formatQuantity } from "./quantity.js";

// Reference transfer port
export { InMemoryAssetBank } from "./asset-bank.js";
export type { InMemoryAssetBankOptions } from "./asset-bank.js";
export {
  signTransferAuthorization,
  authorizeTransfer,
  verifyTransferAuthorization,
} from "./permit.js";
export type { TransferAuthorizationFields } from "./permit.js";

// Types
export type {
  AssetTransferPort,
  Clock,
  PauseSwitch,
  AccountLockState,
  BalanceListing,
  DepositRequest,
  DepositResult,
  WithdrawalOutcome,
  RemovalResult,
  HoldingSnapshot,
  AccountSnapshot,
  LedgerSnapshot,
  CustodyErrorCode,
  TransferErrorCode,
} from "./types.js";
export { CustodyError, TransferError } from "./types.js";
