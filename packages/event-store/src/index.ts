/**
 * @lockbox/event-store: Append-only custody event stream.
 *
 * Provides:
 * - EventStore interface (append, read, subscribe)
 * - InMemoryEventStore implementation
 * - Global SHA-256 hash chain over RFC 8785 canonical records
 */

export type {
  StoredEvent,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  HandlerFailure,
  Subscription,
  IntegrityError,
  EventStoreIntegrityResult,
  EventStore,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

export {
  GENESIS_HASH,
  computeEventHash,
  verifyHashChain,
} from "./hash-chain.js";
export type { UnhashedEvent } from "./hash-chain.js";
