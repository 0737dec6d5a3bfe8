/**
 * @lockbox/event-store: Core types.
 *
 * Defines the interfaces and types for the append-only custody event stream.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a contiguous version within its stream
 * - Every event is linked into a single global hash chain
 * - Subscriptions enable reactive consumers
 */

import type { CustodyEvent, CustodyEventType } from "@lockbox/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * A custody event as persisted in the store.
 */
export interface StoredEvent {
  /** The custody event */
  readonly event: CustodyEvent;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based, contiguous) */
  readonly version: number;

  /** Position across all streams (1-based, contiguous) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;

  /** SHA-256 of this record chained onto `previousHash` */
  readonly hash: string;

  /** Hash of the preceding record in global order, or "genesis" */
  readonly previousHash: string;
}

/**
 * Result of an append operation.
 */
export interface AppendResult {
  readonly streamId: string;

  /** Version of the first event appended */
  readonly fromVersion: number;

  /** Version of the last event appended (current stream head) */
  readonly toVersion: number;

  readonly count: number;
}

// =============================================================================
// Read Options
// =============================================================================

export type ReadDirection = "forward" | "backward";

/**
 * Options for reading events from a stream.
 */
export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1, or the head when reading backward */
  readonly fromVersion?: number | undefined;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number | undefined;

  readonly direction?: ReadDirection | undefined;
}

/**
 * Options for reading events across all streams.
 */
export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1, or the head when reading backward */
  readonly fromPosition?: number | undefined;

  readonly maxCount?: number | undefined;

  readonly direction?: ReadDirection | undefined;

  /** Only return events of these types */
  readonly types?: readonly CustodyEventType[] | undefined;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

/**
 * A subscriber that threw while an event was delivered. The append it
 * was dispatched from has already succeeded.
 */
export interface HandlerFailure {
  readonly error: unknown;
  readonly globalPosition: number;
  readonly streamId: string;
}

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last record that verified */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only custody event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are contiguous with no gaps
 * - Subscribers see events in append order
 */
export interface EventStore {
  /**
   * Append one or more events to a stream, in order.
   *
   * @throws EventStoreError on an empty batch or invalid stream ID
   */
  append(streamId: string, events: readonly CustodyEvent[]): AppendResult;

  /** Read events from a single stream (empty if the stream doesn't exist). */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Read events across all streams in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  /**
   * Handlers run synchronously after each append. An error thrown by a
   * handler must not propagate out of `append`.
   */
  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Version of the last event in the stream, or 0 */
  streamVersion(streamId: string): number;

  /** Position of the last event in the store, or 0 */
  globalPosition(): number;

  /** Recompute and check the global hash chain. */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_EVENT"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
