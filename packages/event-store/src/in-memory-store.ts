/**
 * @lockbox/event-store: In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for:
 * - Unit and integration tests
 * - Single-process deployments whose ledger state is also in memory
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events in the stream or log)
 * - Synchronous subscription dispatch, after the batch is stored
 * - A throwing subscriber never fails the append or starves other
 *   subscribers; the failure goes to `onHandlerError`
 * - No durability guarantees
 */

import { isCustodyEvent } from "@lockbox/types";
import type { CustodyEvent, CustodyEventType } from "@lockbox/types";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  HandlerFailure,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
import type { UnhashedEvent } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt` timestamps. Default: wall clock. */
  readonly now?: (() => Date) | undefined;
  /**
   * Called when a subscriber throws; must not throw itself.
   * Default: the failure is kept in `handlerFailures`.
   */
  readonly onHandlerError?: ((failure: HandlerFailure) => void) | undefined;
}

/**
 * In-memory custody event store.
 *
 * Events live in two structures:
 * - Per-stream arrays for stream reads
 * - A global array for readAll, global subscriptions and the hash chain
 */
export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private readonly _now: () => Date;
  private readonly _onHandlerError: (failure: HandlerFailure) => void;
  private readonly _handlerFailures: HandlerFailure[] = [];
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._now = options?.now ?? (() => new Date());
    this._onHandlerError =
      options?.onHandlerError ?? ((failure) => this._handlerFailures.push(failure));
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly CustodyEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError(
        "EMPTY_APPEND",
        "Cannot append zero events",
        streamId,
      );
    }
    events.forEach((event, i) => {
      if (!isCustodyEvent(event)) {
        throw new EventStoreError(
          "INVALID_EVENT",
          `Event ${i} of the batch is not a well-formed custody event`,
          streamId,
        );
      }
    });

    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const fromVersion = stream.length + 1;
    const appendedAt = this._now().toISOString();
    const stored: StoredEvent[] = [];

    events.forEach((event, i) => {
      const base: UnhashedEvent = {
        event,
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const record: StoredEvent = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };
      this._lastHash = record.hash;
      this._globalLog.push(record);
      stored.push(record);
    });

    stream.push(...stored);
    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion;
    if (fromVersion !== undefined && fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const result =
      options?.direction === "backward"
        ? stream
            .filter((e) => e.version <= (fromVersion ?? stream.length))
            .reverse()
        : stream.filter((e) => e.version >= (fromVersion ?? 1));

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition;
    const types =
      options?.types !== undefined
        ? new Set<CustodyEventType>(options.types)
        : undefined;
    const wanted = (e: StoredEvent): boolean =>
      types === undefined || types.has(e.event.type);

    const result =
      options?.direction === "backward"
        ? this._globalLog
            .filter(
              (e) =>
                e.globalPosition <= (fromPosition ?? this._globalLog.length) &&
                wanted(e),
            )
            .reverse()
        : this._globalLog.filter(
            (e) => e.globalPosition >= (fromPosition ?? 1) && wanted(e),
          );

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    const set = subscribers;
    set.add(handler);

    return {
      unsubscribe: () => {
        set.delete(handler);
        if (set.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);

    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  /** Subscriber failures kept when no `onHandlerError` was given. */
  get handlerFailures(): readonly HandlerFailure[] {
    return this._handlerFailures;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const handlers = [
      ...(this._streamSubscribers.get(streamId) ?? []),
      ...this._globalSubscribers,
    ];
    for (const handler of handlers) {
      for (const stored of events) {
        this._deliver(handler, stored);
      }
    }
  }

  private _deliver(handler: EventHandler, stored: StoredEvent): void {
    try {
      handler(stored);
    } catch (error) {
      this._onHandlerError({
        error,
        globalPosition: stored.globalPosition,
        streamId: stored.streamId,
      });
    }
  }
}

function limit(
  events: readonly StoredEvent[],
  maxCount: number | undefined,
): readonly StoredEvent[] {
  if (maxCount !== undefined && maxCount >= 0) {
    return events.slice(0, maxCount);
  }
  return events;
}
