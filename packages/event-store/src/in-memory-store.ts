/**
 * @keelson/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for:
 * - Unit and integration tests
 * - Single-process hosts where the audit trail is exported via snapshots
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch, after the batch is stored
 */

import type { DomainEvent } from "@keelson/types";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export type SubscriberErrorHandler = (error: unknown, event: HashedStoredEvent) => void;

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt` timestamps. Default: wall clock */
  readonly now?: () => Date;

  /**
   * Receives whatever a subscriber throws. The append it was dispatched
   * from has already been stored and still succeeds.
   * Default: rethrow on a microtask, outside the append.
   */
  readonly onSubscriberError?: SubscriberErrorHandler;
}

/**
 * In-memory event store.
 *
 * Every event lands in the global log; per-stream versions are counted
 * alongside so each stream numbers its own events from 1.
 */
export class InMemoryEventStore implements EventStore {
  private readonly _globalLog: HashedStoredEvent[] = [];
  private readonly _streamVersions = new Map<string, number>();
  private readonly _subscribers = new Set<EventHandler>();
  private readonly _now: () => Date;
  private readonly _onSubscriberError: SubscriberErrorHandler;

  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._now = options?.now ?? (() => new Date());
    this._onSubscriberError = options?.onSubscriberError ?? rethrowLater;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }

    if (events.length === 0) {
      throw new EventStoreError(
        "EMPTY_APPEND",
        "Cannot append zero events",
        streamId,
      );
    }

    const fromVersion = (this._streamVersions.get(streamId) ?? 0) + 1;
    const firstPosition = this._globalLog.length + 1;
    const storedEvents: HashedStoredEvent[] = [];
    const appendedAt = this._now().toISOString();

    events.forEach((event, i) => {
      const base: StoredEvent = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + i,
        globalPosition: firstPosition + i,
        appendedAt,
      };

      const previousHash = storedEvents.at(-1)?.hash ?? this._lastHash;
      storedEvents.push({
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      });
    });

    // Commit the whole batch only once every event is hashed
    for (const stored of storedEvents) {
      this._globalLog.push(stored);
      this._lastHash = stored.hash;
    }
    const toVersion = fromVersion + events.length - 1;
    this._streamVersions.set(streamId, toVersion);

    this._dispatch(storedEvents);

    return {
      streamId,
      fromVersion,
      toVersion,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    return this._globalLog.filter((e) => e.globalPosition >= fromPosition);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribeAll(handler: EventHandler): Subscription {
    this._subscribers.add(handler);

    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _dispatch(events: readonly HashedStoredEvent[]): void {
    for (const handler of this._subscribers) {
      for (const event of events) {
        try {
          handler(event);
        } catch (error) {
          this._onSubscriberError(error, event);
        }
      }
    }
  }
}

function rethrowLater(error: unknown): void {
  queueMicrotask(() => {
    throw error;
  });
}
