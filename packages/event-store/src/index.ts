/**
 * @keelson/event-store — Append-only audit trail.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore, hash-chained for tamper evidence
 * - Hash chain helpers for out-of-band verification
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
  AppendResult,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions, SubscriberErrorHandler } from "./in-memory-store.js";
