/**
 * Event Types
 *
 * Every committed transition in Keelson emits one or more DomainEvents.
 * They form the audit trail; state lives in the subsystem stores.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which subsystem)
 * - Payloads carry amounts as digit strings, never bigint
 * - No UPDATE, no DELETE — only new events
 */

/**
 * Subsystems that emit events.
 */
export type EventSource =
  | "portfolio"
  | "staking"
  | "flash-loan"
  | "governance"
  | "insurance"
  | "referral";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp (derived from the transition clock) */
  readonly timestamp: string;

  /** Account that started the transition */
  readonly actor: string;

  /** Shared by every event emitted in the same transition */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event in the Keelson system.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "asset.withdrawn", "proposal.vote_cast") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
