/**
 * @keelson/types — Shared domain types for the Keelson stack.
 *
 * These types are used across all Keelson packages:
 * - Account identities and integer amounts
 * - Event architecture (the audit trail of committed transitions)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Account types
export type { AccountId, AmountString, UnixSeconds } from "./account.js";
export { ZERO_ACCOUNT } from "./account.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export { isAccountId, isAmountString } from "./guards.js";
