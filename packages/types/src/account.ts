/**
 * Account and amount primitives.
 *
 * Rules:
 * - Account identities are opaque, non-empty strings
 * - The empty string is the zero account and never a valid party
 * - Amounts are non-negative integers (bigint in memory, digit strings on the wire)
 */

/**
 * Stable identity key of an account (owner, staker, voter, referrer).
 */
export type AccountId = string;

/**
 * The zero account. Never a valid caller or recipient.
 */
export const ZERO_ACCOUNT: AccountId = "";

/**
 * An integer amount in a ledger's smallest unit, serialized as a
 * base-10 digit string (e.g. "1000000").
 */
export type AmountString = string;

/**
 * Unix timestamp in whole seconds.
 */
export type UnixSeconds = number;
