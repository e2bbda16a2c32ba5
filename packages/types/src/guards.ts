/**
 * Runtime Type Guards
 *
 * Narrowing functions for account and amount fields arriving from
 * outside: call arguments and deserialized snapshots.
 */

import type { AccountId, AmountString } from "./account.js";

const AMOUNT_PATTERN = /^\d+$/;

export function isAccountId(value: unknown): value is AccountId {
  return typeof value === "string" && value.trim().length > 0;
}

export function isAmountString(value: unknown): value is AmountString {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}
