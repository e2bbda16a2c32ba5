/**
 * Argument checks shared by every subsystem.
 * Each one throws INVALID_ARGUMENT.
 */

import type { AccountId } from "@keelson/types";
import { isAccountId } from "@keelson/types";
import { ProtocolError } from "./types.js";

export function requireAccount(account: AccountId, label: string): void {
  if (!isAccountId(account)) {
    throw new ProtocolError("INVALID_ARGUMENT", `${label} must be a non-zero account`);
  }
}

export function requirePositive(amount: bigint, label: string): void {
  if (amount <= 0n) {
    throw new ProtocolError(
      "INVALID_ARGUMENT",
      `${label} must be greater than zero, got ${amount.toString()}`,
    );
  }
}

export function requireNonNegative(amount: bigint, label: string): void {
  if (amount < 0n) {
    throw new ProtocolError(
      "INVALID_ARGUMENT",
      `${label} must be non-negative, got ${amount.toString()}`,
    );
  }
}

export function requireNonEmpty(value: string, label: string): void {
  if (value.trim() === "") {
    throw new ProtocolError("INVALID_ARGUMENT", `${label} must not be empty`);
  }
}
