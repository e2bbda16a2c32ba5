/**
 * @keelson/ledger — Types for value movement.
 *
 * Rules:
 * - Amounts are non-negative bigint in the token's smallest unit
 * - A `false` return is a refusal, never a partial transfer
 * - Every in-process store the core touches is Journaled
 */

import type { AccountId } from "@keelson/types";

// ─── Fungible Ledger ─────────────────────────────────────────────────────

/**
 * A fungible-token ledger as seen by one account.
 *
 * The handle acts as `account`: `transfer` and `approve` move or grant
 * that account's balance, and `transferFrom` spends an allowance granted
 * to it.
 */
export interface FungibleLedger {
  /** Token symbol (e.g. "GOV", "USDC") */
  readonly symbol: string;

  /** The account this handle acts as */
  readonly account: AccountId;

  transfer(to: AccountId, amount: bigint): boolean;

  transferFrom(from: AccountId, to: AccountId, amount: bigint): boolean;

  approve(spender: AccountId, amount: bigint): boolean;

  balanceOf(account: AccountId): bigint;

  totalSupply(): bigint;
}

// ─── Journaling ──────────────────────────────────────────────────────────

/** Restores a store to the state captured by `checkpoint()`. */
export type Rollback = () => void;

/**
 * A store that can take part in an all-or-nothing transition.
 */
export interface Journaled {
  checkpoint(): Rollback;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type TokenLedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT";

/**
 * Structured error from amount parsing and the in-memory token ledger.
 */
export class TokenLedgerError extends Error {
  public readonly code: TokenLedgerErrorCode;

  constructor(code: TokenLedgerErrorCode, message: string) {
    super(message);
    this.name = "TokenLedgerError";
    this.code = code;
  }
}
