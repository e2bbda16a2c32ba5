/**
 * @keelson/ledger — In-memory fungible token ledger.
 *
 * An in-process host for the FungibleLedger interface. The Keelson core
 * never depends on this class directly; hosts hand it views through
 * `holder(account)`.
 *
 * Rules:
 * - Balances never go negative; an unfunded transfer returns false
 * - transferFrom spends the caller's allowance exactly
 * - Journaled: a checkpoint restores balances, allowances and supply
 */

import type { AccountId } from "@keelson/types";
import { assertNonNegative } from "./amount-math.js";
import type { FungibleLedger, Journaled, Rollback } from "./types.js";
import { TokenLedgerError } from "./types.js";

/**
 * Balance and allowance bookkeeping for one token.
 */
export class InMemoryTokenLedger implements Journaled {
  readonly symbol: string;
  private _balances: Map<AccountId, bigint> = new Map();
  private _allowances: Map<string, bigint> = new Map();
  private _supply = 0n;

  constructor(symbol: string) {
    this.symbol = symbol;
  }

  // ─── Issuance ────────────────────────────────────────────────────────

  /**
   * Create `amount` new tokens in `to`'s balance.
   */
  mint(to: AccountId, amount: bigint): void {
    assertAccount(to);
    assertNonNegative(amount);
    this._balances.set(to, this.balanceOf(to) + amount);
    this._supply += amount;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(account: AccountId): bigint {
    return this._balances.get(account) ?? 0n;
  }

  allowance(owner: AccountId, spender: AccountId): bigint {
    return this._allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  totalSupply(): bigint {
    return this._supply;
  }

  // ─── Movement ────────────────────────────────────────────────────────

  /**
   * Move `amount` from `from` to `to`. Returns false if `from` is short.
   */
  move(from: AccountId, to: AccountId, amount: bigint): boolean {
    assertAccount(to);
    assertNonNegative(amount);

    const available = this.balanceOf(from);
    if (available < amount) {
      return false;
    }

    this._balances.set(from, available - amount);
    this._balances.set(to, this.balanceOf(to) + amount);
    return true;
  }

  approve(owner: AccountId, spender: AccountId, amount: bigint): boolean {
    assertAccount(spender);
    assertNonNegative(amount);
    this._allowances.set(allowanceKey(owner, spender), amount);
    return true;
  }

  /**
   * Spend `spender`'s allowance over `from` to move `amount` to `to`.
   * Returns false (and changes nothing) if allowance or balance is short.
   */
  moveFrom(
    spender: AccountId,
    from: AccountId,
    to: AccountId,
    amount: bigint,
  ): boolean {
    assertAccount(to);
    assertNonNegative(amount);

    const allowed = this.allowance(from, spender);
    if (allowed < amount || this.balanceOf(from) < amount) {
      return false;
    }

    this._allowances.set(allowanceKey(from, spender), allowed - amount);
    return this.move(from, to, amount);
  }

  /**
   * A FungibleLedger handle acting as `account`.
   */
  holder(account: AccountId): FungibleLedger {
    assertAccount(account);
    return {
      symbol: this.symbol,
      account,
      transfer: (to, amount) => this.move(account, to, amount),
      transferFrom: (from, to, amount) => this.moveFrom(account, from, to, amount),
      approve: (spender, amount) => this.approve(account, spender, amount),
      balanceOf: (who) => this.balanceOf(who),
      totalSupply: () => this.totalSupply(),
    };
  }

  // ─── Journaling ──────────────────────────────────────────────────────

  checkpoint(): Rollback {
    const balances = new Map(this._balances);
    const allowances = new Map(this._allowances);
    const supply = this._supply;

    return () => {
      this._balances = balances;
      this._allowances = allowances;
      this._supply = supply;
    };
  }
}

function allowanceKey(owner: AccountId, spender: AccountId): string {
  return JSON.stringify([owner, spender]);
}

function assertAccount(account: AccountId): void {
  if (account.trim() === "") {
    throw new TokenLedgerError("INVALID_ACCOUNT", "Account must be a non-empty string");
  }
}
