/**
 * @keelson/ledger — Deterministic integer arithmetic.
 *
 * All arithmetic uses bigint. Division truncates toward zero, matching
 * the integer semantics every fee, reward and valuation formula relies on.
 *
 * Rules:
 * - No floating-point operations
 * - Wire amounts are base-10 digit strings without sign or decimal point
 * - Zero runtime dependencies
 */

import { TokenLedgerError } from "./types.js";

/** Fixed-point scale where 1.0 = 10^18. */
export const WAD = 10n ** 18n;

/**
 * Parse a wire amount into a bigint.
 *
 * "1000" → 1000n
 * "-5", "1.5", "" → TokenLedgerError
 */
export function parseAmount(amount: string): bigint {
  const trimmed = amount.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new TokenLedgerError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }
  return BigInt(trimmed);
}

/**
 * Convert an amount back to its wire form.
 */
export function formatAmount(amount: bigint): string {
  return amount.toString();
}

/**
 * Assert an in-memory amount is not negative.
 */
export function assertNonNegative(amount: bigint, label = "amount"): void {
  if (amount < 0n) {
    throw new TokenLedgerError(
      "INVALID_AMOUNT",
      `${label} must be non-negative, got ${amount.toString()}`,
    );
  }
}

/**
 * `a * b / denominator`, multiplying first so no precision is lost
 * before the final truncating division.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new TokenLedgerError("INVALID_AMOUNT", "Division by zero");
  }
  return (a * b) / denominator;
}

/**
 * `value * percent / 100`, truncating.
 */
export function percentOf(value: bigint, percent: bigint): bigint {
  return mulDiv(value, percent, 100n);
}

/**
 * `amount * rate / WAD`, truncating. `rate` is a WAD fixed-point fraction.
 */
export function wadMul(amount: bigint, rate: bigint): bigint {
  return mulDiv(amount, rate, WAD);
}

/**
 * Sum a list of amounts.
 */
export function sumAmounts(amounts: Iterable<bigint>): bigint {
  let total = 0n;
  for (const amount of amounts) {
    total += amount;
  }
  return total;
}
