/**
 * @keelson/ledger — Value movement primitives.
 *
 * - Deterministic bigint amount math (no floating point)
 * - The FungibleLedger interface the core moves tokens through
 * - InMemoryTokenLedger, an in-process host for that interface
 * - Journaled, the checkpoint contract behind atomic transitions
 *
 * Design rules:
 * - All amounts are non-negative integers
 * - Fail-closed: invalid amounts throw, short balances refuse
 * - Zero runtime dependencies
 */

// Amount arithmetic
export {
  WAD,
  parseAmount,
  formatAmount,
  assertNonNegative,
  mulDiv,
  percentOf,
  wadMul,
  sumAmounts,
} from "./amount-math.js";

// In-memory host
export { InMemoryTokenLedger } from "./token-ledger.js";

// Types
export type {
  FungibleLedger,
  Journaled,
  Rollback,
  TokenLedgerErrorCode,
} from "./types.js";

export { TokenLedgerError } from "./types.js";
