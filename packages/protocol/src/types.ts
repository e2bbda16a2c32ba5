/**
 * @keelson/protocol domain types.
 *
 * The protocol is one shared, account-keyed ledger with six subsystems:
 * - Portfolio Registry: assets, oracle valuation, fees, risk band, withdrawal
 * - Staking Ledger: custody-held stake with time-based rewards and slashing
 * - Flash-Loan Engine: same-transition borrow against the native balance
 * - Governance Module: time-boxed proposals with vote counts
 * - Insurance Module: one coverage policy per account
 * - Referral Registry: write-once referrer edges
 *
 * Rules:
 * - All records are readonly; stores replace them wholesale
 * - Amounts are bigint, timestamps are Unix seconds
 * - Every failure is a ProtocolError and aborts the whole transition
 */

import type { AccountId, UnixSeconds } from "@keelson/types";

// =============================================================================
// Portfolio Registry
// =============================================================================

/** A named holding. `value` is tracked independently of `amount`. */
export interface Asset {
  readonly symbol: string;
  readonly amount: bigint;
  readonly value: bigint;
}

export interface ValuationPoint {
  readonly timestamp: UnixSeconds;
  readonly totalValue: bigint;
}

export interface Portfolio {
  readonly owner: AccountId;
  readonly totalValue: bigint;
  readonly totalShares: bigint;
  /** Append-only; entries are edited in place, never removed */
  readonly assets: readonly Asset[];
  readonly historicalValues: readonly ValuationPoint[];
  readonly lastUpdateTimestamp: UnixSeconds;
  readonly minValueThreshold: bigint;
  /** `null` = unbounded */
  readonly maxValueThreshold: bigint | null;
  /** Percent of totalValue, 0..100 */
  readonly managementFee: bigint;
  /** Percent of totalValue, 0..100 */
  readonly performanceFee: bigint;
  readonly riskScore: bigint;
}

export interface PortfolioSettings {
  readonly managementFee?: bigint;
  readonly performanceFee?: bigint;
  readonly minValueThreshold?: bigint;
  readonly maxValueThreshold?: bigint | null;
  readonly riskScore?: bigint;
}

export interface WithdrawalReceipt {
  readonly symbol: string;
  readonly token: string;
  readonly to: AccountId;
  readonly amount: bigint;
  /** Value removed from both the asset and the portfolio total */
  readonly valueRemoved: bigint;
}

export interface FeeBreakdown {
  readonly managementFee: bigint;
  readonly performanceFee: bigint;
  readonly bonusApplied: boolean;
  readonly totalValue: bigint;
}

// =============================================================================
// Staking Ledger
// =============================================================================

export interface StakeInfo {
  readonly amount: bigint;
  readonly lastStakeTime: UnixSeconds;
}

export interface RewardClaim {
  readonly account: AccountId;
  readonly periods: bigint;
  readonly reward: bigint;
}

// =============================================================================
// Flash-Loan Engine
// =============================================================================

/**
 * Phases of a flash loan. A loan that never reaches
 * "repayment_verified" aborts its transition.
 */
export type FlashLoanPhase = "disbursed" | "repayment_verified";

export interface FlashLoanDisbursement {
  readonly phase: "disbursed";
  readonly borrower: AccountId;
  readonly amount: bigint;
  readonly fee: bigint;
  /** Borrower's native balance before the disbursement */
  readonly balanceBefore: bigint;
}

export interface FlashLoanReceipt {
  readonly phase: "repayment_verified";
  readonly borrower: AccountId;
  readonly amount: bigint;
  readonly fee: bigint;
  readonly balanceBefore: bigint;
  /** Borrower's native balance after their callback returned */
  readonly balanceAfter: bigint;
}

/**
 * Borrower code run between disbursement and verification.
 * It runs inside the transition; anything it does is undone on abort.
 */
export type FlashLoanCallback = (loan: FlashLoanDisbursement) => void;

// =============================================================================
// Governance Module
// =============================================================================

export interface Proposal {
  readonly id: number;
  readonly proposer: AccountId;
  readonly description: string;
  readonly voteCount: bigint;
  /** Bookkeeping flag; no entry point sets it */
  readonly executed: boolean;
  readonly createdAt: UnixSeconds;
  readonly votingDeadline: UnixSeconds;
}

export type ProposalStatus = "open" | "closed" | "executed";

// =============================================================================
// Insurance Module
// =============================================================================

export interface InsurancePolicy {
  readonly isActive: boolean;
  readonly coverageAmount: bigint;
  readonly premiumPaid: bigint;
  readonly policyStartDate: UnixSeconds;
}

// =============================================================================
// Referral Registry
// =============================================================================

export interface ReferralEdge {
  readonly referred: AccountId;
  readonly referrer: AccountId;
}

// =============================================================================
// Host ports
// =============================================================================

/** Monotonic, read-only time source. */
export interface Clock {
  now(): UnixSeconds;
}

export interface PriceReading {
  /** Fixed-point price; must be positive to be used */
  readonly price: bigint;
  readonly isValid: boolean;
}

/**
 * External price oracle. `source` is the feed bound to `symbol`
 * through setPriceFeedSource.
 */
export interface PriceOracle {
  latestPrice(symbol: string, source: string): PriceReading;
}

// =============================================================================
// Errors
// =============================================================================

export type ProtocolErrorCode =
  | "NOT_OWNER"
  | "ALREADY_EXISTS"
  | "ALREADY_BOUND"
  | "ASSET_NOT_FOUND"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_STAKE"
  | "INVALID_PRICE"
  | "NO_ORACLE"
  | "REPAYMENT_FAILED"
  | "VOTING_CLOSED"
  | "ALREADY_EXECUTED"
  | "INVALID_ARGUMENT"
  | "NOTHING_TO_WITHDRAW"
  | "PROPOSAL_NOT_FOUND"
  | "NO_ACTIVE_POLICY"
  | "TRANSFER_FAILED"
  | "UNAUTHORIZED"
  | "REENTRANT_TRANSITION";

/**
 * Structured rejection of a transition.
 * Always thrown — never returned as a status.
 */
export class ProtocolError extends Error {
  public readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
  }
}
