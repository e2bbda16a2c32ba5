/**
 * Snapshot codec — the protocol's stores as plain JSON.
 *
 * Amounts travel as digit strings. Token balances are not part of the
 * snapshot: they belong to the ledgers the host plugs in.
 *
 * Decoding checks every account and amount field; a malformed one fails
 * with INVALID_ARGUMENT naming the field.
 */

import type { AccountId, AmountString, UnixSeconds } from "@keelson/types";
import { isAccountId, isAmountString } from "@keelson/types";
import { formatAmount, parseAmount } from "@keelson/ledger";
import type {
  InsurancePolicy,
  Portfolio,
  Proposal,
  ReferralEdge,
  StakeInfo,
} from "./types.js";
import { ProtocolError } from "./types.js";

// =============================================================================
// Records
// =============================================================================

export interface AssetRecord {
  readonly symbol: string;
  readonly amount: AmountString;
  readonly value: AmountString;
}

export interface PortfolioRecord {
  readonly owner: AccountId;
  readonly totalValue: AmountString;
  readonly totalShares: AmountString;
  readonly assets: readonly AssetRecord[];
  readonly historicalValues: readonly {
    readonly timestamp: UnixSeconds;
    readonly totalValue: AmountString;
  }[];
  readonly lastUpdateTimestamp: UnixSeconds;
  readonly minValueThreshold: AmountString;
  readonly maxValueThreshold: AmountString | null;
  readonly managementFee: AmountString;
  readonly performanceFee: AmountString;
  readonly riskScore: AmountString;
}

export interface StakeRecord {
  readonly account: AccountId;
  readonly amount: AmountString;
  readonly lastStakeTime: UnixSeconds;
}

export interface ProposalRecord {
  readonly id: number;
  readonly proposer: AccountId;
  readonly description: string;
  readonly voteCount: AmountString;
  readonly executed: boolean;
  readonly createdAt: UnixSeconds;
  readonly votingDeadline: UnixSeconds;
}

export interface PolicyRecord {
  readonly account: AccountId;
  readonly isActive: boolean;
  readonly coverageAmount: AmountString;
  readonly premiumPaid: AmountString;
  readonly policyStartDate: UnixSeconds;
}

/**
 * Complete protocol state for persistence.
 */
export interface ProtocolSnapshot {
  readonly version: 1;
  readonly savedAt: string;
  readonly portfolios: readonly PortfolioRecord[];
  readonly priceFeeds: readonly { readonly symbol: string; readonly source: string }[];
  readonly stakes: readonly StakeRecord[];
  readonly proposals: readonly ProposalRecord[];
  readonly totalVotes: AmountString;
  readonly policies: readonly PolicyRecord[];
  readonly referrals: readonly ReferralEdge[];
}

// =============================================================================
// Encode
// =============================================================================

export function encodePortfolio(p: Portfolio): PortfolioRecord {
  return {
    owner: p.owner,
    totalValue: formatAmount(p.totalValue),
    totalShares: formatAmount(p.totalShares),
    assets: p.assets.map((a) => ({
      symbol: a.symbol,
      amount: formatAmount(a.amount),
      value: formatAmount(a.value),
    })),
    historicalValues: p.historicalValues.map((h) => ({
      timestamp: h.timestamp,
      totalValue: formatAmount(h.totalValue),
    })),
    lastUpdateTimestamp: p.lastUpdateTimestamp,
    minValueThreshold: formatAmount(p.minValueThreshold),
    maxValueThreshold: p.maxValueThreshold === null ? null : formatAmount(p.maxValueThreshold),
    managementFee: formatAmount(p.managementFee),
    performanceFee: formatAmount(p.performanceFee),
    riskScore: formatAmount(p.riskScore),
  };
}

export function encodeStake(account: AccountId, s: StakeInfo): StakeRecord {
  return { account, amount: formatAmount(s.amount), lastStakeTime: s.lastStakeTime };
}

export function encodeProposal(p: Proposal): ProposalRecord {
  return { ...p, voteCount: formatAmount(p.voteCount) };
}

export function encodePolicy(account: AccountId, p: InsurancePolicy): PolicyRecord {
  return {
    account,
    isActive: p.isActive,
    coverageAmount: formatAmount(p.coverageAmount),
    premiumPaid: formatAmount(p.premiumPaid),
    policyStartDate: p.policyStartDate,
  };
}

// =============================================================================
// Decode
// =============================================================================

/**
 * Decode one wire amount. Stricter than `parseAmount`: no surrounding
 * whitespace.
 */
export function decodeAmount(value: unknown, field: string): bigint {
  if (!isAmountString(value)) {
    throw new ProtocolError(
      "INVALID_ARGUMENT",
      `Snapshot field ${field} is not an amount: ${JSON.stringify(value)}`,
    );
  }
  return parseAmount(value);
}

function decodeAccount(value: unknown, field: string): AccountId {
  if (!isAccountId(value)) {
    throw new ProtocolError(
      "INVALID_ARGUMENT",
      `Snapshot field ${field} is not an account: ${JSON.stringify(value)}`,
    );
  }
  return value;
}

export function decodePortfolio(r: PortfolioRecord): Portfolio {
  return {
    owner: decodeAccount(r.owner, "portfolio.owner"),
    totalValue: decodeAmount(r.totalValue, "portfolio.totalValue"),
    totalShares: decodeAmount(r.totalShares, "portfolio.totalShares"),
    assets: r.assets.map((a) => ({
      symbol: a.symbol,
      amount: decodeAmount(a.amount, `portfolio.assets.${a.symbol}.amount`),
      value: decodeAmount(a.value, `portfolio.assets.${a.symbol}.value`),
    })),
    historicalValues: r.historicalValues.map((h) => ({
      timestamp: h.timestamp,
      totalValue: decodeAmount(h.totalValue, "portfolio.historicalValues.totalValue"),
    })),
    lastUpdateTimestamp: r.lastUpdateTimestamp,
    minValueThreshold: decodeAmount(r.minValueThreshold, "portfolio.minValueThreshold"),
    maxValueThreshold:
      r.maxValueThreshold === null
        ? null
        : decodeAmount(r.maxValueThreshold, "portfolio.maxValueThreshold"),
    managementFee: decodeAmount(r.managementFee, "portfolio.managementFee"),
    performanceFee: decodeAmount(r.performanceFee, "portfolio.performanceFee"),
    riskScore: decodeAmount(r.riskScore, "portfolio.riskScore"),
  };
}

export function decodeStake(r: StakeRecord): readonly [AccountId, StakeInfo] {
  return [
    decodeAccount(r.account, "stake.account"),
    { amount: decodeAmount(r.amount, "stake.amount"), lastStakeTime: r.lastStakeTime },
  ];
}

export function decodeProposal(r: ProposalRecord, index: number): Proposal {
  if (r.id !== index) {
    throw new ProtocolError(
      "INVALID_ARGUMENT",
      `Proposal at position ${index} carries id ${r.id}`,
    );
  }
  return {
    ...r,
    proposer: decodeAccount(r.proposer, "proposal.proposer"),
    voteCount: decodeAmount(r.voteCount, "proposal.voteCount"),
  };
}

export function decodePolicy(r: PolicyRecord): readonly [AccountId, InsurancePolicy] {
  return [
    decodeAccount(r.account, "policy.account"),
    {
      isActive: r.isActive,
      coverageAmount: decodeAmount(r.coverageAmount, "policy.coverageAmount"),
      premiumPaid: decodeAmount(r.premiumPaid, "policy.premiumPaid"),
      policyStartDate: r.policyStartDate,
    },
  ];
}

export function decodeReferral(r: ReferralEdge): ReferralEdge {
  return {
    referred: decodeAccount(r.referred, "referral.referred"),
    referrer: decodeAccount(r.referrer, "referral.referrer"),
  };
}
