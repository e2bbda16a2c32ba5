/**
 * Response views.
 *
 * Protocol records carry bigint; JSON cannot. Records that the snapshot
 * codec already knows how to encode reuse it; the rest are mapped here.
 */

import type {
  FeeBreakdown,
  FlashLoanReceipt,
  InsurancePolicy,
  Portfolio,
  PortfolioRecord,
  PolicyRecord,
  Proposal,
  ProposalRecord,
  ProposalStatus,
  RewardClaim,
  StakeInfo,
  StakeRecord,
  WithdrawalReceipt,
} from "@keelson/protocol";
import { encodePolicy, encodePortfolio, encodeProposal, encodeStake } from "@keelson/protocol";

export type PortfolioView = PortfolioRecord;

export interface StakeView extends StakeRecord {
  readonly pendingReward: string;
}

export interface ProposalView extends ProposalRecord {
  readonly status: ProposalStatus;
}

export function portfolioView(portfolio: Portfolio): PortfolioView {
  return encodePortfolio(portfolio);
}

export function stakeView(account: string, stake: StakeInfo, pendingReward: bigint): StakeView {
  return { ...encodeStake(account, stake), pendingReward: pendingReward.toString() };
}

export function proposalView(proposal: Proposal, status: ProposalStatus): ProposalView {
  return { ...encodeProposal(proposal), status };
}

export function policyView(account: string, policy: InsurancePolicy): PolicyRecord {
  return encodePolicy(account, policy);
}

export function withdrawalView(receipt: WithdrawalReceipt) {
  return {
    symbol: receipt.symbol,
    token: receipt.token,
    to: receipt.to,
    amount: receipt.amount.toString(),
    valueRemoved: receipt.valueRemoved.toString(),
  };
}

export function feeView(fees: FeeBreakdown) {
  return {
    managementFee: fees.managementFee.toString(),
    performanceFee: fees.performanceFee.toString(),
    bonusApplied: fees.bonusApplied,
    totalValue: fees.totalValue.toString(),
  };
}

export function rewardView(claim: RewardClaim) {
  return {
    account: claim.account,
    periods: claim.periods.toString(),
    reward: claim.reward.toString(),
  };
}

export function flashLoanView(receipt: FlashLoanReceipt) {
  return {
    phase: receipt.phase,
    borrower: receipt.borrower,
    amount: receipt.amount.toString(),
    fee: receipt.fee.toString(),
    balanceBefore: receipt.balanceBefore.toString(),
    balanceAfter: receipt.balanceAfter.toString(),
  };
}
