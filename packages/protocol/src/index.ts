/**
 * @keelson/protocol — The shared portfolio ledger and its subsystems.
 *
 * - Protocol: the coordinator every host calls into
 * - Subsystem stores: portfolios, stakes, proposals, policies, referrals
 * - TransitionHost: all-or-nothing execution with a buffered audit trail
 * - Clock and price-oracle ports with in-process adapters
 *
 * Design rules:
 * - Synchronous, single-writer transitions
 * - Every rejection is a ProtocolError with a stable code
 * - Amounts are bigint; the snapshot codec turns them into digit strings
 */

// Coordinator
export { Protocol } from "./protocol.js";
export type { ProtocolConfig, ProtocolDeps } from "./protocol.js";

// Subsystems
export {
  PortfolioRegistry,
  INITIAL_SHARES,
  PERFORMANCE_BONUS_PERCENT,
  withinBand,
} from "./portfolio-registry.js";
export {
  StakingLedger,
  SECONDS_PER_REWARD_PERIOD,
  REWARD_PERCENT_PER_PERIOD,
  completedPeriods,
  rewardFor,
} from "./staking.js";
export { FlashLoanEngine, DEFAULT_FLASH_LOAN_FEE_RATE } from "./flash-loan.js";
export { GovernanceModule, MAX_VOTING_PERIOD, proposalStatus } from "./governance.js";
export { InsuranceModule, PREMIUM_DIVISOR } from "./insurance.js";
export { ReferralRegistry } from "./referral.js";

// Transitions
export { TransitionHost } from "./transition.js";
export type { TransitionContext, TransitionHostOptions } from "./transition.js";

// Ports & adapters
export { systemClock, ManualClock } from "./clock.js";
export { StaticPriceOracle } from "./price-oracle.js";

// Snapshot
export type {
  ProtocolSnapshot,
  PortfolioRecord,
  AssetRecord,
  StakeRecord,
  ProposalRecord,
  PolicyRecord,
} from "./snapshot.js";
export {
  encodePortfolio,
  encodeStake,
  encodeProposal,
  encodePolicy,
} from "./snapshot.js";

// Types
export type {
  Asset,
  ValuationPoint,
  Portfolio,
  PortfolioSettings,
  WithdrawalReceipt,
  FeeBreakdown,
  StakeInfo,
  RewardClaim,
  FlashLoanPhase,
  FlashLoanDisbursement,
  FlashLoanReceipt,
  FlashLoanCallback,
  Proposal,
  ProposalStatus,
  InsurancePolicy,
  ReferralEdge,
  Clock,
  PriceReading,
  PriceOracle,
  ProtocolErrorCode,
} from "./types.js";
export { ProtocolError } from "./types.js";
