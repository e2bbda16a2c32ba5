/**
 * Protocol — top-level coordinator.
 *
 * Composes:
 * - PortfolioRegistry (assets, valuation, fees, withdrawal)
 * - StakingLedger (custody stake, rewards)
 * - FlashLoanEngine (borrow against native custody)
 * - GovernanceModule (proposals, votes)
 * - InsuranceModule (coverage policies)
 * - ReferralRegistry (referrer edges)
 *
 * Every entry point is one TransitionHost.run: it either commits all of
 * its state changes and audit records, or none of them.
 *
 * Token handles passed in deps act as the custody account. In-process
 * ledgers behind them must also be listed in `journaled` so that an
 * aborted transition reverts their balances.
 */

import type { AccountId, UnixSeconds } from "@keelson/types";
import type {
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
} from "@keelson/event-store";
import { InMemoryEventStore } from "@keelson/event-store";
import type { FungibleLedger, Journaled } from "@keelson/ledger";
import { FlashLoanEngine } from "./flash-loan.js";
import { GovernanceModule, proposalStatus } from "./governance.js";
import { InsuranceModule } from "./insurance.js";
import { PortfolioRegistry } from "./portfolio-registry.js";
import { ReferralRegistry } from "./referral.js";
import type { ProtocolSnapshot } from "./snapshot.js";
import {
  decodeAmount,
  decodePolicy,
  decodePortfolio,
  decodeProposal,
  decodeReferral,
  decodeStake,
  encodePolicy,
  encodePortfolio,
  encodeProposal,
  encodeStake,
} from "./snapshot.js";
import { StakingLedger } from "./staking.js";
import { TransitionHost } from "./transition.js";
import type {
  Clock,
  FeeBreakdown,
  FlashLoanCallback,
  FlashLoanReceipt,
  InsurancePolicy,
  Portfolio,
  PortfolioSettings,
  PriceOracle,
  Proposal,
  ProposalStatus,
  ReferralEdge,
  RewardClaim,
  StakeInfo,
  WithdrawalReceipt,
} from "./types.js";
import { ProtocolError } from "./types.js";
import { requireAccount, requirePositive } from "./validation.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ProtocolConfig {
  /** Account the protocol holds stake, rewards and loan liquidity under */
  readonly custodyAccount: AccountId;

  /** Accounts allowed to issue governance tokens */
  readonly admins?: readonly AccountId[];

  /** Flash-loan fee as a WAD fraction. Default: 5% */
  readonly flashLoanFeeRate?: bigint;

  /** Event stream for audit records. Default: "protocol" */
  readonly streamId?: string;
}

export interface ProtocolDeps {
  readonly clock: Clock;
  readonly oracle: PriceOracle;

  /** Governance-token handle acting as custody (stake, rewards, claims) */
  readonly governanceToken: FungibleLedger;

  /** Native-token handle acting as custody (flash loans) */
  readonly nativeToken: FungibleLedger;

  /** Asset token address → handle acting as custody (withdrawals) */
  readonly assetTokens?: ReadonlyMap<string, FungibleLedger>;

  /** Extra stores that must roll back with an aborted transition */
  readonly journaled?: readonly Journaled[];

  readonly events?: EventStore;
}

const DEFAULT_STREAM = "protocol";

// =============================================================================
// Protocol
// =============================================================================

export class Protocol {
  readonly config: ProtocolConfig;
  private readonly clock: Clock;
  private readonly governanceToken: FungibleLedger;
  private readonly nativeToken: FungibleLedger;
  private readonly assetTokens: ReadonlyMap<string, FungibleLedger>;
  private readonly admins: ReadonlySet<AccountId>;
  private readonly store: EventStore;
  private readonly streamId: string;
  private readonly host: TransitionHost;

  private readonly registry: PortfolioRegistry;
  private readonly staking: StakingLedger;
  private readonly flashLoans: FlashLoanEngine;
  private readonly governance: GovernanceModule;
  private readonly insurance: InsuranceModule;
  private readonly referrals: ReferralRegistry;

  constructor(config: ProtocolConfig, deps: ProtocolDeps) {
    requireAccount(config.custodyAccount, "custodyAccount");
    const streamId = config.streamId ?? DEFAULT_STREAM;
    if (streamId.length === 0) {
      throw new ProtocolError("INVALID_ARGUMENT", "streamId must be a non-empty string");
    }
    const assetTokens = deps.assetTokens ?? new Map<string, FungibleLedger>();
    for (const handle of [deps.governanceToken, deps.nativeToken, ...assetTokens.values()]) {
      if (handle.account !== config.custodyAccount) {
        throw new ProtocolError(
          "INVALID_ARGUMENT",
          `Token "${handle.symbol}" acts as "${handle.account}", expected custody "${config.custodyAccount}"`,
        );
      }
    }

    this.config = config;
    this.clock = deps.clock;
    this.governanceToken = deps.governanceToken;
    this.nativeToken = deps.nativeToken;
    this.assetTokens = assetTokens;
    this.admins = new Set(config.admins ?? []);
    this.streamId = streamId;
    this.store =
      deps.events ?? new InMemoryEventStore({ now: () => new Date(deps.clock.now() * 1000) });

    this.registry = new PortfolioRegistry(deps.oracle);
    this.staking = new StakingLedger();
    this.flashLoans = new FlashLoanEngine(config.flashLoanFeeRate);
    this.governance = new GovernanceModule();
    this.insurance = new InsuranceModule((account) => this.registry.has(account));
    this.referrals = new ReferralRegistry();

    this.host = new TransitionHost({
      clock: deps.clock,
      participants: [
        this.registry,
        this.staking,
        this.governance,
        this.insurance,
        this.referrals,
        ...(deps.journaled ?? []),
      ],
      events: this.store,
      streamId: this.streamId,
    });
  }

  /**
   * Rebuild a protocol from a snapshot. Token ledgers, oracle and
   * event store come from `deps` as usual.
   */
  static fromSnapshot(
    snapshot: ProtocolSnapshot,
    config: ProtocolConfig,
    deps: ProtocolDeps,
  ): Protocol {
    const version: number = snapshot.version;
    if (version !== 1) {
      throw new ProtocolError("INVALID_ARGUMENT", `Unsupported snapshot version: ${version}`);
    }

    const protocol = new Protocol(config, deps);
    protocol.registry.restore(
      snapshot.portfolios.map(decodePortfolio),
      snapshot.priceFeeds.map((f) => [f.symbol, f.source] as const),
    );
    protocol.staking.restore(snapshot.stakes.map(decodeStake));
    protocol.governance.restore(
      snapshot.proposals.map(decodeProposal),
      decodeAmount(snapshot.totalVotes, "totalVotes"),
    );
    protocol.insurance.restore(snapshot.policies.map(decodePolicy));
    protocol.referrals.restore(snapshot.referrals.map(decodeReferral));
    return protocol;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Portfolio Registry
  // ───────────────────────────────────────────────────────────────────────

  initializePortfolio(caller: AccountId): Portfolio {
    return this.host.run("initializePortfolio", caller, "portfolio", (ctx) =>
      this.registry.initialize(ctx, caller),
    );
  }

  configurePortfolio(caller: AccountId, settings: PortfolioSettings): Portfolio {
    return this.host.run("configurePortfolio", caller, "portfolio", (ctx) =>
      this.registry.configure(ctx, caller, settings),
    );
  }

  addAsset(caller: AccountId, symbol: string, amount: bigint, value: bigint): Portfolio {
    return this.host.run("addAsset", caller, "portfolio", (ctx) =>
      this.registry.addAsset(ctx, caller, symbol, amount, value),
    );
  }

  setPriceFeedSource(caller: AccountId, symbol: string, source: string): void {
    this.host.run("setPriceFeedSource", caller, "portfolio", (ctx) => {
      this.registry.setPriceFeedSource(ctx, symbol, source);
    });
  }

  refreshAssetValue(caller: AccountId, symbol: string): Portfolio {
    return this.host.run("refreshAssetValue", caller, "portfolio", (ctx) =>
      this.registry.refreshAssetValue(ctx, caller, symbol),
    );
  }

  recordValuation(caller: AccountId): Portfolio {
    return this.host.run("recordValuation", caller, "portfolio", (ctx) =>
      this.registry.recordValuation(ctx, caller),
    );
  }

  withdraw(
    caller: AccountId,
    token: string,
    to: AccountId,
    symbol: string,
    amount: bigint,
  ): WithdrawalReceipt {
    return this.host.run("withdraw", caller, "portfolio", (ctx) =>
      this.registry.withdraw(ctx, caller, this.assetToken(token), to, symbol, amount),
    );
  }

  /**
   * Withdraw every asset in full. `tokens[i]` pays out asset position `i`.
   */
  emergencyWithdrawAll(
    caller: AccountId,
    tokens: readonly string[],
  ): readonly WithdrawalReceipt[] {
    return this.host.run("emergencyWithdrawAll", caller, "portfolio", (ctx) =>
      this.registry.emergencyWithdrawAll(
        ctx,
        caller,
        tokens.map((t) => this.assetToken(t)),
      ),
    );
  }

  rebalance(
    caller: AccountId,
    symbols: readonly string[],
    targetRatios: readonly bigint[],
  ): Portfolio {
    return this.host.run("rebalance", caller, "portfolio", (ctx) =>
      this.registry.rebalance(ctx, caller, symbols, targetRatios),
    );
  }

  checkRisk(caller: AccountId): boolean {
    return this.registry.checkRisk(caller);
  }

  applyDynamicFees(caller: AccountId, bonusThreshold: bigint): FeeBreakdown {
    return this.host.run("applyDynamicFees", caller, "portfolio", (ctx) =>
      this.registry.applyDynamicFees(ctx, caller, bonusThreshold),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Staking Ledger
  // ───────────────────────────────────────────────────────────────────────

  stake(caller: AccountId, amount: bigint): StakeInfo {
    return this.host.run("stake", caller, "staking", (ctx) =>
      this.staking.stake(ctx, caller, this.governanceToken, amount),
    );
  }

  unstake(caller: AccountId, amount: bigint): StakeInfo {
    return this.host.run("unstake", caller, "staking", (ctx) =>
      this.staking.unstake(ctx, caller, this.governanceToken, amount),
    );
  }

  claimRewards(caller: AccountId): RewardClaim {
    return this.host.run("claimRewards", caller, "staking", (ctx) =>
      this.staking.claimRewards(ctx, caller, this.governanceToken),
    );
  }

  /**
   * Pay governance tokens out of custody. Admins only.
   */
  issueGovernanceTokens(caller: AccountId, to: AccountId, amount: bigint): void {
    this.host.run("issueGovernanceTokens", caller, "governance", (ctx) => {
      if (!this.admins.has(caller)) {
        throw new ProtocolError("UNAUTHORIZED", `"${caller}" may not issue governance tokens`);
      }
      requireAccount(to, "to");
      requirePositive(amount, "amount");
      if (!this.governanceToken.transfer(to, amount)) {
        throw new ProtocolError(
          "TRANSFER_FAILED",
          `Custody could not issue ${amount.toString()} ${this.governanceToken.symbol} to "${to}"`,
        );
      }
      ctx.emit("governance.tokens_issued", { to, amount: amount.toString() });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Flash-Loan Engine
  // ───────────────────────────────────────────────────────────────────────

  flashLoan(caller: AccountId, amount: bigint, onLoan?: FlashLoanCallback): FlashLoanReceipt {
    return this.host.run("flashLoan", caller, "flash-loan", (ctx) =>
      this.flashLoans.borrow(ctx, caller, this.nativeToken, amount, onLoan),
    );
  }

  flashLoanFee(amount: bigint): bigint {
    return this.flashLoans.feeFor(amount);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Governance Module
  // ───────────────────────────────────────────────────────────────────────

  createProposal(caller: AccountId, description: string, votingPeriod: number): Proposal {
    return this.host.run("createProposal", caller, "governance", (ctx) =>
      this.governance.createProposal(ctx, caller, description, votingPeriod),
    );
  }

  vote(caller: AccountId, proposalId: number, votes: bigint): Proposal {
    return this.host.run("vote", caller, "governance", (ctx) =>
      this.governance.vote(ctx, caller, proposalId, votes),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Insurance Module
  // ───────────────────────────────────────────────────────────────────────

  buyInsurance(caller: AccountId, coverageAmount: bigint, premium: bigint): InsurancePolicy {
    return this.host.run("buyInsurance", caller, "insurance", (ctx) =>
      this.insurance.buy(ctx, caller, coverageAmount, premium),
    );
  }

  claimInsurance(caller: AccountId): InsurancePolicy {
    return this.host.run("claimInsurance", caller, "insurance", (ctx) =>
      this.insurance.claim(ctx, caller, this.governanceToken),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Referral Registry
  // ───────────────────────────────────────────────────────────────────────

  refer(caller: AccountId, newUser: AccountId): ReferralEdge {
    return this.host.run("refer", caller, "referral", (ctx) =>
      this.referrals.refer(ctx, caller, newUser),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  now(): UnixSeconds {
    return this.clock.now();
  }

  portfolioOf(account: AccountId): Portfolio | undefined {
    return this.registry.get(account);
  }

  priceFeedOf(symbol: string): string | undefined {
    return this.registry.priceFeedOf(symbol);
  }

  stakeOf(account: AccountId): StakeInfo {
    return this.staking.get(account);
  }

  totalStaked(): bigint {
    return this.staking.totalStaked();
  }

  pendingReward(account: AccountId): bigint {
    return this.staking.pendingReward(account, this.clock.now());
  }

  policyOf(account: AccountId): InsurancePolicy | undefined {
    return this.insurance.get(account);
  }

  referrerOf(account: AccountId): AccountId | undefined {
    return this.referrals.referrerOf(account);
  }

  referralsOf(referrer: AccountId): readonly AccountId[] {
    return this.referrals.referralsOf(referrer);
  }

  proposal(proposalId: number): Proposal | undefined {
    return this.governance.get(proposalId);
  }

  proposals(): readonly Proposal[] {
    return this.governance.list();
  }

  proposalStatus(proposal: Proposal): ProposalStatus {
    return proposalStatus(proposal, this.clock.now());
  }

  totalVotes(): bigint {
    return this.governance.totalVotes();
  }

  custodyBalances(): { readonly governance: bigint; readonly native: bigint } {
    return {
      governance: this.governanceToken.balanceOf(this.config.custodyAccount),
      native: this.nativeToken.balanceOf(this.config.custodyAccount),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Audit trail & persistence
  // ───────────────────────────────────────────────────────────────────────

  events(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    return this.store.readAll(options);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.store.verifyIntegrity();
  }

  get eventStore(): EventStore {
    return this.store;
  }

  snapshot(): ProtocolSnapshot {
    return {
      version: 1,
      savedAt: new Date(this.clock.now() * 1000).toISOString(),
      portfolios: this.registry.list().map(encodePortfolio),
      priceFeeds: this.registry
        .priceFeedBindings()
        .map(([symbol, source]) => ({ symbol, source })),
      stakes: this.staking.entries().map(([account, info]) => encodeStake(account, info)),
      proposals: this.governance.list().map(encodeProposal),
      totalVotes: this.governance.totalVotes().toString(),
      policies: this.insurance.entries().map(([account, p]) => encodePolicy(account, p)),
      referrals: this.referrals.edges(),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private assetToken(token: string): FungibleLedger {
    const handle = this.assetTokens.get(token);
    if (handle === undefined) {
      throw new ProtocolError("INVALID_ARGUMENT", `Unknown asset token "${token}"`);
    }
    return handle;
  }
}
