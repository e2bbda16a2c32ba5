/**
 * ProtocolService — composition root for the HTTP node.
 *
 * Wires one Protocol to in-process infrastructure:
 * - InMemoryTokenLedger per token (governance, native, each asset token)
 * - StaticPriceOracle seeded from configuration
 * - InMemoryEventStore for the hash-chained audit trail
 *
 * Rules:
 * - Every protocol entry point goes through `execute`, which logs
 *   rejected transitions at warn and rethrows
 * - Every committed audit record is logged at debug
 * - Token approvals and transfers are host-ledger operations; they run
 *   outside protocol transitions and emit no audit records
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AccountId } from "@keelson/types";
import type {
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  Subscription,
} from "@keelson/event-store";
import { InMemoryEventStore } from "@keelson/event-store";
import type { FungibleLedger } from "@keelson/ledger";
import { InMemoryTokenLedger } from "@keelson/ledger";
import type {
  Clock,
  FeeBreakdown,
  FlashLoanReceipt,
  InsurancePolicy,
  Portfolio,
  PortfolioSettings,
  Proposal,
  ProposalStatus,
  ProtocolSnapshot,
  ReferralEdge,
  RewardClaim,
  StakeInfo,
  WithdrawalReceipt,
} from "@keelson/protocol";
import { Protocol, ProtocolError, StaticPriceOracle, systemClock } from "@keelson/protocol";
import { ApiError } from "../types/error.js";

// =============================================================================
// Configuration
// =============================================================================

export interface CustodyBalances {
  readonly governance?: bigint;
  readonly native?: bigint;
  /** Minted for every asset token */
  readonly asset?: bigint;
}

export interface ProtocolServiceConfig {
  readonly custodyAccount: AccountId;
  readonly admins?: readonly AccountId[];
  readonly flashLoanFeeRate?: bigint;
  /** Default: "GOV" */
  readonly governanceSymbol?: string;
  /** Default: "NATIVE" */
  readonly nativeSymbol?: string;
  /** Asset token addresses to create ledgers for */
  readonly assetTokens?: readonly string[];
  readonly custodyBalances?: CustodyBalances;
  /** Feed → price seeded into the static oracle */
  readonly oraclePrices?: ReadonlyMap<string, bigint>;
}

export interface ProtocolServiceDeps {
  readonly clock?: Clock;
  readonly logger?: Logger;
}

// =============================================================================
// Service
// =============================================================================

export class ProtocolService {
  readonly protocol: Protocol;
  readonly oracle: StaticPriceOracle;
  readonly governanceSymbol: string;
  readonly nativeSymbol: string;
  private readonly tokens: ReadonlyMap<string, InMemoryTokenLedger>;
  private readonly logger: Logger;
  private readonly auditLog: Subscription;

  constructor(config: ProtocolServiceConfig, deps: ProtocolServiceDeps = {}) {
    const clock = deps.clock ?? systemClock;
    const custody = config.custodyAccount;
    const balances = config.custodyBalances ?? {};
    this.logger = deps.logger ?? pino({ level: "silent" });
    this.governanceSymbol = config.governanceSymbol ?? "GOV";
    this.nativeSymbol = config.nativeSymbol ?? "NATIVE";

    const governance = new InMemoryTokenLedger(this.governanceSymbol);
    const native = new InMemoryTokenLedger(this.nativeSymbol);
    const tokens = new Map<string, InMemoryTokenLedger>([
      [governance.symbol, governance],
      [native.symbol, native],
    ]);
    const assetTokens = new Map<string, FungibleLedger>();
    for (const address of config.assetTokens ?? []) {
      if (tokens.has(address)) {
        throw new Error(`Duplicate token "${address}"`);
      }
      const ledger = new InMemoryTokenLedger(address);
      ledger.mint(custody, balances.asset ?? 0n);
      tokens.set(address, ledger);
      assetTokens.set(address, ledger.holder(custody));
    }
    this.tokens = tokens;

    governance.mint(custody, balances.governance ?? 0n);
    native.mint(custody, balances.native ?? 0n);

    this.oracle = new StaticPriceOracle(config.oraclePrices);

    const events = new InMemoryEventStore({
      now: () => new Date(clock.now() * 1000),
      onSubscriberError: (err, stored) => {
        this.logger.error(
          { err, type: stored.event.type, globalPosition: stored.globalPosition },
          "Audit subscriber failed",
        );
      },
    });
    this.protocol = new Protocol(
      {
        custodyAccount: custody,
        admins: config.admins ?? [],
        ...(config.flashLoanFeeRate !== undefined
          ? { flashLoanFeeRate: config.flashLoanFeeRate }
          : {}),
      },
      {
        clock,
        oracle: this.oracle,
        governanceToken: governance.holder(custody),
        nativeToken: native.holder(custody),
        assetTokens,
        journaled: [...tokens.values()],
        events,
      },
    );

    this.auditLog = events.subscribeAll((stored) => {
      this.logger.debug(
        {
          type: stored.event.type,
          globalPosition: stored.globalPosition,
          correlationId: stored.event.metadata.correlationId,
        },
        "Audit record committed",
      );
    });
  }

  // ─── Portfolio Registry ────────────────────────────────────────────

  initializePortfolio(caller: AccountId): Portfolio {
    return this.execute("initializePortfolio", caller, () =>
      this.protocol.initializePortfolio(caller),
    );
  }

  configurePortfolio(caller: AccountId, settings: PortfolioSettings): Portfolio {
    return this.execute("configurePortfolio", caller, () =>
      this.protocol.configurePortfolio(caller, settings),
    );
  }

  addAsset(caller: AccountId, symbol: string, amount: bigint, value: bigint): Portfolio {
    return this.execute("addAsset", caller, () =>
      this.protocol.addAsset(caller, symbol, amount, value),
    );
  }

  setPriceFeedSource(caller: AccountId, symbol: string, source: string): void {
    this.execute("setPriceFeedSource", caller, () => {
      this.protocol.setPriceFeedSource(caller, symbol, source);
    });
  }

  refreshAssetValue(caller: AccountId, symbol: string): Portfolio {
    return this.execute("refreshAssetValue", caller, () =>
      this.protocol.refreshAssetValue(caller, symbol),
    );
  }

  recordValuation(caller: AccountId): Portfolio {
    return this.execute("recordValuation", caller, () => this.protocol.recordValuation(caller));
  }

  withdraw(
    caller: AccountId,
    token: string,
    to: AccountId,
    symbol: string,
    amount: bigint,
  ): WithdrawalReceipt {
    return this.execute("withdraw", caller, () =>
      this.protocol.withdraw(caller, token, to, symbol, amount),
    );
  }

  emergencyWithdrawAll(caller: AccountId, tokens: readonly string[]): readonly WithdrawalReceipt[] {
    return this.execute("emergencyWithdrawAll", caller, () =>
      this.protocol.emergencyWithdrawAll(caller, tokens),
    );
  }

  rebalance(
    caller: AccountId,
    symbols: readonly string[],
    targetRatios: readonly bigint[],
  ): Portfolio {
    return this.execute("rebalance", caller, () =>
      this.protocol.rebalance(caller, symbols, targetRatios),
    );
  }

  checkRisk(caller: AccountId): boolean {
    return this.execute("checkRisk", caller, () => this.protocol.checkRisk(caller));
  }

  applyDynamicFees(caller: AccountId, bonusThreshold: bigint): FeeBreakdown {
    return this.execute("applyDynamicFees", caller, () =>
      this.protocol.applyDynamicFees(caller, bonusThreshold),
    );
  }

  // ─── Staking & governance token ────────────────────────────────────

  stake(caller: AccountId, amount: bigint): StakeInfo {
    return this.execute("stake", caller, () => this.protocol.stake(caller, amount));
  }

  unstake(caller: AccountId, amount: bigint): StakeInfo {
    return this.execute("unstake", caller, () => this.protocol.unstake(caller, amount));
  }

  claimRewards(caller: AccountId): RewardClaim {
    return this.execute("claimRewards", caller, () => this.protocol.claimRewards(caller));
  }

  issueGovernanceTokens(caller: AccountId, to: AccountId, amount: bigint): void {
    this.execute("issueGovernanceTokens", caller, () => {
      this.protocol.issueGovernanceTokens(caller, to, amount);
    });
  }

  // ─── Flash loans ───────────────────────────────────────────────────

  /**
   * Borrow without a callback: the borrower's existing native balance
   * has to cover amount + fee.
   */
  flashLoan(caller: AccountId, amount: bigint): FlashLoanReceipt {
    return this.execute("flashLoan", caller, () => this.protocol.flashLoan(caller, amount));
  }

  flashLoanFee(amount: bigint): bigint {
    return this.protocol.flashLoanFee(amount);
  }

  // ─── Governance ────────────────────────────────────────────────────

  createProposal(caller: AccountId, description: string, votingPeriod: number): Proposal {
    return this.execute("createProposal", caller, () =>
      this.protocol.createProposal(caller, description, votingPeriod),
    );
  }

  vote(caller: AccountId, proposalId: number, votes: bigint): Proposal {
    return this.execute("vote", caller, () => this.protocol.vote(caller, proposalId, votes));
  }

  // ─── Insurance & referrals ─────────────────────────────────────────

  buyInsurance(caller: AccountId, coverageAmount: bigint, premium: bigint): InsurancePolicy {
    return this.execute("buyInsurance", caller, () =>
      this.protocol.buyInsurance(caller, coverageAmount, premium),
    );
  }

  claimInsurance(caller: AccountId): InsurancePolicy {
    return this.execute("claimInsurance", caller, () => this.protocol.claimInsurance(caller));
  }

  refer(caller: AccountId, newUser: AccountId): ReferralEdge {
    return this.execute("refer", caller, () => this.protocol.refer(caller, newUser));
  }

  // ─── Host token ledgers ────────────────────────────────────────────

  tokenSymbols(): readonly string[] {
    return [...this.tokens.keys()];
  }

  tokenBalance(token: string, account: AccountId): bigint {
    return this.token(token).balanceOf(account);
  }

  tokenAllowance(token: string, owner: AccountId, spender: AccountId): bigint {
    return this.token(token).allowance(owner, spender);
  }

  approve(caller: AccountId, token: string, spender: AccountId, amount: bigint): void {
    this.token(token).approve(caller, spender, amount);
  }

  transfer(caller: AccountId, token: string, to: AccountId, amount: bigint): void {
    if (!this.token(token).move(caller, to, amount)) {
      throw new ApiError(
        "TRANSFER_FAILED",
        `"${caller}" holds less than ${amount.toString()} ${token}`,
        422,
      );
    }
  }

  // ─── Queries ───────────────────────────────────────────────────────

  portfolioOf(account: AccountId): Portfolio {
    const portfolio = this.protocol.portfolioOf(account);
    if (portfolio === undefined) {
      throw new ApiError("NOT_FOUND", `No portfolio for "${account}"`, 404);
    }
    return portfolio;
  }

  priceFeedOf(symbol: string): string {
    const source = this.protocol.priceFeedOf(symbol);
    if (source === undefined) {
      throw new ApiError("NOT_FOUND", `No price feed bound for "${symbol}"`, 404);
    }
    return source;
  }

  stakeOf(account: AccountId): { readonly stake: StakeInfo; readonly pendingReward: bigint } {
    return {
      stake: this.protocol.stakeOf(account),
      pendingReward: this.protocol.pendingReward(account),
    };
  }

  totalStaked(): bigint {
    return this.protocol.totalStaked();
  }

  policyOf(account: AccountId): InsurancePolicy {
    const policy = this.protocol.policyOf(account);
    if (policy === undefined) {
      throw new ApiError("NOT_FOUND", `No insurance policy for "${account}"`, 404);
    }
    return policy;
  }

  referralsFor(account: AccountId): {
    readonly referrer: AccountId | null;
    readonly referrals: readonly AccountId[];
  } {
    return {
      referrer: this.protocol.referrerOf(account) ?? null,
      referrals: this.protocol.referralsOf(account),
    };
  }

  proposal(proposalId: number): { readonly proposal: Proposal; readonly status: ProposalStatus } {
    const proposal = this.protocol.proposal(proposalId);
    if (proposal === undefined) {
      throw new ProtocolError("PROPOSAL_NOT_FOUND", `Proposal ${proposalId} does not exist`);
    }
    return { proposal, status: this.protocol.proposalStatus(proposal) };
  }

  proposals(): readonly { readonly proposal: Proposal; readonly status: ProposalStatus }[] {
    return this.protocol
      .proposals()
      .map((proposal) => ({ proposal, status: this.protocol.proposalStatus(proposal) }));
  }

  totalVotes(): bigint {
    return this.protocol.totalVotes();
  }

  // ─── Audit trail ───────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    return this.protocol.events(options);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.protocol.verifyIntegrity();
  }

  snapshot(): ProtocolSnapshot {
    return this.protocol.snapshot();
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  isReady(): boolean {
    return this.protocol.verifyIntegrity().valid;
  }

  stop(): void {
    this.auditLog.unsubscribe();
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private execute<T>(operation: string, caller: AccountId, body: () => T): T {
    try {
      return body();
    } catch (error) {
      if (error instanceof ProtocolError) {
        this.logger.warn(
          { operation, caller, code: error.code },
          `Transition rejected: ${error.message}`,
        );
      }
      throw error;
    }
  }

  private token(token: string): InMemoryTokenLedger {
    const ledger = this.tokens.get(token);
    if (ledger === undefined) {
      throw new ApiError("NOT_FOUND", `Unknown token "${token}"`, 404);
    }
    return ledger;
  }
}
