/**
 * Portfolio Registry — per-account portfolios of named assets.
 *
 * Owns the portfolio store and the symbol → price-feed bindings.
 * Values are oracle-driven; amounts move through the asset's token ledger.
 *
 * Rules:
 * - A portfolio is keyed by, and owned by, the account that initialized it
 * - Every portfolio call requires `caller` to own an initialized portfolio
 * - Assets are append-only; lookups by symbol return the first match
 * - totalValue tracks the sum of asset values through add, refresh and
 *   withdraw; rebalance and fee application do not, and emergency
 *   withdrawal zeroes amounts without touching any value
 * - Price-feed bindings are write-once
 */

import type { AccountId } from "@keelson/types";
import type { FungibleLedger, Journaled, Rollback } from "@keelson/ledger";
import { percentOf } from "@keelson/ledger";
import type { TransitionContext } from "./transition.js";
import type {
  Asset,
  FeeBreakdown,
  Portfolio,
  PortfolioSettings,
  PriceOracle,
  WithdrawalReceipt,
} from "./types.js";
import { ProtocolError } from "./types.js";
import {
  requireAccount,
  requireNonEmpty,
  requireNonNegative,
  requirePositive,
} from "./validation.js";

/** Shares minted to every new portfolio. */
export const INITIAL_SHARES = 1_000_000n;

/** Flat performance bonus, in percent of totalValue, above the threshold. */
export const PERFORMANCE_BONUS_PERCENT = 5n;

const MAX_FEE_PERCENT = 100n;

export class PortfolioRegistry implements Journaled {
  private portfolios: Map<AccountId, Portfolio> = new Map();
  private priceFeeds: Map<string, string> = new Map();
  private readonly oracle: PriceOracle;

  constructor(oracle: PriceOracle) {
    this.oracle = oracle;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  initialize(ctx: TransitionContext, caller: AccountId): Portfolio {
    requireAccount(caller, "caller");
    if (this.portfolios.has(caller)) {
      throw new ProtocolError("ALREADY_EXISTS", `Portfolio for "${caller}" already exists`);
    }

    const portfolio: Portfolio = {
      owner: caller,
      totalValue: 0n,
      totalShares: INITIAL_SHARES,
      assets: [],
      historicalValues: [],
      lastUpdateTimestamp: ctx.now,
      minValueThreshold: 0n,
      maxValueThreshold: null,
      managementFee: 0n,
      performanceFee: 0n,
      riskScore: 0n,
    };
    this.portfolios.set(caller, portfolio);

    ctx.emit("portfolio.initialized", {
      owner: caller,
      totalShares: INITIAL_SHARES.toString(),
    });
    return portfolio;
  }

  configure(
    ctx: TransitionContext,
    caller: AccountId,
    settings: PortfolioSettings,
  ): Portfolio {
    const portfolio = this.requireOwned(caller);

    const managementFee = settings.managementFee ?? portfolio.managementFee;
    const performanceFee = settings.performanceFee ?? portfolio.performanceFee;
    const minValueThreshold = settings.minValueThreshold ?? portfolio.minValueThreshold;
    const maxValueThreshold =
      settings.maxValueThreshold === undefined
        ? portfolio.maxValueThreshold
        : settings.maxValueThreshold;
    const riskScore = settings.riskScore ?? portfolio.riskScore;

    requireFeeRate(managementFee, "managementFee");
    requireFeeRate(performanceFee, "performanceFee");
    requireNonNegative(minValueThreshold, "minValueThreshold");
    requireNonNegative(riskScore, "riskScore");
    if (maxValueThreshold !== null) {
      requireNonNegative(maxValueThreshold, "maxValueThreshold");
      if (minValueThreshold > maxValueThreshold) {
        throw new ProtocolError(
          "INVALID_ARGUMENT",
          "minValueThreshold must not exceed maxValueThreshold",
        );
      }
    }

    const updated = this.save({
      ...portfolio,
      managementFee,
      performanceFee,
      minValueThreshold,
      maxValueThreshold,
      riskScore,
      lastUpdateTimestamp: ctx.now,
    });

    ctx.emit("portfolio.configured", {
      owner: caller,
      managementFee: managementFee.toString(),
      performanceFee: performanceFee.toString(),
      minValueThreshold: minValueThreshold.toString(),
      maxValueThreshold: maxValueThreshold === null ? null : maxValueThreshold.toString(),
      riskScore: riskScore.toString(),
    });
    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Assets & valuation
  // ───────────────────────────────────────────────────────────────────────

  addAsset(
    ctx: TransitionContext,
    caller: AccountId,
    symbol: string,
    amount: bigint,
    value: bigint,
  ): Portfolio {
    const portfolio = this.requireOwned(caller);
    requireNonEmpty(symbol, "symbol");
    requireNonNegative(amount, "amount");
    requireNonNegative(value, "value");

    const updated = this.save({
      ...portfolio,
      assets: [...portfolio.assets, { symbol, amount, value }],
      totalValue: portfolio.totalValue + value,
      lastUpdateTimestamp: ctx.now,
    });

    ctx.emit("asset.added", {
      owner: caller,
      symbol,
      amount: amount.toString(),
      value: value.toString(),
      totalValue: updated.totalValue.toString(),
    });
    return updated;
  }

  /**
   * Bind `symbol` to an oracle feed. Open to any caller, once per symbol.
   */
  setPriceFeedSource(ctx: TransitionContext, symbol: string, source: string): void {
    requireNonEmpty(symbol, "symbol");
    requireNonEmpty(source, "source");
    const existing = this.priceFeeds.get(symbol);
    if (existing !== undefined) {
      throw new ProtocolError(
        "ALREADY_BOUND",
        `Price feed for "${symbol}" is already bound to "${existing}"`,
      );
    }
    this.priceFeeds.set(symbol, source);
    ctx.emit("price_feed.bound", { symbol, source });
  }

  refreshAssetValue(ctx: TransitionContext, caller: AccountId, symbol: string): Portfolio {
    const portfolio = this.requireOwned(caller);
    const index = findAsset(portfolio, symbol);

    const source = this.priceFeeds.get(symbol);
    if (source === undefined) {
      throw new ProtocolError("NO_ORACLE", `No price feed bound for "${symbol}"`);
    }

    const reading = this.oracle.latestPrice(symbol, source);
    if (!reading.isValid || reading.price <= 0n) {
      throw new ProtocolError(
        "INVALID_PRICE",
        `Oracle "${source}" returned an unusable price for "${symbol}": ${reading.price.toString()}`,
      );
    }

    const asset = assetAt(portfolio, index);
    const newValue = reading.price * asset.amount;
    const updated = this.save({
      ...portfolio,
      assets: replaceAt(portfolio.assets, index, { ...asset, value: newValue }),
      totalValue: portfolio.totalValue + newValue - asset.value,
      lastUpdateTimestamp: ctx.now,
    });

    ctx.emit("asset.valuation_changed", {
      owner: caller,
      symbol,
      price: reading.price.toString(),
      oldValue: asset.value.toString(),
      newValue: newValue.toString(),
    });
    return updated;
  }

  /**
   * Append the current totalValue to the valuation history.
   */
  recordValuation(ctx: TransitionContext, caller: AccountId): Portfolio {
    const portfolio = this.requireOwned(caller);
    const updated = this.save({
      ...portfolio,
      historicalValues: [
        ...portfolio.historicalValues,
        { timestamp: ctx.now, totalValue: portfolio.totalValue },
      ],
    });

    ctx.emit("portfolio.valuation_recorded", {
      owner: caller,
      timestamp: ctx.now,
      totalValue: portfolio.totalValue.toString(),
    });
    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Withdrawal
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Withdraw `amount` of the first asset named `symbol` to `to`.
   *
   * The value removed is `value * amount / amountBefore`, so a full
   * withdrawal clears the asset's value exactly.
   */
  withdraw(
    ctx: TransitionContext,
    caller: AccountId,
    ledger: FungibleLedger,
    to: AccountId,
    symbol: string,
    amount: bigint,
  ): WithdrawalReceipt {
    const portfolio = this.requireOwned(caller);
    requireAccount(to, "to");
    requirePositive(amount, "amount");
    const index = findAsset(portfolio, symbol);
    return this.withdrawAt(ctx, portfolio, index, ledger, to, amount);
  }

  /**
   * Withdraw every asset in full to the caller.
   *
   * `ledgers[i]` pays out the asset at position `i`; matching tokens to
   * positions is the caller's job. Any empty position aborts the lot.
   * Only amounts are zeroed: asset values and totalValue are left as
   * they were, unlike `withdraw`.
   */
  emergencyWithdrawAll(
    ctx: TransitionContext,
    caller: AccountId,
    ledgers: readonly FungibleLedger[],
  ): readonly WithdrawalReceipt[] {
    this.requireOwned(caller);
    if (ledgers.length === 0) {
      throw new ProtocolError("INVALID_ARGUMENT", "At least one asset token is required");
    }

    const receipts: WithdrawalReceipt[] = [];
    ledgers.forEach((ledger, index) => {
      const portfolio = this.requireOwned(caller);
      const asset = portfolio.assets[index];
      if (asset === undefined) {
        throw new ProtocolError("ASSET_NOT_FOUND", `No asset at position ${index}`);
      }
      if (asset.amount === 0n) {
        throw new ProtocolError(
          "NOTHING_TO_WITHDRAW",
          `Asset "${asset.symbol}" at position ${index} is already empty`,
        );
      }
      this.save({
        ...portfolio,
        assets: replaceAt(portfolio.assets, index, { ...asset, amount: 0n }),
        lastUpdateTimestamp: ctx.now,
      });
      receipts.push(
        this.payOut(ctx, portfolio.owner, asset.symbol, ledger, caller, asset.amount, 0n),
      );
    });
    return receipts;
  }

  private withdrawAt(
    ctx: TransitionContext,
    portfolio: Portfolio,
    index: number,
    ledger: FungibleLedger,
    to: AccountId,
    amount: bigint,
  ): WithdrawalReceipt {
    const asset = assetAt(portfolio, index);
    if (amount > asset.amount) {
      throw new ProtocolError(
        "INSUFFICIENT_BALANCE",
        `Cannot withdraw ${amount.toString()} of "${asset.symbol}": only ${asset.amount.toString()} held`,
      );
    }

    const valueRemoved = (asset.value * amount) / asset.amount;
    this.save({
      ...portfolio,
      assets: replaceAt(portfolio.assets, index, {
        ...asset,
        amount: asset.amount - amount,
        value: asset.value - valueRemoved,
      }),
      totalValue: portfolio.totalValue - valueRemoved,
      lastUpdateTimestamp: ctx.now,
    });

    return this.payOut(ctx, portfolio.owner, asset.symbol, ledger, to, amount, valueRemoved);
  }

  private payOut(
    ctx: TransitionContext,
    owner: AccountId,
    symbol: string,
    ledger: FungibleLedger,
    to: AccountId,
    amount: bigint,
    valueRemoved: bigint,
  ): WithdrawalReceipt {
    if (!ledger.transfer(to, amount)) {
      throw new ProtocolError(
        "TRANSFER_FAILED",
        `Token ledger "${ledger.symbol}" refused to pay ${amount.toString()} to "${to}"`,
      );
    }

    ctx.emit("asset.withdrawn", {
      owner,
      symbol,
      token: ledger.symbol,
      to,
      amount: amount.toString(),
      valueRemoved: valueRemoved.toString(),
    });
    return { symbol, token: ledger.symbol, to, amount, valueRemoved };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Rebalance, risk & fees
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Set each named asset's value to `ratio`% of the totalValue at entry.
   * Ratios are not required to sum to 100 and totalValue is untouched.
   */
  rebalance(
    ctx: TransitionContext,
    caller: AccountId,
    symbols: readonly string[],
    targetRatios: readonly bigint[],
  ): Portfolio {
    const portfolio = this.requireOwned(caller);
    if (symbols.length !== targetRatios.length) {
      throw new ProtocolError(
        "INVALID_ARGUMENT",
        `Got ${symbols.length} symbols but ${targetRatios.length} target ratios`,
      );
    }

    const baseline = portfolio.totalValue;
    let assets = portfolio.assets;
    symbols.forEach((symbol, i) => {
      const ratio = targetRatios[i] ?? 0n;
      requireNonNegative(ratio, "targetRatio");
      const index = findAsset(portfolio, symbol);
      const asset = assetAt({ assets }, index);
      assets = replaceAt(assets, index, { ...asset, value: percentOf(baseline, ratio) });
    });

    const updated = this.save({ ...portfolio, assets, lastUpdateTimestamp: ctx.now });

    ctx.emit("portfolio.rebalanced", {
      owner: caller,
      symbols: [...symbols],
      targetRatios: targetRatios.map((r) => r.toString()),
      baselineValue: baseline.toString(),
    });
    return updated;
  }

  /**
   * Whether totalValue lies inside the portfolio's risk band.
   */
  checkRisk(caller: AccountId): boolean {
    const portfolio = this.requireOwned(caller);
    return withinBand(portfolio);
  }

  /**
   * Deduct management and performance fees from the recorded valuation.
   * Fees are not paid to any account.
   */
  applyDynamicFees(
    ctx: TransitionContext,
    caller: AccountId,
    bonusThreshold: bigint,
  ): FeeBreakdown {
    const portfolio = this.requireOwned(caller);
    requireNonNegative(bonusThreshold, "bonusThreshold");

    const total = portfolio.totalValue;
    const managementFee = percentOf(total, portfolio.managementFee);
    const bonusApplied = total > bonusThreshold;
    const performanceFee =
      percentOf(total, portfolio.performanceFee) +
      (bonusApplied ? percentOf(total, PERFORMANCE_BONUS_PERCENT) : 0n);

    const fees = managementFee + performanceFee;
    if (fees > total) {
      throw new ProtocolError(
        "INSUFFICIENT_BALANCE",
        `Fees of ${fees.toString()} exceed portfolio value ${total.toString()}`,
      );
    }

    const updated = this.save({
      ...portfolio,
      totalValue: total - fees,
      lastUpdateTimestamp: ctx.now,
    });

    ctx.emit("fees.applied", {
      owner: caller,
      managementFee: managementFee.toString(),
      performanceFee: performanceFee.toString(),
      bonusApplied,
      totalValue: updated.totalValue.toString(),
    });
    return { managementFee, performanceFee, bonusApplied, totalValue: updated.totalValue };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(owner: AccountId): Portfolio | undefined {
    return this.portfolios.get(owner);
  }

  has(owner: AccountId): boolean {
    return this.portfolios.has(owner);
  }

  priceFeedOf(symbol: string): string | undefined {
    return this.priceFeeds.get(symbol);
  }

  list(): readonly Portfolio[] {
    return [...this.portfolios.values()];
  }

  priceFeedBindings(): readonly (readonly [string, string])[] {
    return [...this.priceFeeds.entries()];
  }

  /** Replace the whole store (snapshot restore). */
  restore(portfolios: readonly Portfolio[], priceFeeds: Iterable<readonly [string, string]>): void {
    this.portfolios = new Map(portfolios.map((p) => [p.owner, p]));
    this.priceFeeds = new Map(priceFeeds);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Journaling
  // ───────────────────────────────────────────────────────────────────────

  checkpoint(): Rollback {
    const portfolios = new Map(this.portfolios);
    const priceFeeds = new Map(this.priceFeeds);
    return () => {
      this.portfolios = portfolios;
      this.priceFeeds = priceFeeds;
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private requireOwned(caller: AccountId): Portfolio {
    const portfolio = this.portfolios.get(caller);
    if (portfolio === undefined || portfolio.owner !== caller) {
      throw new ProtocolError("NOT_OWNER", `"${caller}" does not own an initialized portfolio`);
    }
    return portfolio;
  }

  private save(portfolio: Portfolio): Portfolio {
    this.portfolios.set(portfolio.owner, portfolio);
    return portfolio;
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function withinBand(portfolio: Portfolio): boolean {
  const { totalValue, minValueThreshold, maxValueThreshold } = portfolio;
  return (
    totalValue >= minValueThreshold &&
    (maxValueThreshold === null || totalValue <= maxValueThreshold)
  );
}

function findAsset(portfolio: Pick<Portfolio, "assets">, symbol: string): number {
  const index = portfolio.assets.findIndex((a) => a.symbol === symbol);
  if (index === -1) {
    throw new ProtocolError("ASSET_NOT_FOUND", `Asset "${symbol}" not found`);
  }
  return index;
}

function assetAt(portfolio: Pick<Portfolio, "assets">, index: number): Asset {
  const asset = portfolio.assets[index];
  if (asset === undefined) {
    throw new ProtocolError("ASSET_NOT_FOUND", `No asset at position ${index}`);
  }
  return asset;
}

function replaceAt(assets: readonly Asset[], index: number, asset: Asset): readonly Asset[] {
  return assets.map((a, i) => (i === index ? asset : a));
}

function requireFeeRate(rate: bigint, label: string): void {
  if (rate < 0n || rate > MAX_FEE_PERCENT) {
    throw new ProtocolError(
      "INVALID_ARGUMENT",
      `${label} must be between 0 and 100, got ${rate.toString()}`,
    );
  }
}
