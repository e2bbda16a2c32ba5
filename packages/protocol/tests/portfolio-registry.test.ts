/**
 * Tests for the Portfolio Registry, driven through the Protocol.
 *
 * Verifies:
 * - Lifecycle: initialize once, configure fee rates and risk band
 * - Ownership: every portfolio call from a non-owner is rejected
 * - Valuation: add, price-feed binding, oracle refresh
 * - Withdrawal: proportional value removal; emergency withdrawal zeroes
 *   amounts only
 * - Rebalance, risk band and fee application
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  ALICE,
  BOB,
  CUSTODY,
  T0,
  USDC_TOKEN,
  WETH_TOKEN,
  codeOf,
  createHarness,
  eventTypes,
} from "./harness.js";
import type { Harness } from "./harness.js";

let h: Harness;

/** alice: USDC 100 @ 100, WETH 2 @ 4000 → totalValue 4100 */
function seedAlice(): void {
  h.protocol.initializePortfolio(ALICE);
  h.protocol.addAsset(ALICE, "USDC", 100n, 100n);
  h.protocol.addAsset(ALICE, "WETH", 2n, 4_000n);
}

beforeEach(() => {
  h = createHarness();
});

// =============================================================================
// Lifecycle
// =============================================================================

describe("initializePortfolio", () => {
  it("creates an empty portfolio with default settings", () => {
    const portfolio = h.protocol.initializePortfolio(ALICE);

    expect(portfolio).toEqual({
      owner: ALICE,
      totalValue: 0n,
      totalShares: 1_000_000n,
      assets: [],
      historicalValues: [],
      lastUpdateTimestamp: T0,
      minValueThreshold: 0n,
      maxValueThreshold: null,
      managementFee: 0n,
      performanceFee: 0n,
      riskScore: 0n,
    });
    expect(h.protocol.portfolioOf(ALICE)).toEqual(portfolio);
  });

  it("rejects a second initialization", () => {
    h.protocol.initializePortfolio(ALICE);

    expect(codeOf(() => h.protocol.initializePortfolio(ALICE))).toBe("ALREADY_EXISTS");
  });

  it("rejects the zero account", () => {
    expect(codeOf(() => h.protocol.initializePortfolio(""))).toBe("INVALID_ARGUMENT");
  });
});

describe("configurePortfolio", () => {
  beforeEach(seedAlice);

  it("updates only the given settings", () => {
    const updated = h.protocol.configurePortfolio(ALICE, {
      managementFee: 2n,
      maxValueThreshold: 10_000n,
    });

    expect(updated.managementFee).toBe(2n);
    expect(updated.performanceFee).toBe(0n);
    expect(updated.maxValueThreshold).toBe(10_000n);
    expect(updated.minValueThreshold).toBe(0n);
  });

  it("can make the upper bound unbounded again", () => {
    h.protocol.configurePortfolio(ALICE, { maxValueThreshold: 10_000n });

    const updated = h.protocol.configurePortfolio(ALICE, { maxValueThreshold: null });

    expect(updated.maxValueThreshold).toBeNull();
  });

  it("rejects fee rates outside 0..100", () => {
    expect(codeOf(() => h.protocol.configurePortfolio(ALICE, { managementFee: 101n }))).toBe(
      "INVALID_ARGUMENT",
    );
    expect(codeOf(() => h.protocol.configurePortfolio(ALICE, { performanceFee: -1n }))).toBe(
      "INVALID_ARGUMENT",
    );
  });

  it("rejects a band whose minimum exceeds its maximum", () => {
    expect(
      codeOf(() =>
        h.protocol.configurePortfolio(ALICE, {
          minValueThreshold: 500n,
          maxValueThreshold: 100n,
        }),
      ),
    ).toBe("INVALID_ARGUMENT");
  });
});

// =============================================================================
// Ownership
// =============================================================================

describe("ownership guard", () => {
  beforeEach(seedAlice);

  const calls: Record<string, (h: Harness) => unknown> = {
    configurePortfolio: (x) => x.protocol.configurePortfolio(BOB, { riskScore: 1n }),
    addAsset: (x) => x.protocol.addAsset(BOB, "USDC", 1n, 1n),
    refreshAssetValue: (x) => x.protocol.refreshAssetValue(BOB, "USDC"),
    recordValuation: (x) => x.protocol.recordValuation(BOB),
    withdraw: (x) => x.protocol.withdraw(BOB, USDC_TOKEN, BOB, "USDC", 1n),
    emergencyWithdrawAll: (x) => x.protocol.emergencyWithdrawAll(BOB, [USDC_TOKEN]),
    rebalance: (x) => x.protocol.rebalance(BOB, ["USDC"], [100n]),
    checkRisk: (x) => x.protocol.checkRisk(BOB),
    applyDynamicFees: (x) => x.protocol.applyDynamicFees(BOB, 0n),
  };

  for (const [name, call] of Object.entries(calls)) {
    it(`${name} fails with NOT_OWNER for an account without a portfolio`, () => {
      expect(codeOf(() => call(h))).toBe("NOT_OWNER");
    });
  }

  it("leaves the owner's portfolio untouched", () => {
    const before = h.protocol.portfolioOf(ALICE);

    codeOf(() => h.protocol.addAsset(BOB, "USDC", 1n, 1n));

    expect(h.protocol.portfolioOf(ALICE)).toEqual(before);
  });
});

// =============================================================================
// Valuation
// =============================================================================

describe("addAsset", () => {
  beforeEach(() => {
    h.protocol.initializePortfolio(ALICE);
  });

  it("appends the asset and adds its value to the total", () => {
    h.protocol.addAsset(ALICE, "USDC", 100n, 100n);
    const portfolio = h.protocol.addAsset(ALICE, "WETH", 2n, 4_000n);

    expect(portfolio.assets).toEqual([
      { symbol: "USDC", amount: 100n, value: 100n },
      { symbol: "WETH", amount: 2n, value: 4_000n },
    ]);
    expect(portfolio.totalValue).toBe(4_100n);
  });

  it("accepts duplicate symbols as separate entries", () => {
    h.protocol.addAsset(ALICE, "USDC", 100n, 100n);
    const portfolio = h.protocol.addAsset(ALICE, "USDC", 50n, 70n);

    expect(portfolio.assets).toHaveLength(2);
    expect(portfolio.totalValue).toBe(170n);
  });

  it("rejects negative amounts and empty symbols", () => {
    expect(codeOf(() => h.protocol.addAsset(ALICE, "USDC", -1n, 0n))).toBe("INVALID_ARGUMENT");
    expect(codeOf(() => h.protocol.addAsset(ALICE, "", 1n, 1n))).toBe("INVALID_ARGUMENT");
  });
});

describe("setPriceFeedSource", () => {
  it("binds a symbol once, for any caller", () => {
    h.protocol.setPriceFeedSource(BOB, "WETH", "feed-eth");

    expect(h.protocol.priceFeedOf("WETH")).toBe("feed-eth");
    expect(codeOf(() => h.protocol.setPriceFeedSource(ALICE, "WETH", "feed-other"))).toBe(
      "ALREADY_BOUND",
    );
    expect(h.protocol.priceFeedOf("WETH")).toBe("feed-eth");
  });
});

describe("refreshAssetValue", () => {
  beforeEach(seedAlice);

  it("values the asset at price × amount and moves the total by the difference", () => {
    h.protocol.setPriceFeedSource(ALICE, "WETH", "feed-eth");
    h.oracle.setPrice("feed-eth", 2_500n);

    const portfolio = h.protocol.refreshAssetValue(ALICE, "WETH");

    expect(portfolio.assets[1]).toEqual({ symbol: "WETH", amount: 2n, value: 5_000n });
    expect(portfolio.totalValue).toBe(5_100n);
    expect(h.protocol.events().at(-1)?.event.payload).toEqual({
      owner: ALICE,
      symbol: "WETH",
      price: "2500",
      oldValue: "4000",
      newValue: "5000",
    });
  });

  it("updates only the first asset with a duplicated symbol", () => {
    h.protocol.addAsset(ALICE, "USDC", 50n, 70n);
    h.protocol.setPriceFeedSource(ALICE, "USDC", "feed-usd");
    h.oracle.setPrice("feed-usd", 2n);

    const portfolio = h.protocol.refreshAssetValue(ALICE, "USDC");

    expect(portfolio.assets.map((a) => a.value)).toEqual([200n, 4_000n, 70n]);
    expect(portfolio.totalValue).toBe(4_270n);
  });

  it("fails with ASSET_NOT_FOUND for an unknown symbol", () => {
    expect(codeOf(() => h.protocol.refreshAssetValue(ALICE, "DAI"))).toBe("ASSET_NOT_FOUND");
  });

  it("fails with NO_ORACLE when no feed is bound", () => {
    expect(codeOf(() => h.protocol.refreshAssetValue(ALICE, "WETH"))).toBe("NO_ORACLE");
  });

  it("fails with INVALID_PRICE for zero, negative or stale prices", () => {
    h.protocol.setPriceFeedSource(ALICE, "WETH", "feed-eth");

    expect(codeOf(() => h.protocol.refreshAssetValue(ALICE, "WETH"))).toBe("INVALID_PRICE");

    h.oracle.setPrice("feed-eth", -5n);
    expect(codeOf(() => h.protocol.refreshAssetValue(ALICE, "WETH"))).toBe("INVALID_PRICE");

    h.oracle.setPrice("feed-eth", 2_500n, false);
    expect(codeOf(() => h.protocol.refreshAssetValue(ALICE, "WETH"))).toBe("INVALID_PRICE");

    expect(h.protocol.portfolioOf(ALICE)?.totalValue).toBe(4_100n);
  });
});

describe("recordValuation", () => {
  it("appends the current total to the history", () => {
    seedAlice();
    h.clock.advance(10);

    const portfolio = h.protocol.recordValuation(ALICE);

    expect(portfolio.historicalValues).toEqual([{ timestamp: T0 + 10, totalValue: 4_100n }]);
  });
});

// =============================================================================
// Withdrawal
// =============================================================================

describe("withdraw", () => {
  beforeEach(() => {
    seedAlice();
    h.weth.mint(CUSTODY, 10n);
  });

  it("removes value proportional to the amount before withdrawal", () => {
    const receipt = h.protocol.withdraw(ALICE, WETH_TOKEN, BOB, "WETH", 1n);

    expect(receipt).toEqual({
      symbol: "WETH",
      token: "WETH",
      to: BOB,
      amount: 1n,
      valueRemoved: 2_000n,
    });
    const portfolio = h.protocol.portfolioOf(ALICE);
    expect(portfolio?.assets[1]).toEqual({ symbol: "WETH", amount: 1n, value: 2_000n });
    expect(portfolio?.totalValue).toBe(2_100n);
    expect(h.weth.balanceOf(BOB)).toBe(1n);
    expect(h.weth.balanceOf(CUSTODY)).toBe(9n);
  });

  it("truncates the proportional value", () => {
    h.protocol.addAsset(ALICE, "DAI", 3n, 10n);
    h.usdc.mint(CUSTODY, 3n);

    const receipt = h.protocol.withdraw(ALICE, USDC_TOKEN, ALICE, "DAI", 1n);

    expect(receipt.valueRemoved).toBe(3n);
    expect(h.protocol.portfolioOf(ALICE)?.assets[2]).toEqual({
      symbol: "DAI",
      amount: 2n,
      value: 7n,
    });
  });

  it("clears the asset's value on a full withdrawal and keeps the entry", () => {
    h.protocol.withdraw(ALICE, WETH_TOKEN, ALICE, "WETH", 2n);

    const portfolio = h.protocol.portfolioOf(ALICE);
    expect(portfolio?.assets[1]).toEqual({ symbol: "WETH", amount: 0n, value: 0n });
    expect(portfolio?.totalValue).toBe(100n);
  });

  it("fails with INSUFFICIENT_BALANCE when withdrawing more than is held", () => {
    expect(codeOf(() => h.protocol.withdraw(ALICE, WETH_TOKEN, ALICE, "WETH", 3n))).toBe(
      "INSUFFICIENT_BALANCE",
    );
  });

  it("rejects a zero amount", () => {
    expect(codeOf(() => h.protocol.withdraw(ALICE, WETH_TOKEN, ALICE, "WETH", 0n))).toBe(
      "INVALID_ARGUMENT",
    );
  });

  it("rejects an unknown token", () => {
    expect(codeOf(() => h.protocol.withdraw(ALICE, "0xdai", ALICE, "WETH", 1n))).toBe(
      "INVALID_ARGUMENT",
    );
  });

  it("aborts with TRANSFER_FAILED when custody cannot pay, leaving the portfolio unchanged", () => {
    const before = h.protocol.portfolioOf(ALICE);

    expect(codeOf(() => h.protocol.withdraw(ALICE, USDC_TOKEN, ALICE, "USDC", 50n))).toBe(
      "TRANSFER_FAILED",
    );

    expect(h.protocol.portfolioOf(ALICE)).toEqual(before);
    expect(eventTypes(h.protocol)).not.toContain("asset.withdrawn");
  });
});

describe("emergencyWithdrawAll", () => {
  beforeEach(() => {
    seedAlice();
    h.usdc.mint(CUSTODY, 100n);
    h.weth.mint(CUSTODY, 2n);
  });

  it("withdraws each position in full to the caller and leaves values untouched", () => {
    const receipts = h.protocol.emergencyWithdrawAll(ALICE, [USDC_TOKEN, WETH_TOKEN]);

    expect(receipts.map((r) => [r.symbol, r.amount, r.valueRemoved])).toEqual([
      ["USDC", 100n, 0n],
      ["WETH", 2n, 0n],
    ]);
    const portfolio = h.protocol.portfolioOf(ALICE);
    expect(portfolio?.assets.map((a) => [a.amount, a.value])).toEqual([
      [0n, 100n],
      [0n, 4_000n],
    ]);
    expect(portfolio?.totalValue).toBe(4_100n);
    expect(h.usdc.balanceOf(ALICE)).toBe(100n);
    expect(h.weth.balanceOf(ALICE)).toBe(2n);
  });

  it("only touches the positions it is given tokens for", () => {
    h.protocol.emergencyWithdrawAll(ALICE, [USDC_TOKEN]);

    const portfolio = h.protocol.portfolioOf(ALICE);
    expect(portfolio?.assets.map((a) => a.amount)).toEqual([0n, 2n]);
    expect(portfolio?.totalValue).toBe(4_100n);
  });

  it("fails with NOTHING_TO_WITHDRAW once a position is empty", () => {
    h.protocol.emergencyWithdrawAll(ALICE, [USDC_TOKEN]);

    expect(codeOf(() => h.protocol.emergencyWithdrawAll(ALICE, [USDC_TOKEN, WETH_TOKEN]))).toBe(
      "NOTHING_TO_WITHDRAW",
    );
    expect(h.weth.balanceOf(ALICE)).toBe(0n);
  });

  it("rolls back every payout when a position is missing", () => {
    expect(
      codeOf(() => h.protocol.emergencyWithdrawAll(ALICE, [USDC_TOKEN, WETH_TOKEN, USDC_TOKEN])),
    ).toBe("ASSET_NOT_FOUND");

    expect(h.usdc.balanceOf(ALICE)).toBe(0n);
    expect(h.weth.balanceOf(ALICE)).toBe(0n);
    expect(h.protocol.portfolioOf(ALICE)?.totalValue).toBe(4_100n);
  });
});

// =============================================================================
// Rebalance, risk, fees
// =============================================================================

describe("rebalance", () => {
  beforeEach(seedAlice);

  it("sets values from the total captured at entry", () => {
    const portfolio = h.protocol.rebalance(ALICE, ["USDC", "WETH"], [50n, 50n]);

    expect(portfolio.assets.map((a) => a.value)).toEqual([2_050n, 2_050n]);
    expect(portfolio.totalValue).toBe(4_100n);
  });

  it("does not validate that ratios sum to 100", () => {
    const portfolio = h.protocol.rebalance(ALICE, ["USDC", "WETH"], [60n, 60n]);

    expect(portfolio.assets.map((a) => a.value)).toEqual([2_460n, 2_460n]);
    expect(portfolio.totalValue).toBe(4_100n);
  });

  it("rejects mismatched lengths", () => {
    expect(codeOf(() => h.protocol.rebalance(ALICE, ["USDC", "WETH"], [100n]))).toBe(
      "INVALID_ARGUMENT",
    );
  });

  it("fails with ASSET_NOT_FOUND for an unknown symbol and changes nothing", () => {
    expect(codeOf(() => h.protocol.rebalance(ALICE, ["USDC", "DAI"], [50n, 50n]))).toBe(
      "ASSET_NOT_FOUND",
    );
    expect(h.protocol.portfolioOf(ALICE)?.assets[0]?.value).toBe(100n);
  });
});

describe("checkRisk", () => {
  beforeEach(seedAlice);

  it("is within band by default", () => {
    expect(h.protocol.checkRisk(ALICE)).toBe(true);
  });

  it("is out of band above the maximum", () => {
    h.protocol.configurePortfolio(ALICE, { maxValueThreshold: 4_099n });

    expect(h.protocol.checkRisk(ALICE)).toBe(false);
  });

  it("is out of band below the minimum", () => {
    h.protocol.configurePortfolio(ALICE, { minValueThreshold: 4_101n });

    expect(h.protocol.checkRisk(ALICE)).toBe(false);
  });

  it("includes both bounds", () => {
    h.protocol.configurePortfolio(ALICE, {
      minValueThreshold: 4_100n,
      maxValueThreshold: 4_100n,
    });

    expect(h.protocol.checkRisk(ALICE)).toBe(true);
  });
});

describe("applyDynamicFees", () => {
  beforeEach(() => {
    seedAlice();
    h.protocol.configurePortfolio(ALICE, { managementFee: 2n, performanceFee: 10n });
  });

  it("deducts management and performance fees from the total", () => {
    const fees = h.protocol.applyDynamicFees(ALICE, 5_000n);

    expect(fees).toEqual({
      managementFee: 82n,
      performanceFee: 410n,
      bonusApplied: false,
      totalValue: 3_608n,
    });
    expect(h.protocol.portfolioOf(ALICE)?.totalValue).toBe(3_608n);
  });

  it("adds a 5% performance bonus above the threshold", () => {
    const fees = h.protocol.applyDynamicFees(ALICE, 1_000n);

    expect(fees).toEqual({
      managementFee: 82n,
      performanceFee: 615n,
      bonusApplied: true,
      totalValue: 3_403n,
    });
  });

  it("applies no bonus when the total equals the threshold", () => {
    expect(h.protocol.applyDynamicFees(ALICE, 4_100n).bonusApplied).toBe(false);
  });

  it("fails with INSUFFICIENT_BALANCE when fees exceed the total", () => {
    h.protocol.configurePortfolio(ALICE, { managementFee: 100n, performanceFee: 100n });

    expect(codeOf(() => h.protocol.applyDynamicFees(ALICE, 0n))).toBe("INSUFFICIENT_BALANCE");
    expect(h.protocol.portfolioOf(ALICE)?.totalValue).toBe(4_100n);
  });
});
