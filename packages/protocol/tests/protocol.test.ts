/**
 * Tests for the Protocol coordinator.
 *
 * Verifies:
 * - Wiring: token handles must act as custody, stream id must be set
 * - Governance-token issuance is admin-only
 * - Audit trail: one batch per transition, hash chain intact
 * - Snapshot: stores survive a round trip through JSON; malformed fields are refused
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryEventStore } from "@keelson/event-store";
import { InMemoryTokenLedger } from "@keelson/ledger";
import { ManualClock } from "../src/clock.js";
import { StaticPriceOracle } from "../src/price-oracle.js";
import { Protocol } from "../src/protocol.js";
import type { ProtocolSnapshot } from "../src/snapshot.js";
import {
  ADMIN,
  ALICE,
  BOB,
  CUSTODY,
  DAY,
  T0,
  codeOf,
  createHarness,
  eventTypes,
} from "./harness.js";
import type { Harness } from "./harness.js";

let h: Harness;

beforeEach(() => {
  h = createHarness();
});

// =============================================================================
// Wiring
// =============================================================================

describe("construction", () => {
  it("rejects token handles that do not act as custody", () => {
    const gov = new InMemoryTokenLedger("GOV");

    expect(
      codeOf(
        () =>
          new Protocol(
            { custodyAccount: CUSTODY },
            {
              clock: new ManualClock(T0),
              oracle: new StaticPriceOracle(),
              governanceToken: gov.holder(ALICE),
              nativeToken: new InMemoryTokenLedger("NATIVE").holder(CUSTODY),
            },
          ),
      ),
    ).toBe("INVALID_ARGUMENT");
  });

  it("rejects an empty custody account", () => {
    expect(
      codeOf(
        () =>
          new Protocol(
            { custodyAccount: "" },
            {
              clock: new ManualClock(T0),
              oracle: new StaticPriceOracle(),
              governanceToken: new InMemoryTokenLedger("GOV").holder(CUSTODY),
              nativeToken: new InMemoryTokenLedger("NATIVE").holder(CUSTODY),
            },
          ),
      ),
    ).toBe("INVALID_ARGUMENT");
  });

  it("rejects an empty audit stream id", () => {
    expect(
      codeOf(
        () =>
          new Protocol(
            { custodyAccount: CUSTODY, streamId: "" },
            {
              clock: new ManualClock(T0),
              oracle: new StaticPriceOracle(),
              governanceToken: new InMemoryTokenLedger("GOV").holder(CUSTODY),
              nativeToken: new InMemoryTokenLedger("NATIVE").holder(CUSTODY),
            },
          ),
      ),
    ).toBe("INVALID_ARGUMENT");
  });
});

// =============================================================================
// Governance-token issuance
// =============================================================================

describe("issueGovernanceTokens", () => {
  beforeEach(() => {
    h.gov.mint(CUSTODY, 1_000n);
  });

  it("lets an admin pay tokens out of custody", () => {
    h.protocol.issueGovernanceTokens(ADMIN, ALICE, 300n);

    expect(h.gov.balanceOf(ALICE)).toBe(300n);
    expect(h.protocol.custodyBalances()).toEqual({ governance: 700n, native: 0n });
    expect(h.protocol.events().at(-1)?.event.payload).toEqual({ to: ALICE, amount: "300" });
  });

  it("fails with UNAUTHORIZED for anyone else", () => {
    expect(codeOf(() => h.protocol.issueGovernanceTokens(ALICE, ALICE, 300n))).toBe(
      "UNAUTHORIZED",
    );
    expect(h.gov.balanceOf(ALICE)).toBe(0n);
  });

  it("fails with TRANSFER_FAILED beyond the custody balance", () => {
    expect(codeOf(() => h.protocol.issueGovernanceTokens(ADMIN, ALICE, 1_001n))).toBe(
      "TRANSFER_FAILED",
    );
  });
});

// =============================================================================
// Audit trail
// =============================================================================

describe("audit trail", () => {
  it("records each committed transition with its actor and subsystem", () => {
    h.protocol.initializePortfolio(ALICE);
    h.protocol.addAsset(ALICE, "USDC", 100n, 100n);
    h.protocol.refer(ALICE, BOB);

    const events = h.protocol.events();
    expect(events.map((e) => [e.event.type, e.event.metadata.source])).toEqual([
      ["portfolio.initialized", "portfolio"],
      ["asset.added", "portfolio"],
      ["referral.recorded", "referral"],
    ]);
    expect(events.every((e) => e.event.metadata.actor === ALICE)).toBe(true);
    expect(events[0]?.event.metadata.timestamp).toBe("2023-11-14T22:13:20.000Z");
    expect(events[0]?.appendedAt).toBe("2023-11-14T22:13:20.000Z");
  });

  it("emits one batch per emergency withdrawal", () => {
    h.protocol.initializePortfolio(ALICE);
    h.protocol.addAsset(ALICE, "USDC", 10n, 10n);
    h.protocol.addAsset(ALICE, "WETH", 1n, 2_000n);
    h.usdc.mint(CUSTODY, 10n);
    h.weth.mint(CUSTODY, 1n);

    h.protocol.emergencyWithdrawAll(ALICE, ["0xusdc", "0xweth"]);

    const withdrawals = h.protocol.events().filter((e) => e.event.type === "asset.withdrawn");
    expect(withdrawals).toHaveLength(2);
    expect(withdrawals[0]?.event.metadata.correlationId).toBe(
      withdrawals[1]?.event.metadata.correlationId,
    );
  });

  it("records nothing for a rejected transition", () => {
    h.protocol.initializePortfolio(ALICE);

    codeOf(() => h.protocol.initializePortfolio(ALICE));

    expect(eventTypes(h.protocol)).toEqual(["portfolio.initialized"]);
  });

  it("keeps an intact hash chain", () => {
    h.protocol.initializePortfolio(ALICE);
    h.protocol.createProposal(ALICE, "Raise the flash-loan fee", DAY);
    h.protocol.vote(BOB, 0, 5n);

    expect(h.protocol.verifyIntegrity()).toEqual({
      valid: true,
      lastVerifiedPosition: 3,
      errors: [],
    });
  });

  it("reads the trail from a global position", () => {
    h.protocol.initializePortfolio(ALICE);
    h.protocol.initializePortfolio(BOB);
    h.protocol.refer(ALICE, BOB);

    const latest = h.protocol.events({ fromPosition: 2 });

    expect(latest.map((e) => [e.globalPosition, e.event.type])).toEqual([
      [2, "portfolio.initialized"],
      [3, "referral.recorded"],
    ]);
  });

  it("commits the transition when an audit subscriber throws", () => {
    const reported: unknown[] = [];
    const events = new InMemoryEventStore({
      onSubscriberError: (error) => {
        reported.push(error);
      },
    });
    events.subscribeAll(() => {
      throw new Error("listener down");
    });
    const protocol = new Protocol(
      { custodyAccount: CUSTODY },
      {
        clock: new ManualClock(T0),
        oracle: new StaticPriceOracle(),
        governanceToken: new InMemoryTokenLedger("GOV").holder(CUSTODY),
        nativeToken: new InMemoryTokenLedger("NATIVE").holder(CUSTODY),
        events,
      },
    );

    expect(protocol.initializePortfolio(ALICE).owner).toBe(ALICE);

    expect(protocol.portfolioOf(ALICE)?.owner).toBe(ALICE);
    expect(eventTypes(protocol)).toEqual(["portfolio.initialized"]);
    expect(reported).toHaveLength(1);
  });
});

// =============================================================================
// Snapshot
// =============================================================================

describe("snapshot", () => {
  function populate(): void {
    h.protocol.initializePortfolio(ALICE);
    h.protocol.addAsset(ALICE, "WETH", 2n, 4_000n);
    h.protocol.configurePortfolio(ALICE, { managementFee: 2n, maxValueThreshold: 9_000n });
    h.protocol.recordValuation(ALICE);
    h.protocol.setPriceFeedSource(ALICE, "WETH", "feed-eth");
    h.gov.mint(ALICE, 500n);
    h.gov.approve(ALICE, CUSTODY, 500n);
    h.protocol.stake(ALICE, 500n);
    h.protocol.createProposal(ALICE, "Raise the flash-loan fee", DAY);
    h.protocol.vote(BOB, 0, 7n);
    h.protocol.buyInsurance(ALICE, 1_000n, 10n);
    h.protocol.refer(ALICE, BOB);
  }

  it("serializes amounts as digit strings", () => {
    populate();

    const snapshot = h.protocol.snapshot();

    expect(snapshot.version).toBe(1);
    expect(snapshot.savedAt).toBe("2023-11-14T22:13:20.000Z");
    expect(snapshot.portfolios[0]?.totalValue).toBe("4000");
    expect(snapshot.portfolios[0]?.maxValueThreshold).toBe("9000");
    expect(snapshot.stakes).toEqual([{ account: ALICE, amount: "500", lastStakeTime: T0 }]);
    expect(snapshot.priceFeeds).toEqual([{ symbol: "WETH", source: "feed-eth" }]);
    expect(snapshot.totalVotes).toBe("7");
    expect(snapshot.referrals).toEqual([{ referred: BOB, referrer: ALICE }]);
  });

  it("restores every store through JSON", () => {
    populate();
    const json = JSON.stringify(h.protocol.snapshot());
    const parsed: ProtocolSnapshot = JSON.parse(json);

    const restored = Protocol.fromSnapshot(
      parsed,
      { custodyAccount: CUSTODY },
      {
        clock: h.clock,
        oracle: h.oracle,
        governanceToken: h.gov.holder(CUSTODY),
        nativeToken: h.native.holder(CUSTODY),
      },
    );

    expect(restored.portfolioOf(ALICE)).toEqual(h.protocol.portfolioOf(ALICE));
    expect(restored.stakeOf(ALICE)).toEqual({ amount: 500n, lastStakeTime: T0 });
    expect(restored.totalStaked()).toBe(500n);
    expect(restored.proposal(0)?.voteCount).toBe(7n);
    expect(restored.totalVotes()).toBe(7n);
    expect(restored.policyOf(ALICE)?.coverageAmount).toBe(1_000n);
    expect(restored.referrerOf(BOB)).toBe(ALICE);
    expect(restored.priceFeedOf("WETH")).toBe("feed-eth");
    expect(restored.snapshot()).toEqual(h.protocol.snapshot());
  });

  function restore(snapshot: ProtocolSnapshot): Protocol {
    return Protocol.fromSnapshot(
      snapshot,
      { custodyAccount: CUSTODY },
      {
        clock: h.clock,
        oracle: h.oracle,
        governanceToken: h.gov.holder(CUSTODY),
        nativeToken: h.native.holder(CUSTODY),
      },
    );
  }

  it("rejects an unknown version", () => {
    const snapshot = { ...h.protocol.snapshot(), version: 2 };
    const parsed: ProtocolSnapshot = JSON.parse(JSON.stringify(snapshot));

    expect(codeOf(() => restore(parsed))).toBe("INVALID_ARGUMENT");
  });

  it("rejects a negative stake amount and names the field", () => {
    populate();
    const snapshot = h.protocol.snapshot();
    const tampered: ProtocolSnapshot = {
      ...snapshot,
      stakes: [{ account: ALICE, amount: "-5", lastStakeTime: T0 }],
    };

    expect(() => restore(tampered)).toThrow('Snapshot field stake.amount is not an amount: "-5"');
  });

  it("rejects padded amounts and blank accounts", () => {
    populate();
    const snapshot = h.protocol.snapshot();

    expect(codeOf(() => restore({ ...snapshot, totalVotes: " 7" }))).toBe("INVALID_ARGUMENT");
    expect(
      codeOf(() => restore({ ...snapshot, referrals: [{ referred: BOB, referrer: " " }] })),
    ).toBe("INVALID_ARGUMENT");
    expect(
      codeOf(() =>
        restore({
          ...snapshot,
          policies: snapshot.policies.map((p) => ({ ...p, account: "" })),
        }),
      ),
    ).toBe("INVALID_ARGUMENT");
  });
});
