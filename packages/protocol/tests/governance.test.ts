/**
 * Tests for the Governance Module.
 *
 * Verifies:
 * - Proposals are indexed by creation order with a fixed deadline
 * - Votes count only while now < votingDeadline
 * - Check order: not found, closed, invalid weight, executed
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryTokenLedger } from "@keelson/ledger";
import { ManualClock } from "../src/clock.js";
import { StaticPriceOracle } from "../src/price-oracle.js";
import { GovernanceModule, MAX_VOTING_PERIOD } from "../src/governance.js";
import { Protocol } from "../src/protocol.js";
import type { TransitionContext } from "../src/transition.js";
import { ALICE, BOB, CUSTODY, DAY, T0, codeOf, createHarness } from "./harness.js";
import type { Harness } from "./harness.js";

let h: Harness;

beforeEach(() => {
  h = createHarness();
});

describe("createProposal", () => {
  it("appends proposals with sequential ids", () => {
    const first = h.protocol.createProposal(ALICE, "Raise the flash-loan fee", 7 * DAY);
    const second = h.protocol.createProposal(BOB, "Lower the flash-loan fee", DAY);

    expect(first).toEqual({
      id: 0,
      proposer: ALICE,
      description: "Raise the flash-loan fee",
      voteCount: 0n,
      executed: false,
      createdAt: T0,
      votingDeadline: T0 + 7 * DAY,
    });
    expect(second.id).toBe(1);
    expect(h.protocol.proposals()).toHaveLength(2);
  });

  it("rejects an empty description", () => {
    expect(codeOf(() => h.protocol.createProposal(ALICE, "  ", DAY))).toBe("INVALID_ARGUMENT");
  });

  it("rejects a negative or fractional voting period", () => {
    expect(codeOf(() => h.protocol.createProposal(ALICE, "x", -1))).toBe("INVALID_ARGUMENT");
    expect(codeOf(() => h.protocol.createProposal(ALICE, "x", 1.5))).toBe("INVALID_ARGUMENT");
  });

  it("accepts the longest voting period and rejects anything beyond it", () => {
    const longest = h.protocol.createProposal(ALICE, "Long vote", MAX_VOTING_PERIOD);

    expect(longest.votingDeadline).toBe(T0 + 315_360_000);
    expect(codeOf(() => h.protocol.createProposal(ALICE, "x", MAX_VOTING_PERIOD + 1))).toBe(
      "INVALID_ARGUMENT",
    );
    expect(h.protocol.proposals()).toHaveLength(1);
  });

  it("rejects a deadline past the safe integer range", () => {
    const ctx: TransitionContext = {
      operation: "createProposal",
      now: Number.MAX_SAFE_INTEGER - 10,
      actor: ALICE,
      correlationId: "corr-1",
      emit: () => undefined,
    };
    const governance = new GovernanceModule();

    expect(() => governance.createProposal(ctx, ALICE, "x", 100)).toThrow(
      `Voting deadline ${Number.MAX_SAFE_INTEGER - 10} + 100 is out of range`,
    );
    expect(governance.list()).toEqual([]);
  });
});

describe("vote", () => {
  beforeEach(() => {
    h.protocol.createProposal(ALICE, "Raise the flash-loan fee", 7 * DAY);
  });

  it("adds caller-supplied weight to the proposal and the global tally", () => {
    h.protocol.vote(BOB, 0, 100n);
    const proposal = h.protocol.vote(ALICE, 0, 25n);

    expect(proposal.voteCount).toBe(125n);
    expect(h.protocol.totalVotes()).toBe(125n);
    expect(h.protocol.events().at(-1)?.event.payload).toEqual({
      proposalId: 0,
      voter: ALICE,
      votes: "25",
      voteCount: "125",
    });
  });

  it("accepts votes until one second before the deadline", () => {
    h.clock.set(T0 + 7 * DAY - 1);

    expect(h.protocol.vote(BOB, 0, 1n).voteCount).toBe(1n);
  });

  it("fails with VOTING_CLOSED at the deadline and after", () => {
    h.clock.set(T0 + 7 * DAY);
    expect(codeOf(() => h.protocol.vote(BOB, 0, 1n))).toBe("VOTING_CLOSED");

    h.clock.advance(DAY);
    expect(codeOf(() => h.protocol.vote(BOB, 0, 1n))).toBe("VOTING_CLOSED");
    expect(h.protocol.proposal(0)?.voteCount).toBe(0n);
  });

  it("closes immediately with a zero voting period", () => {
    h.protocol.createProposal(ALICE, "Instant", 0);

    expect(codeOf(() => h.protocol.vote(BOB, 1, 1n))).toBe("VOTING_CLOSED");
  });

  it("rejects non-positive weight", () => {
    expect(codeOf(() => h.protocol.vote(BOB, 0, 0n))).toBe("INVALID_ARGUMENT");
    expect(codeOf(() => h.protocol.vote(BOB, 0, -3n))).toBe("INVALID_ARGUMENT");
  });

  it("reports a closed window before an invalid weight", () => {
    h.clock.set(T0 + 7 * DAY);

    expect(codeOf(() => h.protocol.vote(BOB, 0, 0n))).toBe("VOTING_CLOSED");
  });

  it("fails with PROPOSAL_NOT_FOUND for unknown ids", () => {
    expect(codeOf(() => h.protocol.vote(BOB, 1, 1n))).toBe("PROPOSAL_NOT_FOUND");
    expect(codeOf(() => h.protocol.vote(BOB, -1, 1n))).toBe("PROPOSAL_NOT_FOUND");
    expect(codeOf(() => h.protocol.vote(BOB, 0.5, 1n))).toBe("PROPOSAL_NOT_FOUND");
  });
});

describe("proposal status", () => {
  it("is open before the deadline and closed from it", () => {
    const proposal = h.protocol.createProposal(ALICE, "Raise the flash-loan fee", DAY);
    expect(h.protocol.proposalStatus(proposal)).toBe("open");

    h.clock.advance(DAY);
    expect(h.protocol.proposalStatus(proposal)).toBe("closed");
  });

  it("treats an executed proposal as terminal", () => {
    const restored = Protocol.fromSnapshot(
      {
        version: 1,
        savedAt: "2023-11-14T22:13:20.000Z",
        portfolios: [],
        priceFeeds: [],
        stakes: [],
        proposals: [
          {
            id: 0,
            proposer: ALICE,
            description: "Done",
            voteCount: "10",
            executed: true,
            createdAt: T0,
            votingDeadline: T0 + DAY,
          },
        ],
        totalVotes: "10",
        policies: [],
        referrals: [],
      },
      { custodyAccount: CUSTODY },
      {
        clock: new ManualClock(T0),
        oracle: new StaticPriceOracle(),
        governanceToken: new InMemoryTokenLedger("GOV").holder(CUSTODY),
        nativeToken: new InMemoryTokenLedger("NATIVE").holder(CUSTODY),
      },
    );

    const proposal = restored.proposal(0);
    expect(proposal === undefined ? undefined : restored.proposalStatus(proposal)).toBe(
      "executed",
    );
    expect(codeOf(() => restored.vote(BOB, 0, 1n))).toBe("ALREADY_EXECUTED");
  });
});
