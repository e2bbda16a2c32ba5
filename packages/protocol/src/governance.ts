/**
 * Governance Module — time-boxed proposals with vote counts.
 *
 * open → closed (deadline reached) → executed (flag only; nothing in
 * the protocol sets it).
 *
 * Rules:
 * - Proposal ids are creation indexes, starting at 0
 * - voteCount only grows, and only while now < votingDeadline
 * - Vote weight is whatever the caller supplies; it is not checked
 *   against any balance
 * - Voting periods are capped at MAX_VOTING_PERIOD and the deadline must
 *   stay a safe integer
 */

import type { AccountId, UnixSeconds } from "@keelson/types";
import type { Journaled, Rollback } from "@keelson/ledger";
import type { TransitionContext } from "./transition.js";
import type { Proposal, ProposalStatus } from "./types.js";
import { ProtocolError } from "./types.js";
import { requireAccount, requireNonEmpty, requirePositive } from "./validation.js";

/** Ten years, in seconds. */
export const MAX_VOTING_PERIOD = 10 * 365 * 86_400;

export class GovernanceModule implements Journaled {
  private proposals: Proposal[] = [];
  private votes = 0n;

  createProposal(
    ctx: TransitionContext,
    caller: AccountId,
    description: string,
    votingPeriod: number,
  ): Proposal {
    requireAccount(caller, "caller");
    requireNonEmpty(description, "description");
    if (!Number.isSafeInteger(votingPeriod) || votingPeriod < 0) {
      throw new ProtocolError(
        "INVALID_ARGUMENT",
        `votingPeriod must be a non-negative whole number of seconds, got ${votingPeriod}`,
      );
    }
    if (votingPeriod > MAX_VOTING_PERIOD) {
      throw new ProtocolError(
        "INVALID_ARGUMENT",
        `votingPeriod must be at most ${MAX_VOTING_PERIOD} seconds, got ${votingPeriod}`,
      );
    }
    if (!Number.isSafeInteger(ctx.now + votingPeriod)) {
      throw new ProtocolError(
        "INVALID_ARGUMENT",
        `Voting deadline ${ctx.now} + ${votingPeriod} is out of range`,
      );
    }

    const proposal: Proposal = {
      id: this.proposals.length,
      proposer: caller,
      description,
      voteCount: 0n,
      executed: false,
      createdAt: ctx.now,
      votingDeadline: ctx.now + votingPeriod,
    };
    this.proposals = [...this.proposals, proposal];

    ctx.emit("proposal.created", {
      proposalId: proposal.id,
      proposer: caller,
      description,
      votingDeadline: proposal.votingDeadline,
    });
    return proposal;
  }

  vote(ctx: TransitionContext, caller: AccountId, proposalId: number, votes: bigint): Proposal {
    const proposal = this.require(proposalId);
    if (ctx.now >= proposal.votingDeadline) {
      throw new ProtocolError(
        "VOTING_CLOSED",
        `Voting on proposal ${proposalId} closed at ${proposal.votingDeadline}`,
      );
    }
    requirePositive(votes, "votes");
    if (proposal.executed) {
      throw new ProtocolError("ALREADY_EXECUTED", `Proposal ${proposalId} was already executed`);
    }

    const updated: Proposal = { ...proposal, voteCount: proposal.voteCount + votes };
    this.proposals = this.proposals.map((p) => (p.id === proposalId ? updated : p));
    this.votes += votes;

    ctx.emit("proposal.vote_cast", {
      proposalId,
      voter: caller,
      votes: votes.toString(),
      voteCount: updated.voteCount.toString(),
    });
    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(proposalId: number): Proposal | undefined {
    return this.proposals[proposalId];
  }

  list(): readonly Proposal[] {
    return this.proposals;
  }

  totalVotes(): bigint {
    return this.votes;
  }

  restore(proposals: readonly Proposal[], totalVotes: bigint): void {
    this.proposals = [...proposals];
    this.votes = totalVotes;
  }

  checkpoint(): Rollback {
    const proposals = this.proposals;
    const votes = this.votes;
    return () => {
      this.proposals = proposals;
      this.votes = votes;
    };
  }

  private require(proposalId: number): Proposal {
    const proposal = Number.isSafeInteger(proposalId) ? this.proposals[proposalId] : undefined;
    if (proposal === undefined) {
      throw new ProtocolError("PROPOSAL_NOT_FOUND", `Proposal ${proposalId} not found`);
    }
    return proposal;
  }
}

export function proposalStatus(proposal: Proposal, now: UnixSeconds): ProposalStatus {
  if (proposal.executed) return "executed";
  return now < proposal.votingDeadline ? "open" : "closed";
}
