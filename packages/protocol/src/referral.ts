/**
 * Referral Registry — write-once referred → referrer edges.
 * No rewards are attached to referrals.
 */

import type { AccountId } from "@keelson/types";
import type { Journaled, Rollback } from "@keelson/ledger";
import type { TransitionContext } from "./transition.js";
import type { ReferralEdge } from "./types.js";
import { ProtocolError } from "./types.js";
import { requireAccount } from "./validation.js";

export class ReferralRegistry implements Journaled {
  private referrers: Map<AccountId, AccountId> = new Map();

  refer(ctx: TransitionContext, caller: AccountId, newUser: AccountId): ReferralEdge {
    requireAccount(caller, "caller");
    requireAccount(newUser, "newUser");

    const existing = this.referrers.get(newUser);
    if (existing !== undefined) {
      throw new ProtocolError(
        "ALREADY_EXISTS",
        `"${newUser}" was already referred by "${existing}"`,
      );
    }

    this.referrers.set(newUser, caller);
    ctx.emit("referral.recorded", { referred: newUser, referrer: caller });
    return { referred: newUser, referrer: caller };
  }

  referrerOf(account: AccountId): AccountId | undefined {
    return this.referrers.get(account);
  }

  /** Accounts `referrer` has referred, in insertion order. */
  referralsOf(referrer: AccountId): readonly AccountId[] {
    const referred: AccountId[] = [];
    for (const [account, by] of this.referrers) {
      if (by === referrer) referred.push(account);
    }
    return referred;
  }

  edges(): readonly ReferralEdge[] {
    return [...this.referrers].map(([referred, referrer]) => ({ referred, referrer }));
  }

  restore(edges: readonly ReferralEdge[]): void {
    this.referrers = new Map(edges.map((e) => [e.referred, e.referrer]));
  }

  checkpoint(): Rollback {
    const referrers = new Map(this.referrers);
    return () => {
      this.referrers = referrers;
    };
  }
}
