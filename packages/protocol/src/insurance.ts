/**
 * Insurance Module — one coverage policy per account.
 *
 * Rules:
 * - Buying requires an initialized portfolio and premium == coverage / 100
 * - A new purchase replaces any existing policy
 * - Claiming pays full coverage from custody and deactivates the policy;
 *   no loss has to be shown
 * - The premium is recorded, not collected
 */

import type { AccountId } from "@keelson/types";
import type { FungibleLedger, Journaled, Rollback } from "@keelson/ledger";
import type { TransitionContext } from "./transition.js";
import type { InsurancePolicy } from "./types.js";
import { ProtocolError } from "./types.js";
import { requireNonNegative, requirePositive } from "./validation.js";

export const PREMIUM_DIVISOR = 100n;

export class InsuranceModule implements Journaled {
  private policies: Map<AccountId, InsurancePolicy> = new Map();
  private readonly hasPortfolio: (account: AccountId) => boolean;

  constructor(hasPortfolio: (account: AccountId) => boolean) {
    this.hasPortfolio = hasPortfolio;
  }

  buy(
    ctx: TransitionContext,
    caller: AccountId,
    coverageAmount: bigint,
    premium: bigint,
  ): InsurancePolicy {
    if (!this.hasPortfolio(caller)) {
      throw new ProtocolError("NOT_OWNER", `"${caller}" does not own an initialized portfolio`);
    }
    requirePositive(coverageAmount, "coverageAmount");
    requireNonNegative(premium, "premium");

    const required = coverageAmount / PREMIUM_DIVISOR;
    if (premium !== required) {
      throw new ProtocolError(
        "INVALID_ARGUMENT",
        `Premium for coverage ${coverageAmount.toString()} must be ${required.toString()}, got ${premium.toString()}`,
      );
    }

    const policy: InsurancePolicy = {
      isActive: true,
      coverageAmount,
      premiumPaid: premium,
      policyStartDate: ctx.now,
    };
    this.policies.set(caller, policy);

    ctx.emit("insurance.purchased", {
      account: caller,
      coverageAmount: coverageAmount.toString(),
      premium: premium.toString(),
    });
    return policy;
  }

  claim(ctx: TransitionContext, caller: AccountId, ledger: FungibleLedger): InsurancePolicy {
    const policy = this.policies.get(caller);
    if (policy === undefined || !policy.isActive) {
      throw new ProtocolError("NO_ACTIVE_POLICY", `"${caller}" has no active policy`);
    }

    const closed: InsurancePolicy = { ...policy, isActive: false };
    this.policies.set(caller, closed);

    if (!ledger.transfer(caller, policy.coverageAmount)) {
      throw new ProtocolError(
        "TRANSFER_FAILED",
        `Custody could not pay coverage of ${policy.coverageAmount.toString()} ${ledger.symbol} to "${caller}"`,
      );
    }

    ctx.emit("insurance.claimed", {
      account: caller,
      coverageAmount: policy.coverageAmount.toString(),
    });
    return closed;
  }

  get(account: AccountId): InsurancePolicy | undefined {
    return this.policies.get(account);
  }

  entries(): readonly (readonly [AccountId, InsurancePolicy])[] {
    return [...this.policies.entries()];
  }

  restore(entries: Iterable<readonly [AccountId, InsurancePolicy]>): void {
    this.policies = new Map(entries);
  }

  checkpoint(): Rollback {
    const policies = new Map(this.policies);
    return () => {
      this.policies = policies;
    };
  }
}
