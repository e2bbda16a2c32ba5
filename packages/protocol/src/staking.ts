/**
 * Staking Ledger — custody-held governance-token stake.
 *
 * Rewards accrue at 1% of the staked amount per completed 30-day period
 * since the last stake, paid from custody.
 *
 * Rules:
 * - StakeInfo.amount never goes negative
 * - totalStaked always equals the sum of every StakeInfo.amount
 * - Partial periods earn nothing (integer division)
 * - Claiming does not reset lastStakeTime; only staking does
 * - Slashing is internal: no external entry point reaches it
 */

import type { AccountId, UnixSeconds } from "@keelson/types";
import type { FungibleLedger, Journaled, Rollback } from "@keelson/ledger";
import { sumAmounts } from "@keelson/ledger";
import type { TransitionContext } from "./transition.js";
import type { RewardClaim, StakeInfo } from "./types.js";
import { ProtocolError } from "./types.js";
import { requireAccount, requirePositive } from "./validation.js";

export const SECONDS_PER_REWARD_PERIOD = 30 * 86_400;

/** Percent of the stake paid per completed period. */
export const REWARD_PERCENT_PER_PERIOD = 1n;

const EMPTY_STAKE: StakeInfo = { amount: 0n, lastStakeTime: 0 };

export class StakingLedger implements Journaled {
  private stakes: Map<AccountId, StakeInfo> = new Map();
  private staked = 0n;

  // ───────────────────────────────────────────────────────────────────────
  // Entry points
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pull `amount` from `caller` into custody. The caller must have
   * approved the custody account on `ledger` beforehand.
   */
  stake(
    ctx: TransitionContext,
    caller: AccountId,
    ledger: FungibleLedger,
    amount: bigint,
  ): StakeInfo {
    requireAccount(caller, "caller");
    requirePositive(amount, "amount");

    if (!ledger.transferFrom(caller, ledger.account, amount)) {
      throw new ProtocolError(
        "TRANSFER_FAILED",
        `Could not pull ${amount.toString()} ${ledger.symbol} from "${caller}" into custody`,
      );
    }

    const current = this.get(caller);
    const updated: StakeInfo = { amount: current.amount + amount, lastStakeTime: ctx.now };
    this.stakes.set(caller, updated);
    this.staked += amount;

    ctx.emit("stake.deposited", {
      account: caller,
      amount: amount.toString(),
      staked: updated.amount.toString(),
    });
    return updated;
  }

  unstake(
    ctx: TransitionContext,
    caller: AccountId,
    ledger: FungibleLedger,
    amount: bigint,
  ): StakeInfo {
    requirePositive(amount, "amount");
    const current = this.get(caller);
    if (current.amount < amount) {
      throw new ProtocolError(
        "INSUFFICIENT_STAKE",
        `"${caller}" has ${current.amount.toString()} staked, cannot unstake ${amount.toString()}`,
      );
    }

    const updated: StakeInfo = { ...current, amount: current.amount - amount };
    this.stakes.set(caller, updated);
    this.staked -= amount;

    if (!ledger.transfer(caller, amount)) {
      throw new ProtocolError(
        "TRANSFER_FAILED",
        `Custody could not return ${amount.toString()} ${ledger.symbol} to "${caller}"`,
      );
    }

    ctx.emit("stake.withdrawn", {
      account: caller,
      amount: amount.toString(),
      staked: updated.amount.toString(),
    });
    return updated;
  }

  claimRewards(ctx: TransitionContext, caller: AccountId, ledger: FungibleLedger): RewardClaim {
    const current = this.get(caller);
    if (current.amount === 0n) {
      throw new ProtocolError("INSUFFICIENT_STAKE", `"${caller}" has nothing staked`);
    }

    const periods = completedPeriods(current.lastStakeTime, ctx.now);
    const reward = rewardFor(current.amount, periods);

    if (reward > 0n && !ledger.transfer(caller, reward)) {
      throw new ProtocolError(
        "TRANSFER_FAILED",
        `Custody could not pay a reward of ${reward.toString()} ${ledger.symbol} to "${caller}"`,
      );
    }

    ctx.emit("stake.reward_claimed", {
      account: caller,
      periods: periods.toString(),
      reward: reward.toString(),
    });
    return { account: caller, periods, reward };
  }

  /**
   * Burn `amount` of `account`'s stake. The tokens stay in custody.
   */
  slash(ctx: TransitionContext, account: AccountId, amount: bigint): StakeInfo {
    requirePositive(amount, "amount");
    const current = this.get(account);
    if (current.amount < amount) {
      throw new ProtocolError(
        "INSUFFICIENT_STAKE",
        `Cannot slash ${amount.toString()} from a stake of ${current.amount.toString()}`,
      );
    }

    const updated: StakeInfo = { ...current, amount: current.amount - amount };
    this.stakes.set(account, updated);
    this.staked -= amount;

    ctx.emit("stake.slashed", {
      account,
      amount: amount.toString(),
      staked: updated.amount.toString(),
    });
    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(account: AccountId): StakeInfo {
    return this.stakes.get(account) ?? EMPTY_STAKE;
  }

  totalStaked(): bigint {
    return this.staked;
  }

  /** What `claimRewards` would pay `account` at `now`. */
  pendingReward(account: AccountId, now: UnixSeconds): bigint {
    const current = this.get(account);
    return rewardFor(current.amount, completedPeriods(current.lastStakeTime, now));
  }

  entries(): readonly (readonly [AccountId, StakeInfo])[] {
    return [...this.stakes.entries()];
  }

  restore(entries: Iterable<readonly [AccountId, StakeInfo]>): void {
    this.stakes = new Map(entries);
    this.staked = sumAmounts([...this.stakes.values()].map((info) => info.amount));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Journaling
  // ───────────────────────────────────────────────────────────────────────

  checkpoint(): Rollback {
    const stakes = new Map(this.stakes);
    const staked = this.staked;
    return () => {
      this.stakes = stakes;
      this.staked = staked;
    };
  }
}

export function completedPeriods(since: UnixSeconds, now: UnixSeconds): bigint {
  if (now <= since) return 0n;
  return BigInt(Math.floor((now - since) / SECONDS_PER_REWARD_PERIOD));
}

export function rewardFor(amount: bigint, periods: bigint): bigint {
  return (amount * periods * REWARD_PERCENT_PER_PERIOD) / 100n;
}
