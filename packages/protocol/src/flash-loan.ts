/**
 * Flash-Loan Engine — borrow against custody and prove repayability
 * before the transition commits.
 *
 * Two phases: "disbursed" (custody paid the borrower, callback runs) and
 * "repayment_verified" (borrower's balance covers amount + fee). A loan
 * that fails verification aborts the transition, undoing the disbursement.
 *
 * Known weak invariant: verification compares balances only. Nothing pulls
 * the repayment back into custody.
 */

import type { AccountId } from "@keelson/types";
import type { FungibleLedger } from "@keelson/ledger";
import { WAD, wadMul } from "@keelson/ledger";
import type { TransitionContext } from "./transition.js";
import type { FlashLoanCallback, FlashLoanDisbursement, FlashLoanReceipt } from "./types.js";
import { ProtocolError } from "./types.js";
import { requireAccount, requireNonNegative, requirePositive } from "./validation.js";

/** 5%, as a WAD fraction. */
export const DEFAULT_FLASH_LOAN_FEE_RATE = 5n * 10n ** 16n;

export class FlashLoanEngine {
  readonly feeRate: bigint;

  constructor(feeRate: bigint = DEFAULT_FLASH_LOAN_FEE_RATE) {
    requireNonNegative(feeRate, "feeRate");
    if (feeRate > WAD) {
      throw new ProtocolError("INVALID_ARGUMENT", "feeRate must not exceed 1.0 (10^18)");
    }
    this.feeRate = feeRate;
  }

  feeFor(amount: bigint): bigint {
    return wadMul(amount, this.feeRate);
  }

  borrow(
    ctx: TransitionContext,
    caller: AccountId,
    native: FungibleLedger,
    amount: bigint,
    onLoan?: FlashLoanCallback,
  ): FlashLoanReceipt {
    requireAccount(caller, "caller");
    requirePositive(amount, "amount");

    const available = native.balanceOf(native.account);
    if (amount > available) {
      throw new ProtocolError(
        "INSUFFICIENT_BALANCE",
        `Requested ${amount.toString()} but custody holds ${available.toString()}`,
      );
    }

    const fee = this.feeFor(amount);
    const balanceBefore = native.balanceOf(caller);

    if (!native.transfer(caller, amount)) {
      throw new ProtocolError(
        "TRANSFER_FAILED",
        `Custody could not disburse ${amount.toString()} ${native.symbol} to "${caller}"`,
      );
    }

    const disbursement: FlashLoanDisbursement = {
      phase: "disbursed",
      borrower: caller,
      amount,
      fee,
      balanceBefore,
    };
    onLoan?.(disbursement);

    const balanceAfter = native.balanceOf(caller);
    if (balanceAfter < amount + fee) {
      throw new ProtocolError(
        "REPAYMENT_FAILED",
        `Borrower balance ${balanceAfter.toString()} does not cover ${amount.toString()} + fee ${fee.toString()}`,
      );
    }

    ctx.emit("flash_loan.taken", {
      borrower: caller,
      amount: amount.toString(),
      fee: fee.toString(),
      balanceBefore: balanceBefore.toString(),
      balanceAfter: balanceAfter.toString(),
    });

    return {
      phase: "repayment_verified",
      borrower: caller,
      amount,
      fee,
      balanceBefore,
      balanceAfter,
    };
  }
}
