/**
 * Flash loan routes.
 *
 * GET  /api/v1/flash-loans/fee?amount=  — Fee charged on a loan of `amount`
 * POST /api/v1/flash-loans               — Borrow native tokens within one transition
 *
 * HTTP carries no borrower callback: the borrower's balance before the
 * loan must already cover the fee, or the loan is rejected with
 * REPAYMENT_FAILED and nothing changes.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { FlashLoanSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { flashLoanView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";

export function createFlashLoanRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/fee", (c) => {
    const raw = c.req.query("amount") ?? "";
    if (!/^\d+$/.test(raw)) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "amount must be a base-10 digit string"),
        400,
      );
    }
    const fee = c.get("service").flashLoanFee(BigInt(raw));
    return c.json({ data: { amount: raw, fee: fee.toString() } });
  });

  routes.post("/", validateBody(FlashLoanSchema), (c) => {
    const receipt = c.get("service").flashLoan(c.get("auth").account, c.get("validatedBody").amount);
    return c.json({ data: flashLoanView(receipt) }, 201);
  });

  return routes;
}
