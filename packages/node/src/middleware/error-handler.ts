/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps ProtocolError codes, ledger and event-store errors to HTTP
 * status codes through one table.
 */

import type { Context } from "hono";
import { EventStoreError } from "@keelson/event-store";
import { TokenLedgerError } from "@keelson/ledger";
import { ProtocolError } from "@keelson/protocol";
import type { ProtocolErrorCode } from "@keelson/protocol";
import type { ErrorStatus } from "../types/error.js";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const PROTOCOL_STATUS_MAP: Readonly<Record<ProtocolErrorCode, ErrorStatus>> = {
  // Missing records
  ASSET_NOT_FOUND: 404,
  PROPOSAL_NOT_FOUND: 404,
  NO_ORACLE: 404,

  // Authorization
  NOT_OWNER: 403,
  UNAUTHORIZED: 403,

  // State conflicts
  ALREADY_EXISTS: 409,
  ALREADY_BOUND: 409,
  ALREADY_EXECUTED: 409,
  VOTING_CLOSED: 409,
  REENTRANT_TRANSITION: 409,

  // Preconditions on balances, prices and policies
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_STAKE: 422,
  INVALID_PRICE: 422,
  REPAYMENT_FAILED: 422,
  TRANSFER_FAILED: 422,
  NOTHING_TO_WITHDRAW: 422,
  NO_ACTIVE_POLICY: 422,

  // Malformed input
  INVALID_ARGUMENT: 400,
};

interface MappedError {
  readonly status: ErrorStatus;
  readonly code: string;
}

function mapError(err: Error): MappedError {
  if (err instanceof ProtocolError) {
    return { status: PROTOCOL_STATUS_MAP[err.code], code: err.code };
  }
  if (err instanceof ApiError) {
    return { status: err.status, code: err.code };
  }
  if (err instanceof TokenLedgerError) {
    return { status: 400, code: err.code };
  }
  if (err instanceof EventStoreError) {
    return { status: 500, code: err.code };
  }
  return { status: 500, code: "INTERNAL_ERROR" };
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const { status, code } = mapError(err);

  // Don't leak internal details
  const message = status === 500 ? "Internal server error" : err.message;

  return c.json(createErrorEnvelope(code, message), status);
}
