/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

import type { ProtocolErrorCode } from "@keelson/protocol";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Codes raised by the HTTP layer itself. Protocol rejections keep
 * their own ProtocolErrorCode.
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "TRANSFER_FAILED"
  | "INTERNAL_ERROR";

/** Statuses an error response can carry */
export type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 500 | 503;

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | ProtocolErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | ProtocolErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}

// =============================================================================
// HTTP-level Error
// =============================================================================

/**
 * Rejection raised by the service layer outside a protocol transition,
 * e.g. an unknown token symbol.
 */
export class ApiError extends Error {
  public readonly code: ApiErrorCode;
  public readonly status: ErrorStatus;

  constructor(code: ApiErrorCode, message: string, status: ErrorStatus) {
    super(message);
    this.name = "ApiError";
    this.code = code;
    this.status = status;
  }
}
