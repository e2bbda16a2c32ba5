/**
 * Authentication middleware.
 *
 * Secured mode: X-Api-Key is looked up in the configured key registry
 * and the key's account becomes the caller.
 * Unsecured mode: the caller names itself through X-Account-Id.
 *
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const ACCOUNT_HEADER = "X-Account-Id";

// =============================================================================
// Secured mode
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Create API key authentication middleware.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Invalid API key"),
        401,
      );
    }

    const auth: AuthContext = {
      type: "api-key",
      account: record.account,
      role: record.role,
    };
    c.set("auth", auth);
    return next();
  };
}

// =============================================================================
// Unsecured mode
// =============================================================================

/**
 * Trust the X-Account-Id header. Local development and tests only.
 */
export function accountHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const account = c.req.header(ACCOUNT_HEADER)?.trim();
    if (account === undefined || account === "") {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `${ACCOUNT_HEADER} header required`),
        401,
      );
    }

    c.set("auth", { type: "header", account, role: "member" });
    return next();
  };
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Build the key registry from parsed API_KEYS records.
 */
export function apiKeyMap(records: readonly ApiKeyRecord[]): ReadonlyMap<string, ApiKeyRecord> {
  const keys = new Map<string, ApiKeyRecord>();
  for (const record of records) {
    if (keys.has(record.key)) {
      throw new Error(`Duplicate API key for account "${record.account}"`);
    }
    keys.set(record.key, record);
  }
  return keys;
}
