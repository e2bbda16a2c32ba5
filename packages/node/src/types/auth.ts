/**
 * Authentication types.
 *
 * Two ways to name the caller:
 * 1. API key via X-Api-Key header (secured mode)
 * 2. X-Account-Id header (unsecured mode, local development and tests)
 *
 * Roles only decide who is seeded as a protocol admin; the protocol
 * itself enforces admin-only entry points.
 */

// =============================================================================
// Roles
// =============================================================================

export type Role = "admin" | "member";

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "header";
  readonly account: string;
  readonly role: Role;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly account: string;
}
