/**
 * Runtime type guard tests for @keelson/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import { isAccountId, isAmountString } from "../src/guards.js";

describe("isAccountId", () => {
  it("accepts a non-empty string", () => {
    expect(isAccountId("alice")).toBe(true);
  });

  it("rejects the zero account", () => {
    expect(isAccountId("")).toBe(false);
  });

  it("rejects whitespace-only identities", () => {
    expect(isAccountId("   ")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAccountId(42)).toBe(false);
    expect(isAccountId(null)).toBe(false);
    expect(isAccountId(undefined)).toBe(false);
  });
});

describe("isAmountString", () => {
  it("accepts digit strings", () => {
    expect(isAmountString("0")).toBe(true);
    expect(isAmountString("1000000000000000000000")).toBe(true);
  });

  it("rejects signs, decimals and empty strings", () => {
    expect(isAmountString("-1")).toBe(false);
    expect(isAmountString("1.5")).toBe(false);
    expect(isAmountString("")).toBe(false);
  });

  it("rejects numbers (must be string)", () => {
    expect(isAmountString(100)).toBe(false);
  });
});
