/**
 * Tests for the Referral Registry.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ALICE, BOB, codeOf, createHarness } from "./harness.js";
import type { Harness } from "./harness.js";

let h: Harness;

beforeEach(() => {
  h = createHarness();
});

describe("refer", () => {
  it("records the caller as the new user's referrer", () => {
    const edge = h.protocol.refer(ALICE, BOB);

    expect(edge).toEqual({ referred: BOB, referrer: ALICE });
    expect(h.protocol.referrerOf(BOB)).toBe(ALICE);
    expect(h.protocol.referrerOf(ALICE)).toBeUndefined();
  });

  it("is write-once per referred account", () => {
    h.protocol.refer(ALICE, BOB);

    expect(codeOf(() => h.protocol.refer("carol", BOB))).toBe("ALREADY_EXISTS");
    expect(h.protocol.referrerOf(BOB)).toBe(ALICE);
  });

  it("rejects the zero account", () => {
    expect(codeOf(() => h.protocol.refer(ALICE, ""))).toBe("INVALID_ARGUMENT");
  });

  it("lists everyone a referrer brought in", () => {
    h.protocol.refer(ALICE, BOB);
    h.protocol.refer(BOB, "dave");
    h.protocol.refer(ALICE, "carol");

    expect(h.protocol.referralsOf(ALICE)).toEqual([BOB, "carol"]);
  });

  it("allows self-referral", () => {
    h.protocol.refer(ALICE, ALICE);

    expect(h.protocol.referrerOf(ALICE)).toBe(ALICE);
  });
});
