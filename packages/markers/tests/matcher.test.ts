/**
 * Tests for payloadMatchesEvent.
 */

import { describe, it, expect } from "vitest";
import type { ConfirmationEvent } from "@resonance/types";
import { payloadMatchesEvent } from "../src/matcher.js";

const ev: ConfirmationEvent = {
  externalRef: "0xabc",
  fromParty: "0xAaAa",
  toParty: "0xBbBb",
  value: "1000000000000000000000",
  cursorPosition: { blockNumber: 1, logIndex: 0 },
};

describe("payloadMatchesEvent", () => {
  it("matches a numeric-string amount beyond the safe integer range", () => {
    expect(payloadMatchesEvent({ amount: "1000000000000000000000" }, ev)).toBe(true);
  });

  it("matches a bigint amount", () => {
    expect(payloadMatchesEvent({ amount: 1000000000000000000000n }, ev)).toBe(true);
  });

  it("accepts value as an alias of amount", () => {
    expect(payloadMatchesEvent({ value: "1000000000000000000000" }, ev)).toBe(true);
  });

  it("matches a safe integer amount", () => {
    expect(payloadMatchesEvent({ amount: 10 }, { ...ev, value: "10" })).toBe(true);
  });

  it("rejects fractional and negative amounts", () => {
    expect(payloadMatchesEvent({ amount: 10.5 }, { ...ev, value: "10" })).toBe(false);
    expect(payloadMatchesEvent({ amount: -10 }, { ...ev, value: "10" })).toBe(false);
    expect(payloadMatchesEvent({ amount: "1e1" }, { ...ev, value: "10" })).toBe(false);
  });

  it("compares parties case-insensitively", () => {
    expect(payloadMatchesEvent({ from: "0xaaaa", to: "0xBBBB" }, ev)).toBe(true);
  });

  it("rejects any conflicting field", () => {
    expect(
      payloadMatchesEvent({ amount: "1000000000000000000000", to: "0xcccc" }, ev),
    ).toBe(false);
  });

  it("does not match a payload with no comparable fields", () => {
    expect(payloadMatchesEvent({ note: "hello" }, ev)).toBe(false);
    expect(payloadMatchesEvent({}, ev)).toBe(false);
  });
});
