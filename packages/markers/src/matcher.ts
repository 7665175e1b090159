/**
 * Marker ↔ Confirmation payload matching.
 *
 * A PENDING marker matches a confirmation event when its payload names
 * at least one of amount/value, from, to, and none of the named fields
 * conflict with the event:
 * - amount (or value) equals the event value in base units
 * - from / to equal the event parties, case-insensitively
 */

import type { ConfirmationEvent, MarkerPayload } from "@resonance/types";

const UNSIGNED_INTEGER = /^\d+$/;

function amountEquals(amount: unknown, value: string): boolean {
  if (typeof amount === "bigint") {
    return amount.toString() === value;
  }
  if (typeof amount === "number") {
    return Number.isSafeInteger(amount) && amount >= 0 && BigInt(amount) === BigInt(value);
  }
  if (typeof amount === "string") {
    return UNSIGNED_INTEGER.test(amount) && BigInt(amount) === BigInt(value);
  }
  return false;
}

function partyEquals(party: unknown, expected: string): boolean {
  return typeof party === "string" && party.toLowerCase() === expected.toLowerCase();
}

export function payloadMatchesEvent(
  payload: MarkerPayload,
  event: ConfirmationEvent,
): boolean {
  let compared = 0;

  const amount = payload["amount"] ?? payload["value"];
  if (amount !== undefined) {
    if (!amountEquals(amount, event.value)) return false;
    compared++;
  }

  const from = payload["from"];
  if (from !== undefined) {
    if (!partyEquals(from, event.fromParty)) return false;
    compared++;
  }

  const to = payload["to"];
  if (to !== undefined) {
    if (!partyEquals(to, event.toParty)) return false;
    compared++;
  }

  return compared > 0;
}
