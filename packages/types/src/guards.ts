/**
 * Runtime Type Guards
 *
 * Narrowing functions for reconciler domain types.
 * These enable safe runtime validation at system boundaries
 * (journal replay, decrypted blobs, external feeds).
 */

import type { InstantMarker, MarkerStatus } from "./marker.js";
import type { ConfirmationEvent, CursorPosition } from "./confirmation.js";
import type { ConfirmedRecord } from "./record.js";

const HEX_DIGEST = /^[0-9a-f]{64}$/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Digest guards
// =============================================================================

/**
 * A lowercase 64-char hex string (32-byte SHA-256 digest, no 0x prefix).
 */
export function isHexDigest(value: unknown): value is string {
  return typeof value === "string" && HEX_DIGEST.test(value);
}

// =============================================================================
// Marker guards
// =============================================================================

const MARKER_STATUSES = new Set<string>(["PENDING", "CONFIRMED"]);

export function isMarkerStatus(value: unknown): value is MarkerStatus {
  return typeof value === "string" && MARKER_STATUSES.has(value);
}

export function isInstantMarker(value: unknown): value is InstantMarker {
  if (!isPlainObject(value)) return false;
  const v = value;
  if (
    typeof v.id !== "string" ||
    v.id.length === 0 ||
    !isMarkerStatus(v.status) ||
    !isPlainObject(v.payload) ||
    typeof v.createdAt !== "string" ||
    typeof v.synthesized !== "boolean"
  ) {
    return false;
  }

  // PENDING markers carry no confirmation data; CONFIRMED markers carry both
  if (v.status === "PENDING") {
    return v.externalRef === null && v.confirmedAt === null;
  }
  return typeof v.externalRef === "string" && typeof v.confirmedAt === "string";
}

// =============================================================================
// Confirmation guards
// =============================================================================

export function isCursorPosition(value: unknown): value is CursorPosition {
  if (!isPlainObject(value)) return false;
  const v = value;
  return (
    typeof v.blockNumber === "number" &&
    Number.isInteger(v.blockNumber) &&
    v.blockNumber >= 0 &&
    typeof v.logIndex === "number" &&
    Number.isInteger(v.logIndex) &&
    v.logIndex >= 0
  );
}

export function isConfirmationEvent(value: unknown): value is ConfirmationEvent {
  if (!isPlainObject(value)) return false;
  const v = value;
  return (
    typeof v.externalRef === "string" &&
    v.externalRef.length > 0 &&
    (v.transactionRef === undefined ||
      (typeof v.transactionRef === "string" && v.transactionRef.length > 0)) &&
    typeof v.fromParty === "string" &&
    typeof v.toParty === "string" &&
    typeof v.value === "string" &&
    /^\d+$/.test(v.value) &&
    isCursorPosition(v.cursorPosition)
  );
}

// =============================================================================
// Record guards
// =============================================================================

export function isConfirmedRecord(value: unknown): value is ConfirmedRecord {
  if (!isPlainObject(value)) return false;
  const v = value;
  return (
    isHexDigest(v.resonanceId) &&
    typeof v.externalRef === "string" &&
    v.externalRef.length > 0 &&
    isPlainObject(v.payload) &&
    isPlainObject(v.metadata) &&
    typeof v.storedAt === "string"
  );
}
