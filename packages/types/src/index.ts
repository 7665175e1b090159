/**
 * @resonance/types — Shared domain types for the reconciler stack.
 *
 * These types are used across all packages:
 * - Instant markers and their lifecycle
 * - Confirmation events from the upstream feed
 * - Confirmed records and their content digests
 * - Merkle commitments
 * - Supply/burn bookkeeping
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation of payloads; meaning lives in producers
 */

// Marker types
export type {
  InstantMarker,
  MarkerStatus,
  MarkerPayload,
  MarkerCounts,
} from "./marker.js";

// Confirmation types
export type {
  ExternalRef,
  CursorPosition,
  ConfirmationEvent,
} from "./confirmation.js";

// Record types
export type { ConfirmedRecord, RecordRef } from "./record.js";

// Commitment types
export type { MerkleCommitment } from "./commitment.js";

// Supply types
export type { BurnPhase, SupplyState } from "./supply.js";

// Runtime type guards
export {
  isHexDigest,
  isMarkerStatus,
  isInstantMarker,
  isCursorPosition,
  isConfirmationEvent,
  isConfirmedRecord,
} from "./guards.js";
