/**
 * @resonance/markers — Core types.
 */

import type { InstantMarker, MarkerStatus } from "@resonance/types";

// =============================================================================
// Journal
// =============================================================================

/**
 * One durable marker transition.
 *
 * - marker.recorded: a new marker (PENDING, or CONFIRMED when synthesized)
 * - marker.expected: a producer registered the ref it expects
 * - marker.confirmed: PENDING → CONFIRMED
 */
export type MarkerJournalEntry =
  | { readonly type: "marker.recorded"; readonly marker: InstantMarker }
  | {
      readonly type: "marker.expected";
      readonly markerId: string;
      readonly externalRef: string;
      readonly at: string;
    }
  | {
      readonly type: "marker.confirmed";
      readonly markerId: string;
      readonly externalRef: string;
      readonly confirmedAt: string;
    };

/**
 * Durable log of marker transitions, replayed on startup.
 */
export interface MarkerJournal {
  /** Persist one entry. Must be durable before returning. */
  append(entry: MarkerJournalEntry): void;

  /** All entries in append order. */
  load(): readonly MarkerJournalEntry[];
}

// =============================================================================
// Table
// =============================================================================

export interface MarkerTableOptions {
  /** Transition log (default: in-memory, not durable) */
  readonly journal?: MarkerJournal;

  /** Marker id generator (default: random UUID) */
  readonly generateId?: () => string;

  /** Clock (default: system time) */
  readonly now?: () => Date;
}

export interface ListMarkersOptions {
  readonly status?: MarkerStatus;
}

/**
 * How a confirmation event was resolved against the table.
 *
 * - duplicate: a marker is already CONFIRMED with this ref
 * - expected: a PENDING marker registered this ref via expectConfirmation
 * - matched: the oldest PENDING marker whose payload matches the event
 * - unmatched: no local intent; the caller synthesizes a marker
 */
export type MarkerResolution =
  | { readonly kind: "duplicate"; readonly marker: InstantMarker }
  | { readonly kind: "expected"; readonly marker: InstantMarker }
  | { readonly kind: "matched"; readonly marker: InstantMarker }
  | { readonly kind: "unmatched" };

export interface LinkResult {
  readonly marker: InstantMarker;

  /** True when the marker was created directly in CONFIRMED state */
  readonly synthesized: boolean;

  /** False when the call was a no-op (already confirmed with this ref) */
  readonly changed: boolean;
}

// =============================================================================
// Errors
// =============================================================================

export type MarkerErrorCode =
  | "MARKER_NOT_FOUND"
  | "INVALID_TRANSITION"
  | "REF_ALREADY_BOUND"
  | "INVALID_REF";

export class MarkerError extends Error {
  public readonly code: MarkerErrorCode;
  constructor(code: MarkerErrorCode, message: string) {
    super(message);
    this.name = "MarkerError";
    this.code = code;
  }
}
