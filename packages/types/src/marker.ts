/**
 * Marker Types
 *
 * An instant marker is the local placeholder for an intent, visible
 * before any external confirmation exists.
 *
 * Rules:
 * - Status moves PENDING → CONFIRMED exactly once
 * - Markers are never deleted (retained for audit)
 * - The payload is opaque: the ledger never interprets it
 */

/**
 * Lifecycle states of a marker.
 */
export type MarkerStatus = "PENDING" | "CONFIRMED";

/**
 * Opaque producer-supplied key/value map.
 */
export type MarkerPayload = Readonly<Record<string, unknown>>;

export interface InstantMarker {
  /** Process-generated opaque identifier */
  readonly id: string;

  /** Current lifecycle state */
  readonly status: MarkerStatus;

  /** External confirmation reference (null until confirmed) */
  readonly externalRef: string | null;

  /** Producer payload */
  readonly payload: MarkerPayload;

  /** ISO 8601 timestamp of creation */
  readonly createdAt: string;

  /** ISO 8601 timestamp of confirmation (null while pending) */
  readonly confirmedAt: string | null;

  /**
   * True when the confirmation arrived before any local intent and the
   * marker was created directly in CONFIRMED state.
   */
  readonly synthesized: boolean;
}

/**
 * Aggregate marker counts exposed to observers.
 */
export interface MarkerCounts {
  readonly pending: number;
  readonly confirmed: number;
  readonly total: number;
}
