/**
 * Supply Types
 *
 * Bookkeeping for the one-time burn. All amounts are integers in
 * token units, carried as bigint.
 */

export type BurnPhase = "NOT_TRIGGERED" | "TRIGGERED";

export interface SupplyState {
  /** Last reported circulating supply */
  readonly circulatingSupply: bigint;

  /** Total burned so far (0 or burnTarget) */
  readonly burnedTotal: bigint;

  /** Amount burned when the threshold is met */
  readonly burnTarget: bigint;

  /** Threshold the circulating supply must reach */
  readonly totalSupply: bigint;

  /** One-way burn phase */
  readonly phase: BurnPhase;

  /** ISO 8601 timestamp of the burn (null before it) */
  readonly triggeredAt: string | null;
}
