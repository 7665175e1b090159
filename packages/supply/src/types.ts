/**
 * @resonance/supply — Core types.
 */

import type { BurnPhase, SupplyState } from "@resonance/types";

/**
 * Persistence for the supply snapshot.
 */
export interface SupplyStateStore {
  load(): SupplyState | null;
  save(state: SupplyState): void;
}

/**
 * Result of one supply report.
 */
export interface BurnEvaluation {
  /** Amount burned by this evaluation (burnTarget or 0) */
  readonly delta: bigint;

  /** True only for the evaluation that fired the burn */
  readonly triggered: boolean;

  readonly state: SupplyState;
}

/**
 * supply.json layout. Amounts are decimal strings.
 */
export interface SerializedSupplyState {
  readonly circulatingSupply: string;
  readonly burnedTotal: string;
  readonly burnTarget: string;
  readonly totalSupply: string;
  readonly phase: BurnPhase;
  readonly triggeredAt: string | null;
}

export type SupplyErrorCode = "INVALID_SUPPLY" | "CORRUPT_STATE";

export class SupplyError extends Error {
  public readonly code: SupplyErrorCode;
  constructor(code: SupplyErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SupplyError";
    this.code = code;
  }
}
