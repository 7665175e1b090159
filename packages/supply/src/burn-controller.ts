/**
 * Burn Controller — One-time supply burn bookkeeping.
 *
 * Each supply report updates circulatingSupply and evaluates the burn:
 * the first report at or above totalSupply moves NOT_TRIGGERED →
 * TRIGGERED and adds burnTarget to burnedTotal. Every later evaluation
 * returns a zero delta, whatever the reported supply.
 *
 * Bookkeeping only: no token is moved on any chain.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { SupplyState } from "@resonance/types";
import { InMemorySupplyStateStore } from "./supply-store.js";
import type { BurnEvaluation, SupplyStateStore } from "./types.js";
import { SupplyError } from "./types.js";

export interface BurnControllerOptions {
  readonly totalSupply: bigint;
  readonly burnTarget: bigint;
  readonly store?: SupplyStateStore;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

export class BurnController {
  private readonly store: SupplyStateStore;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private current: SupplyState;

  constructor(options: BurnControllerOptions) {
    const { totalSupply, burnTarget } = options;
    if (totalSupply <= 0n) {
      throw new SupplyError("INVALID_SUPPLY", "totalSupply must be positive");
    }
    if (burnTarget <= 0n || burnTarget > totalSupply) {
      throw new SupplyError(
        "INVALID_SUPPLY",
        `burnTarget must be in (0, ${totalSupply}], got ${burnTarget}`,
      );
    }

    this.store = options.store ?? new InMemorySupplyStateStore();
    this.logger = options.logger ?? pino({ level: "silent" });
    this.now = options.now ?? (() => new Date());

    const persisted = this.store.load();
    if (persisted === null) {
      this.current = {
        circulatingSupply: 0n,
        burnedTotal: 0n,
        burnTarget,
        totalSupply,
        phase: "NOT_TRIGGERED",
        triggeredAt: null,
      };
      return;
    }

    // A snapshot taken under other parameters cannot be reinterpreted
    if (persisted.totalSupply !== totalSupply || persisted.burnTarget !== burnTarget) {
      throw new SupplyError(
        "INVALID_SUPPLY",
        `Configured supply (${totalSupply}/${burnTarget}) does not match the persisted snapshot (${persisted.totalSupply}/${persisted.burnTarget})`,
      );
    }
    this.current = persisted;
  }

  /**
   * Record a circulating supply report and apply the burn if due.
   *
   * @throws SupplyError INVALID_SUPPLY for a negative report
   */
  evaluate(circulatingSupply: bigint): BurnEvaluation {
    if (circulatingSupply < 0n) {
      throw new SupplyError("INVALID_SUPPLY", `circulatingSupply must be >= 0, got ${circulatingSupply}`);
    }

    const prev = this.current;
    const due =
      prev.phase === "NOT_TRIGGERED" &&
      circulatingSupply >= prev.totalSupply &&
      prev.burnedTotal < prev.burnTarget;

    const next: SupplyState = due
      ? {
          ...prev,
          circulatingSupply,
          burnedTotal: prev.burnedTotal + prev.burnTarget,
          phase: "TRIGGERED",
          triggeredAt: this.now().toISOString(),
        }
      : { ...prev, circulatingSupply };

    this.store.save(next);
    this.current = next;

    if (due) {
      this.logger.info(
        {
          burned: next.burnTarget.toString(),
          remaining: this.remaining().toString(),
          circulatingSupply: circulatingSupply.toString(),
        },
        "Burn triggered",
      );
    }

    return { delta: due ? next.burnTarget : 0n, triggered: due, state: next };
  }

  /** totalSupply − burnedTotal */
  remaining(): bigint {
    return this.current.totalSupply - this.current.burnedTotal;
  }

  state(): SupplyState {
    return this.current;
  }
}
