/**
 * Supply snapshot persistence.
 *
 * supply.json carries the state and a SHA-256 of its canonical JSON.
 * A snapshot whose hash does not match is rejected, never repaired.
 */

import { createHash } from "node:crypto";
import { existsSync, mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import { writeFileAtomic } from "@resonance/record-store";
import type { SupplyState } from "@resonance/types";
import type { SerializedSupplyState, SupplyStateStore } from "./types.js";
import { SupplyError } from "./types.js";

const amount = z.string().regex(/^\d+$/);

const SupplyFileSchema = z.object({
  state: z.object({
    circulatingSupply: amount,
    burnedTotal: amount,
    burnTarget: amount,
    totalSupply: amount,
    phase: z.enum(["NOT_TRIGGERED", "TRIGGERED"]),
    triggeredAt: z.string().datetime().nullable(),
  }),
  stateHash: z.string().regex(/^[0-9a-f]{64}$/),
});

export function serializeSupplyState(state: SupplyState): SerializedSupplyState {
  return {
    circulatingSupply: state.circulatingSupply.toString(),
    burnedTotal: state.burnedTotal.toString(),
    burnTarget: state.burnTarget.toString(),
    totalSupply: state.totalSupply.toString(),
    phase: state.phase,
    triggeredAt: state.triggeredAt,
  };
}

export function deserializeSupplyState(data: SerializedSupplyState): SupplyState {
  return {
    circulatingSupply: BigInt(data.circulatingSupply),
    burnedTotal: BigInt(data.burnedTotal),
    burnTarget: BigInt(data.burnTarget),
    totalSupply: BigInt(data.totalSupply),
    phase: data.phase,
    triggeredAt: data.triggeredAt,
  };
}

/**
 * SHA-256 of the canonical JSON of the serialized state.
 */
export function computeStateHash(state: SupplyState): string {
  return createHash("sha256")
    .update(canonicalize(serializeSupplyState(state)))
    .digest("hex");
}

export class InMemorySupplyStateStore implements SupplyStateStore {
  private state: SupplyState | null = null;

  load(): SupplyState | null {
    return this.state;
  }

  save(state: SupplyState): void {
    this.state = state;
  }
}

export class FileSupplyStateStore implements SupplyStateStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    mkdirSync(dirname(filePath), { recursive: true });
  }

  load(): SupplyState | null {
    if (!existsSync(this.filePath)) {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      throw new SupplyError("CORRUPT_STATE", `Supply snapshot is not JSON: ${this.filePath}`, {
        cause: err,
      });
    }

    const parsed = SupplyFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new SupplyError(
        "CORRUPT_STATE",
        `Invalid supply snapshot in ${this.filePath}: ${parsed.error.message}`,
      );
    }

    const state = deserializeSupplyState(parsed.data.state);
    if (computeStateHash(state) !== parsed.data.stateHash) {
      throw new SupplyError(
        "CORRUPT_STATE",
        `Supply snapshot hash mismatch in ${this.filePath}`,
      );
    }
    return state;
  }

  save(state: SupplyState): void {
    const file = { state: serializeSupplyState(state), stateHash: computeStateHash(state) };
    writeFileAtomic(this.filePath, JSON.stringify(file, null, 2) + "\n");
  }
}
