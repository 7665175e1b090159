/**
 * Anchor state persistence.
 *
 * anchor.json is replaced atomically, so a crash leaves either the
 * previous or the next state.
 */

import { existsSync, mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { writeFileAtomic } from "@resonance/record-store";
import type { AnchorState, AnchorStateStore } from "./types.js";
import { AnchorError } from "./types.js";

const AnchorStateSchema = z.object({
  lastRoot: z.string().regex(/^[0-9a-f]{64}$/),
  leafCount: z.number().int().nonnegative(),
  anchoredRef: z.string().min(1),
  anchoredAt: z.string().datetime(),
});

export class InMemoryAnchorStateStore implements AnchorStateStore {
  private state: AnchorState | null;

  constructor(initial: AnchorState | null = null) {
    this.state = initial;
  }

  load(): AnchorState | null {
    return this.state;
  }

  save(state: AnchorState): void {
    this.state = state;
  }
}

export class FileAnchorStateStore implements AnchorStateStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    mkdirSync(dirname(filePath), { recursive: true });
  }

  load(): AnchorState | null {
    if (!existsSync(this.filePath)) {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      throw new AnchorError("CORRUPT_STATE", `Anchor state is not JSON: ${this.filePath}`, {
        cause: err,
      });
    }

    const parsed = AnchorStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AnchorError(
        "CORRUPT_STATE",
        `Invalid anchor state in ${this.filePath}: ${parsed.error.message}`,
      );
    }
    return parsed.data;
  }

  save(state: AnchorState): void {
    writeFileAtomic(this.filePath, JSON.stringify(state, null, 2) + "\n");
  }
}
