/**
 * Cursor persistence.
 *
 * cursor.json holds the last fully processed block:
 *   { "blockNumber": 1234, "updatedAt": "2026-01-01T00:00:00.000Z" }
 */

import { existsSync, mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { writeFileAtomic } from "@resonance/record-store";
import type { CursorStore } from "./types.js";
import { CursorError } from "./types.js";

const CursorFileSchema = z.object({
  blockNumber: z.number().int().nonnegative(),
  updatedAt: z.string(),
});

function assertForward(current: number | null, next: number): void {
  if (!Number.isSafeInteger(next) || next < 0) {
    throw new CursorError("CURSOR_REGRESSION", `Invalid cursor block ${next}`);
  }
  if (current !== null && next < current) {
    throw new CursorError(
      "CURSOR_REGRESSION",
      `Cursor cannot move backward from ${current} to ${next}`,
    );
  }
}

export class InMemoryCursorStore implements CursorStore {
  private blockNumber: number | null;

  constructor(initial: number | null = null) {
    this.blockNumber = initial;
  }

  load(): number | null {
    return this.blockNumber;
  }

  advance(blockNumber: number): void {
    assertForward(this.blockNumber, blockNumber);
    this.blockNumber = blockNumber;
  }
}

export class FileCursorStore implements CursorStore {
  private readonly filePath: string;
  private readonly now: () => Date;
  private cached: number | null | undefined;

  constructor(filePath: string, now: () => Date = () => new Date()) {
    this.filePath = filePath;
    this.now = now;
    mkdirSync(dirname(filePath), { recursive: true });
  }

  load(): number | null {
    if (this.cached !== undefined) {
      return this.cached;
    }
    if (!existsSync(this.filePath)) {
      this.cached = null;
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      throw new CursorError("CORRUPT_CURSOR", `Cursor file is not JSON: ${this.filePath}`, {
        cause: err,
      });
    }

    const parsed = CursorFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CursorError(
        "CORRUPT_CURSOR",
        `Invalid cursor in ${this.filePath}: ${parsed.error.message}`,
      );
    }

    this.cached = parsed.data.blockNumber;
    return this.cached;
  }

  advance(blockNumber: number): void {
    assertForward(this.load(), blockNumber);
    writeFileAtomic(
      this.filePath,
      JSON.stringify({ blockNumber, updatedAt: this.now().toISOString() }) + "\n",
    );
    this.cached = blockNumber;
  }
}
