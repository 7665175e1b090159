import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createHash } from "node:crypto";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { SupplyState } from "@resonance/types";
import { FileSupplyStateStore, computeStateHash } from "../src/supply-store.js";

const state: SupplyState = {
  circulatingSupply: 1_021_000_000n,
  burnedTotal: 1_000_000_000n,
  burnTarget: 1_000_000_000n,
  totalSupply: 1_021_000_000n,
  phase: "TRIGGERED",
  triggeredAt: "2026-03-01T12:00:00.000Z",
};

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err: unknown) {
    return err;
  }
  return undefined;
}

describe("computeStateHash", () => {
  it("hashes the canonical JSON with amounts as strings", () => {
    const canonical =
      '{"burnTarget":"1000000000","burnedTotal":"1000000000","circulatingSupply":"1021000000",' +
      '"phase":"TRIGGERED","totalSupply":"1021000000","triggeredAt":"2026-03-01T12:00:00.000Z"}';
    expect(computeStateHash(state)).toBe(createHash("sha256").update(canonical).digest("hex"));
  });
});

describe("FileSupplyStateStore", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "resonance-supply-store-"));
    file = join(dir, "supply.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns null when nothing was saved", () => {
    expect(new FileSupplyStateStore(file).load()).toBeNull();
  });

  it("round-trips bigint amounts", () => {
    new FileSupplyStateStore(file).save(state);
    expect(new FileSupplyStateStore(file).load()).toEqual(state);
  });

  it("writes amounts as decimal strings with the state hash", () => {
    new FileSupplyStateStore(file).save(state);
    const written: unknown = JSON.parse(readFileSync(file, "utf-8"));

    expect(written).toEqual({
      state: {
        circulatingSupply: "1021000000",
        burnedTotal: "1000000000",
        burnTarget: "1000000000",
        totalSupply: "1021000000",
        phase: "TRIGGERED",
        triggeredAt: "2026-03-01T12:00:00.000Z",
      },
      stateHash: computeStateHash(state),
    });
  });

  it("rejects a tampered snapshot", () => {
    const store = new FileSupplyStateStore(file);
    store.save(state);
    const tampered = readFileSync(file, "utf-8").replace('"burnedTotal": "1000000000"', '"burnedTotal": "0"');
    writeFileSync(file, tampered);

    expect(captureError(() => store.load())).toMatchObject({ code: "CORRUPT_STATE" });
  });

  it("rejects a file that is not JSON", () => {
    writeFileSync(file, "supply");
    expect(captureError(() => new FileSupplyStateStore(file).load())).toMatchObject({
      code: "CORRUPT_STATE",
    });
  });
});
