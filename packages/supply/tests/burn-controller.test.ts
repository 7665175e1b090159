/**
 * Tests for BurnController.
 *
 * Verifies:
 * - the burn fires once, at the first report reaching totalSupply
 * - later reports never burn again
 * - state survives a restart through the file store
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { BurnController } from "../src/burn-controller.js";
import { FileSupplyStateStore } from "../src/supply-store.js";
import { SupplyError } from "../src/types.js";

const TOTAL = 1_021_000_000n;
const TARGET = 1_000_000_000n;
const now = (): Date => new Date("2026-03-01T12:00:00.000Z");

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err: unknown) {
    return err;
  }
  return undefined;
}

describe("BurnController", () => {
  it("starts untriggered with nothing burned", () => {
    const controller = new BurnController({ totalSupply: TOTAL, burnTarget: TARGET });

    expect(controller.state()).toEqual({
      circulatingSupply: 0n,
      burnedTotal: 0n,
      burnTarget: TARGET,
      totalSupply: TOTAL,
      phase: "NOT_TRIGGERED",
      triggeredAt: null,
    });
    expect(controller.remaining()).toBe(TOTAL);
  });

  it("does not burn below the threshold", () => {
    const controller = new BurnController({ totalSupply: TOTAL, burnTarget: TARGET });
    const result = controller.evaluate(TOTAL - 1n);

    expect(result.delta).toBe(0n);
    expect(result.triggered).toBe(false);
    expect(result.state.circulatingSupply).toBe(TOTAL - 1n);
    expect(result.state.phase).toBe("NOT_TRIGGERED");
  });

  it("burns exactly once when the threshold is met twice", () => {
    const controller = new BurnController({ totalSupply: TOTAL, burnTarget: TARGET, now });

    const first = controller.evaluate(TOTAL);
    const second = controller.evaluate(TOTAL);

    expect(first.delta).toBe(TARGET);
    expect(first.triggered).toBe(true);
    expect(first.state.phase).toBe("TRIGGERED");
    expect(first.state.triggeredAt).toBe("2026-03-01T12:00:00.000Z");

    expect(second.delta).toBe(0n);
    expect(second.triggered).toBe(false);
    expect(second.state.burnedTotal).toBe(TARGET);
    expect(controller.remaining()).toBe(21_000_000n);
  });

  it("stays triggered after the supply drops and rises again", () => {
    const controller = new BurnController({ totalSupply: TOTAL, burnTarget: TARGET });
    controller.evaluate(TOTAL + 5n);
    controller.evaluate(10n);
    const again = controller.evaluate(TOTAL * 2n);

    expect(again.delta).toBe(0n);
    expect(again.state.burnedTotal).toBe(TARGET);
    expect(again.state.circulatingSupply).toBe(TOTAL * 2n);
  });

  it("rejects invalid parameters and reports", () => {
    expect(captureError(() => new BurnController({ totalSupply: 0n, burnTarget: 1n }))).toMatchObject({
      code: "INVALID_SUPPLY",
    });
    expect(
      captureError(() => new BurnController({ totalSupply: 10n, burnTarget: 11n })),
    ).toMatchObject({ code: "INVALID_SUPPLY" });

    const controller = new BurnController({ totalSupply: TOTAL, burnTarget: TARGET });
    const err = captureError(() => controller.evaluate(-1n));
    expect(err).toBeInstanceOf(SupplyError);
    expect(err).toMatchObject({ code: "INVALID_SUPPLY" });
  });

  describe("with a file store", () => {
    let dir: string;
    let file: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "resonance-supply-"));
      file = join(dir, "supply.json");
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("does not burn again after a restart", () => {
      const first = new BurnController({
        totalSupply: TOTAL,
        burnTarget: TARGET,
        store: new FileSupplyStateStore(file),
        now,
      });
      first.evaluate(TOTAL);

      const restarted = new BurnController({
        totalSupply: TOTAL,
        burnTarget: TARGET,
        store: new FileSupplyStateStore(file),
      });

      expect(restarted.state().phase).toBe("TRIGGERED");
      expect(restarted.evaluate(TOTAL).delta).toBe(0n);
      expect(restarted.remaining()).toBe(21_000_000n);
    });

    it("refuses a snapshot taken under other parameters", () => {
      new BurnController({
        totalSupply: TOTAL,
        burnTarget: TARGET,
        store: new FileSupplyStateStore(file),
      }).evaluate(5n);

      const err = captureError(
        () =>
          new BurnController({
            totalSupply: TOTAL,
            burnTarget: 1n,
            store: new FileSupplyStateStore(file),
          }),
      );
      expect(err).toMatchObject({ code: "INVALID_SUPPLY" });
    });
  });
});
